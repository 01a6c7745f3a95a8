import {
  CAPTURED_CURSOR,
  type CursorController,
  type DispelConfig,
  type DispelFrameInput,
  type DispelMode,
  type DispelSessionSnapshot,
  type DispelUpdateResult,
  type Point2D,
  type TargetRegistry,
} from '../types';
import { createDispelEventHub, type DispelEvent, type DispelEventHub } from '../events';
import { createDispelSessionStore, getDispelSessionSnapshot, isDispelActive, type DispelSessionStore } from '../store';
import type { SpatialProjector } from '../projection/SpatialProjector';
import { resolveDispelConfig } from '../utils/dispel-config';

import { buildDispelFeedback } from './feedback';
import { DISPEL_PIPELINE, runDispelPipeline, type DispelStepContext } from './pipeline';

export interface DispelToolOptions {
  cursor: CursorController;
  targets: TargetRegistry;
  projector: SpatialProjector;
  /** Called once per closed loop with the ids to despawn (possibly none). */
  onDispel?: (targetIds: string[]) => void;
  config?: Partial<DispelConfig>;
  /** Session to drive; a fresh one is created when omitted. */
  session?: DispelSessionStore;
  now?: () => number;
}

/**
 * Freehand enclosure mechanic for one scene. Call `update` once per frame
 * with that frame's pointer state; targets enclosed by a closed loop are
 * reported through `onDispel` and the returned result.
 */
export class DispelTool {
  private readonly options: DispelToolOptions;
  private readonly config: DispelConfig;
  private readonly session: DispelSessionStore;
  private readonly events: DispelEventHub;
  private disposed = false;

  constructor(options: DispelToolOptions) {
    this.options = options;
    this.config = resolveDispelConfig(options.config);
    this.session = options.session ?? createDispelSessionStore();
    this.events = createDispelEventHub();
  }

  getConfig(): DispelConfig {
    return { ...this.config };
  }

  getSession(): DispelSessionStore {
    return this.session;
  }

  getMode(): DispelMode {
    return this.session.getState().mode;
  }

  isActive(): boolean {
    return isDispelActive(this.session.getState());
  }

  getPath(): Point2D[] {
    return this.session.getState().path.map((point) => ({ ...point }));
  }

  getSnapshot(): DispelSessionSnapshot {
    return getDispelSessionSnapshot(this.session.getState());
  }

  subscribe(listener: (event: DispelEvent) => void): () => void {
    return this.events.subscribe(listener);
  }

  update(input: DispelFrameInput): DispelUpdateResult {
    if (this.disposed) {
      return { mode: 'dormant', active: false, path: [], removedTargetIds: [], feedback: null };
    }

    const removedTargetIds: string[] = [];
    const context: DispelStepContext = {
      session: this.session,
      input,
      config: this.config,
      projector: this.options.projector,
      cursor: this.options.cursor,
      targets: this.options.targets,
      events: this.events,
      requestRemoval: (targetIds) => {
        removedTargetIds.push(...targetIds);
        this.options.onDispel?.([...targetIds]);
      },
      now: this.options.now ?? Date.now,
    };
    runDispelPipeline(context, DISPEL_PIPELINE);

    const snapshot = this.getSnapshot();
    const feedback =
      snapshot.active && !input.paused
        ? buildDispelFeedback(snapshot.path, input.cursor, this.options.projector, this.config)
        : null;

    return {
      mode: snapshot.mode,
      active: snapshot.active,
      path: snapshot.path,
      removedTargetIds,
      feedback,
    };
  }

  /** Scene teardown: drops the session and gives the cursor back to the host. */
  dispose(): void {
    if (this.disposed) return;
    const wasActive = this.isActive();
    this.session.getState().deactivate();
    if (wasActive) {
      this.options.cursor.apply({ ...CAPTURED_CURSOR });
    }
    this.events.notify({ type: 'released', timestamp: (this.options.now ?? Date.now)() });
    this.events.clear();
    this.disposed = true;
  }
}
