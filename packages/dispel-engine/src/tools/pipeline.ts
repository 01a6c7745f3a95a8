/**
 * Dispel frame pipeline.
 *
 * One frame is a fixed sequence of steps over the session store:
 * mode toggle -> sampling -> closure/enclosure -> cancel. Every step reads
 * the store fresh, so a transition made by an earlier step is visible to
 * the later ones in the same frame.
 */

import {
  CAPTURED_CURSOR,
  FREE_CURSOR,
  type CursorController,
  type DispelConfig,
  type DispelFrameInput,
  type TargetRegistry,
} from '../types';
import type { DispelEventHub } from '../events';
import type { DispelSessionStore } from '../store';
import type { SpatialProjector } from '../projection/SpatialProjector';

import { detectClosure } from './closure';
import { findEnclosedTargets } from './enclosure';
import { samplePointer } from './sampler';

export interface DispelStepContext {
  session: DispelSessionStore;
  input: DispelFrameInput;
  config: DispelConfig;
  projector: SpatialProjector;
  cursor: CursorController;
  targets: TargetRegistry;
  events: DispelEventHub;
  requestRemoval: (targetIds: string[]) => void;
  now: () => number;
}

export type DispelStep = (context: DispelStepContext) => void;

// =============================================================================
// Steps
// =============================================================================

export const toggleMode: DispelStep = ({ session, input, cursor, events, now }) => {
  if (!input.primaryJustPressed) return;
  const state = session.getState();

  if (state.mode === 'dormant') {
    state.arm();
    cursor.apply({ ...FREE_CURSOR });
    events.notify({ type: 'armed', timestamp: now() });
    return;
  }

  // Pressing again while drawing only starts over once the previous stroke was released.
  if (state.mode === 'armed' || state.path.length === 0) {
    state.beginStroke(input.cursor);
    events.notify({
      type: 'stroke-started',
      seed: input.cursor ? { ...input.cursor } : null,
      timestamp: now(),
    });
  }
};

export const samplePath: DispelStep = ({ session, input, config, events, now }) => {
  const state = session.getState();
  if (state.mode !== 'drawing') return;

  if (input.primaryJustReleased) {
    state.clearStroke();
    events.notify({ type: 'stroke-cleared', timestamp: now() });
    return;
  }

  samplePointer(session, input, config);
};

export const closeAndDispel: DispelStep = (context) => {
  const { session, input, config, projector, targets, events, now } = context;
  // Cancel wins over closure in the same frame.
  if (input.secondaryJustPressed) return;

  const state = session.getState();
  if (state.mode !== 'drawing') return;
  if (!detectClosure(state.path, input.cursor, config) || !input.cursor) return;

  const loop = state.closeLoop(input.cursor);

  let targetIds: string[] = [];
  if (projector.hasCamera()) {
    targetIds = findEnclosedTargets(loop, targets.listTargets(), projector);
  } else {
    console.warn('Dispel loop closed without an active camera; no targets tested');
  }

  session.getState().deactivate();
  context.cursor.apply({ ...CAPTURED_CURSOR });
  context.requestRemoval(targetIds);
  events.notify({ type: 'dispelled', path: loop, targetIds, timestamp: now() });
};

export const cancelOnSecondary: DispelStep = ({ session, input, cursor, events, now }) => {
  if (!input.secondaryJustPressed) return;
  const state = session.getState();
  if (state.mode === 'dormant') return;

  state.deactivate();
  cursor.apply({ ...CAPTURED_CURSOR });
  events.notify({ type: 'cancelled', timestamp: now() });
};

export const DISPEL_PIPELINE: readonly DispelStep[] = [
  toggleMode,
  samplePath,
  closeAndDispel,
  cancelOnSecondary,
];

export function runDispelPipeline(
  context: DispelStepContext,
  steps: readonly DispelStep[] = DISPEL_PIPELINE
): void {
  if (context.input.paused) return;
  for (const step of steps) {
    step(context);
  }
}
