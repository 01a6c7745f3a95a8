/**
 * SpatialProjector
 *
 * Maps between window space (pointer coordinates), viewport space (the
 * reduced-resolution render target) and world space through the active
 * three.js camera. The canvas scale lives here and nowhere else: window
 * coordinates are viewport coordinates multiplied by `canvasScale`.
 */

import { Ray, Raycaster, Vector2, Vector3 } from 'three';
import type { Camera } from 'three';

import type { Point2D, ProjectorConfig, ViewportSize } from '../types';
import { resolveProjectorConfig } from '../utils/dispel-config';

export interface SpatialProjectorOptions {
  /** Active camera, or null when none is available this frame. Matrices must be current. */
  getCamera: () => Camera | null;
  /** Render target size in viewport pixels, or null before the target exists. */
  getViewportSize: () => ViewportSize | null;
  config?: Partial<ProjectorConfig>;
}

function isUsableViewport(size: ViewportSize | null): size is ViewportSize {
  return (
    size !== null &&
    Number.isFinite(size.width) &&
    Number.isFinite(size.height) &&
    size.width > 0 &&
    size.height > 0
  );
}

export class SpatialProjector {
  private readonly options: SpatialProjectorOptions;
  readonly config: ProjectorConfig;
  private readonly raycaster = new Raycaster();
  private readonly ndc = new Vector2();

  constructor(options: SpatialProjectorOptions) {
    this.options = options;
    this.config = resolveProjectorConfig(options.config);
  }

  hasCamera(): boolean {
    return this.options.getCamera() !== null;
  }

  /**
   * Projects a world point to window coordinates. Null when the point is
   * behind the camera, outside the depth range, or nothing can be projected.
   */
  worldToScreen(world: Vector3): Point2D | null {
    const camera = this.options.getCamera();
    const viewport = this.options.getViewportSize();
    if (!camera || !isUsableViewport(viewport)) return null;

    const ndc = world.clone().project(camera);
    if (!Number.isFinite(ndc.x) || !Number.isFinite(ndc.y) || !Number.isFinite(ndc.z)) {
      return null;
    }
    if (ndc.z < -1 || ndc.z > 1) return null;

    const viewportX = ((ndc.x + 1) / 2) * viewport.width;
    const viewportY = ((1 - ndc.y) / 2) * viewport.height;
    return {
      x: viewportX * this.config.canvasScale,
      y: viewportY * this.config.canvasScale,
    };
  }

  /** World-space ray through a window point. */
  screenToWorldRay(screen: Point2D): Ray | null {
    const camera = this.options.getCamera();
    const viewport = this.options.getViewportSize();
    if (!camera || !isUsableViewport(viewport)) return null;
    if (!('isPerspectiveCamera' in camera) && !('isOrthographicCamera' in camera)) return null;

    const viewportX = screen.x / this.config.canvasScale;
    const viewportY = screen.y / this.config.canvasScale;
    this.ndc.set((viewportX / viewport.width) * 2 - 1, 1 - (viewportY / viewport.height) * 2);
    if (!Number.isFinite(this.ndc.x) || !Number.isFinite(this.ndc.y)) return null;

    this.raycaster.setFromCamera(this.ndc, camera);
    const { origin, direction } = this.raycaster.ray;
    if (
      ![origin.x, origin.y, origin.z, direction.x, direction.y, direction.z].every(Number.isFinite) ||
      direction.lengthSq() === 0
    ) {
      return null;
    }
    return this.raycaster.ray.clone();
  }

  /** Point `depth` world units along the ray through a window point. */
  screenToWorldPoint(screen: Point2D, depth: number): Vector3 | null {
    const ray = this.screenToWorldRay(screen);
    if (!ray) return null;
    return ray.at(depth, new Vector3());
  }
}
