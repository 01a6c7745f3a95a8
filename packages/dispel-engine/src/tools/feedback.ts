/**
 * Feedback data for the drawn loop: the path lifted into world space just in
 * front of the camera, a marker on the start point and one on the pointer.
 * Drawing it is up to the host renderer.
 */

import type { Vector3 } from 'three';

import type { DispelConfig, DispelFeedback, Point2D } from '../types';
import type { SpatialProjector } from '../projection/SpatialProjector';

export const START_MARKER_RADIUS_FACTOR = 0.02;
export const CURSOR_MARKER_RADIUS_FACTOR = 0.005;

export type ScreenToWorld = Pick<SpatialProjector, 'screenToWorldPoint'>;

export function buildDispelFeedback(
  path: readonly Point2D[],
  cursor: Point2D | null,
  projector: ScreenToWorld,
  config: Pick<DispelConfig, 'gizmoDepth'>
): DispelFeedback | null {
  const first = path[0];
  if (!first || path.length < 2) return null;

  const depth = config.gizmoDepth;
  const worldPoints = path
    .map((point) => projector.screenToWorldPoint(point, depth))
    .filter((point): point is Vector3 => point !== null);

  const start = projector.screenToWorldPoint(first, depth);
  const pointer = cursor ? projector.screenToWorldPoint(cursor, depth) : null;

  return {
    polyline: worldPoints.length >= 2 ? worldPoints : null,
    startMarker: start ? { center: start, radius: depth * START_MARKER_RADIUS_FACTOR } : null,
    cursorMarker: pointer ? { center: pointer, radius: depth * CURSOR_MARKER_RADIUS_FACTOR } : null,
  };
}
