import type { DispelConfig, Point2D } from '../types';
import { distance } from '../utils/geometry';

/**
 * True when the live pointer is back within `closureDistance` of the first
 * point of a path that already has at least `minPoints` points.
 */
export function detectClosure(
  path: readonly Point2D[],
  cursor: Point2D | null,
  config: Pick<DispelConfig, 'minPoints' | 'closureDistance'>
): boolean {
  if (!cursor || path.length < config.minPoints) return false;
  const first = path[0];
  if (!first) return false;
  return distance(cursor, first) <= config.closureDistance;
}
