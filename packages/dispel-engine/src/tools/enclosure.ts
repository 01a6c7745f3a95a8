/**
 * Enclosure test: which targets, seen through the camera, fall inside a
 * closed gesture loop.
 */

import type { DispelTarget, Point2D } from '../types';
import type { SpatialProjector } from '../projection/SpatialProjector';
import { isPointInBounds, isPointInPolygon, polygonBounds } from '../utils/geometry';

export type WorldToScreen = Pick<SpatialProjector, 'worldToScreen'>;

export function findEnclosedTargets(
  loop: readonly Point2D[],
  targets: Iterable<DispelTarget>,
  projector: WorldToScreen
): string[] {
  if (loop.length < 3) return [];
  const polygon = [...loop];
  const bounds = polygonBounds(polygon);
  if (!bounds) return [];

  const enclosed = new Set<string>();
  for (const target of targets) {
    if (enclosed.has(target.id)) continue;
    // Targets that do not project (behind the camera etc.) are never enclosed.
    const screen = projector.worldToScreen(target.position);
    if (!screen) continue;
    if (!isPointInBounds(screen, bounds)) continue;
    if (isPointInPolygon(screen, polygon)) {
      enclosed.add(target.id);
    }
  }
  return [...enclosed];
}
