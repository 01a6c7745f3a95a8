/**
 * Planar geometry helpers for drawn paths.
 * Turf.js is used for bounds; metric work stays in window pixels.
 */

import * as turf from '@turf/turf';

import type { Bounds2D, Point2D } from '../types';

export function distance(a: Point2D, b: Point2D): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

/**
 * Even-odd ray casting. Points exactly on an edge get whichever parity the
 * arithmetic produces; the answer is stable for identical inputs.
 */
export function isPointInPolygon(point: Point2D, polygon: Point2D[]): boolean {
  if (polygon.length < 3) return false;
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const pi = polygon[i];
    const pj = polygon[j];
    if (!pi || !pj) continue;
    if (
      (pi.y > point.y) !== (pj.y > point.y) &&
      point.x < ((pj.x - pi.x) * (point.y - pi.y)) / (pj.y - pi.y) + pi.x
    ) {
      inside = !inside;
    }
  }
  return inside;
}

export function polygonBounds(points: Point2D[]): Bounds2D | null {
  if (points.length === 0) return null;
  if (points.length === 1) {
    const only = points[0];
    if (!only) return null;
    return { minX: only.x, minY: only.y, maxX: only.x, maxY: only.y };
  }
  const [minX, minY, maxX, maxY] = turf.bbox(
    turf.lineString(points.map((point) => [point.x, point.y]))
  );
  return { minX, minY, maxX, maxY };
}

export function isPointInBounds(point: Point2D, bounds: Bounds2D): boolean {
  return (
    point.x >= bounds.minX &&
    point.x <= bounds.maxX &&
    point.y >= bounds.minY &&
    point.y <= bounds.maxY
  );
}
