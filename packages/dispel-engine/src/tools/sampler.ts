import type { DispelConfig, DispelFrameInput, Point2D } from '../types';
import type { DispelSessionStore } from '../store';
import { distance } from '../utils/geometry';

/** A candidate is kept only when it moved strictly more than `minDistance` from the last point. */
export function shouldRecordPoint(
  last: Point2D | undefined,
  candidate: Point2D,
  minDistance: number
): boolean {
  if (!last) return true;
  return distance(last, candidate) > minDistance;
}

/**
 * Ticks the segment timer while the primary button is held and records the
 * pointer when the timer fires. Returns true when a point was appended.
 */
export function samplePointer(
  session: DispelSessionStore,
  input: DispelFrameInput,
  config: DispelConfig
): boolean {
  const state = session.getState();
  if (state.mode !== 'drawing' || !input.primaryPressed) return false;

  const fired = state.tickSegmentTimer(input.deltaSeconds, config.segmentInterval);
  if (!fired || !input.cursor) return false;

  const path = session.getState().path;
  if (!shouldRecordPoint(path[path.length - 1], input.cursor, config.minPointDistance)) {
    return false;
  }
  session.getState().appendPoint(input.cursor);
  return true;
}
