/**
 * Dispel lifecycle events.
 */

import type { Point2D } from '../types';

import { createObserverHub, type ObserverHub } from './observer-hub';

export type DispelEvent =
    | { type: 'armed'; timestamp: number }
    | { type: 'stroke-started'; seed: Point2D | null; timestamp: number }
    | { type: 'stroke-cleared'; timestamp: number }
    | { type: 'dispelled'; path: Point2D[]; targetIds: string[]; timestamp: number }
    | { type: 'cancelled'; timestamp: number }
    | { type: 'released'; timestamp: number };

export type DispelEventType = DispelEvent['type'];

export type DispelEventHub = ObserverHub<DispelEvent>;

export function createDispelEventHub(): DispelEventHub {
    return createObserverHub<DispelEvent>('Dispel');
}
