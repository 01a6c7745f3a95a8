/**
 * Dispel Slice
 *
 * Gesture session state: the mode, the path being drawn and the segment
 * timer that gates sampling. Uses the Zustand slice pattern with immer.
 */

import type { StateCreator } from 'zustand/vanilla';

import type { DispelMode, DispelSessionSnapshot, Point2D } from '../../types';

// =============================================================================
// Types
// =============================================================================

export interface DispelSliceState {
    mode: DispelMode;
    /** Window-space points in drawing order; empty unless mode is 'drawing'. */
    path: Point2D[];
    /** Seconds accumulated towards the next sample. */
    segmentElapsed: number;
}

export interface DispelSliceActions {
    arm: () => void;
    beginStroke: (seed: Point2D | null) => void;
    clearStroke: () => void;
    /** Advances the repeating segment timer; true when it fired this tick. */
    tickSegmentTimer: (deltaSeconds: number, intervalSeconds: number) => boolean;
    appendPoint: (point: Point2D) => void;
    /** Appends the closing vertex and returns the closed path. */
    closeLoop: (point: Point2D) => Point2D[];
    deactivate: () => void;
}

export type DispelSlice = DispelSliceState & DispelSliceActions;

// =============================================================================
// Slice Creator
// =============================================================================

export const createDispelSlice: StateCreator<
    DispelSlice,
    [['zustand/immer', never]],
    [],
    DispelSlice
> = (set, get) => ({
    // Initial State
    mode: 'dormant',
    path: [],
    segmentElapsed: 0,

    // Actions
    arm: () =>
        set((state) => {
            state.mode = 'armed';
            state.path = [];
            state.segmentElapsed = 0;
        }),

    beginStroke: (seed) =>
        set((state) => {
            state.mode = 'drawing';
            state.path = seed ? [{ x: seed.x, y: seed.y }] : [];
            state.segmentElapsed = 0;
        }),

    clearStroke: () =>
        set((state) => {
            state.path = [];
        }),

    tickSegmentTimer: (deltaSeconds, intervalSeconds) => {
        const delta = Number.isFinite(deltaSeconds) && deltaSeconds > 0 ? deltaSeconds : 0;
        const elapsed = get().segmentElapsed + delta;
        if (elapsed < intervalSeconds) {
            set({ segmentElapsed: elapsed });
            return false;
        }
        set({ segmentElapsed: elapsed % intervalSeconds });
        return true;
    },

    appendPoint: (point) =>
        set((state) => {
            if (state.mode !== 'drawing') return;
            state.path.push({ x: point.x, y: point.y });
        }),

    closeLoop: (point) => {
        get().appendPoint(point);
        return get().path.map((vertex) => ({ ...vertex }));
    },

    deactivate: () =>
        set((state) => {
            state.mode = 'dormant';
            state.path = [];
            state.segmentElapsed = 0;
        }),
});

// =============================================================================
// Selectors
// =============================================================================

export function isDispelActive(state: DispelSliceState): boolean {
    return state.mode !== 'dormant';
}

export function getDispelSessionSnapshot(state: DispelSliceState): DispelSessionSnapshot {
    return {
        mode: state.mode,
        active: isDispelActive(state),
        drawing: state.mode === 'drawing',
        path: state.path.map((point) => ({ ...point })),
    };
}
