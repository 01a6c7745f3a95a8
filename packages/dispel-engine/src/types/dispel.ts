/**
 * Dispel Types
 *
 * Session, configuration and collaborator contracts for the gesture-based
 * enclosure mechanic. The host supplies pointer input, a cursor controller,
 * the live target set and a camera; the mechanic answers with removal
 * requests and feedback data.
 */

import type { Vector3 } from 'three';

import type { Point2D } from './index';

// =============================================================================
// Session
// =============================================================================

/**
 * dormant: mechanic off, cursor captured.
 * armed: cursor freed, waiting for the press that starts a stroke.
 * drawing: a stroke is (or can be) recorded.
 */
export type DispelMode = 'dormant' | 'armed' | 'drawing';

export interface DispelSessionSnapshot {
    mode: DispelMode;
    active: boolean;
    drawing: boolean;
    path: Point2D[];
}

// =============================================================================
// Configuration
// =============================================================================

export interface DispelConfig {
    /** Seconds between two recorded path points. */
    segmentInterval: number;
    /** Max distance (window px) between pointer and first point to close the loop. */
    closureDistance: number;
    /** Points required before a closure is attempted. */
    minPoints: number;
    /** Min distance (window px) between consecutive recorded points. */
    minPointDistance: number;
    /** Distance in front of the camera at which feedback points are placed (world units). */
    gizmoDepth: number;
}

export const DEFAULT_DISPEL_CONFIG: DispelConfig = {
    segmentInterval: 0.05,
    closureDistance: 30,
    minPoints: 10,
    minPointDistance: 5,
    gizmoDepth: 0.5,
};

export interface ProjectorConfig {
    /** The scene renders at 1/canvasScale of the window resolution. */
    canvasScale: number;
}

export const DEFAULT_PROJECTOR_CONFIG: ProjectorConfig = {
    canvasScale: 2,
};

// =============================================================================
// Collaborators
// =============================================================================

/** Pointer state sampled by the host once per frame. */
export interface DispelFrameInput {
    deltaSeconds: number;
    /** null while the pointer is outside the window. */
    cursor: Point2D | null;
    primaryJustPressed: boolean;
    primaryPressed: boolean;
    primaryJustReleased: boolean;
    secondaryJustPressed: boolean;
    paused?: boolean;
}

export type CursorGrab = 'locked' | 'free';
export type CursorIcon = 'default' | 'feather';

export interface CursorPresentation {
    grab: CursorGrab;
    visible: boolean;
    icon: CursorIcon;
}

export const FREE_CURSOR: Readonly<CursorPresentation> = {
    grab: 'free',
    visible: true,
    icon: 'feather',
};

export const CAPTURED_CURSOR: Readonly<CursorPresentation> = {
    grab: 'locked',
    visible: false,
    icon: 'default',
};

export interface CursorController {
    apply: (presentation: CursorPresentation) => void;
}

export interface DispelTarget {
    id: string;
    position: Vector3;
}

export interface TargetRegistry {
    /** Must reflect the current frame; removed targets are not listed. */
    listTargets: () => Iterable<DispelTarget>;
}

// =============================================================================
// Feedback
// =============================================================================

export interface FeedbackMarker {
    center: Vector3;
    radius: number;
}

export interface DispelFeedback {
    /** World-space line strip through the drawn path, null when fewer than two points project. */
    polyline: Vector3[] | null;
    startMarker: FeedbackMarker | null;
    cursorMarker: FeedbackMarker | null;
}

export interface DispelUpdateResult {
    mode: DispelMode;
    active: boolean;
    path: Point2D[];
    /** Target ids flagged for removal this frame; empty unless a loop closed. */
    removedTargetIds: string[];
    feedback: DispelFeedback | null;
}
