/**
 * Core Types
 *
 * Shared geometric primitives plus the dispel mechanic's public types.
 */

// =============================================================================
// Geometry Primitives
// =============================================================================

/** 2-D point in window (logical pointer) space, y pointing down. */
export interface Point2D {
    x: number;
    y: number;
}

export interface Bounds2D {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

/** Size of the render target the camera draws into, in viewport pixels. */
export interface ViewportSize {
    width: number;
    height: number;
}

export * from './dispel';
