import { OrthographicCamera, PerspectiveCamera } from 'three';

import type { CursorPresentation, DispelFrameInput, Point2D, ViewportSize } from '../src/types';
import { SpatialProjector } from '../src/projection/SpatialProjector';

export const VIEWPORT: ViewportSize = { width: 400, height: 400 };

export function expectPointClose(actual: Point2D | null, expected: Point2D, tolerance = 1e-4): void {
    expect(actual).not.toBeNull();
    if (!actual) return;
    expect(Math.abs(actual.x - expected.x)).toBeLessThanOrEqual(tolerance);
    expect(Math.abs(actual.y - expected.y)).toBeLessThanOrEqual(tolerance);
}

export function toPoint(x: number, y: number): Point2D {
    return { x, y };
}

/** 90 degree square camera at the origin looking down -Z. */
export function buildCamera(): PerspectiveCamera {
    const camera = new PerspectiveCamera(90, 1, 0.1, 100);
    camera.updateMatrixWorld();
    return camera;
}

export function buildOrthographicCamera(): OrthographicCamera {
    const camera = new OrthographicCamera(-10, 10, 10, -10, 0.1, 100);
    camera.updateMatrixWorld();
    return camera;
}

export function buildProjector(
    camera: PerspectiveCamera | OrthographicCamera | null = buildCamera(),
    canvasScale = 2
): SpatialProjector {
    return new SpatialProjector({
        getCamera: () => camera,
        getViewportSize: () => VIEWPORT,
        config: { canvasScale },
    });
}

export function frame(overrides: Partial<DispelFrameInput> = {}): DispelFrameInput {
    return {
        deltaSeconds: 0.05,
        cursor: null,
        primaryJustPressed: false,
        primaryPressed: false,
        primaryJustReleased: false,
        secondaryJustPressed: false,
        ...overrides,
    };
}

export function recordingCursor(): { apply: (presentation: CursorPresentation) => void; calls: CursorPresentation[] } {
    const calls: CursorPresentation[] = [];
    return {
        apply: (presentation) => {
            calls.push(presentation);
        },
        calls,
    };
}
