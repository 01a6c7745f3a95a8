import { describe, expect, it } from 'vitest';
import { PerspectiveCamera, Vector3 } from 'three';

import { SpatialProjector } from '../src/projection/SpatialProjector';
import {
    buildCamera,
    buildOrthographicCamera,
    buildProjector,
    expectPointClose,
    toPoint,
    VIEWPORT,
} from './test-utils';

describe('spatial projector', () => {
    it('projects world points into window space through the canvas scale', () => {
        const projector = buildProjector();
        expectPointClose(projector.worldToScreen(new Vector3(0, 0, -10)), toPoint(400, 400));
        expectPointClose(projector.worldToScreen(new Vector3(5, 0, -10)), toPoint(600, 400));
        expectPointClose(projector.worldToScreen(new Vector3(0, 5, -10)), toPoint(400, 200));
    });

    it('uses the configured scale', () => {
        const projector = buildProjector(buildCamera(), 1);
        expectPointClose(projector.worldToScreen(new Vector3(5, 0, -10)), toPoint(300, 200));
    });

    it('fails for points behind the camera or past the far plane', () => {
        const projector = buildProjector();
        expect(projector.worldToScreen(new Vector3(0, 0, 10))).toBeNull();
        expect(projector.worldToScreen(new Vector3(0, 0, -200))).toBeNull();
    });

    it('follows the camera transform', () => {
        const camera = new PerspectiveCamera(90, 1, 0.1, 100);
        camera.position.set(0, 0, 10);
        camera.updateMatrixWorld();
        const projector = buildProjector(camera);

        expectPointClose(projector.worldToScreen(new Vector3(0, 0, 0)), toPoint(400, 400));
        expect(projector.worldToScreen(new Vector3(0, 0, 20))).toBeNull();
    });

    it('returns null without a camera or a usable viewport', () => {
        expect(buildProjector(null).worldToScreen(new Vector3(0, 0, -10))).toBeNull();
        expect(buildProjector(null).screenToWorldRay(toPoint(400, 400))).toBeNull();

        const camera = buildCamera();
        const collapsed = new SpatialProjector({
            getCamera: () => camera,
            getViewportSize: () => ({ width: 0, height: 0 }),
        });
        expect(collapsed.worldToScreen(new Vector3(0, 0, -10))).toBeNull();
        expect(collapsed.screenToWorldPoint(toPoint(10, 10), 1)).toBeNull();
    });

    it('builds a ray from the camera through a window point', () => {
        const ray = buildProjector().screenToWorldRay(toPoint(400, 400));
        expect(ray).not.toBeNull();
        if (!ray) return;
        expect(ray.origin.length()).toBeCloseTo(0, 6);
        expect(ray.direction.x).toBeCloseTo(0, 6);
        expect(ray.direction.y).toBeCloseTo(0, 6);
        expect(ray.direction.z).toBeCloseTo(-1, 6);
    });

    it('places screen points at a fixed depth', () => {
        const point = buildProjector().screenToWorldPoint(toPoint(400, 400), 0.5);
        expect(point).not.toBeNull();
        if (!point) return;
        expect(point.x).toBeCloseTo(0, 6);
        expect(point.y).toBeCloseTo(0, 6);
        expect(point.z).toBeCloseTo(-0.5, 6);
    });

    it('round-trips window points through world space', () => {
        const projector = buildProjector();
        const world = projector.screenToWorldPoint(toPoint(600, 200), 0.5);
        expect(world).not.toBeNull();
        if (!world) return;
        expect(world.length()).toBeCloseTo(0.5, 6);
        expectPointClose(projector.worldToScreen(world), toPoint(600, 200), 1e-3);
    });

    it('supports orthographic cameras', () => {
        const projector = buildProjector(buildOrthographicCamera());
        expectPointClose(projector.worldToScreen(new Vector3(5, 0, -10)), toPoint(600, 400));

        const point = projector.screenToWorldPoint(toPoint(600, 400), 0.5);
        expect(point).not.toBeNull();
        if (!point) return;
        expect(point.x).toBeCloseTo(5, 6);
        expect(point.y).toBeCloseTo(0, 6);
        expect(point.z).toBeCloseTo(-0.5, 6);
    });

    it('rejects an invalid canvas scale', () => {
        expect(
            () =>
                new SpatialProjector({
                    getCamera: () => null,
                    getViewportSize: () => VIEWPORT,
                    config: { canvasScale: 0 },
                })
        ).toThrow('Invalid projector config: canvasScale must be a positive number');
    });
});
