/**
 * Frame Loop
 *
 * rAF-based loop that calls `step` once per frame with the elapsed time in
 * seconds. Falls back to setTimeout at `minFrameMs` outside the browser.
 */

export interface FrameLoop {
    start: () => void;
    stop: () => void;
    isRunning: () => boolean;
}

export interface FrameLoopOptions {
    minFrameMs?: number;
    /** Upper bound for one step's delta, so a stalled tab does not produce a huge jump. */
    maxDeltaSeconds?: number;
}

export function createFrameLoop(
    step: (deltaSeconds: number) => void,
    options: FrameLoopOptions = {}
): FrameLoop {
    const minFrameMs = Math.max(options.minFrameMs ?? 16, 0);
    const maxDeltaSeconds = Math.max(options.maxDeltaSeconds ?? 0.25, 0);
    let frameHandle: ReturnType<typeof setTimeout> | number | null = null;
    let lastFrameTs: number | null = null;
    let running = false;

    const hasAnimationFrame = () =>
        typeof window !== 'undefined' && typeof window.requestAnimationFrame === 'function';

    const cancel = () => {
        if (frameHandle === null) return;
        if (typeof frameHandle === 'number' && hasAnimationFrame()) {
            window.cancelAnimationFrame(frameHandle);
        } else {
            clearTimeout(frameHandle);
        }
        frameHandle = null;
    };

    const request = (callback: (ts: number) => void) => {
        if (hasAnimationFrame()) {
            frameHandle = window.requestAnimationFrame(callback);
            return;
        }
        frameHandle = setTimeout(() => callback(Date.now()), minFrameMs);
    };

    const onFrame = (nowTs: number) => {
        frameHandle = null;
        if (!running) return;

        const deltaSeconds =
            lastFrameTs === null ? 0 : Math.min(Math.max((nowTs - lastFrameTs) / 1000, 0), maxDeltaSeconds);
        lastFrameTs = nowTs;

        try {
            step(deltaSeconds);
        } finally {
            if (running) request(onFrame);
        }
    };

    return {
        start: () => {
            if (running) return;
            running = true;
            lastFrameTs = null;
            request(onFrame);
        },
        stop: () => {
            running = false;
            lastFrameTs = null;
            cancel();
        },
        isRunning: () => running,
    };
}
