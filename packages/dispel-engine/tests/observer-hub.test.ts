import { afterEach, describe, expect, it, vi } from 'vitest';

import { createObserverHub } from '../src/events/observer-hub';

describe('observer hub', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('notifies subscribers until they unsubscribe', () => {
        const hub = createObserverHub<number>();
        const seen: number[] = [];
        const unsubscribe = hub.subscribe((value) => seen.push(value));

        hub.notify(1);
        unsubscribe();
        hub.notify(2);

        expect(seen).toEqual([1]);
        expect(hub.size()).toBe(0);
    });

    it('keeps notifying when one observer throws', () => {
        const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const hub = createObserverHub<string>('Dispel');
        const seen: string[] = [];
        const failure = new Error('boom');

        hub.subscribe(() => {
            throw failure;
        });
        hub.subscribe((value) => seen.push(value));
        hub.notify('dispelled');

        expect(seen).toEqual(['dispelled']);
        expect(error).toHaveBeenCalledWith('Dispel listener failed', failure);
    });

    it('drops every observer on clear', () => {
        const hub = createObserverHub<number>();
        hub.subscribe(() => undefined);
        hub.subscribe(() => undefined);
        hub.clear();
        expect(hub.size()).toBe(0);
    });
});
