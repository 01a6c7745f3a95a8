/**
 * Observer Hub
 *
 * Small observer implementation used for decoupled event notifications.
 * A throwing observer is logged and does not stop the others.
 */

export type Observer<T> = (value: T) => void;

export interface ObserverHub<T> {
    subscribe: (observer: Observer<T>) => () => void;
    notify: (value: T) => void;
    clear: () => void;
    size: () => number;
}

export function createObserverHub<T>(label = 'Observer'): ObserverHub<T> {
    const observers = new Set<Observer<T>>();

    return {
        subscribe: (observer) => {
            observers.add(observer);
            return () => {
                observers.delete(observer);
            };
        },
        notify: (value) => {
            observers.forEach((observer) => {
                try {
                    observer(value);
                } catch (error) {
                    console.error(`${label} listener failed`, error);
                }
            });
        },
        clear: () => {
            observers.clear();
        },
        size: () => observers.size,
    };
}
