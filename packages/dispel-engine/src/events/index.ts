export { createObserverHub, type Observer, type ObserverHub } from './observer-hub';
export {
    createDispelEventHub,
    type DispelEvent,
    type DispelEventHub,
    type DispelEventType,
} from './dispel-events';
