/**
 * @veilward/dispel-engine
 *
 * Freehand enclosure ("dispel") mechanic: sample a pointer stroke, detect
 * when it closes into a loop, and report which world targets the loop
 * encloses as seen through the camera.
 */

// Tool + pipeline
export * from './tools';

// Session store
export * from './store';

// Projection
export { SpatialProjector, type SpatialProjectorOptions } from './projection/SpatialProjector';

// Events
export * from './events';

// Runtime
export * from './runtime';

// Utilities
export * from './utils';

// Types
export * from './types';
