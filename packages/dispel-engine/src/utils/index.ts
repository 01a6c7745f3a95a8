/**
 * Utility Module Index
 */

export {
  distance,
  isPointInPolygon,
  isPointInBounds,
  polygonBounds,
} from './geometry';

export {
  validateDispelConfig,
  resolveDispelConfig,
  validateProjectorConfig,
  resolveProjectorConfig,
} from './dispel-config';
