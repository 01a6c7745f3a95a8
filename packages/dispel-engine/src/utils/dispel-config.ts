/**
 * Dispel configuration merge + validation.
 */

import {
    DEFAULT_DISPEL_CONFIG,
    DEFAULT_PROJECTOR_CONFIG,
    type DispelConfig,
    type ProjectorConfig,
} from '../types';

function isPositive(value: number): boolean {
    return Number.isFinite(value) && value > 0;
}

export function validateDispelConfig(config: DispelConfig): string[] {
    const errors: string[] = [];
    if (!isPositive(config.segmentInterval)) errors.push('segmentInterval must be a positive number');
    if (!isPositive(config.closureDistance)) errors.push('closureDistance must be a positive number');
    if (!Number.isInteger(config.minPoints)) {
        errors.push('minPoints must be an integer');
    } else if (config.minPoints < 3) {
        errors.push('minPoints must be at least 3');
    }
    if (!Number.isFinite(config.minPointDistance) || config.minPointDistance < 0) {
        errors.push('minPointDistance must be zero or positive');
    }
    if (!isPositive(config.gizmoDepth)) errors.push('gizmoDepth must be a positive number');
    return errors;
}

export function resolveDispelConfig(overrides: Partial<DispelConfig> = {}): DispelConfig {
    const config: DispelConfig = { ...DEFAULT_DISPEL_CONFIG, ...overrides };
    const errors = validateDispelConfig(config);
    if (errors.length > 0) {
        throw new Error(`Invalid dispel config: ${errors.join('; ')}`);
    }
    return config;
}

export function validateProjectorConfig(config: ProjectorConfig): string[] {
    return isPositive(config.canvasScale) ? [] : ['canvasScale must be a positive number'];
}

export function resolveProjectorConfig(overrides: Partial<ProjectorConfig> = {}): ProjectorConfig {
    const config: ProjectorConfig = { ...DEFAULT_PROJECTOR_CONFIG, ...overrides };
    const errors = validateProjectorConfig(config);
    if (errors.length > 0) {
        throw new Error(`Invalid projector config: ${errors.join('; ')}`);
    }
    return config;
}
