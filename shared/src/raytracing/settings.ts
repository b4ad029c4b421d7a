import type { RenderSettings } from './types.js';
import type { ShadowPolicy } from './types.js';

import { RENDER_DEFAULTS } from '../config/env.js';
import { ValidationError } from '../utils/errorTypes.js';

export const DEFAULT_RENDER_SETTINGS: RenderSettings = Object.freeze({
  maxDepth: 5,
  epsilon: 1e-3,
  shadow: Object.freeze({ kind: 'soft', factor: 0.3 }),
  energyPolicy: 'unclamped',
});

/**
 * Merge overrides onto `base` and validate the result.
 *
 * @throws ValidationError for a negative or fractional depth, a non-positive
 *   epsilon, or a soft shadow factor outside [0, 1]
 */
export function createRenderSettings(
  overrides: Partial<RenderSettings> = {},
  base: RenderSettings = DEFAULT_RENDER_SETTINGS
): RenderSettings {
  const settings: RenderSettings = { ...base, ...overrides };

  if (!Number.isInteger(settings.maxDepth) || settings.maxDepth < 0) {
    throw ValidationError.outOfRange('maxDepth', { min: 0, value: settings.maxDepth });
  }
  if (!(settings.epsilon > 0)) {
    throw ValidationError.outOfRange('epsilon', { min: 0, value: settings.epsilon });
  }
  if (settings.shadow.kind === 'soft' && !(settings.shadow.factor >= 0 && settings.shadow.factor <= 1)) {
    throw ValidationError.outOfRange('shadow.factor', { min: 0, max: 1, value: settings.shadow.factor });
  }

  return Object.freeze(settings);
}

/**
 * Settings from the environment configuration, with optional overrides.
 */
export function defaultRenderSettings(overrides: Partial<RenderSettings> = {}): RenderSettings {
  const shadow: ShadowPolicy = RENDER_DEFAULTS.shadowMode === 'hard'
    ? { kind: 'hard' }
    : { kind: 'soft', factor: RENDER_DEFAULTS.shadowFactor };

  return createRenderSettings(
    {
      maxDepth: RENDER_DEFAULTS.maxDepth,
      epsilon: RENDER_DEFAULTS.epsilon,
      shadow,
      energyPolicy: RENDER_DEFAULTS.energyPolicy,
      ...overrides,
    }
  );
}
