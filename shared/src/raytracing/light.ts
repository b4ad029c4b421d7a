import type { Color } from '../geometry/Vector3.js';
import type { Vector3Like } from '../geometry/types.js';
import type { Falloff } from './types.js';
import type { PointLight } from './types.js';

import { Vector3 } from '../geometry/Vector3.js';
import { ValidationError } from '../utils/errorTypes.js';

export interface PointLightOptions {
  position: Vector3Like;
  color?: Vector3Like;
  intensity?: number;
  falloff?: Falloff;
}

/**
 * Build a frozen point light. White at intensity 1 unless told otherwise.
 */
export function createPointLight(options: PointLightOptions): PointLight {
  const intensity = options.intensity ?? 1;
  if (!(intensity >= 0)) {
    throw ValidationError.outOfRange('intensity', { min: 0, value: intensity });
  }
  if (options.falloff && !(options.falloff.linear >= 0 && options.falloff.quadratic >= 0)) {
    throw new ValidationError('falloff coefficients must be non-negative', 'falloff', { ...options.falloff });
  }
  return Object.freeze({
    position: Vector3.from(options.position),
    color: Vector3.from(options.color ?? Vector3.one),
    intensity,
    ...(options.falloff && { falloff: Object.freeze({ ...options.falloff }) }),
  });
}

/**
 * 1 / (1 + k1·d + k2·d²), or 1 for a light without falloff.
 */
export function attenuation(light: PointLight, distance: number): number {
  if (!light.falloff) return 1;
  const { linear, quadratic } = light.falloff;
  return 1 / (1 + linear * distance + quadratic * distance * distance);
}

/**
 * Color arriving at a point `distance` away, before shadowing.
 */
export function radianceAt(light: PointLight, distance: number): Color {
  return light.color.multiply(light.intensity * attenuation(light, distance));
}
