import type { Color } from '../geometry/Vector3.js';
import type { Vector3Like } from '../geometry/types.js';
import type { EnergyPolicy } from './types.js';
import type { EnergySplit } from './types.js';
import type { EnergyWeights } from './types.js';
import type { Material } from './types.js';
import type { Texture } from './types.js';
import type { TextureSampler } from './types.js';

import { Vector3 } from '../geometry/Vector3.js';
import { ValidationError } from '../utils/errorTypes.js';

export interface MaterialOptions {
  /** Shorthand for a solid texture */
  color?: Vector3Like;
  texture?: Texture;
  specularExponent?: number;
  albedo?: Partial<EnergySplit>;
  refractiveIndex?: number;
  emission?: Vector3Like;
}

const DEFAULT_COLOR = new Vector3(0.7, 0.7, 0.7);

export const DEFAULT_ALBEDO: EnergySplit = Object.freeze({
  diffuse: 1,
  specular: 0,
  reflective: 0,
  transmissive: 0,
});

/**
 * Build a frozen material. Unspecified fields take neutral defaults: a grey
 * fully diffuse surface in air with no emission.
 *
 * @throws ValidationError if a weight is outside [0, 1], the exponent is
 *   negative, or the refractive index is not positive
 */
export function createMaterial(options: MaterialOptions = {}): Material {
  const texture = options.texture ?? solid(options.color ?? DEFAULT_COLOR);
  const albedo: EnergySplit = Object.freeze({ ...DEFAULT_ALBEDO, ...options.albedo });
  const specularExponent = options.specularExponent ?? 32;
  const refractiveIndex = options.refractiveIndex ?? 1;

  for (const key of ['diffuse', 'specular', 'reflective', 'transmissive'] as const) {
    const value = albedo[key];
    if (!(value >= 0 && value <= 1)) {
      throw ValidationError.outOfRange(`albedo.${key}`, { min: 0, max: 1, value });
    }
  }
  if (!(specularExponent >= 0)) {
    throw ValidationError.outOfRange('specularExponent', { min: 0, value: specularExponent });
  }
  if (!(refractiveIndex > 0)) {
    throw new ValidationError('refractiveIndex must be positive', 'refractiveIndex', { value: refractiveIndex });
  }

  return Object.freeze({
    texture,
    specularExponent,
    albedo,
    refractiveIndex,
    emission: Vector3.from(options.emission ?? Vector3.zero),
  });
}

export function solid(color: Vector3Like): Texture {
  return Object.freeze({ kind: 'solid', color: Vector3.from(color) });
}

/**
 * 3-D checkerboard keyed by the parity of floor(scaled coordinate).
 */
export function checker(scale: number, even: Vector3Like, odd: Vector3Like): Texture {
  if (!(scale > 0)) {
    throw ValidationError.outOfRange('scale', { min: 0, value: scale });
  }
  return Object.freeze({ kind: 'checker', scale, even: Vector3.from(even), odd: Vector3.from(odd) });
}

export function image(sampler: TextureSampler): Texture {
  return Object.freeze({ kind: 'image', sampler });
}

/**
 * Base color of a material at a world-space point with surface parameters (u, v).
 */
export function colorAt(material: Material, point: Vector3Like, u: number, v: number): Color {
  const texture = material.texture;
  switch (texture.kind) {
    case 'solid':
      return texture.color;
    case 'checker': {
      const sum =
        Math.floor(point.x * texture.scale) +
        Math.floor(point.y * texture.scale) +
        Math.floor(point.z * texture.scale);
      // true modulus so negative cells alternate as well
      return ((sum % 2) + 2) % 2 === 0 ? texture.even : texture.odd;
    }
    case 'image':
      return texture.sampler.sample(u, v);
  }
}

/**
 * Resolve the blend weights for local, reflected and refracted light.
 */
export function energyWeights(albedo: EnergySplit, policy: EnergyPolicy): EnergyWeights {
  let reflective = albedo.reflective;
  let transmissive = albedo.transmissive;

  switch (policy) {
    case 'unclamped':
      return { local: 1 - reflective - transmissive, reflective, transmissive };
    case 'clamp':
      return { local: Math.max(0, 1 - reflective - transmissive), reflective, transmissive };
    case 'normalize': {
      const total = reflective + transmissive;
      if (total > 1) {
        reflective /= total;
        transmissive /= total;
        return { local: 0, reflective, transmissive };
      }
      return { local: 1 - reflective - transmissive, reflective, transmissive };
    }
  }
}
