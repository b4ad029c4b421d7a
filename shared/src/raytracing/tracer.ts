/**
 * Shading and light transport.
 *
 * A Tracer is bound to one frozen scene and one set of render settings. It
 * never mutates either, so a single instance can serve any number of rows
 * from any number of callers.
 *
 * @module raytracing/tracer
 */

import type { Color } from '../geometry/Vector3.js';
import type { Vector3Like } from '../geometry/types.js';
import type { EnergyWeights } from './types.js';
import type { HitRecord } from './types.js';
import type { PointLight } from './types.js';
import type { RenderSettings } from './types.js';
import type { Scene } from './types.js';

import { Ray } from '../geometry/Ray.js';
import { Vector3 } from '../geometry/Vector3.js';
import { colorAt } from './material.js';
import { energyWeights } from './material.js';
import { radianceAt } from './light.js';
import { outwardNormal } from './primitives.js';
import { backgroundColor } from './scene.js';
import { isOccluded } from './scene.js';
import { nearestHit } from './scene.js';

// =============================================================================
// Helpers
// =============================================================================

export type RefractionResult =
  | { readonly kind: 'refracted'; readonly direction: Vector3 }
  | { readonly kind: 'total-internal-reflection' };

/**
 * Bias a new ray's origin off the surface toward the side it leaves on.
 */
export function offsetOrigin(point: Vector3, normal: Vector3, direction: Vector3Like, epsilon: number): Vector3 {
  return normal.dot(direction) < 0
    ? point.subtract(normal.multiply(epsilon))
    : point.add(normal.multiply(epsilon));
}

/**
 * Snell refraction of a unit `incident` direction at a surface with the given
 * outward normal. A negative cosine means the ray is entering the medium.
 */
export function refract(incident: Vector3, outward: Vector3, refractiveIndex: number): RefractionResult {
  let cosI = Math.min(1, Math.max(-1, incident.dot(outward)));
  let normal = outward;
  let eta: number;

  if (cosI < 0) {
    cosI = -cosI;
    eta = 1 / refractiveIndex;
  } else {
    normal = outward.negate();
    eta = refractiveIndex;
  }

  const k = 1 - eta * eta * (1 - cosI * cosI);
  if (k < 0) {
    return { kind: 'total-internal-reflection' };
  }

  return {
    kind: 'refracted',
    direction: incident.multiply(eta).add(normal.multiply(eta * cosI - Math.sqrt(k))),
  };
}

export function combineEnergy(local: Color, reflection: Color, refraction: Color, weights: EnergyWeights): Color {
  return local
    .multiply(weights.local)
    .add(reflection.multiply(weights.reflective))
    .add(refraction.multiply(weights.transmissive));
}

// =============================================================================
// Tracer
// =============================================================================

export class Tracer {
  constructor(
    readonly scene: Scene,
    readonly settings: RenderSettings
  ) {}

  /**
   * Color seen along a ray. `direction` need not be unit length but must not
   * be zero.
   */
  trace(origin: Vector3Like, direction: Vector3Like, depth: number = 0): Color {
    return this.traceRay(new Ray(origin, direction), depth);
  }

  traceRay(ray: Ray, depth: number): Color {
    if (depth > this.settings.maxDepth) {
      return backgroundColor(this.scene.background, ray.direction);
    }

    const hit = nearestHit(this.scene, ray, this.settings.epsilon, Infinity);
    if (!hit) {
      return backgroundColor(this.scene.background, ray.direction);
    }

    return this.shade(ray, hit, depth);
  }

  /**
   * Full surface response at a hit: local term, recursive reflection and
   * refraction blended by the energy weights, plus emission.
   */
  shade(ray: Ray, hit: HitRecord, depth: number): Color {
    const { albedo, emission } = hit.material;
    const weights = energyWeights(albedo, this.settings.energyPolicy);

    const local = this.shadeLocal(ray, hit);
    const reflection = albedo.reflective > 0 ? this.traceReflection(ray, hit, depth) : Vector3.zero;
    const refraction = albedo.transmissive > 0
      ? this.traceRefraction(ray, hit, depth, albedo.reflective > 0 ? reflection : undefined)
      : Vector3.zero;

    return combineEnergy(local, reflection, refraction, weights).add(emission);
  }

  /**
   * Phong diffuse and specular over every light, plus ambient fill.
   * Lights behind the surface contribute nothing.
   */
  shadeLocal(ray: Ray, hit: HitRecord): Color {
    const { albedo, specularExponent } = hit.material;
    const color = colorAt(hit.material, hit.point, hit.u, hit.v);
    const view = ray.direction.negate();

    let diffuse = Vector3.zero;
    let specular = Vector3.zero;

    for (const light of this.scene.lights) {
      const toLight = light.position.subtract(hit.point);
      const distance = toLight.length;
      if (distance === 0) continue;

      const lightDir = toLight.multiply(1 / distance);
      const nDotL = hit.normal.dot(lightDir);
      if (nDotL <= 0) continue;

      const shadow = this.shadowFactor(hit, light, lightDir);
      if (shadow === 0) continue;

      const radiance = radianceAt(light, distance).multiply(shadow);
      diffuse = diffuse.add(color.multiplyComponents(radiance).multiply(nDotL));

      const mirrored = lightDir.negate().reflect(hit.normal);
      const highlight = Math.pow(Math.max(0, view.dot(mirrored)), specularExponent);
      specular = specular.add(radiance.multiply(highlight));
    }

    return diffuse
      .multiply(albedo.diffuse)
      .add(specular.multiply(albedo.specular))
      .add(this.scene.ambient.multiplyComponents(color).multiply(albedo.diffuse));
  }

  traceReflection(ray: Ray, hit: HitRecord, depth: number): Color {
    const direction = ray.direction.reflect(hit.normal);
    const origin = offsetOrigin(hit.point, hit.normal, direction, this.settings.epsilon);
    return this.traceRay(new Ray(origin, direction), depth + 1);
  }

  /**
   * Transmitted color. Total internal reflection yields the reflected color,
   * reusing `reflected` when the caller already traced it.
   */
  traceRefraction(ray: Ray, hit: HitRecord, depth: number, reflected?: Color): Color {
    const result = refract(ray.direction, outwardNormal(hit), hit.material.refractiveIndex);
    if (result.kind === 'total-internal-reflection') {
      return reflected ?? this.traceReflection(ray, hit, depth);
    }
    const origin = offsetOrigin(hit.point, hit.normal, result.direction, this.settings.epsilon);
    return this.traceRay(new Ray(origin, result.direction), depth + 1);
  }

  /**
   * 1 when the light is visible, otherwise 0 (hard) or the soft factor.
   */
  private shadowFactor(hit: HitRecord, light: PointLight, lightDir: Vector3): number {
    const origin = offsetOrigin(hit.point, hit.normal, lightDir, this.settings.epsilon);
    if (!isOccluded(this.scene, origin, light.position, this.settings.epsilon)) {
      return 1;
    }
    const policy = this.settings.shadow;
    return policy.kind === 'hard' ? 0 : policy.factor;
  }
}
