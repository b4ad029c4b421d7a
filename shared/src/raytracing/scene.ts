import type { Color } from '../geometry/Vector3.js';
import type { Vector3Like } from '../geometry/types.js';
import type { Background } from './types.js';
import type { HitRecord } from './types.js';
import type { PointLight } from './types.js';
import type { Primitive } from './types.js';
import type { Scene } from './types.js';

import { Ray } from '../geometry/Ray.js';
import { Vector3 } from '../geometry/Vector3.js';
import { intersect } from './primitives.js';

export interface SceneOptions {
  primitives?: readonly Primitive[];
  lights?: readonly PointLight[];
  background?: Background;
  ambient?: Vector3Like;
}

/**
 * Assemble an immutable scene snapshot. Defaults: no primitives, no lights,
 * black background, no ambient light.
 */
export function createScene(options: SceneOptions = {}): Scene {
  return Object.freeze({
    primitives: Object.freeze([...(options.primitives ?? [])]),
    lights: Object.freeze([...(options.lights ?? [])]),
    background: options.background ?? solidBackground(Vector3.zero),
    ambient: Vector3.from(options.ambient ?? Vector3.zero),
  });
}

export function solidBackground(color: Vector3Like): Background {
  return Object.freeze({ kind: 'solid', color: Vector3.from(color) });
}

export function gradientBackground(horizon: Vector3Like, zenith: Vector3Like, ground?: Vector3Like): Background {
  return Object.freeze({
    kind: 'gradient',
    horizon: Vector3.from(horizon),
    zenith: Vector3.from(zenith),
    ...(ground && { ground: Vector3.from(ground) }),
  });
}

/**
 * Sky color for a ray that hit nothing. `direction` must be unit length.
 */
export function backgroundColor(background: Background, direction: Vector3Like): Color {
  switch (background.kind) {
    case 'solid':
      return background.color;
    case 'gradient':
      if (direction.y < 0) {
        return background.ground ?? background.horizon;
      }
      return background.horizon.lerp(background.zenith, Math.min(1, direction.y));
  }
}

/**
 * Closest hit over every primitive within (tMin, tMax]. Each hit narrows
 * the upper bound for the primitives after it; on an exact tie the earlier
 * primitive is kept.
 */
export function nearestHit(scene: Scene, ray: Ray, tMin: number, tMax: number): HitRecord | null {
  let closest: HitRecord | null = null;
  let closestSoFar = tMax;

  for (const primitive of scene.primitives) {
    const hit = intersect(primitive, ray, tMin, closestSoFar);
    if (hit && (closest === null || hit.t < closest.t)) {
      closest = hit;
      closestSoFar = hit.t;
    }
  }

  return closest;
}

/**
 * Whether anything blocks the segment from `from` to `to`. Hits within
 * `epsilon` of either end are ignored.
 */
export function isOccluded(scene: Scene, from: Vector3Like, to: Vector3Like, epsilon: number): boolean {
  const offset = Vector3.from(to).subtract(from);
  const distance = offset.length;
  if (distance <= epsilon) {
    return false;
  }
  const probe = new Ray(from, offset);
  return nearestHit(scene, probe, epsilon, distance - epsilon) !== null;
}
