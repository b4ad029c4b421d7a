import type { Vector3Like } from '../geometry/types.js';
import type { Ray } from '../geometry/Ray.js';
import type { Box } from './types.js';
import type { HitRecord } from './types.js';
import type { Material } from './types.js';
import type { Plane } from './types.js';
import type { Primitive } from './types.js';

import { EPSILON } from '../geometry/types.js';
import { Vector3 } from '../geometry/Vector3.js';
import { perpendicular } from '../geometry/basis.js';
import { ValidationError } from '../utils/errorTypes.js';

// =============================================================================
// Construction
// =============================================================================

/**
 * Axis-aligned box from its center and half-extents.
 */
export function createBox(center: Vector3Like, halfExtents: Vector3Like, material: Material): Box {
  if (!(halfExtents.x > 0 && halfExtents.y > 0 && halfExtents.z > 0)) {
    throw new ValidationError('Box half-extents must be positive', 'halfExtents', {
      halfExtents: { x: halfExtents.x, y: halfExtents.y, z: halfExtents.z },
    });
  }
  return Object.freeze({
    kind: 'box',
    center: Vector3.from(center),
    halfExtents: Vector3.from(halfExtents),
    material,
  });
}

/**
 * Infinite plane through `point`. The normal is normalized here.
 */
export function createPlane(point: Vector3Like, normal: Vector3Like, material: Material): Plane {
  return Object.freeze({
    kind: 'plane',
    point: Vector3.from(point),
    normal: Vector3.from(normal).normalize(),
    material,
  });
}

// =============================================================================
// Hit records
// =============================================================================

/**
 * Build a hit record, flipping the geometric normal when it does not oppose
 * the ray (`dot(direction, normal) >= 0`).
 */
export function makeHitRecord(
  ray: Ray,
  t: number,
  point: Vector3,
  outwardNormal: Vector3,
  material: Material,
  u: number,
  v: number
): HitRecord {
  const frontFace = ray.direction.dot(outwardNormal) < 0;
  return {
    t,
    point,
    normal: frontFace ? outwardNormal : outwardNormal.negate(),
    frontFace,
    material,
    u,
    v,
  };
}

/**
 * The outward normal a hit record was built from.
 */
export function outwardNormal(hit: HitRecord): Vector3 {
  return hit.frontFace ? hit.normal : hit.normal.negate();
}

// =============================================================================
// Intersection
// =============================================================================

/**
 * Nearest intersection of `ray` with `primitive` in the window (tMin, tMax],
 * or null on a miss.
 */
export function intersect(primitive: Primitive, ray: Ray, tMin: number, tMax: number): HitRecord | null {
  switch (primitive.kind) {
    case 'box':
      return intersectBox(primitive, ray, tMin, tMax);
    case 'plane':
      return intersectPlane(primitive, ray, tMin, tMax);
  }
}

/**
 * Slab test. Division by a zero direction component yields ±Infinity and is
 * left to IEEE arithmetic. A NaN slab bound (0 × Infinity, the origin lying on
 * a face plane of a parallel ray) fails both comparisons and leaves the
 * running interval untouched.
 */
export function intersectBox(box: Box, ray: Ray, tMin: number, tMax: number): HitRecord | null {
  let tEnter = -Infinity;
  let tExit = Infinity;

  for (let axis = 0; axis < 3; axis++) {
    const origin = ray.origin.getComponent(axis);
    const center = box.center.getComponent(axis);
    const half = box.halfExtents.getComponent(axis);
    const invDir = 1 / ray.direction.getComponent(axis);

    let t0 = (center - half - origin) * invDir;
    let t1 = (center + half - origin) * invDir;
    if (invDir < 0) {
      const temp = t0;
      t0 = t1;
      t1 = temp;
    }

    if (t0 > tEnter) tEnter = t0;
    if (t1 < tExit) tExit = t1;
  }

  if (tExit < tEnter || tExit < 0) {
    return null;
  }

  // Entry when it lies ahead, otherwise the exit (origin inside the box)
  const t = tEnter > tMin ? tEnter : tExit;
  if (!(t > tMin) || t > tMax) {
    return null;
  }

  const point = ray.at(t);
  const local = point.subtract(box.center).divideComponents(box.halfExtents);
  const { normal, u, v } = boxFace(local);

  return makeHitRecord(ray, t, point, normal, box.material, u, v);
}

/**
 * Face normal and UV from a box-local point scaled to [-1, 1] per axis.
 * The dominant axis wins; ties go to x, then y, then z.
 */
export function boxFace(local: Vector3): { normal: Vector3; u: number; v: number } {
  const ax = Math.abs(local.x);
  const ay = Math.abs(local.y);
  const az = Math.abs(local.z);

  if (ax >= ay && ax >= az) {
    return {
      normal: new Vector3(local.x > 0 ? 1 : -1, 0, 0),
      u: (local.z + 1) * 0.5,
      v: (local.y + 1) * 0.5,
    };
  }
  if (ay >= az) {
    return {
      normal: new Vector3(0, local.y > 0 ? 1 : -1, 0),
      u: (local.x + 1) * 0.5,
      v: (local.z + 1) * 0.5,
    };
  }
  return {
    normal: new Vector3(0, 0, local.z > 0 ? 1 : -1),
    u: (local.x + 1) * 0.5,
    v: (local.y + 1) * 0.5,
  };
}

export function intersectPlane(plane: Plane, ray: Ray, tMin: number, tMax: number): HitRecord | null {
  const denom = plane.normal.dot(ray.direction);
  if (Math.abs(denom) < EPSILON) {
    return null; // parallel
  }

  const t = plane.point.subtract(ray.origin).dot(plane.normal) / denom;
  if (t < tMin || t > tMax) {
    return null;
  }

  const point = ray.at(t);
  const tangent = perpendicular(plane.normal);
  const bitangent = plane.normal.cross(tangent);
  const offset = point.subtract(plane.point);

  return makeHitRecord(
    ray,
    t,
    point,
    plane.normal,
    plane.material,
    fract(offset.dot(tangent)),
    fract(offset.dot(bitangent))
  );
}

function fract(value: number): number {
  return value - Math.floor(value);
}
