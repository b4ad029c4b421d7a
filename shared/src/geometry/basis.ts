import type { OrthonormalBasis } from './types.js';
import type { Vector3Like } from './types.js';

import { Vector3 } from './Vector3.js';

/** Orthonormal basis with concrete vectors. */
export interface Basis extends OrthonormalBasis {
  readonly right: Vector3;
  readonly up: Vector3;
  readonly forward: Vector3;
}

/**
 * Build a right-handed orthonormal basis looking along `forward`.
 *
 * `up` only needs to be roughly up: its component along `forward` is removed
 * (Gram-Schmidt). When it is parallel to `forward` a fallback axis is used,
 * world Y unless forward is itself vertical, then world X.
 */
export function orthonormalBasis(forward: Vector3Like, up: Vector3Like): Basis {
  const normalizedForward = Vector3.from(forward).normalize();
  const upVec = Vector3.from(up);

  // Remove forward component from up
  let adjustedUp = upVec.subtract(normalizedForward.multiply(upVec.dot(normalizedForward)));
  if (adjustedUp.isZero()) {
    adjustedUp = Math.abs(normalizedForward.y) < 0.9999
      ? new Vector3(0, 1, 0)
      : new Vector3(1, 0, 0);
    adjustedUp = adjustedUp.subtract(normalizedForward.multiply(adjustedUp.dot(normalizedForward)));
  }
  const normalizedUp = adjustedUp.normalize();

  // forward × up points right when forward is -Z and up is +Y
  const right = normalizedForward.cross(normalizedUp).normalize();

  return {
    right,
    up: normalizedUp,
    forward: normalizedForward,
  };
}

/**
 * Any unit vector perpendicular to `normal`, chosen deterministically.
 */
export function perpendicular(normal: Vector3Like): Vector3 {
  const n = Vector3.from(normal);
  const helper = Math.abs(n.x) < 0.9 ? new Vector3(1, 0, 0) : new Vector3(0, 1, 0);
  return helper.subtract(n.multiply(helper.dot(n))).normalize();
}
