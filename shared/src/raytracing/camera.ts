import type { Basis } from '../geometry/basis.js';
import type { Vector3Like } from '../geometry/types.js';

import { DEG_TO_RAD } from '../geometry/types.js';
import { Vector3 } from '../geometry/Vector3.js';
import { orthonormalBasis } from '../geometry/basis.js';
import { ValidationError } from '../utils/errorTypes.js';

/**
 * Supplies the eye position and the camera-to-world rotation for primary rays.
 * Camera space looks down -Z with +Y up.
 */
export interface CameraProvider {
  readonly eye: Vector3;
  toWorld(direction: Vector3Like): Vector3;
}

export interface LookAtOptions {
  position: Vector3Like;
  target: Vector3Like;
  up?: Vector3Like;
}

/**
 * Camera at `position` aimed at `target`.
 */
export class LookAtCamera implements CameraProvider {
  readonly eye: Vector3;
  readonly target: Vector3;
  readonly basis: Basis;

  constructor(options: LookAtOptions) {
    this.eye = Vector3.from(options.position);
    this.target = Vector3.from(options.target);
    this.basis = orthonormalBasis(this.target.subtract(this.eye), options.up ?? Vector3.up);
  }

  toWorld(direction: Vector3Like): Vector3 {
    const { right, up, forward } = this.basis;
    return right
      .multiply(direction.x)
      .add(up.multiply(direction.y))
      .add(forward.multiply(-direction.z));
  }
}

/**
 * Camera-space direction through the center of pixel (x, y). Row 0 is the
 * top of the image; the result is not normalized.
 */
export function primaryRayDirection(
  x: number,
  y: number,
  width: number,
  height: number,
  fovDegrees: number
): Vector3 {
  const aspect = width / height;
  const scale = Math.tan((fovDegrees * DEG_TO_RAD) / 2);

  const ndcX = ((x + 0.5) / width) * 2 - 1;
  const ndcY = 1 - ((y + 0.5) / height) * 2;

  return new Vector3(ndcX * scale * aspect, ndcY * scale, -1);
}

/**
 * @throws ValidationError unless 0 < fov < 180
 */
export function assertFieldOfView(fovDegrees: number): void {
  if (!(fovDegrees > 0 && fovDegrees < 180)) {
    throw ValidationError.outOfRange('fov', { min: 0, max: 180, value: fovDegrees });
  }
}
