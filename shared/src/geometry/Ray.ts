import type { Vector3Like } from './types.js';

import { Vector3 } from './Vector3.js';

/**
 * Half-line with an origin and a unit direction.
 *
 * The constructor normalizes the direction unconditionally, so everything
 * downstream may assume `direction.length === 1`. A zero direction throws
 * `DegenerateVectorError`.
 */
export class Ray {
  readonly origin: Vector3;
  readonly direction: Vector3;

  constructor(origin: Vector3Like, direction: Vector3Like) {
    this.origin = Vector3.from(origin);
    this.direction = Vector3.from(direction).normalize();
  }

  /** Point along the ray at parameter t */
  at(t: number): Vector3 {
    return new Vector3(
      this.origin.x + this.direction.x * t,
      this.origin.y + this.direction.y * t,
      this.origin.z + this.direction.z * t
    );
  }

  toString(): string {
    return `Ray(${this.origin.toString()} -> ${this.direction.toString()})`;
  }
}
