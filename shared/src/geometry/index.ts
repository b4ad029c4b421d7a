/**
 * 3D Geometry Module
 *
 * Immutable vectors, rays and orthonormal bases in a right-handed,
 * Y-up coordinate system.
 *
 * @example
 * ```typescript
 * import { Vector3, Ray } from '@raybox/shared';
 *
 * const ray = new Ray(new Vector3(0, 1, 5), new Vector3(0, 0, -2));
 * ray.direction;   // Vector3(0, 0, -1)
 * ray.at(2);       // Vector3(0, 1, 3)
 * ```
 */

// Core types and constants
export type { Vector3Like } from './types.js';
export type { Vector3Tuple } from './types.js';
export type { OrthonormalBasis } from './types.js';

export { EPSILON } from './types.js';
export { DEG_TO_RAD } from './types.js';

// Core classes
export { Vector3 } from './Vector3.js';
export type { Color } from './Vector3.js';
export { Ray } from './Ray.js';

// Bases
export { orthonormalBasis } from './basis.js';
export { perpendicular } from './basis.js';
export type { Basis } from './basis.js';
