/**
 * Core type definitions for 3D geometry with right-handed coordinate system.
 *
 * Right-Handed Coordinate System Convention:
 * - X-axis: Points right (positive = right)
 * - Y-axis: Points up (positive = up)
 * - Z-axis: Points toward the viewer (positive = out of screen)
 *
 * Cameras look down -Z, so a camera-space direction of (0, 0, -1) is
 * "straight ahead".
 */

/**
 * Represents a 3D vector or point with x, y, z components.
 */
export interface Vector3Like {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/**
 * Tuple representation of a 3D vector [x, y, z].
 */
export type Vector3Tuple = readonly [number, number, number];

/**
 * Right-handed orthonormal basis. `forward` is the viewing direction.
 */
export interface OrthonormalBasis {
  readonly right: Vector3Like;
  readonly up: Vector3Like;
  readonly forward: Vector3Like;
}

/**
 * Numeric tolerance constants for floating-point comparisons.
 */
export const EPSILON = 1e-6;
export const DEG_TO_RAD = Math.PI / 180;
