import type { Vector3Like } from './types.js';
import type { Vector3Tuple } from './types.js';

import { EPSILON } from './types.js';
import { DegenerateVectorError } from '../utils/errorTypes.js';

/**
 * Immutable 3D vector class for use in a right-handed coordinate system.
 *
 * All operations return new Vector3 instances, so a vector can be shared
 * freely between rays, hit records and materials. The same class carries
 * linear RGB colors (x = red, y = green, z = blue).
 */
export class Vector3 implements Vector3Like {
  readonly x: number;
  readonly y: number;
  readonly z: number;

  // Common constant vectors (lazily initialized)
  private static _zero: Vector3 | undefined;
  private static _one: Vector3 | undefined;
  private static _up: Vector3 | undefined;

  constructor(x: number = 0, y: number = 0, z: number = 0) {
    this.x = x;
    this.y = y;
    this.z = z;
  }

  // ==================== Static Constructors ====================

  /** Zero vector (0, 0, 0), also black */
  static get zero(): Vector3 {
    return Vector3._zero ??= new Vector3(0, 0, 0);
  }

  /** (1, 1, 1), also white */
  static get one(): Vector3 {
    return Vector3._one ??= new Vector3(1, 1, 1);
  }

  /** Up direction (0, 1, 0) - positive Y */
  static get up(): Vector3 {
    return Vector3._up ??= new Vector3(0, 1, 0);
  }

  /** Create from a Vector3Like object */
  static from(v: Vector3Like): Vector3 {
    return v instanceof Vector3 ? v : new Vector3(v.x, v.y, v.z);
  }

  /** Create from a tuple [x, y, z] */
  static fromTuple(tuple: Vector3Tuple): Vector3 {
    return new Vector3(tuple[0], tuple[1], tuple[2]);
  }

  /** Uniform vector (s, s, s) */
  static splat(scalar: number): Vector3 {
    return new Vector3(scalar, scalar, scalar);
  }

  // ==================== Conversion Methods ====================

  /** Convert to tuple [x, y, z] */
  toTuple(): Vector3Tuple {
    return [this.x, this.y, this.z];
  }

  // ==================== Basic Operations ====================

  add(v: Vector3Like): Vector3 {
    return new Vector3(this.x + v.x, this.y + v.y, this.z + v.z);
  }

  subtract(v: Vector3Like): Vector3 {
    return new Vector3(this.x - v.x, this.y - v.y, this.z - v.z);
  }

  /** Multiply by a scalar */
  multiply(scalar: number): Vector3 {
    return new Vector3(this.x * scalar, this.y * scalar, this.z * scalar);
  }

  negate(): Vector3 {
    return new Vector3(-this.x, -this.y, -this.z);
  }

  /** Component-wise multiplication (Hadamard product), used to modulate colors */
  multiplyComponents(v: Vector3Like): Vector3 {
    return new Vector3(this.x * v.x, this.y * v.y, this.z * v.z);
  }

  /** Component-wise division, IEEE semantics (x / 0 = ±Infinity) */
  divideComponents(v: Vector3Like): Vector3 {
    return new Vector3(this.x / v.x, this.y / v.y, this.z / v.z);
  }

  // ==================== Vector Products ====================

  /**
   * Dot product (scalar product).
   * Returns the cosine of the angle times the magnitudes: |a||b|cos(θ)
   */
  dot(v: Vector3Like): number {
    return this.x * v.x + this.y * v.y + this.z * v.z;
  }

  /**
   * Cross product following the right-hand rule: X × Y = Z.
   */
  cross(v: Vector3Like): Vector3 {
    return new Vector3(
      this.y * v.z - this.z * v.y,
      this.z * v.x - this.x * v.z,
      this.x * v.y - this.y * v.x
    );
  }

  // ==================== Length & Normalization ====================

  /** Squared length - faster than length when comparing */
  get lengthSquared(): number {
    return this.x * this.x + this.y * this.y + this.z * this.z;
  }

  get length(): number {
    return Math.sqrt(this.lengthSquared);
  }

  /**
   * Normalize to unit length.
   *
   * @throws DegenerateVectorError when the vector has zero or non-finite length
   */
  normalize(): Vector3 {
    const len = this.length;
    if (len === 0 || !Number.isFinite(len)) {
      throw new DegenerateVectorError(this);
    }
    const inv = 1 / len;
    return new Vector3(this.x * inv, this.y * inv, this.z * inv);
  }

  /** Distance to another vector */
  distanceTo(v: Vector3Like): number {
    return this.subtract(v).length;
  }

  // ==================== Interpolation ====================

  /** Linear interpolation between this and another vector */
  lerp(v: Vector3Like, t: number): Vector3 {
    return new Vector3(
      this.x + (v.x - this.x) * t,
      this.y + (v.y - this.y) * t,
      this.z + (v.z - this.z) * t
    );
  }

  // ==================== Reflection ====================

  /**
   * Reflect this vector about a surface normal: `this - normal * 2 * dot(this, normal)`.
   * The normal must already be unit length; the result is not renormalized.
   */
  reflect(normal: Vector3Like): Vector3 {
    const d = 2 * this.dot(normal);
    return new Vector3(this.x - normal.x * d, this.y - normal.y * d, this.z - normal.z * d);
  }

  // ==================== Component Access ====================

  /** Get component by index (0=x, 1=y, 2=z) */
  getComponent(index: number): number {
    switch (index) {
      case 0: return this.x;
      case 1: return this.y;
      case 2: return this.z;
      default: throw new Error(`Invalid component index: ${index}`);
    }
  }

  /** Absolute value of each component */
  abs(): Vector3 {
    return new Vector3(Math.abs(this.x), Math.abs(this.y), Math.abs(this.z));
  }

  /** Clamp each component to [0, 1] */
  clamp01(): Vector3 {
    return new Vector3(
      Math.max(0, Math.min(1, this.x)),
      Math.max(0, Math.min(1, this.y)),
      Math.max(0, Math.min(1, this.z))
    );
  }

  // ==================== Comparison ====================

  /** Check if approximately equal within epsilon */
  equals(v: Vector3Like, epsilon: number = EPSILON): boolean {
    return (
      Math.abs(this.x - v.x) < epsilon &&
      Math.abs(this.y - v.y) < epsilon &&
      Math.abs(this.z - v.z) < epsilon
    );
  }

  /** Check if this is a zero vector */
  isZero(epsilon: number = EPSILON): boolean {
    return this.lengthSquared < epsilon * epsilon;
  }

  // ==================== Utility ====================

  toString(): string {
    return `Vector3(${this.x}, ${this.y}, ${this.z})`;
  }

  toJSON(): Vector3Like {
    return { x: this.x, y: this.y, z: this.z };
  }
}

/** Linear RGB color; channels are nominally in [0, 1] but may exceed it before display. */
export type Color = Vector3;
