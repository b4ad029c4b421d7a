/**
 * Scene and shading types for the ray tracer.
 *
 * Everything here is read-only: a scene is assembled once, frozen, and then
 * shared by every ray of every frame.
 *
 * @module raytracing/types
 */

import type { Color } from '../geometry/Vector3.js';
import type { Vector3 } from '../geometry/Vector3.js';

// =============================================================================
// Materials
// =============================================================================

/**
 * Stateless (u, v) → color lookup into pre-decoded pixels.
 */
export interface TextureSampler {
  sample(u: number, v: number): Color;
}

/**
 * Base color rule of a material. New patterns are new variants.
 */
export type Texture =
  | { readonly kind: 'solid'; readonly color: Color }
  | {
      readonly kind: 'checker';
      /** Cells per world unit */
      readonly scale: number;
      /** Color where floor(x·s) + floor(y·s) + floor(z·s) is even */
      readonly even: Color;
      readonly odd: Color;
    }
  | { readonly kind: 'image'; readonly sampler: TextureSampler };

export type TextureKind = Texture['kind'];

/**
 * How a surface partitions incoming energy. Each weight lies in [0, 1].
 * `diffuse` and `specular` scale the local (Phong) term; `reflective` and
 * `transmissive` are handed to recursive rays.
 */
export interface EnergySplit {
  readonly diffuse: number;
  readonly specular: number;
  readonly reflective: number;
  readonly transmissive: number;
}

export interface Material {
  readonly texture: Texture;
  /** Phong exponent, ≥ 0; larger is a tighter highlight */
  readonly specularExponent: number;
  readonly albedo: EnergySplit;
  /** 1.0 is air */
  readonly refractiveIndex: number;
  /** Self-luminous color, added regardless of lighting */
  readonly emission: Color;
}

/**
 * What to do when reflective + transmissive exceeds 1.
 * - `unclamped`: use 1 - r - t as is (the local term may go negative)
 * - `clamp`: floor the local weight at 0
 * - `normalize`: scale r and t down so they sum to 1
 */
export type EnergyPolicy = 'unclamped' | 'clamp' | 'normalize';

export interface EnergyWeights {
  readonly local: number;
  readonly reflective: number;
  readonly transmissive: number;
}

// =============================================================================
// Primitives
// =============================================================================

export interface Box {
  readonly kind: 'box';
  readonly center: Vector3;
  /** Distance from center to each face pair; every component > 0 */
  readonly halfExtents: Vector3;
  readonly material: Material;
}

export interface Plane {
  readonly kind: 'plane';
  readonly point: Vector3;
  /** Unit normal */
  readonly normal: Vector3;
  readonly material: Material;
}

export type Primitive = Box | Plane;

export type PrimitiveKind = Primitive['kind'];

/**
 * Result of a successful ray/primitive intersection. Built per test and
 * consumed immediately by shading.
 */
export interface HitRecord {
  /** Distance along the ray, > 0 */
  readonly t: number;
  readonly point: Vector3;
  /** Unit normal facing against the incoming ray */
  readonly normal: Vector3;
  /** True when the geometric (outward) normal already faced the ray */
  readonly frontFace: boolean;
  readonly material: Material;
  readonly u: number;
  readonly v: number;
}

// =============================================================================
// Lights & scene
// =============================================================================

/**
 * Distance falloff: attenuation = 1 / (1 + linear·d + quadratic·d²)
 */
export interface Falloff {
  readonly linear: number;
  readonly quadratic: number;
}

export interface PointLight {
  readonly position: Vector3;
  readonly color: Color;
  readonly intensity: number;
  /** No falloff means constant intensity at any distance */
  readonly falloff?: Falloff;
}

export type Background =
  | { readonly kind: 'solid'; readonly color: Color }
  | {
      readonly kind: 'gradient';
      /** Color at direction.y = 0 */
      readonly horizon: Color;
      /** Color at direction.y = 1 */
      readonly zenith: Color;
      /** Color for directions below the horizon; defaults to `horizon` */
      readonly ground?: Color;
    };

export interface Scene {
  /** Iteration order only breaks ties between exactly coincident hits */
  readonly primitives: readonly Primitive[];
  readonly lights: readonly PointLight[];
  readonly background: Background;
  /** Constant fill light, modulated by surface color and diffuse weight */
  readonly ambient: Color;
}

// =============================================================================
// Render settings
// =============================================================================

export type ShadowPolicy =
  | { readonly kind: 'hard' }
  /** Occluded lights still contribute `factor` of their radiance */
  | { readonly kind: 'soft'; readonly factor: number };

export interface RenderSettings {
  /** Recursion stops once depth exceeds this value */
  readonly maxDepth: number;
  /** Origin bias and minimum hit distance */
  readonly epsilon: number;
  readonly shadow: ShadowPolicy;
  readonly energyPolicy: EnergyPolicy;
}
