/**
 * Scene Documents
 *
 * JSON description of a renderable scene: named materials, primitives that
 * reference them, lights, background and camera. Documents are validated
 * with zod before anything is built from them.
 *
 * @example
 * ```json
 * {
 *   "materials": { "floor": { "color": [0.7, 0.7, 0.7] } },
 *   "primitives": [{ "kind": "plane", "point": [0, -2, 0], "normal": [0, 1, 0], "material": "floor" }],
 *   "lights": [{ "position": [-3, 5, 2] }],
 *   "camera": { "position": [3, 4, 2], "target": [0, -0.5, -3] }
 * }
 * ```
 */

import { z } from 'zod';
import type { ZodIssue } from 'zod';

import type { Material } from './types.js';
import type { Primitive } from './types.js';
import type { Scene } from './types.js';
import type { Texture } from './types.js';

import { Vector3 } from '../geometry/Vector3.js';
import { LookAtCamera } from './camera.js';
import { checker, createMaterial, image, solid } from './material.js';
import { createPointLight } from './light.js';
import { createBox, createPlane } from './primitives.js';
import { createScene, gradientBackground, solidBackground } from './scene.js';
import { ImageTexture } from './texture.js';
import { ValidationError } from '../utils/errorTypes.js';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

const finite = z.number().finite();

/** [x, y, z] */
const vec3Schema = z.tuple([finite, finite, finite]);

const weightSchema = finite.min(0).max(1);

const textureSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('solid'), color: vec3Schema }),
  z.object({
    kind: z.literal('checker'),
    scale: finite.positive(),
    even: vec3Schema,
    odd: vec3Schema,
  }),
  z.object({
    kind: z.literal('image'),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    /** Row-major linear RGB, top row first; omitted means the grey placeholder checker */
    pixels: z.array(vec3Schema).optional(),
    cellSize: z.number().int().positive().optional(),
  }),
]);

const materialSchema = z
  .object({
    color: vec3Schema.optional(),
    texture: textureSchema.optional(),
    specularExponent: finite.min(0).optional(),
    albedo: z
      .object({
        diffuse: weightSchema.optional(),
        specular: weightSchema.optional(),
        reflective: weightSchema.optional(),
        transmissive: weightSchema.optional(),
      })
      .optional(),
    refractiveIndex: finite.positive().optional(),
    emission: vec3Schema.optional(),
  })
  .superRefine((material, ctx) => {
    const reflective = material.albedo?.reflective ?? 0;
    const transmissive = material.albedo?.transmissive ?? 0;
    if (reflective + transmissive > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `reflective + transmissive must not exceed 1 (got ${reflective + transmissive})`,
        path: ['albedo'],
      });
    }
    const texture = material.texture;
    if (texture?.kind === 'image' && texture.pixels && texture.pixels.length !== texture.width * texture.height) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${texture.width * texture.height} pixels, got ${texture.pixels.length}`,
        path: ['texture', 'pixels'],
      });
    }
  });

const primitiveSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('box'),
    center: vec3Schema,
    halfExtents: z.tuple([finite.positive(), finite.positive(), finite.positive()]),
    material: z.string().min(1),
  }),
  z.object({
    kind: z.literal('plane'),
    point: vec3Schema,
    normal: vec3Schema.refine(([x, y, z]) => x !== 0 || y !== 0 || z !== 0, {
      message: 'Plane normal must not be zero',
    }),
    material: z.string().min(1),
  }),
]);

const lightSchema = z.object({
  position: vec3Schema,
  color: vec3Schema.optional(),
  intensity: finite.min(0).optional(),
  falloff: z.object({ linear: finite.min(0), quadratic: finite.min(0) }).optional(),
});

const backgroundSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('solid'), color: vec3Schema }),
  z.object({
    kind: z.literal('gradient'),
    horizon: vec3Schema,
    zenith: vec3Schema,
    ground: vec3Schema.optional(),
  }),
]);

const cameraSchema = z
  .object({
    position: vec3Schema,
    target: vec3Schema,
    up: vec3Schema.optional(),
    fov: finite.gt(0).lt(180).optional(),
  })
  .refine(
    ({ position, target }) => position[0] !== target[0] || position[1] !== target[1] || position[2] !== target[2],
    { message: 'Camera target must differ from its position', path: ['target'] }
  );

export const sceneDocumentSchema = z
  .object({
    materials: z.record(z.string(), materialSchema),
    primitives: z.array(primitiveSchema),
    lights: z.array(lightSchema).default([]),
    background: backgroundSchema.optional(),
    ambient: vec3Schema.optional(),
    camera: cameraSchema,
  })
  .superRefine((document, ctx) => {
    document.primitives.forEach((primitive, index) => {
      if (!Object.hasOwn(document.materials, primitive.material)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown material "${primitive.material}"`,
          path: ['primitives', index, 'material'],
        });
      }
    });
  });

export type SceneDocument = z.infer<typeof sceneDocumentSchema>;
export type MaterialDocument = z.infer<typeof materialSchema>;
export type TextureDocument = z.infer<typeof textureSchema>;

export interface BuiltScene {
  scene: Scene;
  camera: LookAtCamera;
  /** From the document's camera, when it sets one */
  fovDegrees?: number;
}

// =============================================================================
// PARSING
// =============================================================================

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

/**
 * Validate untrusted JSON as a scene document.
 *
 * @throws ValidationError naming the first offending field; every issue is
 *   listed under `context.issues`
 */
export function parseSceneDocument(input: unknown): SceneDocument {
  const result = sceneDocumentSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors;
  const field = issues.length > 0 ? issues[0].path.join('.') : undefined;
  throw new ValidationError(`Invalid scene: ${issues.map(formatIssue).join('; ')}`, field || undefined, {
    issues: issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  });
}

/**
 * Parse scene JSON text.
 *
 * @throws ValidationError for malformed JSON or an invalid document
 */
export function parseSceneJson(text: string): SceneDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      `Scene is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error instanceof Error ? error.message : String(error) }
    );
  }
  return parseSceneDocument(raw);
}

// =============================================================================
// BUILDING
// =============================================================================

function buildTexture(texture: TextureDocument): Texture {
  switch (texture.kind) {
    case 'solid':
      return solid(Vector3.fromTuple(texture.color));
    case 'checker':
      return checker(texture.scale, Vector3.fromTuple(texture.even), Vector3.fromTuple(texture.odd));
    case 'image':
      return image(
        texture.pixels
          ? new ImageTexture(texture.width, texture.height, texture.pixels.map((p) => Vector3.fromTuple(p)))
          : ImageTexture.checker(texture.width, texture.height, texture.cellSize)
      );
  }
}

function buildMaterial(material: MaterialDocument): Material {
  return createMaterial({
    color: material.color && Vector3.fromTuple(material.color),
    texture: material.texture && buildTexture(material.texture),
    specularExponent: material.specularExponent,
    albedo: material.albedo,
    refractiveIndex: material.refractiveIndex,
    emission: material.emission && Vector3.fromTuple(material.emission),
  });
}

/**
 * Turn a validated document into a frozen scene and its camera.
 */
export function buildScene(document: SceneDocument): BuiltScene {
  const materials = new Map<string, Material>();
  for (const [name, material] of Object.entries(document.materials)) {
    materials.set(name, buildMaterial(material));
  }

  const primitives: Primitive[] = document.primitives.map((primitive, index) => {
    const material = materials.get(primitive.material);
    if (!material) {
      throw new ValidationError(`Unknown material "${primitive.material}"`, `primitives.${index}.material`);
    }
    switch (primitive.kind) {
      case 'box':
        return createBox(Vector3.fromTuple(primitive.center), Vector3.fromTuple(primitive.halfExtents), material);
      case 'plane':
        return createPlane(Vector3.fromTuple(primitive.point), Vector3.fromTuple(primitive.normal), material);
    }
  });

  const lights = document.lights.map((light) =>
    createPointLight({
      position: Vector3.fromTuple(light.position),
      color: light.color && Vector3.fromTuple(light.color),
      intensity: light.intensity,
      falloff: light.falloff,
    })
  );

  const background = document.background;
  const scene = createScene({
    primitives,
    lights,
    background:
      background === undefined
        ? undefined
        : background.kind === 'solid'
          ? solidBackground(Vector3.fromTuple(background.color))
          : gradientBackground(
              Vector3.fromTuple(background.horizon),
              Vector3.fromTuple(background.zenith),
              background.ground && Vector3.fromTuple(background.ground)
            ),
    ambient: document.ambient && Vector3.fromTuple(document.ambient),
  });

  const camera = new LookAtCamera({
    position: Vector3.fromTuple(document.camera.position),
    target: Vector3.fromTuple(document.camera.target),
    up: document.camera.up && Vector3.fromTuple(document.camera.up),
  });

  return { scene, camera, fovDegrees: document.camera.fov };
}

// =============================================================================
// DEMO
// =============================================================================

/**
 * The default scene: a magenta and black checkered cube above a grey floor,
 * lit by one warm light against a white background.
 */
export function demoSceneDocument(): SceneDocument {
  return {
    materials: {
      floor: {
        color: [0.7, 0.7, 0.7],
        specularExponent: 12.8,
        albedo: { diffuse: 1, specular: 0.1 },
      },
      checkered: {
        texture: { kind: 'checker', scale: 1, even: [1, 0, 1], odd: [0, 0, 0] },
        specularExponent: 89.6,
        albedo: { diffuse: 1, specular: 0.5, reflective: 0.2 },
      },
    },
    primitives: [
      { kind: 'plane', point: [0, -2, 0], normal: [0, 1, 0], material: 'floor' },
      { kind: 'box', center: [0, -0.5, -3], halfExtents: [0.75, 0.75, 0.75], material: 'checkered' },
    ],
    lights: [
      {
        position: [-3, 5, 2],
        color: [1, 1, 0.9],
        intensity: 1,
        falloff: { linear: 0.1, quadratic: 0.01 },
      },
    ],
    background: { kind: 'solid', color: [1, 1, 1] },
    camera: { position: [3, 4, 2], target: [0, -0.5, -3], up: [0, 1, 0], fov: 45 },
  };
}
