/**
 * Ray Tracing Module
 *
 * Backward ray tracer over axis-aligned boxes and infinite planes lit by
 * point lights: materials, intersection, shading and transport, the frame
 * driver, PPM output and JSON scene documents.
 *
 * @example
 * ```typescript
 * import { buildScene, demoSceneDocument, renderFrame, encodePpm, defaultRenderSettings } from '@raybox/shared';
 *
 * const { scene, camera } = buildScene(demoSceneDocument());
 * const frame = renderFrame(scene, camera, {
 *   width: 320,
 *   height: 240,
 *   fovDegrees: 45,
 *   settings: defaultRenderSettings(),
 * });
 * const ppm = encodePpm(frame);
 * ```
 */

export type {
  TextureSampler,
  Texture,
  TextureKind,
  EnergySplit,
  Material,
  EnergyPolicy,
  EnergyWeights,
  Box,
  Plane,
  Primitive,
  PrimitiveKind,
  HitRecord,
  Falloff,
  PointLight,
  Background,
  Scene,
  ShadowPolicy,
  RenderSettings,
} from './types.js';

// Materials and textures
export { createMaterial, solid, checker, image, colorAt, energyWeights, DEFAULT_ALBEDO } from './material.js';
export type { MaterialOptions } from './material.js';
export { ImageTexture } from './texture.js';

// Lights
export { createPointLight, attenuation, radianceAt } from './light.js';
export type { PointLightOptions } from './light.js';

// Intersection
export {
  createBox,
  createPlane,
  makeHitRecord,
  outwardNormal,
  intersect,
  intersectBox,
  intersectPlane,
  boxFace,
} from './primitives.js';
export {
  createScene,
  solidBackground,
  gradientBackground,
  backgroundColor,
  nearestHit,
  isOccluded,
} from './scene.js';
export type { SceneOptions } from './scene.js';

// Shading and transport
export { Tracer, offsetOrigin, refract, combineEnergy } from './tracer.js';
export type { RefractionResult } from './tracer.js';
export { DEFAULT_RENDER_SETTINGS, createRenderSettings, defaultRenderSettings } from './settings.js';

// Frame driver
export { LookAtCamera, primaryRayDirection, assertFieldOfView } from './camera.js';
export type { CameraProvider, LookAtOptions } from './camera.js';
export { createFrameBuffer, toPixel, renderPixel, renderRows, renderFrame, renderFrameAsync } from './frame.js';
export type { FrameBuffer, FrameContext, Pixel, RenderFrameOptions } from './frame.js';
export { encodePpm } from './ppm.js';

// Scene documents
export {
  sceneDocumentSchema,
  parseSceneDocument,
  parseSceneJson,
  buildScene,
  demoSceneDocument,
} from './sceneDocument.js';
export type { SceneDocument, MaterialDocument, TextureDocument, BuiltScene } from './sceneDocument.js';
