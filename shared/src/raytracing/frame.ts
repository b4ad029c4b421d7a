/**
 * Frame driver: maps pixels to primary rays and collects the traced colors
 * into an 8-bit RGBA buffer.
 *
 * Rows are independent. `renderFrame` walks them in order on the calling
 * thread, and `renderFrameAsync` yields between batches of rows. Callers
 * that split work across workers use `renderRows` on disjoint row ranges of
 * the same buffer.
 *
 * @module raytracing/frame
 */

import { setImmediate } from 'node:timers/promises';

import type { Color } from '../geometry/Vector3.js';
import type { CameraProvider } from './camera.js';
import type { RenderSettings } from './types.js';
import type { Scene } from './types.js';

import { Tracer } from './tracer.js';
import { assertFieldOfView } from './camera.js';
import { primaryRayDirection } from './camera.js';
import { logger } from '../utils/logging/logger.js';
import { RenderAbortedError } from '../utils/errorTypes.js';
import { ValidationError } from '../utils/errorTypes.js';

const PROGRESS_INTERVAL_ROWS = 100;
const YIELD_INTERVAL_ROWS = 8;

let frameCounter = 0;

// =============================================================================
// Types
// =============================================================================

export interface FrameBuffer {
  readonly width: number;
  readonly height: number;
  /** RGBA, 4 bytes per pixel, row-major from the top row */
  readonly data: Uint8ClampedArray;
}

export type Pixel = readonly [r: number, g: number, b: number, a: number];

export interface FrameContext {
  readonly tracer: Tracer;
  readonly camera: CameraProvider;
  readonly width: number;
  readonly height: number;
  readonly fovDegrees: number;
}

export interface RenderFrameOptions {
  width: number;
  height: number;
  fovDegrees: number;
  settings: RenderSettings;
  /** Checked before each row */
  signal?: AbortSignal;
}

// =============================================================================
// Pixels
// =============================================================================

export function createFrameBuffer(width: number, height: number): FrameBuffer {
  assertDimension('width', width);
  assertDimension('height', height);
  return { width, height, data: new Uint8ClampedArray(width * height * 4) };
}

/**
 * Clamp each channel to [0, 1] and quantize with floor(c·255). Alpha is opaque.
 */
export function toPixel(color: Color): Pixel {
  const c = color.clamp01();
  return [Math.floor(c.x * 255), Math.floor(c.y * 255), Math.floor(c.z * 255), 255];
}

export function renderPixel(context: FrameContext, x: number, y: number): Color {
  const direction = primaryRayDirection(x, y, context.width, context.height, context.fovDegrees);
  return context.tracer.trace(context.camera.eye, context.camera.toWorld(direction), 0);
}

/**
 * Render rows [startRow, endRow) into `frame`.
 */
export function renderRows(context: FrameContext, frame: FrameBuffer, startRow: number, endRow: number): void {
  if (frame.width !== context.width || frame.height !== context.height) {
    throw new ValidationError(
      `Frame is ${frame.width}x${frame.height}, expected ${context.width}x${context.height}`,
      'frame'
    );
  }
  if (!(Number.isInteger(startRow) && Number.isInteger(endRow) && startRow >= 0 && startRow <= endRow && endRow <= frame.height)) {
    throw new ValidationError(`Invalid row range [${startRow}, ${endRow}) for height ${frame.height}`, 'rows', {
      startRow,
      endRow,
    });
  }

  for (let y = startRow; y < endRow; y++) {
    for (let x = 0; x < frame.width; x++) {
      const [r, g, b, a] = toPixel(renderPixel(context, x, y));
      const offset = (y * frame.width + x) * 4;
      frame.data[offset] = r;
      frame.data[offset + 1] = g;
      frame.data[offset + 2] = b;
      frame.data[offset + 3] = a;
    }
  }
}

// =============================================================================
// Frames
// =============================================================================

interface FrameJob {
  readonly frame: FrameBuffer;
  readonly context: FrameContext;
  readonly operationId: string;
  readonly settings: RenderSettings;
  readonly signal?: AbortSignal;
}

function startFrame(scene: Scene, camera: CameraProvider, options: RenderFrameOptions): FrameJob {
  const { width, height, fovDegrees, settings, signal } = options;
  assertFieldOfView(fovDegrees);

  const frame = createFrameBuffer(width, height);
  const context: FrameContext = { tracer: new Tracer(scene, settings), camera, width, height, fovDegrees };

  const operationId = `frame-${++frameCounter}`;
  logger.startOperation(operationId);
  logger.debug('Rendering frame', {
    component: 'frame',
    width,
    height,
    primitives: scene.primitives.length,
    lights: scene.lights.length,
  });

  return { frame, context, operationId, settings, signal };
}

function renderJobRow(job: FrameJob, y: number): void {
  const { frame, context, signal } = job;
  if (signal?.aborted) {
    logger.warn('Frame aborted', { component: 'frame', completedRows: y, totalRows: frame.height });
    throw new RenderAbortedError(y, frame.height);
  }

  renderRows(context, frame, y, y + 1);

  const completed = y + 1;
  if (completed % PROGRESS_INTERVAL_ROWS === 0 && completed < frame.height) {
    logger.debug(`Rendered ${completed}/${frame.height} rows`, { component: 'frame' });
  }
}

function finishFrame(job: FrameJob): FrameBuffer {
  logger.timed('info', 'Frame rendered', job.operationId, {
    component: 'frame',
    width: job.frame.width,
    height: job.frame.height,
    maxDepth: job.settings.maxDepth,
  });
  return job.frame;
}

/**
 * Render a whole frame on the calling thread.
 *
 * @throws RenderAbortedError when `options.signal` is aborted before a row starts
 */
export function renderFrame(scene: Scene, camera: CameraProvider, options: RenderFrameOptions): FrameBuffer {
  const job = startFrame(scene, camera, options);
  try {
    for (let y = 0; y < job.frame.height; y++) {
      renderJobRow(job, y);
    }
  } catch (error) {
    logger.endOperation(job.operationId);
    throw error;
  }
  return finishFrame(job);
}

/**
 * Same as `renderFrame`, but yields to the event loop every few rows so that
 * timers and signal handlers can abort the render.
 *
 * @throws RenderAbortedError when `options.signal` is aborted before a row starts
 */
export async function renderFrameAsync(
  scene: Scene,
  camera: CameraProvider,
  options: RenderFrameOptions
): Promise<FrameBuffer> {
  const job = startFrame(scene, camera, options);
  try {
    for (let y = 0; y < job.frame.height; y++) {
      if (y > 0 && y % YIELD_INTERVAL_ROWS === 0) {
        await setImmediate();
      }
      renderJobRow(job, y);
    }
  } catch (error) {
    logger.endOperation(job.operationId);
    throw error;
  }
  return finishFrame(job);
}

function assertDimension(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw ValidationError.outOfRange(field, { min: 1, value });
  }
}
