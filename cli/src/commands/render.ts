/**
 * Render CLI Command
 * Renders a scene file (or the built-in demo scene) to a binary PPM image.
 *
 * File access is injected so the command can be tested without touching disk.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import {
  RENDER_DEFAULTS,
  buildScene,
  defaultRenderSettings,
  demoSceneDocument,
  encodePpm,
  logger,
  parseSceneJson,
  renderFrameAsync,
} from '@raybox/shared';

import type { EnergyPolicy, RenderSettings } from '@raybox/shared';
import type { FileIo } from '../utils/fileIo.js';

import { handleCommandError } from '../utils/errorHandler.js';

// =============================================================================
// Types
// =============================================================================

export interface RenderCliServices {
  files: FileIo;
}

export interface RenderCommandOptions {
  output: string;
  width?: number;
  height?: number;
  fov?: number;
  maxDepth?: number;
  shadow?: 'hard' | 'soft';
  energy?: EnergyPolicy;
  json?: boolean;
}

// =============================================================================
// Option parsing
// =============================================================================

export function parsePositiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function parseFieldOfView(value: string): number {
  const parsed = Number(value);
  if (!(parsed > 0 && parsed < 180)) {
    throw new InvalidArgumentError('Must be between 0 and 180 degrees.');
  }
  return parsed;
}

/**
 * Settings overrides for the flags that were given. Unset flags leave the
 * environment defaults alone.
 */
export function settingsOverrides(options: RenderCommandOptions): Partial<RenderSettings> {
  const overrides: { -readonly [K in keyof RenderSettings]?: RenderSettings[K] } = {};
  if (options.maxDepth !== undefined) {
    overrides.maxDepth = options.maxDepth;
  }
  if (options.shadow === 'hard') {
    overrides.shadow = { kind: 'hard' };
  } else if (options.shadow === 'soft') {
    overrides.shadow = { kind: 'soft', factor: RENDER_DEFAULTS.shadowFactor };
  }
  if (options.energy !== undefined) {
    overrides.energyPolicy = options.energy;
  }
  return overrides;
}

// =============================================================================
// Command Factory
// =============================================================================

/**
 * Create the render command.
 *
 * @example
 * ```typescript
 * program.addCommand(createRenderCommand({ files: nodeFileIo }));
 * ```
 */
export function createRenderCommand(services: RenderCliServices): Command {
  const { files } = services;

  return new Command('render')
    .description('Render a scene to a PPM image (the demo scene when no file is given)')
    .argument('[scene]', 'Path to a scene JSON file')
    .option('-o, --output <path>', 'Output PPM file', 'render.ppm')
    .option('-w, --width <pixels>', `Image width (default: ${RENDER_DEFAULTS.width})`, parsePositiveInteger)
    .option('-H, --height <pixels>', `Image height (default: ${RENDER_DEFAULTS.height})`, parsePositiveInteger)
    .option('--fov <degrees>', 'Vertical field of view (default: from the scene)', parseFieldOfView)
    .option('--max-depth <depth>', `Recursion limit (default: ${RENDER_DEFAULTS.maxDepth})`, parseNonNegativeInteger)
    .addOption(new Option('--shadow <mode>', 'Shadow policy').choices(['hard', 'soft']))
    .addOption(new Option('--energy <policy>', 'Energy policy').choices(['unclamped', 'clamp', 'normalize']))
    .option('--json', 'Output as JSON')
    .action(async (scenePath: string | undefined, options: RenderCommandOptions) => {
      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once('SIGINT', onInterrupt);

      const previousLevel = logger.getLevel();
      if (options.json) {
        // keep stdout parseable
        logger.setLevel('warn');
      }

      try {
        const document = scenePath ? parseSceneJson(await files.readText(scenePath)) : demoSceneDocument();
        const { scene, camera, fovDegrees } = buildScene(document);

        const width = options.width ?? RENDER_DEFAULTS.width;
        const height = options.height ?? RENDER_DEFAULTS.height;
        const fov = options.fov ?? fovDegrees ?? RENDER_DEFAULTS.fovDegrees;
        const settings = defaultRenderSettings(settingsOverrides(options));

        logger.info(`Rendering ${scenePath ?? 'demo scene'}`, { component: 'cli', width, height, fov });

        const started = Date.now();
        const frame = await renderFrameAsync(scene, camera, {
          width,
          height,
          fovDegrees: fov,
          settings,
          signal: controller.signal,
        });
        await files.writeBytes(options.output, encodePpm(frame));
        const durationMs = Date.now() - started;

        if (options.json) {
          console.log(JSON.stringify({
            success: true,
            scene: scenePath ?? 'demo',
            output: options.output,
            width,
            height,
            primitives: scene.primitives.length,
            lights: scene.lights.length,
            durationMs,
          }, null, 2));
          return;
        }

        console.log(`Wrote ${width}x${height} image to ${options.output} in ${durationMs}ms`);
      } catch (error) {
        handleCommandError(error, 'rendering scene', { json: options.json });
      } finally {
        process.removeListener('SIGINT', onInterrupt);
        logger.setLevel(previousLevel);
      }
    });
}
