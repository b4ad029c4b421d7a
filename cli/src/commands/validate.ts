/**
 * Validate CLI Command
 * Checks a scene file against the scene schema and builds it without rendering.
 */

import { Command } from 'commander';
import { buildScene, parseSceneJson } from '@raybox/shared';

import type { FileIo } from '../utils/fileIo.js';

import { wrapCommand } from '../utils/errorHandler.js';

export interface ValidateCliServices {
  files: FileIo;
}

export interface ValidateCommandOptions {
  json?: boolean;
}

export function createValidateCommand(services: ValidateCliServices): Command {
  const { files } = services;

  return new Command('validate')
    .description('Check a scene file without rendering it')
    .argument('<scene>', 'Path to a scene JSON file')
    .option('--json', 'Output as JSON')
    .action(wrapCommand(
      'validating scene',
      async (scenePath: string, options: ValidateCommandOptions) => {
        const document = parseSceneJson(await files.readText(scenePath));
        const { scene } = buildScene(document);

        const summary = {
          valid: true,
          scene: scenePath,
          materials: Object.keys(document.materials).length,
          primitives: scene.primitives.length,
          lights: scene.lights.length,
        };

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }

        console.log(
          `${scenePath} is valid: ${summary.primitives} primitives, ${summary.lights} lights, ${summary.materials} materials`
        );
      },
      (_scenePath, options) => ({ json: options.json })
    ));
}
