#!/usr/bin/env -S node --import tsx
import 'dotenv/config';
import { Command } from 'commander';
import { createConfigCommand } from './commands/config.js';
import { createRenderCommand } from './commands/render.js';
import { createValidateCommand } from './commands/validate.js';
import { nodeFileIo } from './utils/fileIo.js';

async function main() {
  const program = new Command();

  program
    .name('raybox')
    .description('Render scenes of boxes and planes to PPM images')
    .version('1.0.0');

  program.addCommand(createRenderCommand({ files: nodeFileIo }));
  program.addCommand(createValidateCommand({ files: nodeFileIo }));
  program.addCommand(createConfigCommand());

  await program.parseAsync();
}

main().catch((error) => {
  console.error('CLI error:', error);
  process.exit(1);
});
