/**
 * Config CLI Command
 * Prints the effective environment configuration.
 */

import { Command } from 'commander';
import { RENDER_DEFAULTS, LOG_LEVEL, NODE_ENV, VERBOSE_MODE, logEnvConfig } from '@raybox/shared';

export function createConfigCommand(): Command {
  return new Command('config')
    .description('Show the configuration read from the environment')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      if (options.json) {
        console.log(JSON.stringify({
          nodeEnv: NODE_ENV,
          verboseMode: VERBOSE_MODE,
          logLevel: LOG_LEVEL,
          render: RENDER_DEFAULTS,
        }, null, 2));
        return;
      }
      logEnvConfig();
    });
}
