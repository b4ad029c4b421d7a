/**
 * Configuration
 * @module config
 */

export {
  envSchema,
  parseEnv,
  NODE_ENV,
  VERBOSE_MODE,
  LOG_LEVEL,
  VERBOSE_TIMING,
  RENDER_DEFAULTS,
  isVerbose,
  isDebugLevel,
  isProduction,
  logEnvConfig,
} from './env.js';
export type { EnvConfig } from './env.js';
