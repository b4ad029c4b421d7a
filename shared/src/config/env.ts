/**
 * Centralized Environment Configuration
 *
 * This module is the SINGLE SOURCE OF TRUTH for environment variables.
 * The renderer core never reads the environment: entry points turn these
 * values into explicit render settings (see `defaultRenderSettings`).
 *
 * Features:
 * - Zod schema validation with type safety
 * - Default values for every variable
 * - Invalid values are reported and replaced by defaults (fatal in production)
 *
 * Usage:
 *   import { RENDER_DEFAULTS, LOG_LEVEL } from '@raybox/shared';
 */

import { z } from 'zod';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Helper to parse integer env vars with default
 */
const integerWithDefault = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : defaultValue))
    .refine((val) => !isNaN(val), { message: 'Must be a valid integer' });

/**
 * Helper to parse positive integer env vars with default
 */
const positiveIntegerWithDefault = (defaultValue: number) =>
  integerWithDefault(defaultValue).refine((val) => val > 0, { message: 'Must be a positive integer' });

/**
 * Helper to parse float env vars with default
 */
const numberWithDefault = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultValue))
    .refine((val) => Number.isFinite(val), { message: 'Must be a finite number' });

/**
 * Helper for optional string with default
 */
const optionalString = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => val || defaultValue);

/**
 * Main environment configuration schema
 */
export const envSchema = z.object({
  // -------------------------------------------------------------------------
  // Node Environment
  // -------------------------------------------------------------------------
  NODE_ENV: optionalString('development'),

  // -------------------------------------------------------------------------
  // Verbose/Debug Mode Configuration
  // -------------------------------------------------------------------------
  VERBOSE_MODE: z
    .enum(['off', 'on', 'debug'])
    .optional()
    .transform((val) => val ?? 'off'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(), // Computed below if not set

  // -------------------------------------------------------------------------
  // Frame
  // -------------------------------------------------------------------------
  RAYBOX_WIDTH: positiveIntegerWithDefault(800),
  RAYBOX_HEIGHT: positiveIntegerWithDefault(600),
  RAYBOX_FOV: numberWithDefault(45).refine((val) => val > 0 && val < 180, {
    message: 'Must be between 0 and 180 degrees',
  }),

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------
  RAYBOX_MAX_DEPTH: integerWithDefault(5).refine((val) => val >= 0, { message: 'Must be non-negative' }),
  RAYBOX_EPSILON: numberWithDefault(0.001).refine((val) => val > 0, { message: 'Must be positive' }),
  RAYBOX_SHADOW_MODE: z
    .enum(['hard', 'soft'])
    .optional()
    .transform((val) => val ?? 'soft'),
  RAYBOX_SHADOW_FACTOR: numberWithDefault(0.3).refine((val) => val >= 0 && val <= 1, {
    message: 'Must be between 0 and 1',
  }),
  RAYBOX_ENERGY_POLICY: z
    .enum(['unclamped', 'clamp', 'normalize'])
    .optional()
    .transform((val) => val ?? 'unclamped'),
});

export type EnvConfig = z.infer<typeof envSchema>;

// =============================================================================
// PARSE AND VALIDATE
// =============================================================================

/**
 * Parse an environment record. Invalid entries are reported on stderr and
 * fall back to their defaults; in production they are fatal.
 */
export function parseEnv(env: NodeJS.ProcessEnv): EnvConfig {
  const parseResult = envSchema.safeParse(env);
  if (parseResult.success) {
    return parseResult.data;
  }

  console.error('Environment validation failed:');
  const invalidKeys = new Set<string>();
  for (const error of parseResult.error.errors) {
    console.error(`  ${error.path.join('.')}: ${error.message}`);
    invalidKeys.add(String(error.path[0]));
  }
  if (env.NODE_ENV === 'production') {
    console.error('Exiting due to invalid environment configuration');
    process.exit(1);
  }

  // Retry with the offending keys removed so they take their defaults
  const cleaned: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(env)) {
    if (!invalidKeys.has(key)) cleaned[key] = value;
  }
  return envSchema.parse(cleaned);
}

const parsedEnv = parseEnv(process.env);

// =============================================================================
// EXPORTED CONFIGURATION VALUES
// =============================================================================

export const NODE_ENV = parsedEnv.NODE_ENV;

export const VERBOSE_MODE = parsedEnv.VERBOSE_MODE;
export const LOG_LEVEL = parsedEnv.LOG_LEVEL ?? (VERBOSE_MODE === 'debug' ? 'debug' : 'info');
export const VERBOSE_TIMING = VERBOSE_MODE !== 'off';

/**
 * Render defaults, overridable per call by CLI flags or explicit settings.
 */
export const RENDER_DEFAULTS = {
  width: parsedEnv.RAYBOX_WIDTH,
  height: parsedEnv.RAYBOX_HEIGHT,
  fovDegrees: parsedEnv.RAYBOX_FOV,
  maxDepth: parsedEnv.RAYBOX_MAX_DEPTH,
  epsilon: parsedEnv.RAYBOX_EPSILON,
  shadowMode: parsedEnv.RAYBOX_SHADOW_MODE,
  shadowFactor: parsedEnv.RAYBOX_SHADOW_FACTOR,
  energyPolicy: parsedEnv.RAYBOX_ENERGY_POLICY,
} as const;

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Check if verbose mode is enabled
 */
export function isVerbose(): boolean {
  return VERBOSE_MODE !== 'off';
}

/**
 * Check if debug level logging is enabled
 */
export function isDebugLevel(): boolean {
  return VERBOSE_MODE === 'debug' || LOG_LEVEL === 'debug';
}

/**
 * Check if running in production
 */
export function isProduction(): boolean {
  return NODE_ENV === 'production';
}

/**
 * Log environment configuration
 */
export function logEnvConfig(): void {
  console.log('Environment Configuration:');
  console.log(`  NODE_ENV=${NODE_ENV}`);
  console.log(`  VERBOSE_MODE=${VERBOSE_MODE}`);
  console.log(`  LOG_LEVEL=${LOG_LEVEL}`);
  console.log(`  RAYBOX_WIDTH=${RENDER_DEFAULTS.width}`);
  console.log(`  RAYBOX_HEIGHT=${RENDER_DEFAULTS.height}`);
  console.log(`  RAYBOX_FOV=${RENDER_DEFAULTS.fovDegrees}`);
  console.log(`  RAYBOX_MAX_DEPTH=${RENDER_DEFAULTS.maxDepth}`);
  console.log(`  RAYBOX_EPSILON=${RENDER_DEFAULTS.epsilon}`);
  console.log(`  RAYBOX_SHADOW_MODE=${RENDER_DEFAULTS.shadowMode}`);
  console.log(`  RAYBOX_SHADOW_FACTOR=${RENDER_DEFAULTS.shadowFactor}`);
  console.log(`  RAYBOX_ENERGY_POLICY=${RENDER_DEFAULTS.energyPolicy}`);
}
