/**
 * Tests for centralized environment configuration.
 * Covers schema defaults, fallback on invalid values, and helper functions.
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';

import {
  parseEnv,
  isProduction,
  isVerbose,
  isDebugLevel,
  logEnvConfig,
  NODE_ENV,
  VERBOSE_MODE,
  LOG_LEVEL,
  VERBOSE_TIMING,
  RENDER_DEFAULTS,
} from '../../src/config/env.js';

describe('parseEnv', () => {
  let errorLines: string[];

  beforeEach(() => {
    errorLines = [];
    mock.method(console, 'error', (line: unknown) => {
      errorLines.push(String(line));
    });
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it('should apply defaults to an empty environment', () => {
    const env = parseEnv({});

    assert.strictEqual(env.NODE_ENV, 'development');
    assert.strictEqual(env.VERBOSE_MODE, 'off');
    assert.strictEqual(env.LOG_LEVEL, undefined);
    assert.strictEqual(env.RAYBOX_WIDTH, 800);
    assert.strictEqual(env.RAYBOX_HEIGHT, 600);
    assert.strictEqual(env.RAYBOX_FOV, 45);
    assert.strictEqual(env.RAYBOX_MAX_DEPTH, 5);
    assert.strictEqual(env.RAYBOX_EPSILON, 0.001);
    assert.strictEqual(env.RAYBOX_SHADOW_MODE, 'soft');
    assert.strictEqual(env.RAYBOX_SHADOW_FACTOR, 0.3);
    assert.strictEqual(env.RAYBOX_ENERGY_POLICY, 'unclamped');
    assert.deepStrictEqual(errorLines, []);
  });

  it('should parse provided values', () => {
    const env = parseEnv({
      RAYBOX_WIDTH: '320',
      RAYBOX_FOV: '60.5',
      RAYBOX_MAX_DEPTH: '0',
      RAYBOX_SHADOW_MODE: 'hard',
      RAYBOX_ENERGY_POLICY: 'normalize',
      LOG_LEVEL: 'warn',
    });

    assert.strictEqual(env.RAYBOX_WIDTH, 320);
    assert.strictEqual(env.RAYBOX_FOV, 60.5);
    assert.strictEqual(env.RAYBOX_MAX_DEPTH, 0);
    assert.strictEqual(env.RAYBOX_SHADOW_MODE, 'hard');
    assert.strictEqual(env.RAYBOX_ENERGY_POLICY, 'normalize');
    assert.strictEqual(env.LOG_LEVEL, 'warn');
  });

  it('should treat empty strings as unset', () => {
    const env = parseEnv({ RAYBOX_WIDTH: '', NODE_ENV: '' });
    assert.strictEqual(env.RAYBOX_WIDTH, 800);
    assert.strictEqual(env.NODE_ENV, 'development');
  });

  it('should report invalid values and fall back to their defaults', () => {
    const env = parseEnv({ RAYBOX_WIDTH: 'abc', RAYBOX_HEIGHT: '240', RAYBOX_FOV: '200' });

    assert.strictEqual(env.RAYBOX_WIDTH, 800);
    assert.strictEqual(env.RAYBOX_HEIGHT, 240);
    assert.strictEqual(env.RAYBOX_FOV, 45);
    assert.strictEqual(errorLines[0], 'Environment validation failed:');
    assert.ok(errorLines.includes('  RAYBOX_WIDTH: Must be a valid integer'));
    assert.ok(errorLines.includes('  RAYBOX_FOV: Must be between 0 and 180 degrees'));
  });

  it('should reject out-of-range transport settings', () => {
    const env = parseEnv({ RAYBOX_MAX_DEPTH: '-1', RAYBOX_EPSILON: '0', RAYBOX_SHADOW_FACTOR: '1.5' });

    assert.strictEqual(env.RAYBOX_MAX_DEPTH, 5);
    assert.strictEqual(env.RAYBOX_EPSILON, 0.001);
    assert.strictEqual(env.RAYBOX_SHADOW_FACTOR, 0.3);
    assert.ok(errorLines.includes('  RAYBOX_MAX_DEPTH: Must be non-negative'));
    assert.ok(errorLines.includes('  RAYBOX_EPSILON: Must be positive'));
    assert.ok(errorLines.includes('  RAYBOX_SHADOW_FACTOR: Must be between 0 and 1'));
  });

  it('should reject unknown enum values', () => {
    const env = parseEnv({ RAYBOX_ENERGY_POLICY: 'loud', VERBOSE_MODE: 'chatty' });

    assert.strictEqual(env.RAYBOX_ENERGY_POLICY, 'unclamped');
    assert.strictEqual(env.VERBOSE_MODE, 'off');
    assert.ok(errorLines.some((line) => line.startsWith('  RAYBOX_ENERGY_POLICY: Invalid enum value')));
  });

  it('should exit on invalid values in production', () => {
    const exitCodes: unknown[] = [];
    mock.method(process, 'exit', (code?: unknown) => {
      exitCodes.push(code);
      throw new Error('process.exit');
    });

    assert.throws(() => parseEnv({ NODE_ENV: 'production', RAYBOX_WIDTH: '-5' }), /process\.exit/);
    assert.deepStrictEqual(exitCodes, [1]);
    assert.strictEqual(errorLines[errorLines.length - 1], 'Exiting due to invalid environment configuration');
  });
});

describe('Environment exports', () => {
  it('should derive LOG_LEVEL from VERBOSE_MODE when unset', () => {
    if (!process.env.LOG_LEVEL) {
      assert.strictEqual(LOG_LEVEL, VERBOSE_MODE === 'debug' ? 'debug' : 'info');
    }
  });

  it('should keep helpers consistent with the exported values', () => {
    assert.strictEqual(isProduction(), NODE_ENV === 'production');
    assert.strictEqual(isVerbose(), VERBOSE_MODE !== 'off');
    assert.strictEqual(VERBOSE_TIMING, isVerbose());
    assert.strictEqual(isDebugLevel(), VERBOSE_MODE === 'debug' || LOG_LEVEL === 'debug');
  });

  it('should expose render defaults within their valid ranges', () => {
    assert.ok(Number.isInteger(RENDER_DEFAULTS.width) && RENDER_DEFAULTS.width > 0);
    assert.ok(Number.isInteger(RENDER_DEFAULTS.height) && RENDER_DEFAULTS.height > 0);
    assert.ok(RENDER_DEFAULTS.fovDegrees > 0 && RENDER_DEFAULTS.fovDegrees < 180);
    assert.ok(RENDER_DEFAULTS.maxDepth >= 0);
    assert.ok(RENDER_DEFAULTS.epsilon > 0);
    assert.ok(RENDER_DEFAULTS.shadowFactor >= 0 && RENDER_DEFAULTS.shadowFactor <= 1);
  });

  it('should print every render default', () => {
    const lines: string[] = [];
    mock.method(console, 'log', (line: unknown) => {
      lines.push(String(line));
    });
    try {
      logEnvConfig();
    } finally {
      mock.restoreAll();
    }

    assert.strictEqual(lines[0], 'Environment Configuration:');
    assert.ok(lines.includes(`  RAYBOX_WIDTH=${RENDER_DEFAULTS.width}`));
    assert.ok(lines.includes(`  RAYBOX_ENERGY_POLICY=${RENDER_DEFAULTS.energyPolicy}`));
  });
});
