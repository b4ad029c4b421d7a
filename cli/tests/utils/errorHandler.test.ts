/**
 * Tests for CLI error reporting.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DegenerateVectorError, RenderAbortedError, ValidationError } from '@raybox/shared';

import { handleCommandError, wrapCommand } from '../../src/utils/errorHandler.js';
import { runCommandAction } from '../helpers/testSetup.js';

async function report(error: unknown, options: { json?: boolean; silent?: boolean } = {}) {
  return runCommandAction(async () => handleCommandError(error, 'rendering scene', options));
}

describe('handleCommandError', () => {
  it('should prefix validation errors', async () => {
    const result = await report(new ValidationError('width must be at least 1', 'width'));

    assert.strictEqual(result.exitCode, 1);
    assert.deepStrictEqual(result.errors, ['Validation Error: width must be at least 1']);
  });

  it('should report aborted renders', async () => {
    const result = await report(new RenderAbortedError(3, 10));
    assert.deepStrictEqual(result.errors, ['Aborted: Render aborted after 3 of 10 rows']);
  });

  it('should name the action for other errors', async () => {
    const result = await report(new Error('disk full'));
    assert.deepStrictEqual(result.errors, ['Error rendering scene: disk full']);
  });

  it('should print non-Error values', async () => {
    const result = await report('boom');
    assert.deepStrictEqual(result.errors, ['Error rendering scene: boom']);
  });

  it('should emit a JSON error object', async () => {
    const result = await report(new DegenerateVectorError({ x: 0, y: 0, z: 0 }), { json: true });

    assert.strictEqual(result.exitCode, 1);
    assert.deepStrictEqual(JSON.parse(result.errorOutput), {
      success: false,
      action: 'rendering scene',
      error: 'Cannot normalize a zero-length vector (0, 0, 0)',
      type: 'GEOMETRY_ERROR',
    });
  });

  it('should type plain errors as "error" in JSON', async () => {
    const result = await report(new Error('disk full'), { json: true });
    assert.deepStrictEqual(JSON.parse(result.errorOutput), {
      success: false,
      action: 'rendering scene',
      error: 'disk full',
      type: 'error',
    });
  });

  it('should only set the exit code when silent', async () => {
    const result = await report(new Error('quiet'), { silent: true });

    assert.strictEqual(result.exitCode, 1);
    assert.deepStrictEqual(result.errors, []);
  });
});

describe('wrapCommand', () => {
  it('should pass through successful actions', async () => {
    const calls: string[] = [];
    const action = wrapCommand('testing', async (name: string) => {
      calls.push(name);
    });

    const result = await runCommandAction(() => action('scene.json'));

    assert.deepStrictEqual(calls, ['scene.json']);
    assert.strictEqual(result.exitCode, null);
  });

  it('should route failures through the error handler with derived options', async () => {
    const action = wrapCommand(
      'testing',
      async (_name: string, _options: { json?: boolean }) => {
        throw new ValidationError('bad scene', 'camera');
      },
      (_name, options) => ({ json: options.json })
    );

    const result = await runCommandAction(() => action('scene.json', { json: true }));

    assert.strictEqual(result.exitCode, 1);
    assert.deepStrictEqual(JSON.parse(result.errorOutput), {
      success: false,
      action: 'testing',
      error: 'bad scene',
      type: 'VALIDATION_ERROR',
      field: 'camera',
    });
  });
});
