/**
 * Test setup utilities for CLI command tests
 *
 * Provides helpers for capturing console output and process.exit calls
 * while a command runs.
 */

import type { Command } from 'commander';
import type { MockConsole, MockProcessExit } from './mocks.js';
import { createMockConsole, createMockProcessExit } from './mocks.js';

// ============================================================================
// GLOBAL TEST STATE
// ============================================================================

let originalConsoleLog: typeof console.log;
let originalConsoleError: typeof console.error;
let originalProcessExit: typeof process.exit;
let mockConsole: MockConsole | null = null;
let mockExit: MockProcessExit | null = null;

// ============================================================================
// CONSOLE CAPTURE
// ============================================================================

/**
 * Start capturing console output
 */
export function captureConsole(): MockConsole {
  if (!mockConsole) {
    originalConsoleLog = console.log;
    originalConsoleError = console.error;
    mockConsole = createMockConsole();
    console.log = mockConsole.log;
    console.error = mockConsole.error;
  }
  return mockConsole;
}

/**
 * Stop capturing console output and restore original
 */
export function restoreConsole(): void {
  if (mockConsole) {
    console.log = originalConsoleLog;
    console.error = originalConsoleError;
    mockConsole = null;
  }
}

// ============================================================================
// PROCESS.EXIT CAPTURE
// ============================================================================

/**
 * Start capturing process.exit calls
 */
export function captureProcessExit(): MockProcessExit {
  if (!mockExit) {
    originalProcessExit = process.exit;
    mockExit = createMockProcessExit();
    process.exit = mockExit.exit;
  }
  return mockExit;
}

/**
 * Stop capturing process.exit and restore original
 */
export function restoreProcessExit(): void {
  if (mockExit) {
    process.exit = originalProcessExit;
    mockExit = null;
  }
}

// ============================================================================
// COMMAND EXECUTION HELPERS
// ============================================================================

/**
 * Result of running a command action
 */
export interface CommandResult {
  output: string;
  errorOutput: string;
  logs: string[];
  errors: string[];
  exitCode: number | null;
  error?: Error;
}

/**
 * Run a command action and capture results
 *
 * This helper sets up console capture, runs the action, and returns the results.
 * It handles process.exit() calls gracefully.
 */
export async function runCommandAction(action: () => Promise<unknown>): Promise<CommandResult> {
  const mockCon = captureConsole();
  const exit = captureProcessExit();
  mockCon.reset();

  let error: Error | undefined;

  try {
    await action();
  } catch (err) {
    // process.exit was called
    if (!(err instanceof Error && err.message.startsWith('process.exit('))) {
      error = err instanceof Error ? err : new Error(String(err));
    }
  } finally {
    restoreConsole();
    restoreProcessExit();
  }

  return {
    output: mockCon.getOutput(),
    errorOutput: mockCon.getErrorOutput(),
    logs: [...mockCon.logs],
    errors: [...mockCon.errors],
    exitCode: exit.exitCode,
    error,
  };
}

/**
 * Parse user arguments with a command, as if typed after its name
 */
export function runCommand(command: Command, args: string[]): Promise<CommandResult> {
  return runCommandAction(() => command.parseAsync(args, { from: 'user' }));
}
