/**
 * CLI Helper Functions
 *
 * Shared utilities for CLI commands.
 */

import { c } from './colors.js';
import { ConfigError, describeError } from '../core/errors.js';

/**
 * Commander reducer for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Report an error that escaped a command and return the exit code to use.
 * Configuration mistakes get a short message; anything else keeps its stack
 * for bug reports.
 */
export function reportCommandError(error: unknown, print: (line: string) => void = console.error): number {
  if (error instanceof ConfigError) {
    print(`${c.error('ERROR')} ${error.message}`);
    return 2;
  }
  print(`${c.error('ERROR')} ${describeError(error)}`);
  if (error instanceof Error && error.stack) {
    print(c.dim(error.stack));
  }
  return 1;
}
