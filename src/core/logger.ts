/**
 * docmirror - Logger
 *
 * Logger instances are created by the CLI and passed down explicitly.
 * Console lines go to stderr with a level prefix; when a log file is
 * configured, timestamped lines are appended to it as well.
 */

import { appendFileSync, mkdirSync } from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  logFile?: string;
  /** Console sink, replaceable in tests */
  write?: (line: string) => void;
}

export function formatLogLine(level: LogLevel, message: string, at: Date = new Date()): string {
  const timestamp = at.toISOString().replace('T', ' ').slice(0, 19);
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}\n`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false, logFile } = options;
  const write = options.write ?? ((line: string) => console.error(line));

  if (logFile) {
    mkdirSync(path.dirname(logFile), { recursive: true });
  }

  const emit = (level: LogLevel, message: string): void => {
    if (level === 'debug' && !verbose) return;
    write(`[${level.toUpperCase()}] ${message}`);
    if (logFile) {
      appendFileSync(logFile, formatLogLine(level, message));
    }
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
