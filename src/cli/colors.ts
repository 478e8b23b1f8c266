/**
 * ANSI color utilities for CLI output
 *
 * Colors are dropped when NO_COLOR is set or stdout is not a terminal, so
 * piped output and log files stay plain.
 */

export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',
  gray: '\x1b[90m',
  bgRed: '\x1b[41m',
};

export function colorEnabled(): boolean {
  return !process.env.NO_COLOR && process.stdout.isTTY === true;
}

function paint(s: string, ...codes: string[]): string {
  return colorEnabled() ? `${codes.join('')}${s}${colors.reset}` : s;
}

/**
 * Semantic color helpers
 */
export const c = {
  title: (s: string) => paint(s, colors.bold, colors.cyan),
  header: (s: string) => paint(s, colors.bold, colors.cyan),
  success: (s: string) => paint(s, colors.green),
  warning: (s: string) => paint(s, colors.yellow),
  error: (s: string) => (colorEnabled() ? paint(` ${s} `, colors.bgRed, colors.white) : s),
  dim: (s: string) => paint(s, colors.dim),
  file: (s: string) => paint(s, colors.magenta),
  path: (s: string) => paint(s, colors.gray),
  time: (s: string) => paint(s, colors.dim),
  list: (s: string) => `${paint('•', colors.yellow)} ${s}`,
};
