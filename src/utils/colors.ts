/**
 * Terminal Colors
 *
 * ANSI color codes for terminal output.
 * Honors NO_COLOR (https://no-color.org): when set, text passes through unstyled.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Codes
// ═══════════════════════════════════════════════════════════════════════════════

export const colors = {
  reset: '\x1b[0m',

  // Modifiers
  bright: '\x1b[1m',
  dim: '\x1b[2m',

  // Foreground colors
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
  white: '\x1b[37m',

  // Bright foreground colors
  brightRed: '\x1b[91m',
  brightGreen: '\x1b[92m',
  brightYellow: '\x1b[93m',
  brightCyan: '\x1b[96m'
} as const;

export type ColorName = keyof typeof colors;

// ═══════════════════════════════════════════════════════════════════════════════
// Color Functions
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Whether output should carry ANSI codes. Read on every call so tests
 * and child processes can toggle it through the environment.
 */
export function colorEnabled(): boolean {
  const flag = process.env['NO_COLOR'];
  return flag === undefined || flag === '';
}

/**
 * Apply a color to text.
 */
export function colorize(text: string, color: ColorName): string {
  if (!colorEnabled()) return text;
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Strip ANSI color codes, e.g. to measure visible width.
 */
export function stripColors(text: string): string {
  const escapeChar = String.fromCharCode(27);
  return text.replace(new RegExp(`${escapeChar}\\[[0-9;]*m`, 'g'), '');
}

// ═══════════════════════════════════════════════════════════════════════════════
// Convenience Functions
// ═══════════════════════════════════════════════════════════════════════════════

export const c = {
  dim: (text: string) => colorize(text, 'dim'),
  bright: (text: string) => colorize(text, 'bright'),

  red: (text: string) => colorize(text, 'red'),
  green: (text: string) => colorize(text, 'green'),
  yellow: (text: string) => colorize(text, 'yellow'),
  magenta: (text: string) => colorize(text, 'magenta'),
  cyan: (text: string) => colorize(text, 'cyan'),
  white: (text: string) => colorize(text, 'white'),

  brightRed: (text: string) => colorize(text, 'brightRed'),
  brightGreen: (text: string) => colorize(text, 'brightGreen'),
  brightYellow: (text: string) => colorize(text, 'brightYellow'),
  brightCyan: (text: string) => colorize(text, 'brightCyan')
} as const;
