/**
 * ANSI color codes for terminal output
 */

export const colors = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',

  // Emphasis for the price itself
  brightGreen: '\x1b[92m',
} as const;

export type ColorName = keyof typeof colors;

/**
 * Colorize text with ANSI codes
 */
export function colorize(text: string, color: ColorName): string {
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Strip ANSI color codes from text
 */
export function stripColors(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, '');
}
