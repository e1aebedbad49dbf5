/**
 * ANSI color codes for daemon console output.
 */

export const colors = {
  // Reset
  reset: "\x1b[0m",

  // Modifiers
  dim: "\x1b[2m",
  bold: "\x1b[1m",

  // Standard colors
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  red: "\x1b[31m",
} as const;

export type ColorKey = keyof typeof colors;

/** Wrap text in a color, resetting afterwards. */
export function paint(color: ColorKey, text: string): string {
  return `${colors[color]}${text}${colors.reset}`;
}
