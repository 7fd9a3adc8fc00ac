/**
 * ANSI styles used by the terminal renderers.
 *
 * @packageDocumentation
 */

/** SGR parameter strings for the styles used in trees and panels. */
export const STYLES = {
  bold: '1',
  dim: '2',
  red: '31',
  green: '32',
  yellow: '33',
  blue: '34',
  cyan: '36',
  boldCyan: '1;36',
  dimCyan: '2;36',
  brightBlue: '94',
  brightWhite: '97',
  current: '30;103',
} as const;

/** Name of a style in {@link STYLES}. */
export type StyleName = keyof typeof STYLES;

const ANSI_ESCAPE_PATTERN = new RegExp(String.fromCharCode(27) + '\\[[0-9;]*m', 'g');

/**
 * Wraps text in an ANSI style when colors are enabled.
 *
 * @param text - Text to style.
 * @param style - Style name.
 * @param colors - Whether to emit escape codes.
 */
export function paint(text: string, style: StyleName, colors: boolean): string {
  if (!colors || text === '') {
    return text;
  }
  return `\x1b[${STYLES[style]}m${text}\x1b[0m`;
}

/**
 * Strips ANSI escape sequences from a string to get visible text.
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE_PATTERN, '');
}
