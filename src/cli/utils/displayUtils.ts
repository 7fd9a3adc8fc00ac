/**
 * Shared display utilities for CLI commands.
 *
 * Provides box-drawing borders and status labels used across commands.
 */

import { paint, stripAnsi } from '../../render/ansi.js';

export interface DisplayOptions {
  colors: boolean;
  unicode: boolean;
}

export interface BorderChars {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

export function getBorderChars(options: DisplayOptions): BorderChars {
  if (options.unicode) {
    return {
      topLeft: '┌',
      topRight: '┐',
      bottomLeft: '└',
      bottomRight: '┘',
      horizontal: '─',
      vertical: '│',
    };
  }
  return {
    topLeft: '+',
    topRight: '+',
    bottomLeft: '+',
    bottomRight: '+',
    horizontal: '-',
    vertical: '|',
  };
}

export function wrapInBox(text: string, options: DisplayOptions): string {
  const border = getBorderChars(options);
  const lines = text.split('\n');
  const maxLength = Math.max(...lines.map((line) => stripAnsi(line).length));
  const horizontalBorder = border.horizontal.repeat(maxLength + 2);

  let result = border.topLeft + horizontalBorder + border.topRight + '\n';
  for (const line of lines) {
    const visibleLength = stripAnsi(line).length;
    const padding = ' '.repeat(maxLength - visibleLength);
    result += border.vertical + ' ' + line + padding + ' ' + border.vertical + '\n';
  }
  result += border.bottomLeft + horizontalBorder + border.bottomRight;

  return result;
}

/**
 * Success label, `✓ <text>` in green (`OK <text>` without unicode).
 */
export function formatSuccess(text: string, options: DisplayOptions): string {
  return paint(`${options.unicode ? '✓' : 'OK'} ${text}`, 'green', options.colors);
}

/**
 * Failure label, `✗ <text>` in red (`FAIL <text>` without unicode).
 */
export function formatFailure(text: string, options: DisplayOptions): string {
  return paint(`${options.unicode ? '✗' : 'FAIL'} ${text}`, 'red', options.colors);
}

/**
 * Field label in blue, as in `Concepts: 12`.
 */
export function formatLabel(label: string, options: DisplayOptions): string {
  return paint(`${label}:`, 'blue', options.colors);
}
