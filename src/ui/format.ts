/**
 * Display-width aware text helpers. Widths are terminal columns: East Asian
 * wide characters take two, combining marks none.
 */

import { graphemeWidth, splitGraphemes, textWidth } from '../utils/text-width.js';

const CONTROL_CHARS = /[\u0000-\u001f\u007f-\u009f]/g;

export const ELLIPSIS = '…';

/**
 * Replace control characters, which have no column width of their own
 */
export function sanitize(text: string): string {
  return text.replace(CONTROL_CHARS, '?');
}

export function displayWidth(text: string): number {
  return textWidth(text);
}

/**
 * Longest prefix of `text` that fits in `columns`
 */
export function truncateToWidth(text: string, columns: number): string {
  if (columns <= 0) return '';
  if (textWidth(text) <= columns) return text;

  let result = '';
  let used = 0;
  for (const grapheme of splitGraphemes(text)) {
    const width = graphemeWidth(grapheme);
    if (used + width > columns) break;
    result += grapheme;
    used += width;
  }
  return result;
}

/**
 * Truncate with a trailing ellipsis when the text does not fit
 */
export function ellipsize(text: string, columns: number): string {
  if (textWidth(text) <= columns) return text;
  if (columns <= 1) return truncateToWidth(text, columns);
  return truncateToWidth(text, columns - 1) + ELLIPSIS;
}

/**
 * Fit text to exactly `columns`, padding on the right (or left for numbers)
 */
export function fitToWidth(text: string, columns: number, align: 'left' | 'right' = 'left'): string {
  const fitted = ellipsize(text, columns);
  const padding = ' '.repeat(Math.max(0, columns - textWidth(fitted)));
  return align === 'left' ? fitted + padding : padding + fitted;
}

export interface Column {
  width: number;
  align?: 'left' | 'right';
}

/**
 * Lay out one table row; the last column is not padded
 */
export function formatColumns(values: readonly string[], columns: readonly Column[]): string {
  return values
    .map((value, index) => {
      const column = columns[index];
      if (!column) return value;
      return index === values.length - 1 && column.align !== 'right'
        ? ellipsize(value, column.width)
        : fitToWidth(value, column.width, column.align);
    })
    .join(' ');
}
