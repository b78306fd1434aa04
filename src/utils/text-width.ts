/**
 * Terminal column widths measured per grapheme cluster, so that an emoji
 * sequence or a base letter with its combining marks is one unit everywhere
 * text is measured, cut or placed.
 */

import stringWidth from 'string-width';

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

export function splitGraphemes(text: string): string[] {
  return Array.from(segmenter.segment(text), part => part.segment);
}

/**
 * Columns one grapheme occupies: 0 for a lone mark, at most 2
 */
export function graphemeWidth(grapheme: string): number {
  return Math.min(2, stringWidth(grapheme));
}

export function textWidth(text: string): number {
  let width = 0;
  for (const grapheme of splitGraphemes(text)) {
    width += graphemeWidth(grapheme);
  }
  return width;
}
