/**
 * Serialize frame buffer rows to blessed tag markup
 */

import type { Cell, CellStyle } from './frame-buffer.js';

export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, brace => (brace === '{' ? '{open}' : '{close}'));
}

function openTags(style: CellStyle): string {
  return `${style.bold ? '{bold}' : ''}${style.dim ? '{light-black-fg}' : ''}${style.inverse ? '{inverse}' : ''}`;
}

function sameStyle(a: CellStyle, b: CellStyle): boolean {
  return Boolean(a.bold) === Boolean(b.bold) && Boolean(a.inverse) === Boolean(b.inverse) && Boolean(a.dim) === Boolean(b.dim);
}

/**
 * One row as tagged content. Runs of equally styled cells share a tag pair;
 * the second cell of a wide character is dropped.
 */
export function toTaggedLine(cells: readonly Cell[]): string {
  let line = '';
  let run = '';
  let runStyle: CellStyle = {};

  const flush = (): void => {
    if (run === '') return;
    const tags = openTags(runStyle);
    line += tags === '' ? escapeTags(run) : `${tags}${escapeTags(run)}{/}`;
    run = '';
  };

  for (const cell of cells) {
    if (!sameStyle(cell.style, runStyle)) {
      flush();
      runStyle = cell.style;
    }
    run += cell.char;
  }
  flush();
  return line;
}
