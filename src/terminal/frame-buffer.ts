/**
 * In-memory character grid implementing the "write text at (row, col)"
 * primitive. Writes that leave the grid throw `RenderError`; the bounded
 * writer is expected to keep them from happening.
 */

import { graphemeWidth, splitGraphemes, textWidth } from '../utils/text-width.js';
import { RenderError } from '../errors/index.js';

export interface CellStyle {
  bold?: boolean;
  inverse?: boolean;
  dim?: boolean;
}

export interface Cell {
  /** Empty for the second column of a wide character */
  char: string;
  style: CellStyle;
}

export interface Surface {
  readonly width: number;
  readonly height: number;
  put(row: number, col: number, text: string, style?: CellStyle): void;
}

const BLANK_STYLE: CellStyle = {};

function blankRow(width: number): Cell[] {
  return Array.from({ length: width }, () => ({ char: ' ', style: BLANK_STYLE }));
}

export class FrameBuffer implements Surface {
  readonly width: number;
  readonly height: number;
  private readonly rows: Cell[][];

  constructor(width: number, height: number) {
    this.width = Math.max(0, Math.floor(width));
    this.height = Math.max(0, Math.floor(height));
    this.rows = Array.from({ length: this.height }, () => blankRow(this.width));
  }

  put(row: number, col: number, text: string, style: CellStyle = BLANK_STYLE): void {
    const cells = this.rows[row];
    const span = textWidth(text);
    if (!cells || col < 0 || col + span > this.width) {
      throw new RenderError(`write of ${span} columns at (${row}, ${col}) leaves a ${this.width}x${this.height} frame`, {
        row,
        col,
        span,
      });
    }

    let column = col;
    for (const grapheme of splitGraphemes(text)) {
      const width = graphemeWidth(grapheme);
      if (width === 0) {
        // Lone mark: attach to the previous cell of this write, or drop it
        const previous = column > col ? cells[column - 1] : undefined;
        if (previous) previous.char += grapheme;
        continue;
      }
      if (column + width > this.width) break;
      cells[column] = { char: grapheme, style };
      if (width === 2) {
        cells[column + 1] = { char: '', style };
      }
      column += width;
    }
  }

  /**
   * Plain text of one row, for tests and logging
   */
  rowText(row: number): string {
    return (this.rows[row] ?? []).map(cell => cell.char).join('');
  }

  lines(): string[] {
    return this.rows.map((_, row) => this.rowText(row));
  }

  cellAt(row: number, col: number): Cell | undefined {
    return this.rows[row]?.[col];
  }

  rowCells(row: number): readonly Cell[] {
    return this.rows[row] ?? [];
  }
}
