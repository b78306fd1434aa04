/**
 * The single write primitive used by every panel.
 *
 * Rows and columns are relative to a region. A write whose row or starting
 * column lies outside the region is skipped; text is cut to exactly the
 * columns left in the region; a write that still fails is counted and the
 * frame goes on.
 */

import { toError } from '../errors/index.js';
import type { CellStyle, Surface } from '../terminal/frame-buffer.js';
import { displayWidth, sanitize, truncateToWidth } from './format.js';

export interface Region {
  readonly top: number;
  readonly left: number;
  readonly width: number;
  readonly height: number;
}

export interface WriteStats {
  written: number;
  skipped: number;
  failed: number;
}

export function insetRegion(region: Region, by: number = 1): Region {
  return {
    top: region.top + by,
    left: region.left + by,
    width: Math.max(0, region.width - 2 * by),
    height: Math.max(0, region.height - 2 * by),
  };
}

export class BoundedWriter {
  private readonly surface: Surface;
  private readonly stats: WriteStats = { written: 0, skipped: 0, failed: 0 };
  private lastError: Error | null = null;

  constructor(surface: Surface) {
    this.surface = surface;
  }

  /**
   * Returns the number of columns written
   */
  write(region: Region, row: number, col: number, text: string, style?: CellStyle): number {
    if (row < 0 || row >= region.height || col < 0 || col >= region.width) {
      this.stats.skipped++;
      return 0;
    }

    const clipped = truncateToWidth(sanitize(text), region.width - col);
    if (clipped === '') {
      this.stats.skipped++;
      return 0;
    }

    try {
      this.surface.put(region.top + row, region.left + col, clipped, style);
      this.stats.written++;
      return displayWidth(clipped);
    } catch (error) {
      this.stats.failed++;
      this.lastError = toError(error);
      return 0;
    }
  }

  /**
   * Write a full-width row, padded so a style covers the whole line
   */
  writeLine(region: Region, row: number, text: string, style?: CellStyle): number {
    const clipped = truncateToWidth(sanitize(text), region.width);
    const padded = clipped + ' '.repeat(Math.max(0, region.width - displayWidth(clipped)));
    return this.write(region, row, 0, padded, style);
  }

  getStats(): Readonly<WriteStats> {
    return { ...this.stats };
  }

  getLastError(): Error | null {
    return this.lastError;
  }
}
