/**
 * Blessed-backed terminal. The inspector only sees the `Terminal` interface:
 * a size, key and resize events, and a way to show a finished frame.
 */

import * as blessed from 'blessed';
import type { Widgets } from 'blessed';
import { TerminalError, toError } from '../errors/index.js';
import type { FrameBuffer } from './frame-buffer.js';
import { toTaggedLine } from './tags.js';

export interface Terminal {
  readonly columns: number;
  readonly rows: number;
  draw(frame: FrameBuffer): void;
  onKey(listener: (key: string) => void): void;
  onResize(listener: () => void): void;
  destroy(): void;
}

function dimension(value: number | string): number {
  if (typeof value === 'number') return value;
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

export class BlessedTerminal implements Terminal {
  private readonly screen: Widgets.Screen;
  private readonly canvas: Widgets.BoxElement;
  private destroyed = false;

  private constructor(screen: Widgets.Screen, canvas: Widgets.BoxElement) {
    this.screen = screen;
    this.canvas = canvas;
  }

  /**
   * Take over the controlling terminal
   */
  static open(title: string): BlessedTerminal {
    try {
      const screen = blessed.screen({
        smartCSR: true,
        fullUnicode: true,
        title,
      });
      const canvas = blessed.box({
        parent: screen,
        top: 0,
        left: 0,
        width: '100%',
        height: '100%',
        tags: true,
      });
      return new BlessedTerminal(screen, canvas);
    } catch (error) {
      throw new TerminalError('Failed to initialize the terminal', toError(error));
    }
  }

  get columns(): number {
    return dimension(this.screen.width);
  }

  get rows(): number {
    return dimension(this.screen.height);
  }

  draw(frame: FrameBuffer): void {
    if (this.destroyed) return;
    const lines: string[] = [];
    for (let row = 0; row < frame.height; row++) {
      lines.push(toTaggedLine(frame.rowCells(row)));
    }
    this.canvas.setContent(lines.join('\n'));
    this.screen.render();
  }

  onKey(listener: (key: string) => void): void {
    this.screen.on('keypress', (_ch: unknown, key: Widgets.Events.IKeyEventArg | undefined) => {
      if (key?.full) listener(key.full);
    });
  }

  onResize(listener: () => void): void {
    this.screen.on('resize', listener);
  }

  destroy(): void {
    if (this.destroyed) return;
    this.destroyed = true;
    this.screen.destroy();
  }
}
