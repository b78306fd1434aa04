/**
 * Tests for the in-memory frame buffer
 */

import { describe, it, expect } from '@jest/globals';
import { FrameBuffer } from './frame-buffer.js';
import { RenderError } from '../errors/index.js';

describe('FrameBuffer', () => {
  it('should start blank', () => {
    const buffer = new FrameBuffer(4, 2);

    expect(buffer.lines()).toEqual(['    ', '    ']);
  });

  it('should place text and styles at a position', () => {
    const buffer = new FrameBuffer(6, 2);

    buffer.put(1, 2, 'ab', { bold: true });

    expect(buffer.rowText(1)).toBe('  ab  ');
    expect(buffer.cellAt(1, 3)).toEqual({ char: 'b', style: { bold: true } });
  });

  it('should give wide characters two cells', () => {
    const buffer = new FrameBuffer(4, 1);

    buffer.put(0, 0, 'デa');

    expect(buffer.cellAt(0, 1)?.char).toBe('');
    expect(buffer.rowText(0)).toBe('デa ');
  });

  it('should keep an emoji sequence whole and the row at its width', () => {
    const buffer = new FrameBuffer(4, 1);

    buffer.put(0, 0, 'a👨‍👩‍👧b');

    expect(buffer.cellAt(0, 1)?.char).toBe('👨‍👩‍👧');
    expect(buffer.cellAt(0, 2)?.char).toBe('');
    expect(buffer.cellAt(0, 3)?.char).toBe('b');
    expect(buffer.cellAt(0, 4)).toBeUndefined();
    expect(buffer.rowText(0)).toBe('a👨‍👩‍👧b');
  });

  it('should reject an emoji sequence that would pass the last column', () => {
    const buffer = new FrameBuffer(4, 1);

    expect(() => buffer.put(0, 3, '👨‍👩‍👧')).toThrow(RenderError);
    expect(buffer.rowText(0)).toBe('    ');
  });

  it('should throw RenderError for writes outside the grid', () => {
    const buffer = new FrameBuffer(4, 2);

    expect(() => buffer.put(2, 0, 'a')).toThrow(RenderError);
    expect(() => buffer.put(0, -1, 'a')).toThrow(RenderError);
    expect(() => buffer.put(0, 2, 'abc')).toThrow(RenderError);
  });
});
