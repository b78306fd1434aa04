/**
 * Unit tests for size normalization
 */

import { describe, it, expect } from '@jest/globals';
import { parseSize, parseCount, formatSize } from './data-size.js';

const KiB = 1024;
const MiB = 1024 * KiB;
const GiB = 1024 * MiB;
const TiB = 1024 * GiB;

describe('Data Size Utilities', () => {
  describe('parseSize', () => {
    it('should parse plain byte counts', () => {
      expect(parseSize('0')).toBe(0);
      expect(parseSize('107374182400')).toBe(100 * GiB);
      expect(parseSize('  4194304  ')).toBe(4 * MiB);
      expect(parseSize('512B')).toBe(512);
    });

    it('should read bare suffixes with the declared base', () => {
      expect(parseSize('1K')).toBe(KiB);
      expect(parseSize('4m')).toBe(4 * MiB);
      expect(parseSize('1GB', 1000)).toBe(1_000_000_000);
      expect(parseSize('53.7GB', 1000)).toBe(53_700_000_000);
      expect(parseSize('1049kB', 1000)).toBe(1_049_000);
    });

    it('should always read iB suffixes as binary', () => {
      expect(parseSize('2GiB', 1000)).toBe(2 * GiB);
      expect(parseSize('1.5 TiB')).toBe(1.5 * TiB);
      expect(parseSize('3Mi')).toBe(3 * MiB);
    });

    it('should strip LVM rounding markers', () => {
      expect(parseSize('<10.00g')).toBe(10 * GiB);
      expect(parseSize('>1k')).toBe(KiB);
    });

    it('should accept a decimal comma', () => {
      expect(parseSize('1,50g')).toBe(1.5 * GiB);
    });

    it('should be case insensitive', () => {
      expect(parseSize('1gb')).toBe(parseSize('1GB'));
      expect(parseSize('1gib')).toBe(GiB);
    });

    it('should return null for unreadable input', () => {
      expect(parseSize('')).toBeNull();
      expect(parseSize(null)).toBeNull();
      expect(parseSize(undefined)).toBeNull();
      expect(parseSize('N/A')).toBeNull();
      expect(parseSize('-100')).toBeNull();
      expect(parseSize('12q')).toBeNull();
      expect(parseSize('1iB')).toBeNull();
      expect(parseSize('1.2.3g')).toBeNull();
    });
  });

  describe('parseCount', () => {
    it('should parse non-negative integers', () => {
      expect(parseCount('20000')).toBe(20000);
      expect(parseCount(' 0 ')).toBe(0);
    });

    it('should reject everything else', () => {
      expect(parseCount('1.5')).toBeNull();
      expect(parseCount('-1')).toBeNull();
      expect(parseCount('')).toBeNull();
      expect(parseCount(null)).toBeNull();
    });
  });

  describe('formatSize', () => {
    it('should format bytes without decimals', () => {
      expect(formatSize(0)).toBe('0 B');
      expect(formatSize(1000)).toBe('1000 B');
    });

    it('should format binary units', () => {
      expect(formatSize(KiB)).toBe('1.00 KiB');
      expect(formatSize(4 * MiB)).toBe('4.00 MiB');
      expect(formatSize(1.5 * GiB)).toBe('1.50 GiB');
      expect(formatSize(80 * GiB)).toBe('80.00 GiB');
      expect(formatSize(2 * TiB)).toBe('2.00 TiB');
    });

    it('should allow custom decimal places', () => {
      expect(formatSize(1.5 * GiB, 1)).toBe('1.5 GiB');
    });

    it('should render unknown sizes as N/A', () => {
      expect(formatSize(null)).toBe('N/A');
      expect(formatSize(Number.NaN)).toBe('N/A');
      expect(formatSize(-1)).toBe('N/A');
    });
  });
});
