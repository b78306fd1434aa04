/**
 * Size normalization. Every size in the topology is a byte count; `null`
 * stands for a value the source tool did not report in a usable form.
 *
 * Policy: suffixes written with an `i` (KiB, MiB, ...) are always powers of
 * 1024. Bare suffixes (K, M, G, KB, MB, ...) use the base declared by the
 * parser that reads them: LVM, lsblk and df output is read as 1024-based,
 * parted output as 1000-based.
 */

export type SizeBase = 1000 | 1024;

const POWERS: Record<string, number> = {
  b: 0,
  k: 1,
  m: 2,
  g: 3,
  t: 4,
  p: 5,
  e: 6,
};

const SIZE_PATTERN = /^(\d+(?:\.\d+)?)\s*(?:([bkmgtpe])(i)?(b)?)?$/i;

/**
 * Parse a size string to bytes, or null when it cannot be read.
 * Accepts LVM's `<`/`>` rounding markers and a decimal comma.
 */
export function parseSize(text: string | null | undefined, base: SizeBase = 1024): number | null {
  if (text === null || text === undefined) return null;

  let value = text.trim().replace(/^[<>]/, '');
  if (value === '') return null;
  if (!value.includes('.') && /^\d+,\d+/.test(value)) {
    value = value.replace(',', '.');
  }

  const match = value.match(SIZE_PATTERN);
  const amountText = match?.[1];
  if (!match || amountText === undefined) return null;

  const [, , unitText, binaryMarker, byteMarker] = match;
  const unit = (unitText ?? 'b').toLowerCase();
  const power = POWERS[unit];
  if (power === undefined) return null;
  if (unit === 'b' && (binaryMarker || byteMarker)) return null;

  const multiplier = (binaryMarker ? 1024 : base) ** power;
  const bytes = Math.round(parseFloat(amountText) * multiplier);
  return Number.isFinite(bytes) ? bytes : null;
}

/**
 * Parse a non-negative integer field such as an extent count
 */
export function parseCount(text: string | null | undefined): number | null {
  if (text === null || text === undefined) return null;
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = parseInt(trimmed, 10);
  return Number.isSafeInteger(value) ? value : null;
}

const UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB'];

/**
 * Format a byte count with binary units, or N/A when unknown
 */
export function formatSize(bytes: number | null, decimals: number = 2): string {
  if (bytes === null || !Number.isFinite(bytes) || bytes < 0) return 'N/A';

  let size = bytes;
  let unitIndex = 0;
  while (size >= 1024 && unitIndex < UNITS.length - 1) {
    size /= 1024;
    unitIndex++;
  }

  if (unitIndex === 0) return `${bytes} B`;
  return `${size.toFixed(decimals)} ${UNITS[unitIndex]}`;
}
