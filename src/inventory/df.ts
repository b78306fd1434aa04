/**
 * df -B1 --output=source,size,used,avail,target parser
 */

import { z } from 'zod';
import type { ParseResult } from '../types/inventory.js';
import type { FilesystemRecord } from '../types/storage.js';
import { defineLayout, parseRecords } from './fields.js';

export const DF_FIELDS = ['source', 'size', 'used', 'avail', 'target'] as const;

/**
 * Mount points may contain spaces, so everything after the fourth column is the target
 */
export function tokenizeDfLine(line: string): string[] {
  const tokens = line.trim().split(/\s+/);
  if (tokens.length <= DF_FIELDS.length) return tokens;
  const leading = tokens.slice(0, DF_FIELDS.length - 1);
  const target = line
    .trim()
    .replace(/^(\S+\s+){4}/, '')
    .trim();
  return [...leading, target];
}

const layout = defineLayout<FilesystemRecord>({
  source: 'df',
  fields: DF_FIELDS,
  sizeBase: 1024,
  tokenize: tokenizeDfLine,
  build: kit =>
    z
      .object({
        source: kit.required(),
        size: kit.size(),
        used: kit.size(),
        avail: kit.size(),
        target: kit.required(),
      })
      .transform(row => ({
        source: row.source,
        sizeBytes: row.size,
        usedBytes: row.used,
        availableBytes: row.avail,
        mountPoint: row.target,
      })),
});

export function parseFilesystems(text: string): ParseResult<FilesystemRecord> {
  return parseRecords(text, layout, { header: true });
}
