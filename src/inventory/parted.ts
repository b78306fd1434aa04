/**
 * parted -s -m -l (machine readable) parser.
 *
 * Output is grouped per disk: a unit marker line (`BYT;`), one disk line
 * and one line per partition, each terminated by `;`. parted reports sizes
 * with decimal units, so size fields here use base 1000.
 */

import { z } from 'zod';
import type { ParseResult } from '../types/inventory.js';
import type { DiskRecord, PartitionRecord } from '../types/storage.js';
import { defineLayout, parseLine, recordSkip } from './fields.js';

const DISK_FIELDS = [
  'path',
  'size',
  'transport',
  'logicalSector',
  'physicalSector',
  'table',
  'model',
  'flags',
] as const;

const PARTITION_FIELDS = ['number', 'start', 'end', 'size', 'fs', 'name', 'flags'] as const;

const UNIT_MARKERS = new Set(['BYT', 'CHS', 'CYL']);

/**
 * Split on unescaped colons; parted writes a literal colon as `\:`
 */
export function splitMachineLine(line: string): string[] {
  const body = line.trim().replace(/;$/, '');
  return body.split(/(?<!\\):/).map(value => value.replace(/\\:/g, ':').trim());
}

function parseFlags(text: string | null): string[] {
  if (text === null) return [];
  return text
    .split(',')
    .map(flag => flag.trim())
    .filter(flag => flag !== '');
}

const diskLayout = defineLayout<DiskRecord>({
  source: 'parted',
  fields: DISK_FIELDS,
  sizeBase: 1000,
  tokenize: splitMachineLine,
  build: kit =>
    z
      .object({
        path: kit.required(),
        size: kit.size(),
        transport: kit.text(),
        logicalSector: z.string(),
        physicalSector: z.string(),
        table: kit.text(),
        model: kit.text(),
        flags: z.string(),
      })
      .transform(row => ({
        path: row.path,
        sizeBytes: row.size,
        transport: row.transport,
        tableType: row.table,
        model: row.model === null ? null : row.model.replace(/\s+/g, ' '),
        partitions: [],
      })),
});

const partitionLayout = defineLayout<PartitionRecord>({
  source: 'parted',
  fields: PARTITION_FIELDS,
  sizeBase: 1000,
  tokenize: splitMachineLine,
  build: kit =>
    z
      .object({
        number: kit.count(),
        start: z.string(),
        end: z.string(),
        size: kit.size(),
        fs: kit.text(),
        name: kit.text(),
        flags: kit.text(),
      })
      .transform(row => ({
        number: row.number,
        fsType: row.fs,
        name: row.name,
        flags: parseFlags(row.flags),
      })),
});

export function parsePartitionTables(text: string): ParseResult<DiskRecord> {
  const result: ParseResult<DiskRecord> = { records: [], skipped: 0, issues: [] };
  let current: DiskRecord | null = null;

  text.split(/\r?\n/).forEach((raw, index) => {
    const line = raw.trim();
    if (line === '') {
      current = null;
      return;
    }
    if (UNIT_MARKERS.has(line.replace(/;$/, ''))) {
      current = null;
      return;
    }

    if (line.startsWith('/')) {
      const disk = parseLine(line, diskLayout);
      if (disk.ok) {
        current = disk.record;
        result.records.push(disk.record);
      } else {
        current = null;
        recordSkip(result, { line: index + 1, message: `parted: ${disk.message}` });
      }
      return;
    }

    if (current === null) {
      recordSkip(result, { line: index + 1, message: 'parted: partition line outside a disk block' });
      return;
    }

    const partition = parseLine(line, partitionLayout);
    if (partition.ok) {
      current.partitions.push(partition.record);
    } else {
      recordSkip(result, { line: index + 1, message: `parted: ${partition.message}` });
    }
  });

  return result;
}
