/**
 * lsblk --pairs output parser
 */

import { z } from 'zod';
import type { ParseResult } from '../types/inventory.js';
import type { BlockDeviceRecord } from '../types/storage.js';
import type { PartitionRole } from '../types/topology.js';
import { defineLayout, parseRecords } from './fields.js';

export const LSBLK_COLUMNS = [
  'NAME',
  'PATH',
  'PKNAME',
  'SIZE',
  'TYPE',
  'PTTYPE',
  'PARTTYPE',
  'PARTTYPENAME',
  'FSTYPE',
  'LABEL',
  'MOUNTPOINT',
] as const;

const PAIR_PATTERN = /([A-Z][A-Z0-9:_-]*)="((?:[^"\\]|\\.)*)"/g;

/**
 * lsblk escapes unsafe bytes (spaces in labels, quotes, anything outside
 * ASCII under the C locale) as \xNN. A run of escapes is one UTF-8 sequence.
 */
export function decodeLsblkValue(value: string): string {
  return value.replace(/(?:\\x[0-9a-fA-F]{2})+/g, run => {
    const bytes = run
      .split('\\x')
      .filter(hex => hex.length > 0)
      .map(hex => parseInt(hex, 16));
    return Buffer.from(bytes).toString('utf8');
  });
}

function tokenizePairs(line: string): Array<string | undefined> {
  const pairs = new Map<string, string>();
  for (const match of line.matchAll(PAIR_PATTERN)) {
    const [, key, value] = match;
    if (key !== undefined && value !== undefined) {
      pairs.set(key, decodeLsblkValue(value));
    }
  }
  return LSBLK_COLUMNS.map(column => pairs.get(column));
}

const layout = defineLayout<BlockDeviceRecord>({
  source: 'lsblk',
  fields: LSBLK_COLUMNS,
  // Older util-linux releases have no PARTTYPENAME column
  optional: ['PARTTYPENAME'],
  sizeBase: 1024,
  tokenize: tokenizePairs,
  build: kit =>
    z
      .object({
        NAME: kit.required(),
        PATH: kit.text(),
        PKNAME: kit.text(),
        SIZE: kit.size(),
        TYPE: kit.required(),
        PTTYPE: kit.text(),
        PARTTYPE: kit.text(),
        PARTTYPENAME: kit.text(),
        FSTYPE: kit.text(),
        LABEL: kit.text(),
        MOUNTPOINT: kit.text(),
      })
      .transform(row => ({
        name: row.NAME,
        path: row.PATH ?? `/dev/${row.NAME}`,
        parent: row.PKNAME,
        sizeBytes: row.SIZE,
        kind: row.TYPE,
        tableType: row.PTTYPE,
        partitionTypeCode: row.PARTTYPE,
        partitionType: row.PARTTYPENAME,
        fsType: row.FSTYPE,
        label: row.LABEL,
        mountPoint: row.MOUNTPOINT,
      })),
});

/**
 * Parse `lsblk -P` output. A device listed more than once (an LV spanning
 * several PVs appears under each of them) is kept once, at its first position.
 */
export function parseBlockDevices(text: string): ParseResult<BlockDeviceRecord> {
  const parsed = parseRecords(text, layout);
  const seen = new Set<string>();
  const records = parsed.records.filter(record => {
    if (seen.has(record.path)) return false;
    seen.add(record.path);
    return true;
  });
  return { ...parsed, records };
}

const EXTENDED_TYPE_CODES = new Set(['0x5', '0xf', '0x85']);

/**
 * Number at the end of a partition's kernel name (sda3 -> 3, nvme0n1p2 -> 2)
 */
export function partitionNumber(name: string): number | null {
  const match = name.match(/(\d+)$/);
  return match?.[1] !== undefined ? parseInt(match[1], 10) : null;
}

/**
 * Role of a block device within its partition table. Only DOS tables
 * distinguish extended and logical partitions.
 */
export function partitionRole(record: BlockDeviceRecord): PartitionRole {
  if (record.kind === 'disk') return 'Disk';
  if (record.kind !== 'part') return '---';

  const typeCode = record.partitionTypeCode?.toLowerCase() ?? '';
  if (record.tableType === 'dos') {
    if (EXTENDED_TYPE_CODES.has(typeCode)) return 'Extd';
    const number = partitionNumber(record.name);
    if (number !== null && number > 4) return 'Logi';
  }
  return 'Pri';
}
