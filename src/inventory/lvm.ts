/**
 * Parsers for pvs, vgs and lvs reports.
 *
 * All reports are requested with `--noheadings --nosuffix --units b
 * --separator |`, so every field is positional and sizes are plain byte
 * counts. Values still pass through the size parser so that a report
 * produced with unit suffixes reads the same way.
 */

import { z } from 'zod';
import type { ParseResult } from '../types/inventory.js';
import type {
  LogicalVolumeRecord,
  PhysicalVolumeRecord,
  SegmentRecord,
  StripeRecord,
  VolumeGroupRecord,
} from '../types/storage.js';
import { parseCount } from '../utils/data-size.js';
import { defineLayout, parseRecords, splitOn } from './fields.js';

export const LVM_SEPARATOR = '|';

export const PV_FIELDS = ['pv_name', 'vg_name', 'pv_fmt', 'pv_size', 'pv_free'] as const;

export const VG_FIELDS = [
  'vg_name',
  'vg_fmt',
  'vg_attr',
  'vg_extent_size',
  'vg_size',
  'vg_free',
  'pv_count',
  'lv_count',
] as const;

export const LV_FIELDS = ['vg_name', 'lv_name', 'lv_path', 'lv_dm_path', 'lv_attr', 'lv_size'] as const;

export const SEGMENT_FIELDS = ['vg_name', 'lv_name', 'seg_start_pe', 'seg_size_pe', 'devices'] as const;

const tokenize = splitOn(LVM_SEPARATOR);

const pvLayout = defineLayout<PhysicalVolumeRecord>({
  source: 'pvs',
  fields: PV_FIELDS,
  sizeBase: 1024,
  tokenize,
  build: kit =>
    z
      .object({
        pv_name: kit.required(),
        vg_name: kit.text(),
        pv_fmt: kit.text(),
        pv_size: kit.size(),
        pv_free: kit.size(),
      })
      .transform(row => ({
        devicePath: row.pv_name,
        vgName: row.vg_name,
        format: row.pv_fmt,
        sizeBytes: row.pv_size,
        freeBytes: row.pv_free,
      })),
});

const vgLayout = defineLayout<VolumeGroupRecord>({
  source: 'vgs',
  fields: VG_FIELDS,
  sizeBase: 1024,
  tokenize,
  build: kit =>
    z
      .object({
        vg_name: kit.required(),
        vg_fmt: kit.text(),
        vg_attr: kit.text(),
        vg_extent_size: kit.size(),
        vg_size: kit.size(),
        vg_free: kit.size(),
        pv_count: kit.optionalCount(),
        lv_count: kit.optionalCount(),
      })
      .transform(row => ({
        name: row.vg_name,
        format: row.vg_fmt,
        attributes: row.vg_attr,
        extentSizeBytes: row.vg_extent_size,
        sizeBytes: row.vg_size,
        freeBytes: row.vg_free,
        pvCount: row.pv_count,
        lvCount: row.lv_count,
      })),
});

const lvLayout = defineLayout<LogicalVolumeRecord>({
  source: 'lvs',
  fields: LV_FIELDS,
  sizeBase: 1024,
  tokenize,
  build: kit =>
    z
      .object({
        vg_name: kit.required(),
        lv_name: kit.required(),
        lv_path: kit.text(),
        lv_dm_path: kit.text(),
        lv_attr: kit.text(),
        lv_size: kit.size(),
      })
      .transform(row => ({
        vgName: row.vg_name,
        name: row.lv_name,
        path: row.lv_path,
        dmPath: row.lv_dm_path,
        attributes: row.lv_attr,
        sizeBytes: row.lv_size,
      })),
});

const STRIPE_PATTERN = /^(.+)\((\d+)\)$/;

/**
 * Split an LVM devices field (`/dev/sda1(0),/dev/sdb1(2560)`) into stripes.
 * A stripe without a readable starting extent keeps its device and a null start.
 */
export function parseStripes(devices: string): StripeRecord[] {
  return devices
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry !== '')
    .map(entry => {
      const match = entry.match(STRIPE_PATTERN);
      const device = match?.[1];
      if (!match || device === undefined) {
        return { device: entry, peStart: null };
      }
      return { device, peStart: parseCount(match[2]) };
    });
}

const segmentLayout = defineLayout<SegmentRecord>({
  source: 'lvs --segments',
  fields: SEGMENT_FIELDS,
  sizeBase: 1024,
  tokenize,
  build: kit =>
    z
      .object({
        vg_name: kit.required(),
        lv_name: kit.required(),
        seg_start_pe: kit.count(),
        seg_size_pe: kit.count(),
        devices: z.string(),
      })
      .transform(row => ({
        vgName: row.vg_name,
        lvName: row.lv_name,
        leStart: row.seg_start_pe,
        peCount: row.seg_size_pe,
        stripes: parseStripes(row.devices),
      })),
});

export function parsePhysicalVolumes(text: string): ParseResult<PhysicalVolumeRecord> {
  return parseRecords(text, pvLayout);
}

export function parseVolumeGroups(text: string): ParseResult<VolumeGroupRecord> {
  return parseRecords(text, vgLayout);
}

export function parseLogicalVolumes(text: string): ParseResult<LogicalVolumeRecord> {
  return parseRecords(text, lvLayout);
}

export function parseSegments(text: string): ParseResult<SegmentRecord> {
  return parseRecords(text, segmentLayout);
}
