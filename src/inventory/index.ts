/**
 * Inventory acquisition and parsing
 */

import type { CommandName, InventoryOutput, ParseIssue } from '../types/inventory.js';
import type { InventoryRecords } from '../types/storage.js';
import type { SourceStatus } from '../types/topology.js';
import { parseFilesystems } from './df.js';
import { parseBlockDevices } from './lsblk.js';
import { parseLogicalVolumes, parsePhysicalVolumes, parseSegments, parseVolumeGroups } from './lvm.js';
import { parsePartitionTables } from './parted.js';

export { CommandGateway, COMMAND_CATALOG, COMMAND_NAMES, classifyResult } from './commands.js';
export type { InventoryRecords } from '../types/storage.js';

export interface ParsedInventory {
  records: InventoryRecords;
  sources: Record<CommandName, SourceStatus>;
  issues: Partial<Record<CommandName, ParseIssue[]>>;
}

type ParserTable = {
  [K in keyof InventoryRecords]: (text: string) => {
    records: InventoryRecords[K];
    skipped: number;
    issues: ParseIssue[];
  };
};

const PARSERS: ParserTable = {
  blockDevices: parseBlockDevices,
  physicalVolumes: parsePhysicalVolumes,
  volumeGroups: parseVolumeGroups,
  logicalVolumes: parseLogicalVolumes,
  segments: parseSegments,
  filesystems: parseFilesystems,
  partitions: parsePartitionTables,
};

function parseSource<K extends keyof InventoryRecords>(
  name: K,
  output: InventoryOutput,
  parsed: ParsedInventory
): void {
  const outcome = output[name];
  if (outcome === undefined) {
    parsed.sources[name] = { state: 'disabled' };
    return;
  }
  if (!outcome.ok) {
    parsed.sources[name] = { state: 'failed', failure: outcome.failure };
    return;
  }

  const result = PARSERS[name](outcome.stdout);
  parsed.records[name] = result.records;
  parsed.sources[name] = { state: 'ok', records: result.records.length, skipped: result.skipped };
  if (result.issues.length > 0) {
    parsed.issues[name] = result.issues;
  }
}

/**
 * Run each source's parser over one refresh's raw output
 */
export function parseInventory(output: InventoryOutput): ParsedInventory {
  const disabled: SourceStatus = { state: 'disabled' };
  const parsed: ParsedInventory = {
    records: {
      blockDevices: [],
      physicalVolumes: [],
      volumeGroups: [],
      logicalVolumes: [],
      segments: [],
      filesystems: [],
      partitions: [],
    },
    sources: {
      blockDevices: disabled,
      physicalVolumes: disabled,
      volumeGroups: disabled,
      logicalVolumes: disabled,
      segments: disabled,
      filesystems: disabled,
      partitions: disabled,
    },
    issues: {},
  };

  parseSource('blockDevices', output, parsed);
  parseSource('physicalVolumes', output, parsed);
  parseSource('volumeGroups', output, parsed);
  parseSource('logicalVolumes', output, parsed);
  parseSource('segments', output, parsed);
  parseSource('filesystems', output, parsed);
  parseSource('partitions', output, parsed);

  return parsed;
}
