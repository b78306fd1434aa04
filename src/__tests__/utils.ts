/**
 * Test utilities and helper functions
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { Writable } from 'stream';
import winston from 'winston';
import type { Config } from '../config/schema.js';
import { COMMAND_NAMES } from '../inventory/commands.js';
import { Logger } from '../logger/index.js';
import { buildTopology } from '../topology/builder.js';
import type { CommandFailure, CommandName, CommandOutcome, InventoryOutput } from '../types/inventory.js';
import type { BlockDeviceRecord, PhysicalVolumeRecord, VolumeGroupRecord } from '../types/storage.js';
import type { Topology } from '../types/topology.js';

const FIXTURE_ROOT = join(__dirname, '..', '..', 'tests', 'fixtures');

const FIXTURE_FILES: Record<CommandName, string> = {
  blockDevices: 'lsblk.txt',
  physicalVolumes: 'pvs.txt',
  volumeGroups: 'vgs.txt',
  logicalVolumes: 'lvs.txt',
  segments: 'segments.txt',
  filesystems: 'df.txt',
  partitions: 'parted.txt',
};

/**
 * Read a fixture file, e.g. loadFixture('host', 'pvs.txt')
 */
export function loadFixture(...segments: string[]): string {
  return readFileSync(join(FIXTURE_ROOT, ...segments), 'utf8');
}

/**
 * Successful output of every command for a fixture host. An override replaces
 * one command's outcome; an override of undefined leaves the command out.
 */
export function createHostOutput(
  overrides: Partial<Record<CommandName, CommandOutcome | undefined>> = {},
  host: string = 'host'
): InventoryOutput {
  const output: Partial<Record<CommandName, CommandOutcome>> = {};
  for (const name of COMMAND_NAMES) {
    if (name in overrides) {
      const outcome = overrides[name];
      if (outcome !== undefined) output[name] = outcome;
    } else {
      output[name] = { ok: true, stdout: loadFixture(host, FIXTURE_FILES[name]), durationMs: 1 };
    }
  }
  return output;
}

export function failedOutcome(failure: CommandFailure): CommandOutcome {
  return { ok: false, failure, durationMs: 1 };
}

export const TEST_LOGGING: Config['logging'] = {
  level: 'debug',
  format: 'json',
  dir: 'logs',
  maxFiles: 1,
  maxSize: '1m',
  console: false,
  file: false,
};

/**
 * Logger whose entries are captured in memory for assertions
 */
export function createTestLogger(): { logger: Logger; entries: winston.Logform.TransformableInfo[] } {
  const entries: winston.Logform.TransformableInfo[] = [];
  const stream = new Writable({
    objectMode: true,
    write(info: winston.Logform.TransformableInfo, _encoding, callback) {
      entries.push(info);
      callback();
    },
  });
  const instance = winston.createLogger({
    level: 'debug',
    transports: [new winston.transports.Stream({ stream })],
  });
  return { logger: new Logger(TEST_LOGGING, instance), entries };
}

/**
 * Deterministic pseudo-random generator for property-style loops (mulberry32)
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Synthetic topology: `groups[i]` PVs in volume group i, plus `devices` block devices
 */
export function createSyntheticTopology(groups: readonly number[], devices: number = 0): Topology {
  const physicalVolumes: PhysicalVolumeRecord[] = [];
  const volumeGroups: VolumeGroupRecord[] = groups.map((pvCount, g) => {
    const name = `vg${String(g).padStart(2, '0')}`;
    for (let p = 0; p < pvCount; p++) {
      physicalVolumes.push({
        devicePath: `/dev/sd${String.fromCharCode(97 + g)}${p + 1}`,
        vgName: name,
        format: 'lvm2',
        sizeBytes: 1024 ** 3,
        freeBytes: 0,
      });
    }
    return {
      name,
      format: 'lvm2',
      attributes: 'wz--n-',
      extentSizeBytes: 4194304,
      sizeBytes: pvCount * 1024 ** 3,
      freeBytes: 0,
      pvCount,
      lvCount: 0,
    };
  });
  const blockDevices: BlockDeviceRecord[] = Array.from({ length: devices }, (_, d) => ({
    name: `loop${d}`,
    path: `/dev/loop${d}`,
    parent: null,
    sizeBytes: 1048576,
    kind: 'loop',
    tableType: null,
    partitionTypeCode: null,
    partitionType: null,
    fsType: null,
    label: null,
    mountPoint: null,
  }));
  return buildTopology({ physicalVolumes, volumeGroups, blockDevices });
}
