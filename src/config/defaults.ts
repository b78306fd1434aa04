import { tmpdir } from 'os';
import { join } from 'path';
import type { Config } from './schema.js';

/**
 * Default configuration values
 * These are used when no environment variables override them
 */
export const defaultConfig: Config = {
  logging: {
    level: 'info',
    format: 'json',
    dir: join(tmpdir(), 'lvmscope'),
    maxFiles: 5,
    maxSize: '10m',
    console: false,
    file: true,
  },
  commands: {
    timeoutMs: 5000,
    probePartitions: true,
    paths: {
      lsblk: 'lsblk',
      pvs: 'pvs',
      vgs: 'vgs',
      lvs: 'lvs',
      df: 'df',
      parted: 'parted',
    },
  },
  ui: {
    refreshIntervalMs: 10000,
  },
};
