/**
 * Command gateway: runs the inventory utilities with fixed argument lists and
 * turns each run into raw output or a typed failure. Nothing here throws.
 */

import type { Config, Tool } from '../config/schema.js';
import { CommandError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';
import type { CommandFailure, CommandName, CommandOutcome, InventoryOutput } from '../types/inventory.js';
import { executeCommand, type ExecResult } from '../utils/exec.js';
import { LSBLK_COLUMNS } from './lsblk.js';
import { LV_FIELDS, LVM_SEPARATOR, PV_FIELDS, SEGMENT_FIELDS, VG_FIELDS } from './lvm.js';

export interface CommandSpec {
  tool: Tool;
  args: readonly string[];
}

const LVM_REPORT_ARGS = ['--noheadings', '--nosuffix', '--units', 'b', '--separator', LVM_SEPARATOR];

export const COMMAND_CATALOG: Readonly<Record<CommandName, CommandSpec>> = {
  blockDevices: { tool: 'lsblk', args: ['-P', '-b', '-o', LSBLK_COLUMNS.join(',')] },
  physicalVolumes: { tool: 'pvs', args: [...LVM_REPORT_ARGS, '-o', PV_FIELDS.join(',')] },
  volumeGroups: { tool: 'vgs', args: [...LVM_REPORT_ARGS, '-o', VG_FIELDS.join(',')] },
  logicalVolumes: { tool: 'lvs', args: [...LVM_REPORT_ARGS, '-o', LV_FIELDS.join(',')] },
  segments: { tool: 'lvs', args: ['--segments', '-a', ...LVM_REPORT_ARGS, '-o', SEGMENT_FIELDS.join(',')] },
  filesystems: { tool: 'df', args: ['-B1', '--output=source,size,used,avail,target'] },
  partitions: { tool: 'parted', args: ['-s', '-m', '-l'] },
};

export const COMMAND_NAMES: readonly CommandName[] = [
  'blockDevices',
  'physicalVolumes',
  'volumeGroups',
  'logicalVolumes',
  'segments',
  'filesystems',
  'partitions',
];

const PERMISSION_PATTERN = /permission denied|must be root|only root|are you root|requires root|not permitted/i;

function firstLine(text: string): string {
  return text.split('\n').find(line => line.trim() !== '')?.trim() ?? '';
}

/**
 * Map a finished process to success or one of the failure kinds
 */
export function classifyResult(program: string, result: ExecResult, timeoutMs: number): CommandFailure | null {
  if (result.errorCode === 'ENOENT') {
    return { kind: 'NotFound', program };
  }
  if (result.errorCode === 'EACCES' || result.errorCode === 'EPERM') {
    return { kind: 'PermissionDenied', detail: firstLine(result.stderr) || result.errorCode };
  }
  if (result.timedOut) {
    return { kind: 'ExecutionFailed', reason: `timed out after ${timeoutMs} ms` };
  }
  if (result.errorCode !== undefined) {
    return { kind: 'ExecutionFailed', reason: firstLine(result.stderr) || result.errorCode };
  }
  if (result.exitCode === 0) {
    return null;
  }

  const permissionLine = result.stderr.split('\n').find(line => PERMISSION_PATTERN.test(line));
  if (permissionLine !== undefined) {
    return { kind: 'PermissionDenied', detail: permissionLine.trim() };
  }
  const detail = firstLine(result.stderr);
  return {
    kind: 'ExecutionFailed',
    reason: detail ? `exit code ${result.exitCode}: ${detail}` : `exit code ${result.exitCode}`,
  };
}

export class CommandGateway {
  private readonly config: Config['commands'];
  private readonly logger: Logger;

  constructor(config: Config['commands'], logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: 'gateway' });
  }

  /**
   * Commands run on each collection; parted is optional
   */
  enabledCommands(): CommandName[] {
    return COMMAND_NAMES.filter(name => name !== 'partitions' || this.config.probePartitions);
  }

  async run(name: CommandName): Promise<CommandOutcome> {
    const spec = COMMAND_CATALOG[name];
    const program = this.config.paths[spec.tool];
    const started = Date.now();

    const result = await executeCommand(program, spec.args, { timeout: this.config.timeoutMs });
    const durationMs = Date.now() - started;
    const failure = classifyResult(program, result, this.config.timeoutMs);

    if (failure) {
      const error = new CommandError(name, failure);
      this.logger.warn(error.message, { code: error.code, failure, program, durationMs });
      return { ok: false, failure, durationMs };
    }

    this.logger.debug(`${name} completed`, { program, durationMs, bytes: result.stdout.length });
    return { ok: true, stdout: result.stdout, durationMs };
  }

  /**
   * Run every enabled command concurrently; resolves once all have finished or timed out
   */
  async collect(): Promise<InventoryOutput> {
    const names = this.enabledCommands();
    const outcomes = await Promise.all(names.map(name => this.run(name)));

    const output: Partial<Record<CommandName, CommandOutcome>> = {};
    names.forEach((name, index) => {
      const outcome = outcomes[index];
      if (outcome) output[name] = outcome;
    });
    return output;
  }
}
