/**
 * Unit tests for the command gateway
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { CommandGateway, COMMAND_CATALOG, classifyResult } from './commands.js';
import { createTestLogger } from '../__tests__/utils.js';
import type { Config } from '../config/schema.js';
import type { ExecResult } from '../utils/exec.js';

// Mock process execution
jest.mock('../utils/exec.js');

import { executeCommand } from '../utils/exec.js';

const mockExecuteCommand = jest.mocked(executeCommand);

const commandsConfig: Config['commands'] = {
  timeoutMs: 5000,
  probePartitions: true,
  paths: {
    lsblk: 'lsblk',
    pvs: '/usr/sbin/pvs',
    vgs: 'vgs',
    lvs: 'lvs',
    df: 'df',
    parted: 'parted',
  },
};

function success(stdout: string): ExecResult {
  return { stdout, stderr: '', exitCode: 0, timedOut: false };
}

function exited(exitCode: number, stderr: string): ExecResult {
  return { stdout: '', stderr, exitCode, timedOut: false };
}

describe('classifyResult', () => {
  it('should treat a zero exit as success', () => {
    expect(classifyResult('pvs', success('x'), 5000)).toBeNull();
  });

  it('should report a missing program', () => {
    const result: ExecResult = { ...exited(1, 'spawn parted ENOENT'), errorCode: 'ENOENT' };

    expect(classifyResult('parted', result, 5000)).toEqual({ kind: 'NotFound', program: 'parted' });
  });

  it('should report spawn permission errors', () => {
    const result: ExecResult = { ...exited(1, 'spawn /sbin/pvs EACCES'), errorCode: 'EACCES' };

    expect(classifyResult('/sbin/pvs', result, 5000)).toEqual({
      kind: 'PermissionDenied',
      detail: 'spawn /sbin/pvs EACCES',
    });
  });

  it('should recognise permission problems reported on stderr', () => {
    const stderr = [
      'WARNING: Running as a non-root user. Functionality may be unavailable.',
      '/run/lock/lvm/P_global:aux: open failed: Permission denied',
    ].join('\n');

    expect(classifyResult('pvs', exited(5, stderr), 5000)).toEqual({
      kind: 'PermissionDenied',
      detail: '/run/lock/lvm/P_global:aux: open failed: Permission denied',
    });
  });

  it('should recognise root requirements', () => {
    expect(classifyResult('parted', exited(1, 'Error: You must be root to do this.'), 5000)).toEqual({
      kind: 'PermissionDenied',
      detail: 'Error: You must be root to do this.',
    });
  });

  it('should report other exits with the first stderr line', () => {
    expect(classifyResult('lsblk', exited(32, 'lsblk: unknown column: PATH\nmore'), 5000)).toEqual({
      kind: 'ExecutionFailed',
      reason: 'exit code 32: lsblk: unknown column: PATH',
    });
    expect(classifyResult('lsblk', exited(2, ''), 5000)).toEqual({
      kind: 'ExecutionFailed',
      reason: 'exit code 2',
    });
  });

  it('should report timeouts', () => {
    const result: ExecResult = { ...exited(1, ''), timedOut: true };

    expect(classifyResult('vgs', result, 2500)).toEqual({
      kind: 'ExecutionFailed',
      reason: 'timed out after 2500 ms',
    });
  });
});

describe('CommandGateway', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should run the configured program with its fixed arguments', async () => {
    mockExecuteCommand.mockResolvedValue(success('  /dev/sda1|vg0|lvm2|1|0\n'));
    const { logger } = createTestLogger();
    const gateway = new CommandGateway(commandsConfig, logger);

    const outcome = await gateway.run('physicalVolumes');

    expect(outcome.ok).toBe(true);
    expect(mockExecuteCommand).toHaveBeenCalledWith(
      '/usr/sbin/pvs',
      [
        '--noheadings',
        '--nosuffix',
        '--units',
        'b',
        '--separator',
        '|',
        '-o',
        'pv_name,vg_name,pv_fmt,pv_size,pv_free',
      ],
      { timeout: 5000 }
    );
  });

  it('should return failures as values and log them at warn', async () => {
    mockExecuteCommand.mockResolvedValue({ ...exited(1, 'spawn vgs ENOENT'), errorCode: 'ENOENT' });
    const { logger, entries } = createTestLogger();
    const gateway = new CommandGateway(commandsConfig, logger);

    const outcome = await gateway.run('volumeGroups');

    expect(outcome).toMatchObject({ ok: false, failure: { kind: 'NotFound', program: 'vgs' } });
    const warning = entries.find(entry => entry.level === 'warn');
    expect(warning?.message).toBe('volumeGroups: vgs not found');
    expect(warning?.['component']).toBe('gateway');
  });

  it('should collect every command, including failed ones', async () => {
    mockExecuteCommand.mockImplementation(async program =>
      program === 'df' ? exited(1, 'df: cannot read table of mounted file systems') : success('')
    );
    const { logger } = createTestLogger();
    const gateway = new CommandGateway(commandsConfig, logger);

    const output = await gateway.collect();

    expect(Object.keys(output).sort()).toEqual(Object.keys(COMMAND_CATALOG).sort());
    expect(output.filesystems).toMatchObject({
      ok: false,
      failure: { kind: 'ExecutionFailed', reason: 'exit code 1: df: cannot read table of mounted file systems' },
    });
    expect(output.blockDevices?.ok).toBe(true);
    expect(mockExecuteCommand).toHaveBeenCalledTimes(7);
  });

  it('should leave partitions out when probing is disabled', async () => {
    mockExecuteCommand.mockResolvedValue(success(''));
    const { logger } = createTestLogger();
    const gateway = new CommandGateway({ ...commandsConfig, probePartitions: false }, logger);

    const output = await gateway.collect();

    expect(output.partitions).toBeUndefined();
    expect(mockExecuteCommand).toHaveBeenCalledTimes(6);
    expect(mockExecuteCommand.mock.calls.some(([program]) => program === 'parted')).toBe(false);
  });

  it('should wait for a slow command before resolving', async () => {
    const gate: { release?: () => void } = {};
    mockExecuteCommand.mockImplementation(program =>
      program === 'lsblk'
        ? new Promise<ExecResult>(resolve => {
            gate.release = () => resolve(success('late'));
          })
        : Promise.resolve(success(''))
    );
    const { logger } = createTestLogger();
    const gateway = new CommandGateway(commandsConfig, logger);

    let settled = false;
    const collecting = gateway.collect().then(output => {
      settled = true;
      return output;
    });
    await new Promise(resolve => setImmediate(resolve));

    expect(settled).toBe(false);
    gate.release?.();
    const output = await collecting;
    expect(output.blockDevices).toMatchObject({ ok: true, stdout: 'late' });
  });
});
