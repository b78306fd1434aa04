/**
 * Mock child_process module for testing
 * Each program name maps to a scripted behaviour; unscripted programs fail with ENOENT.
 * A key of `<program> <first argument>` (e.g. `lvs --segments`) takes precedence over the bare name.
 */

import { EventEmitter } from 'events';
import { basename } from 'path';

export type CommandBehavior =
  | { kind: 'output'; stdout: string; stderr?: string }
  | { kind: 'exit'; exitCode: number; stdout?: string; stderr: string }
  | { kind: 'spawn-error'; code: string }
  | { kind: 'timeout' };

type ExecFileCallback = (error: ExecFileError | null, stdout: string, stderr: string) => void;

interface ExecFileError extends Error {
  code?: string | number;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
}

interface RecordedCall {
  program: string;
  args: string[];
  env: NodeJS.ProcessEnv | undefined;
}

const behaviors = new Map<string, CommandBehavior>();
const calls: RecordedCall[] = [];

export function __setCommandBehavior(program: string, behavior: CommandBehavior): void {
  behaviors.set(program, behavior);
}

export function __resetCommandBehaviors(): void {
  behaviors.clear();
  calls.length = 0;
}

export function __getCalls(): readonly RecordedCall[] {
  return calls;
}

class MockChildProcess extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
  exitCode: number | null = null;

  kill() {
    this.exitCode = -1;
    this.emit('exit', this.exitCode);
  }
}

function failure(message: string, fields: Partial<ExecFileError>): ExecFileError {
  return Object.assign(new Error(message), fields);
}

export function execFile(
  program: string,
  args: string[],
  options: { env?: NodeJS.ProcessEnv },
  callback: ExecFileCallback
): MockChildProcess {
  const proc = new MockChildProcess();
  calls.push({ program, args, env: options.env });
  const name = basename(program);
  const behavior = behaviors.get(`${name} ${args[0] ?? ''}`) ??
    behaviors.get(name) ?? { kind: 'spawn-error', code: 'ENOENT' };

  setImmediate(() => {
    switch (behavior.kind) {
      case 'output':
        callback(null, behavior.stdout, behavior.stderr ?? '');
        proc.exitCode = 0;
        break;
      case 'exit':
        callback(
          failure(`Command failed: ${program}`, { code: behavior.exitCode, killed: false, signal: null }),
          behavior.stdout ?? '',
          behavior.stderr
        );
        proc.exitCode = behavior.exitCode;
        break;
      case 'spawn-error':
        callback(failure(`spawn ${program} ${behavior.code}`, { code: behavior.code }), '', '');
        proc.exitCode = -2;
        break;
      case 'timeout':
        callback(failure(`Command failed: ${program}`, { killed: true, signal: 'SIGKILL' }), '', '');
        proc.exitCode = null;
        break;
    }
    proc.emit('exit', proc.exitCode);
  });

  return proc;
}
