/**
 * Utilities for executing system commands
 */

import { execFile } from 'child_process';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** Spawn error code such as ENOENT, when the process never ran */
  errorCode?: string;
  timedOut: boolean;
}

export interface ExecOptions {
  timeout: number;
  maxBuffer?: number;
}

const MAX_BUFFER = 10 * 1024 * 1024;

/**
 * Run a program with a fixed argument vector (no shell) and collect its output.
 * Never rejects: spawn errors, non-zero exits and timeouts are all reported in the result.
 */
export function executeCommand(
  program: string,
  args: readonly string[],
  options: ExecOptions
): Promise<ExecResult> {
  return new Promise(resolve => {
    execFile(
      program,
      [...args],
      {
        encoding: 'utf8',
        timeout: options.timeout,
        killSignal: 'SIGKILL',
        maxBuffer: options.maxBuffer ?? MAX_BUFFER,
        // Stable number formatting and messages regardless of the user's locale
        env: { ...process.env, LC_ALL: 'C' },
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr: stderr.trim(), exitCode: 0, timedOut: false });
          return;
        }

        const code: unknown = error.code;
        const errorCode = typeof code === 'string' ? code : undefined;
        resolve({
          stdout,
          stderr: stderr ? stderr.trim() : error.message,
          exitCode: typeof code === 'number' ? code : 1,
          errorCode,
          timedOut: errorCode === undefined && error.killed === true && error.signal === 'SIGKILL',
        });
      }
    );
  });
}
