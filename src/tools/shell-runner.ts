// Shell Runner - runs a script through /bin/sh -c under a wall-clock limit

import { execFile } from 'node:child_process';

const SHELL = '/bin/sh';
const MAX_BUFFER_EXCEEDED = 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER';

export interface ShellOptions {
  timeoutMs: number;
  maxOutputBytes: number;
  cwd?: string;
}

export interface ShellResult {
  stdout: string;
  stderr: string;
  /** null when the shell was killed before exiting */
  exitCode: number | null;
  timedOut: boolean;
}

/**
 * Run `script` with `/bin/sh -c`. Non-zero exits, timeouts and oversized
 * output resolve with whatever was captured; only a shell that cannot be
 * started rejects.
 */
export function runShell(script: string, options: ShellOptions): Promise<ShellResult> {
  return new Promise((resolve, reject) => {
    execFile(
      SHELL,
      ['-c', script],
      { timeout: options.timeoutMs, maxBuffer: options.maxOutputBytes, cwd: options.cwd },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0, timedOut: false });
          return;
        }
        // String codes are spawn errors (ENOENT, EACCES), except the buffer limit
        if (typeof error.code === 'string' && error.code !== MAX_BUFFER_EXCEEDED) {
          reject(error);
          return;
        }
        resolve({
          stdout,
          stderr,
          exitCode: typeof error.code === 'number' ? error.code : null,
          timedOut: error.killed === true && error.code !== MAX_BUFFER_EXCEEDED,
        });
      }
    );
  });
}
