// Code execution for the execute_code dev tool

import { runShell } from './shell-runner.js';
import { errorMessage } from '../core/errors.js';

export const DEFAULT_EXEC_TIMEOUT = 30_000;
const MAX_OUTPUT_SIZE = 1024 * 1024; // 1MB

const SUPPORTED_LANGUAGES = new Set(['bash', 'sh']);

export interface ExecuteCodeOptions {
  timeout?: number;
  cwd?: string;
}

function formatOutput(stdout: string, stderr: string): string {
  return `Output:\n${stdout.slice(0, MAX_OUTPUT_SIZE)}\n${stderr.slice(0, MAX_OUTPUT_SIZE)}`;
}

/**
 * Run a snippet through the shell with a fixed wall-clock timeout. Only shell
 * code is accepted.
 */
export async function executeCode(
  code: string,
  language: string,
  options: ExecuteCodeOptions = {},
): Promise<string> {
  if (!SUPPORTED_LANGUAGES.has(language.toLowerCase())) {
    return `Language '${language}' not supported`;
  }

  const timeout = options.timeout ?? DEFAULT_EXEC_TIMEOUT;

  try {
    const result = await runShell(code, {
      timeoutMs: timeout,
      maxOutputBytes: MAX_OUTPUT_SIZE,
      cwd: options.cwd,
    });
    if (result.timedOut) {
      return `Execution error: command timed out after ${timeout}ms`;
    }
    // A non-zero exit still reports its output
    return formatOutput(result.stdout, result.stderr);
  } catch (err) {
    return `Execution error: ${errorMessage(err)}`;
  }
}
