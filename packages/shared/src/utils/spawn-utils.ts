import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a finished child process
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  /** Exit code; 1 when the process was terminated by a signal */
  code: number;
  /** Terminating signal, when the process did not exit on its own */
  signal: NodeJS.Signals | null;
}

/**
 * Spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;
}

/**
 * Run a command-line tool and collect its output.
 *
 * Resolves once the process closes, whatever its exit code; rejects only
 * when the process could not be started (e.g. the binary is missing).
 * Pass `timeout` to have Node terminate long-running tools.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['/tmp/deck.pdf']);
 * if (result.code === 0) {
 *   console.log(result.stdout);
 * }
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });
    }

    proc.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({
        stdout,
        stderr,
        code: code ?? (signal ? 1 : 0),
        signal: signal ?? null,
      });
    });

    proc.on('error', reject);
  });
}
