import { execFile } from 'node:child_process';

import type { CommandExecutor, ExecResult } from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Real CommandExecutor using child_process.execFile. Non-zero exits,
 * timeouts and missing binaries are reported in the result, never thrown.
 */
export function createCommandExecutor(defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS): CommandExecutor {
  return {
    exec(file, args, options = {}) {
      return new Promise<ExecResult>((resolve) => {
        execFile(
          file,
          [...args],
          {
            cwd: options.cwd,
            timeout: options.timeoutMs ?? defaultTimeoutMs,
            encoding: 'utf-8',
            maxBuffer: 16 * 1024 * 1024,
          },
          (err, stdout, stderr) => {
            if (!err) {
              resolve({ stdout, stderr, exitCode: 0 });
              return;
            }
            const code: unknown = err.code;
            let exitCode = 1;
            if (typeof code === 'number') exitCode = code;
            else if (code === 'ENOENT') exitCode = 127;
            resolve({
              stdout,
              stderr: stderr || err.message,
              exitCode,
            });
          },
        );
      });
    },
  };
}
