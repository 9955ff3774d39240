import { execFile } from 'node:child_process';

export interface CommandResult {
  /** null when the process was terminated by a signal (timeout) */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandOptions {
  /** The process is killed once this elapses */
  timeoutMs: number;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  opts: CommandOptions,
) => Promise<CommandResult>;

/**
 * Run a command to completion and report its exit code.
 * Rejects only when the process could not be started.
 */
export const execFileRunner: CommandRunner = (file, args, opts) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      {
        timeout: opts.timeoutMs,
        windowsHide: true,
        maxBuffer: 4 * 1024 * 1024,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
          return;
        }
        if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr });
          return;
        }
        if (error.killed) {
          resolve({
            exitCode: null,
            stdout,
            stderr: stderr || `${file} terminated by ${error.signal ?? 'signal'} after ${opts.timeoutMs}ms`,
          });
          return;
        }
        reject(error);
      },
    );
  });

/** Trimmed, single-string diagnostic text of a command result. */
export function commandOutput(result: CommandResult): string {
  return [result.stdout, result.stderr]
    .map((s) => s.trim())
    .filter(Boolean)
    .join('\n');
}
