/**
 * Promise wrapper around child_process.execFile for the external tools the
 * router drives (separation command, nvidia-smi, ffmpeg).
 */

import { execFile } from 'child_process';

/** Captured output of a finished command */
export interface CommandOutput {
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  /** Kill the process after this many ms (0 = no limit) */
  timeoutMs?: number;
  /** Max bytes buffered per stream. Defaults to 16MB */
  maxBuffer?: number;
}

/**
 * Raised when a command cannot be started or exits unsuccessfully.
 */
export class CommandError extends Error {
  readonly command: string;
  /** The executable was not found on PATH */
  readonly notFound: boolean;
  /** The process was killed after exceeding its timeout */
  readonly timedOut: boolean;
  readonly stderr: string;

  constructor(
    message: string,
    command: string,
    details: { notFound?: boolean; timedOut?: boolean; stderr?: string } = {},
  ) {
    super(message);
    this.name = 'CommandError';
    this.command = command;
    this.notFound = details.notFound ?? false;
    this.timedOut = details.timedOut ?? false;
    this.stderr = details.stderr ?? '';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const DEFAULT_MAX_BUFFER = 16 * 1024 * 1024;

/**
 * Runs a command without a shell and resolves with its output.
 * @throws CommandError on spawn failure, non-zero exit or timeout
 */
export function runCommand(
  command: string,
  args: string[],
  options?: RunCommandOptions,
): Promise<CommandOutput> {
  return new Promise<CommandOutput>((resolve, reject) => {
    execFile(
      command,
      args,
      {
        timeout: options?.timeoutMs ?? 0,
        maxBuffer: options?.maxBuffer ?? DEFAULT_MAX_BUFFER,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        const stderrText = String(stderr);
        if (error) {
          if (error.code === 'ENOENT') {
            reject(new CommandError(`Command not found: ${command}`, command, { notFound: true }));
            return;
          }
          if (error.killed) {
            reject(
              new CommandError(`${command} timed out after ${options?.timeoutMs ?? 0}ms`, command, {
                timedOut: true,
                stderr: stderrText,
              }),
            );
            return;
          }
          const detail = stderrText.trim() ? ` (${lastLines(stderrText, 5)})` : '';
          reject(
            new CommandError(`${command} failed: ${error.message}${detail}`, command, {
              stderr: stderrText,
            }),
          );
          return;
        }

        resolve({ stdout: String(stdout), stderr: stderrText });
      },
    );
  });
}

function lastLines(text: string, count: number): string {
  return text.trim().split(/\r?\n/).slice(-count).join(' | ');
}
