import { execFile } from 'node:child_process';

export type CommandFailure = 'not-found' | 'timeout' | 'exit';

export class CommandError extends Error {
  /** Output printed before the failure */
  readonly stdout: string;

  constructor(
    readonly command: string,
    readonly reason: CommandFailure,
    readonly stderr: string,
    options?: { cause?: unknown; stdout?: string },
  ) {
    super(CommandError.describe(command, reason, stderr), options);
    this.name = 'CommandError';
    this.stdout = options?.stdout ?? '';
  }

  private static describe(command: string, reason: CommandFailure, stderr: string): string {
    switch (reason) {
      case 'not-found':
        return `${command} not found`;
      case 'timeout':
        return `${command} timed out`;
      case 'exit':
        return `${command} failed${stderr.trim() ? `: ${stderr.trim()}` : ''}`;
    }
  }
}

const MAX_OUTPUT_BYTES = 16 * 1024 * 1024;

/**
 * Run an executable without a shell and collect its output.
 * Rejects with CommandError when the binary is missing, the timeout fires or the exit code is non-zero.
 */
export function runCommand(
  file: string,
  args: string[],
  timeoutMs: number,
): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { encoding: 'utf8', timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES },
      (err, stdout, stderr) => {
        if (err) {
          let reason: CommandFailure = 'exit';
          if (err.code === 'ENOENT') {
            reason = 'not-found';
          } else if (err.killed) {
            reason = 'timeout';
          }
          reject(
            new CommandError([file, ...args].join(' '), reason, String(stderr ?? ''), {
              cause: err,
              stdout: String(stdout ?? ''),
            }),
          );
          return;
        }
        resolve({ stdout: String(stdout), stderr: String(stderr) });
      },
    );
  });
}
