import { execFile } from 'node:child_process';

export interface CommandResult {
  ok: boolean;
  out: string;
  exitCode: number;
  /** The executable could not be found */
  missing: boolean;
  err?: string;
}

export interface CommandOptions {
  cwd?: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 4000;

/**
 * Run a command and collect stdout. Never rejects: failures come back in the result.
 */
export function runCommand(command: string, args: Array<string>, options: CommandOptions = {}) {
  return new Promise<CommandResult>((resolve) => {
    execFile(
      command,
      args,
      {
        cwd: options.cwd,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        encoding: 'utf8',
        maxBuffer: 1024 * 1024,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (error === null) {
          resolve({ ok: true, out: stdout, exitCode: 0, missing: false });
          return;
        }

        const code: unknown = error.code;
        const exitCode = typeof code === 'number' ? code : 1;
        const err = stderr.trim().length > 0 ? stderr.trim() : error.message;

        resolve({
          ok: false,
          out: stdout,
          exitCode,
          missing: code === 'ENOENT',
          err,
        });
      }
    );
  });
}
