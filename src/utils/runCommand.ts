import { spawn } from 'child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;

  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
}

export class CommandTimeoutError extends Error {
  constructor(
    public readonly command: string,
    public readonly timeoutMs: number
  ) {
    super(`${command} timed out after ${timeoutMs}ms`);
    this.name = 'CommandTimeoutError';
  }
}

/**
 * Run an external command to completion.
 * Resolves with the exit code whatever it is; rejects when the process cannot
 * be spawned or runs past the timeout.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: { ...process.env, ...options.env },
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timeout: NodeJS.Timeout | undefined;

    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    child.on('close', code => {
      if (timeout) {
        clearTimeout(timeout);
      }
      if (settled) {
        return; // Timeout or spawn error already rejected
      }
      settled = true;
      resolve({ exitCode: code ?? -1, stdout, stderr });
    });

    child.on('error', error => {
      if (timeout) {
        clearTimeout(timeout);
      }
      if (settled) {
        return;
      }
      settled = true;
      reject(error);
    });

    if (options.timeoutMs !== undefined) {
      const timeoutMs = options.timeoutMs;
      timeout = setTimeout(() => {
        if (settled) {
          return;
        }
        settled = true;

        // Try graceful termination first
        child.kill('SIGTERM');
        setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, 10000).unref();

        reject(new CommandTimeoutError(command, timeoutMs));
      }, timeoutMs);
    }
  });
}
