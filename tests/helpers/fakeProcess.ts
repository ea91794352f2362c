import { ChildProcess, SpawnOptions } from 'child_process';
import { PassThrough } from 'stream';

const { ChildProcess: RealChildProcess } =
  jest.requireActual<typeof import('child_process')>('child_process');

export interface ProcessScript {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
  /** Emit a spawn error instead of exiting */
  error?: Error;
  /** Never exit */
  hang?: boolean;
  /** Runs before the process reports its exit, e.g. to write an output file */
  beforeExit?: (args: readonly string[]) => void;
}

export interface SpawnCall {
  command: string;
  args: readonly string[];
  options: SpawnOptions;
}

/**
 * Build a spawn implementation that plays back scripted processes in order
 */
export function scriptedSpawn(scripts: ProcessScript[], calls: SpawnCall[] = []) {
  let index = 0;

  return (command: string, args: readonly string[], options: SpawnOptions): ChildProcess => {
    calls.push({ command, args, options });
    const script = scripts[Math.min(index, scripts.length - 1)];
    index++;

    const child = new RealChildProcess();
    const stdout = new PassThrough();
    const stderr = new PassThrough();
    child.stdout = stdout;
    child.stderr = stderr;
    child.kill = jest.fn(() => true);

    setImmediate(() => {
      if (script.error) {
        child.emit('error', script.error);
        return;
      }
      if (script.hang) {
        return;
      }
      if (script.stdout) {
        stdout.emit('data', Buffer.from(script.stdout));
      }
      if (script.stderr) {
        stderr.emit('data', Buffer.from(script.stderr));
      }
      script.beforeExit?.(args);
      child.emit('close', script.exitCode ?? 0);
    });

    return child;
  };
}

export function spawnError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}
