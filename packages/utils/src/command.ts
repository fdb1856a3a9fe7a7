/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Optional timeout
 * - Bounded output capture (the tail of each stream is kept)
 * - Abort signal forwarding
 */

import { spawn, type SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
  aborted: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds, no limit when omitted
  maxOutputSize?: number; // bytes kept per stream
  signal?: AbortSignal;
}

const DEFAULT_MAX_OUTPUT = 64 * 1024;

/**
 * Keeps the last `limit` bytes written to it.
 */
export class TailBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(data: Buffer): void {
    this.chunks.push(data);
    this.size += data.length;

    while (this.size > this.limit && this.chunks.length > 0) {
      const head = this.chunks[0];
      if (!head) break;
      const excess = this.size - this.limit;
      if (head.length <= excess) {
        this.chunks.shift();
        this.size -= head.length;
      } else {
        this.chunks[0] = head.subarray(excess);
        this.size -= excess;
      }
    }
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Execute an external command safely
 *
 * Resolves with the exit status once the process has closed; rejects only
 * when the process could not be spawned.
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout,
    maxOutputSize = DEFAULT_MAX_OUTPUT,
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;
  let aborted = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    const stdout = new TailBuffer(maxOutputSize);
    const stderr = new TailBuffer(maxOutputSize);

    let timeoutId: NodeJS.Timeout | undefined;
    let killId: NodeJS.Timeout | undefined;

    const terminate = (): void => {
      child.kill('SIGTERM');
      // Force kill after 10 seconds
      killId = setTimeout(() => child.kill('SIGKILL'), 10000);
    };

    if (timeout !== undefined) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        terminate();
      }, timeout);
    }

    const onAbort = (): void => {
      aborted = true;
      terminate();
    };

    if (signal) {
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    const release = (): void => {
      clearTimeout(timeoutId);
      clearTimeout(killId);
      signal?.removeEventListener('abort', onAbort);
    };

    child.stdout?.on('data', (data: Buffer) => stdout.push(data));
    child.stderr?.on('data', (data: Buffer) => stderr.push(data));

    child.on('close', (code, exitSignal) => {
      release();

      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        duration: Date.now() - startTime,
        timedOut,
        aborted,
      });
    });

    // Handle spawn errors
    child.on('error', (error) => {
      release();
      reject(error);
    });
  });
}
