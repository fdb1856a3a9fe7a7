/**
 * Interactive prompts
 *
 * One readline interface serves every question of a run. Lines that arrive
 * before a question is asked (piped input) are queued, not dropped.
 */

import chalk from 'chalk';
import { createInterface, type Interface } from 'node:readline';

export interface PrompterOptions {
  /** Ctrl+C while the prompt owns the terminal */
  onInterrupt?: () => void;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export class Prompter {
  private readonly rl: Interface;
  private readonly queued: string[] = [];
  private readonly waiters = new Set<(line: string | null) => void>();
  private closed = false;

  constructor(options: PrompterOptions = {}) {
    const { onInterrupt, input = process.stdin, output = process.stdout } = options;

    this.rl = createInterface({ input, output });

    this.rl.on('line', (line) => {
      const [waiter] = this.waiters;
      if (waiter) {
        waiter(line);
      } else {
        this.queued.push(line);
      }
    });

    this.rl.on('close', () => {
      this.closed = true;
      for (const waiter of [...this.waiters]) {
        waiter(null);
      }
    });

    this.rl.on('SIGINT', () => {
      output.write('\n');
      onInterrupt?.();
    });
  }

  /**
   * Ask one question and resolve with the raw answer.
   * Rejects when the input closes or the signal aborts before an answer.
   */
  ask(question: string, signal?: AbortSignal): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      if (!this.closed) {
        this.rl.setPrompt(chalk.bold(question));
        this.rl.prompt();
      }

      const buffered = this.queued.shift();
      if (buffered !== undefined) {
        resolve(buffered);
        return;
      }
      if (this.closed) {
        reject(new Error('Input closed before an answer was given'));
        return;
      }

      const onAbort = (): void => {
        this.waiters.delete(waiter);
        reject(signal?.reason);
      };

      const waiter = (line: string | null): void => {
        this.waiters.delete(waiter);
        signal?.removeEventListener('abort', onAbort);
        if (line === null) {
          reject(new Error('Input closed before an answer was given'));
        } else {
          resolve(line);
        }
      };

      this.waiters.add(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
