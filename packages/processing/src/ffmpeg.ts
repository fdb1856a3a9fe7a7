/**
 * FFmpeg Wrapper
 *
 * Runs ffmpeg with captured, bounded output. Every invocation is logged.
 */

import { executeCommand, createLogger, type CommandResult } from '@tubemux/utils';

export interface FFmpegRunOptions {
  cwd?: string;
  signal?: AbortSignal;
}

/**
 * Anything that can run an ffmpeg argument list
 */
export interface FFmpegExecutor {
  readonly path: string;
  execute(args: string[], options?: FFmpegRunOptions): Promise<CommandResult>;
}

export class FFmpeg implements FFmpegExecutor {
  readonly path: string;

  constructor(ffmpegPath: string = 'ffmpeg') {
    this.path = ffmpegPath;
  }

  /**
   * Execute an FFmpeg command
   *
   * `-y` is always prepended so an existing output is overwritten.
   */
  async execute(args: string[], options: FFmpegRunOptions = {}): Promise<CommandResult> {
    const fullArgs = ['-y', ...args];
    const log = createLogger({ module: 'ffmpeg' });

    log.debug({ command: this.path, args: fullArgs }, 'Running ffmpeg');

    const result = await executeCommand(this.path, fullArgs, {
      cwd: options.cwd,
      signal: options.signal,
    });

    log.debug(
      { exitCode: result.exitCode, duration: result.duration, aborted: result.aborted },
      'ffmpeg finished'
    );

    return result;
  }
}
