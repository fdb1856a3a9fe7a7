/**
 * Muxer
 *
 * Combines a video-only and an audio-only file into one container.
 *
 * Video is always stream-copied; audio is re-encoded to a widely
 * supported codec.
 */

import { dirname } from 'node:path';
import { MuxFailedError } from '@tubemux/core';
import { ensureDir, removeFile, createLogger } from '@tubemux/utils';
import { FFmpeg, type FFmpegExecutor } from './ffmpeg.js';

export interface MuxOptions {
  videoFile: string;
  audioFile: string;
  outputFile: string;
  audioCodec?: string;
  signal?: AbortSignal;
}

export interface MuxResult {
  outputFile: string;
  ffmpegCommand: string;
  duration: number;
}

export const DEFAULT_AUDIO_CODEC = 'aac';

export class Muxer {
  private ffmpeg: FFmpegExecutor;

  constructor(ffmpeg: FFmpegExecutor | string = 'ffmpeg') {
    this.ffmpeg = typeof ffmpeg === 'string' ? new FFmpeg(ffmpeg) : ffmpeg;
  }

  /**
   * Mux video and audio together
   *
   * Throws MuxFailedError on a non-zero exit or when ffmpeg cannot be
   * launched. A partial output file is removed before throwing.
   */
  async mux(options: MuxOptions): Promise<MuxResult> {
    const startTime = Date.now();
    const log = createLogger({ module: 'muxer' });

    await ensureDir(dirname(options.outputFile));

    const args = buildMuxArgs(options);
    const commandStr = `${this.ffmpeg.path} -y ${args.join(' ')}`;

    let exitCode: number;
    let diagnostics: string;

    try {
      const result = await this.ffmpeg.execute(args, { signal: options.signal });
      exitCode = result.exitCode;
      diagnostics = result.stderr || result.stdout;
    } catch (error) {
      throw new MuxFailedError(this.ffmpeg.path, null, '', error);
    }

    if (exitCode !== 0) {
      await this.discardPartialOutput(options.outputFile);
      log.debug({ exitCode, command: commandStr }, 'Mux failed');
      throw new MuxFailedError(this.ffmpeg.path, exitCode, diagnostics);
    }

    return {
      outputFile: options.outputFile,
      ffmpegCommand: commandStr,
      duration: Date.now() - startTime,
    };
  }

  private async discardPartialOutput(outputFile: string): Promise<void> {
    try {
      await removeFile(outputFile);
    } catch (error) {
      createLogger({ module: 'muxer' }).warn({ error, outputFile }, 'Could not remove partial output');
    }
  }
}

/**
 * Build the ffmpeg argument list (without the leading `-y`)
 */
export function buildMuxArgs(options: Pick<MuxOptions, 'videoFile' | 'audioFile' | 'outputFile' | 'audioCodec'>): string[] {
  return [
    '-i', options.videoFile,
    '-i', options.audioFile,
    '-c:v', 'copy',
    '-c:a', options.audioCodec ?? DEFAULT_AUDIO_CODEC,
    '-strict', 'experimental',
    options.outputFile,
  ];
}
