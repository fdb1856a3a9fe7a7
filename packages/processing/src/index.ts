/**
 * @tubemux/processing
 *
 * Muxing layer.
 *
 * RULES:
 * - NEVER re-encode video
 * - Log every FFmpeg command executed
 */

// FFmpeg wrapper
export { FFmpeg, type FFmpegExecutor, type FFmpegRunOptions } from './ffmpeg.js';

// Muxer
export {
  Muxer,
  buildMuxArgs,
  DEFAULT_AUDIO_CODEC,
  type MuxOptions,
  type MuxResult,
} from './muxer.js';
