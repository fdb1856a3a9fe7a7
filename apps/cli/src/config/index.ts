/**
 * CLI Configuration
 *
 * Precedence: CLI flag > environment > config file > default.
 */

import { z } from 'zod';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { existsSync, readFileSync } from 'node:fs';
import { resolveBinaryPath } from '@tubemux/core';
import { DEFAULT_AUDIO_CODEC } from '@tubemux/processing';
import { logger } from '@tubemux/utils';

export const VERSION = '1.0.0';

/**
 * `~/.tubemux/config.json` for the given home directory
 */
export function defaultConfigFile(homeDir: string = homedir()): string {
  return join(homeDir, '.tubemux', 'config.json');
}

// An empty variable counts as unset
const envString = z.preprocess((value) => (value === '' ? undefined : value), z.string().optional());

// Environment schema
const envSchema = z.object({
  TUBEMUX_OUTPUT_DIR: envString,
  TUBEMUX_DEBUG: envString,
  XDG_VIDEOS_DIR: envString,
});

// Config file schema
const configFileSchema = z.object({
  outputDir: z.string().min(1).optional(),
  audioCodec: z.string().min(1).default(DEFAULT_AUDIO_CODEC),
  ffmpegPath: z.string().min(1).optional(),
  clearScreen: z.boolean().default(true),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface CliFlags {
  outputDir?: string;
  ffmpeg?: string;
  clear?: boolean;
  debug?: boolean;
}

export interface CliConfig {
  outputDir: string;
  ffmpegPath: string;
  audioCodec: string;
  clearScreen: boolean;
  debug: boolean;
  configFile: string;
}

export interface ConfigSources {
  env?: NodeJS.ProcessEnv;
  configFile?: string;
  homeDir?: string;
  platform?: NodeJS.Platform;
}

/**
 * The platform's standard folder for the user's videos
 */
export function defaultMediaDir(
  platform: NodeJS.Platform,
  homeDir: string,
  xdgVideosDir?: string
): string {
  if (platform === 'darwin') {
    return join(homeDir, 'Movies');
  }
  if (platform !== 'win32' && xdgVideosDir) {
    return xdgVideosDir.replace(/^\$HOME/, homeDir);
  }
  return join(homeDir, 'Videos');
}

/**
 * --ffmpeg flag, then FFMPEG_PATH, then the config file, then a bundled
 * binary or the system PATH
 */
function resolveFfmpegPath(flag: string | undefined, fromFile: string | undefined, env: NodeJS.ProcessEnv): string {
  if (flag) {
    return flag;
  }
  const found = resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', { env });
  if (found.source === 'env' || !fromFile) {
    return found.resolvedPath;
  }
  return fromFile;
}

// Load config from file; a missing or unreadable file means defaults
function loadConfigFile(path: string): unknown {
  if (!existsSync(path)) {
    return {};
  }
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    logger.warn({ error, path }, 'Ignoring config file that cannot be read as JSON');
    return {};
  }
}

/**
 * Merge flags, environment, config file and defaults
 */
export function loadConfig(flags: CliFlags = {}, sources: ConfigSources = {}): CliConfig {
  const {
    env: rawEnv = process.env,
    homeDir = homedir(),
    configFile = defaultConfigFile(homeDir),
    platform = process.platform,
  } = sources;

  const env = envSchema.parse(rawEnv);

  const parsedFile = configFileSchema.safeParse(loadConfigFile(configFile));
  if (!parsedFile.success) {
    const issues = parsedFile.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${configFile}: ${issues}`);
  }
  const fileConfig = parsedFile.data;

  return {
    outputDir:
      flags.outputDir ??
      env.TUBEMUX_OUTPUT_DIR ??
      fileConfig.outputDir ??
      defaultMediaDir(platform, homeDir, env.XDG_VIDEOS_DIR),
    ffmpegPath: resolveFfmpegPath(flags.ffmpeg, fileConfig.ffmpegPath, rawEnv),
    audioCodec: fileConfig.audioCodec,
    clearScreen: flags.clear ?? fileConfig.clearScreen,
    debug: flags.debug === true || env.TUBEMUX_DEBUG === 'true',
    configFile,
  };
}
