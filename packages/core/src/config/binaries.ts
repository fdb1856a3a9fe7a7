/**
 * Binary Configuration
 *
 * Locates the external binaries the pipeline shells out to.
 * Supports Windows, Linux and macOS binaries with automatic OS detection.
 *
 * Priority order:
 * 1. Environment variables (e.g., FFMPEG_PATH)
 * 2. Custom binary folder (packages/core/binaries/<os>/)
 * 3. System PATH
 */

import { existsSync } from 'node:fs';
import { join, resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/
const BINARY_ROOT = resolve(__dirname, '../../binaries');

function getOsFolder(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  source: 'env' | 'bundled' | 'path';
}

export interface BinaryLookup {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  binaryRoot?: string;
  exists?: (path: string) => boolean;
}

/**
 * Resolve a binary path following the priority order above
 */
export function resolveBinaryPath(
  name: string,
  envVar: string,
  lookup: BinaryLookup = {}
): BinaryConfig {
  const {
    env = process.env,
    platform = process.platform,
    binaryRoot = BINARY_ROOT,
    exists = existsSync,
  } = lookup;

  const envPath = env[envVar];
  if (envPath && exists(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  const exeName = platform === 'win32' ? `${name}.exe` : name;
  const bundledPath = join(binaryRoot, getOsFolder(platform), exeName);
  if (exists(bundledPath)) {
    return { name, envVar, resolvedPath: bundledPath, source: 'bundled' };
  }

  // Let the system PATH resolve it; a missing binary surfaces when it is spawned
  return { name, envVar, resolvedPath: name, source: 'path' };
}
