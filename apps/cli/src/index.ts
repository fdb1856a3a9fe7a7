#!/usr/bin/env -S node --import tsx
/**
 * CLI Entry Point
 *
 * Downloads one video at a chosen resolution and merges it with the best
 * available audio.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { downloadCommand } from './commands/download.js';
import { VERSION } from './config/index.js';

const program = new Command();

program
  .name('tubemux')
  .description('Download a video at a chosen resolution and merge it with the best audio')
  .version(VERSION)
  .argument('[url]', 'Video URL (prompted for when omitted)')
  .option('-o, --output-dir <dir>', 'Directory for the merged file and temporary downloads')
  .option('--ffmpeg <path>', 'Path to the ffmpeg binary')
  .option('--no-clear', 'Do not clear the screen on start')
  .option('--debug', 'Enable debug logging')
  .action(async (url: string | undefined, options: { outputDir?: string; ffmpeg?: string; clear: boolean; debug?: boolean }) => {
    const exitCode = await downloadCommand(url, {
      outputDir: options.outputDir,
      ffmpeg: options.ffmpeg,
      // Commander defaults --no-clear to true; only an explicit flag overrides the config file
      clear: options.clear === false ? false : undefined,
      debug: options.debug,
    });
    process.exit(exitCode);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : 'Unknown error');
  process.exit(1);
});
