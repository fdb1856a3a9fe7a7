/**
 * Download Command
 *
 * Resolves a video, asks for a resolution, downloads the video and audio
 * streams and merges them into one file.
 */

import chalk from 'chalk';
import { YoutubeCatalog } from '@tubemux/acquisition';
import {
  MuxFailedError,
  RunCancelledError,
  TubemuxError,
  type PipelineStage,
} from '@tubemux/core';
import { DownloadRunner } from '@tubemux/pipeline';
import { Muxer } from '@tubemux/processing';
import { setLogLevel } from '@tubemux/utils';
import { VERSION, loadConfig, type CliConfig, type CliFlags } from '../config/index.js';
import { RunPresenter } from '../lib/presenter.js';
import { Prompter } from '../lib/prompt.js';
import {
  printBanner,
  printError,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';

export type DownloadOptions = CliFlags;

const STAGE_LABEL: Record<PipelineStage, string> = {
  catalog: 'fetching video information',
  selection: 'selecting streams',
  retrieval: 'downloading',
  mux: 'merging',
  cleanup: 'cleaning up',
  run: 'running',
};

const DIAGNOSTIC_LINES = 20;

/**
 * Returns the process exit code
 */
export async function downloadCommand(
  url: string | undefined,
  options: DownloadOptions
): Promise<number> {
  let config: CliConfig;
  try {
    config = loadConfig(options);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Invalid configuration');
    return 1;
  }

  if (config.debug) {
    setLogLevel('debug');
  }
  if (config.clearScreen) {
    console.clear();
  }
  printBanner(VERSION);

  const controller = new AbortController();
  const { signal } = controller;
  const onInterrupt = (): void => controller.abort();
  // Registered until the run ends: every Ctrl+C only aborts
  process.on('SIGINT', onInterrupt);
  const prompter = new Prompter({ onInterrupt });

  try {
    const locator = url ?? (await prompter.ask('\nVideo URL: ', signal));
    if (!locator.trim()) {
      printError('No URL provided');
      return 1;
    }

    const runner = new DownloadRunner({
      catalog: new YoutubeCatalog(),
      muxer: new Muxer(config.ffmpegPath),
      destinationDir: config.outputDir,
      audioCodec: config.audioCodec,
    });
    new RunPresenter(runner.events).attach();

    const result = await runner.run({
      locator,
      signal,
      promptResolution: () => prompter.ask('\nSelect the desired resolution [number]: ', signal),
    });

    console.log();
    printSuccess('Download complete!');
    printKeyValue('Saved to', result.outputPath);
    return 0;
  } catch (error) {
    return reportFailure(error, signal);
  } finally {
    prompter.close();
    process.off('SIGINT', onInterrupt);
  }
}

function reportFailure(error: unknown, signal: AbortSignal): number {
  if (error instanceof RunCancelledError || signal.aborted) {
    console.log();
    printWarning('Operation cancelled by user.');
    return 0;
  }

  if (error instanceof TubemuxError) {
    printError(`Failed while ${STAGE_LABEL[error.stage]}: ${error.message}`);
    if (error instanceof MuxFailedError && error.diagnostics) {
      const tail = error.diagnostics.trimEnd().split('\n').slice(-DIAGNOSTIC_LINES).join('\n');
      console.error(chalk.gray(tail));
    }
    return 1;
  }

  printError(error instanceof Error ? error.message : 'Unknown error');
  return 1;
}
