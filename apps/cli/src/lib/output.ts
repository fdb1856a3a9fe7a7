/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import type { AssetDetails } from '@tubemux/core';
import { formatLength, formatPublishDate, formatViews, truncateTitle } from './format.js';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${value}`);
}

export function printBanner(version: string): void {
  const width = 42;
  const line = (text: string): string => `║${text.padStart((width + text.length) / 2).padEnd(width)}║`;

  console.log(chalk.cyan(`╔${'═'.repeat(width)}╗`));
  console.log(chalk.cyan(line('tubemux')));
  console.log(chalk.cyan(line('adaptive stream downloader')));
  console.log(chalk.cyan(line(`v${version}`)));
  console.log(chalk.cyan(`╚${'═'.repeat(width)}╝`));
}

export function printVideoInfo(asset: AssetDetails): void {
  printHeader('Video Information');
  printKeyValue('Title', truncateTitle(asset.title));
  printKeyValue('Channel', asset.author);
  printKeyValue('Duration', formatLength(asset.lengthSeconds));
  printKeyValue('Views', formatViews(asset.viewCount));
  printKeyValue('Published', formatPublishDate(asset.publishDate));
}

export function printResolutions(resolutions: ReadonlyArray<string>): void {
  printHeader('Available Resolutions');
  resolutions.forEach((resolution, index) => {
    console.log(`  ${chalk.cyan(`[${index + 1}]`)} ${resolution}`);
  });
}
