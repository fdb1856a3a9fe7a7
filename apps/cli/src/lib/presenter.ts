/**
 * Run Presenter
 *
 * Turns runner events into spinners and printed blocks. Holds no state the
 * pipeline depends on.
 */

import ora, { type Ora } from 'ora';
import type { RunEventBus } from '@tubemux/pipeline';
import { formatProgress } from './format.js';
import { printResolutions, printVideoInfo, printWarning } from './output.js';

export class RunPresenter {
  private spinner: Ora | null = null;

  constructor(private readonly events: RunEventBus) {}

  attach(): this {
    this.spin('Fetching video information');

    this.events.on('state', (transition) => {
      switch (transition.to) {
        case 'RESOLVED':
          this.succeed('Video information loaded');
          break;
        case 'MUXING':
          this.spin('Merging video and audio');
          break;
        case 'CLEANING':
          this.succeed('Merged');
          break;
        case 'FAILED':
          this.spinner?.fail();
          this.spinner = null;
          break;
        case 'CANCELLED':
          this.spinner?.stop();
          this.spinner = null;
          break;
        default:
          break;
      }
    });

    this.events.on('asset', (asset) => printVideoInfo(asset));
    this.events.on('resolutions', (resolutions) => printResolutions(resolutions));

    this.events.on('choice:invalid', (error) => {
      printWarning(
        error.reason === 'malformed'
          ? 'Please enter a valid number.'
          : 'Invalid option. Try again.'
      );
    });

    this.events.on('retrieval:start', ({ kind }) => {
      this.spin(`Downloading ${kind}`);
    });

    this.events.on('retrieval:progress', ({ kind, downloadedBytes, totalBytes }) => {
      if (this.spinner) {
        this.spinner.text = `Downloading ${kind} ${formatProgress(downloadedBytes, totalBytes)}`;
      }
    });

    this.events.on('retrieval:complete', ({ kind }) => {
      this.succeed(`Downloaded ${kind}`);
    });

    this.events.on('cleanup:failed', (error) => {
      printWarning(error.message);
    });

    return this;
  }

  private spin(text: string): void {
    this.spinner?.stop();
    // stdin belongs to the prompt's readline interface
    this.spinner = ora({ text, discardStdin: false }).start();
  }

  private succeed(text: string): void {
    this.spinner?.succeed(text);
    this.spinner = null;
  }
}
