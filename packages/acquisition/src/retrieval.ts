/**
 * Retrieval Pipeline
 *
 * Downloads the selected video and audio representations to their
 * temporary paths: video first, then audio, never concurrently.
 *
 * There is no resumption and no retry. A failed download leaves whatever
 * was already written on disk.
 */

import { dirname } from 'node:path';
import {
  RetrievalFailedError,
  type RetrievalProgress,
  type Selection,
  type StreamDescriptor,
  type StreamKind,
} from '@tubemux/core';
import { ensureDir, createLogger } from '@tubemux/utils';

export interface RetrievalTargets {
  videoPath: string;
  audioPath: string;
}

export interface RetrievalListener {
  onStart?(kind: StreamKind, path: string): void;
  onProgress?(kind: StreamKind, progress: RetrievalProgress): void;
  onComplete?(kind: StreamKind, path: string): void;
}

export interface RetrievalOptions {
  signal?: AbortSignal;
  listener?: RetrievalListener;
}

export class RetrievalPipeline {
  async retrieve(
    selection: Selection,
    targets: RetrievalTargets,
    options: RetrievalOptions = {}
  ): Promise<void> {
    await ensureDir(dirname(targets.videoPath));
    await ensureDir(dirname(targets.audioPath));

    await this.retrieveOne(selection.video, targets.videoPath, options);
    await this.retrieveOne(selection.audio, targets.audioPath, options);
  }

  private async retrieveOne(
    descriptor: StreamDescriptor,
    path: string,
    { signal, listener }: RetrievalOptions
  ): Promise<void> {
    const log = createLogger({ module: 'retrieval', kind: descriptor.kind, itag: descriptor.itag });
    const startTime = Date.now();

    listener?.onStart?.(descriptor.kind, path);
    log.debug({ path }, 'Download started');

    try {
      await descriptor.retrieve(path, {
        signal,
        onProgress: (progress) => listener?.onProgress?.(descriptor.kind, progress),
      });
    } catch (error) {
      log.debug({ error, path }, 'Download failed');
      throw new RetrievalFailedError(descriptor.kind, path, error);
    }

    log.debug({ path, duration: Date.now() - startTime }, 'Download finished');
    listener?.onComplete?.(descriptor.kind, path);
  }
}
