/**
 * Artifact Lifecycle
 *
 * Owns the two temporary download paths and the output path of a run.
 * Temporaries are removed only after a successful mux; after any failure
 * they stay on disk for inspection.
 */

import { join } from 'node:path';
import { CleanupFailedError, TubemuxError, type StreamKind } from '@tubemux/core';
import { removeFile, sanitizeFilename, slugify, createLogger } from '@tubemux/utils';

export const OUTPUT_CONTAINER = 'mp4';

export interface ArtifactPlan {
  destinationDir: string;
  assetId: string;
  title: string;
  resolution: string;
  videoContainer: string;
  audioContainer: string;
}

export interface ArtifactPaths {
  videoPath: string;
  audioPath: string;
  outputPath: string;
}

/**
 * `{assetId}_{kind}.{ext}`
 */
export function temporaryFileName(assetId: string, kind: StreamKind, container: string): string {
  return `${sanitizeFilename(assetId)}_${kind}.${sanitizeFilename(container)}`;
}

/**
 * `{normalizedTitle}_{resolution}.mp4`; only [A-Za-z0-9._-] survive
 */
export function outputFileName(title: string, resolution: string): string {
  return `${slugify(title)}_${sanitizeFilename(resolution) || 'unknown'}.${OUTPUT_CONTAINER}`;
}

export class ArtifactLifecycle {
  readonly paths: ArtifactPaths;

  constructor(plan: ArtifactPlan) {
    this.paths = {
      videoPath: join(plan.destinationDir, temporaryFileName(plan.assetId, 'video', plan.videoContainer)),
      audioPath: join(plan.destinationDir, temporaryFileName(plan.assetId, 'audio', plan.audioContainer)),
      outputPath: join(plan.destinationDir, outputFileName(plan.title, plan.resolution)),
    };

    const { videoPath, audioPath, outputPath } = this.paths;
    if (outputPath === videoPath || outputPath === audioPath) {
      throw new TubemuxError(
        `Output path collides with a temporary file: ${outputPath}`,
        'ARTIFACT_COLLISION',
        'run',
        { ...this.paths }
      );
    }
  }

  get temporaryPaths(): string[] {
    return [this.paths.videoPath, this.paths.audioPath];
  }

  /**
   * Remove both temporaries. Failures are returned, never thrown: the
   * output already exists at this point.
   */
  async cleanup(): Promise<CleanupFailedError[]> {
    const log = createLogger({ module: 'lifecycle' });
    const failures: CleanupFailedError[] = [];

    for (const path of this.temporaryPaths) {
      try {
        await removeFile(path);
        log.debug({ path }, 'Removed temporary file');
      } catch (error) {
        log.debug({ error, path }, 'Could not remove temporary file');
        failures.push(new CleanupFailedError(path, error));
      }
    }

    return failures;
  }
}
