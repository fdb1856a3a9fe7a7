/**
 * Stream Catalog
 *
 * Adapter over @distube/ytdl-core. Resolves a locator into asset details
 * and the adaptive (single-kind) representations of that asset.
 */

import { createWriteStream } from 'node:fs';
import { pipeline } from 'node:stream/promises';
import ytdl from '@distube/ytdl-core';
import {
  AssetUnavailableError,
  type AssetDetails,
  type CatalogEntry,
  type RetrieveOptions,
  type StreamCatalog,
  type StreamDescriptor,
} from '@tubemux/core';
import { createLogger } from '@tubemux/utils';
import { nominalResolution } from './selector.js';

export class YoutubeCatalog implements StreamCatalog {
  /**
   * Fetch the asset once. No retry: a failed lookup ends the run.
   */
  async resolve(locator: string): Promise<CatalogEntry> {
    const log = createLogger({ module: 'catalog' });
    const trimmed = locator.trim();

    let info: ytdl.videoInfo;
    try {
      const videoId = ytdl.getVideoID(trimmed);
      log.debug({ videoId }, 'Fetching video info');
      info = await ytdl.getInfo(videoId);
    } catch (error) {
      log.debug({ error, locator: trimmed }, 'Video info lookup failed');
      throw new AssetUnavailableError(trimmed, error);
    }

    const descriptors = info.formats
      .map((format) => toDescriptor(info, format))
      .filter((descriptor): descriptor is StreamDescriptor => descriptor !== null);

    log.debug(
      { videoId: info.videoDetails.videoId, formats: info.formats.length, adaptive: descriptors.length },
      'Video info resolved'
    );

    return {
      asset: toAssetDetails(info),
      descriptors,
    };
  }
}

function toAssetDetails(info: ytdl.videoInfo): AssetDetails {
  const details = info.videoDetails;
  return {
    id: details.videoId,
    title: details.title,
    author: details.author.name,
    lengthSeconds: parseInt(details.lengthSeconds, 10) || 0,
    viewCount: parseInt(details.viewCount, 10) || 0,
    publishDate: details.publishDate || undefined,
  };
}

/**
 * Map one ytdl format to a descriptor; muxed and manifest-based formats
 * are not adaptive representations and are dropped.
 */
export function toDescriptor(info: ytdl.videoInfo, format: ytdl.videoFormat): StreamDescriptor | null {
  if (format.isLive || format.isHLS || format.isDashMPD) {
    return null;
  }

  const retrieve = (destinationPath: string, options?: RetrieveOptions): Promise<void> =>
    downloadFormat(info, format, destinationPath, options);

  const resolution = format.height ? `${format.height}p` : format.qualityLabel;
  if (format.hasVideo && !format.hasAudio && resolution) {
    return {
      kind: 'video',
      itag: format.itag,
      resolution: nominalResolution(resolution),
      container: format.container,
      codec: format.videoCodec,
      retrieve,
    };
  }

  if (format.hasAudio && !format.hasVideo) {
    return {
      kind: 'audio',
      itag: format.itag,
      bitrate: format.audioBitrate ?? Math.round((format.bitrate ?? 0) / 1000),
      container: format.container,
      codec: format.audioCodec,
      retrieve,
    };
  }

  return null;
}

async function downloadFormat(
  info: ytdl.videoInfo,
  format: ytdl.videoFormat,
  destinationPath: string,
  options: RetrieveOptions = {}
): Promise<void> {
  const source = ytdl.downloadFromInfo(info, { format });

  if (options.onProgress) {
    const onProgress = options.onProgress;
    source.on('progress', (_chunkLength: number, downloaded: number, total: number) => {
      onProgress({ downloadedBytes: downloaded, totalBytes: total > 0 ? total : undefined });
    });
  }

  await pipeline(source, createWriteStream(destinationPath), { signal: options.signal });
}
