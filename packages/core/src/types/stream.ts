/**
 * Stream Types
 *
 * Descriptors are immutable values owned by a catalog adapter. The pipeline
 * only reads them and calls `retrieve`.
 */

export type StreamKind = 'video' | 'audio';

export interface RetrievalProgress {
  downloadedBytes: number;
  totalBytes?: number;
}

export interface RetrieveOptions {
  signal?: AbortSignal;
  onProgress?: (progress: RetrievalProgress) => void;
}

/**
 * Writes the representation's bytes to `destinationPath`.
 */
export type RetrieveFn = (destinationPath: string, options?: RetrieveOptions) => Promise<void>;

interface BaseStreamDescriptor {
  readonly itag: number;
  /** File extension tag, e.g. `mp4` or `webm` */
  readonly container: string;
  readonly codec?: string;
  readonly retrieve: RetrieveFn;
}

export interface VideoStreamDescriptor extends BaseStreamDescriptor {
  readonly kind: 'video';
  /** Nominal resolution label, e.g. `1080p` or `720p` */
  readonly resolution: string;
}

export interface AudioStreamDescriptor extends BaseStreamDescriptor {
  readonly kind: 'audio';
  /** kbps */
  readonly bitrate: number;
}

export type StreamDescriptor = VideoStreamDescriptor | AudioStreamDescriptor;

export interface Selection {
  video: VideoStreamDescriptor;
  audio: AudioStreamDescriptor;
}

export interface AssetDetails {
  id: string;
  title: string;
  author: string;
  lengthSeconds: number;
  viewCount: number;
  publishDate?: string;
}

export interface CatalogEntry {
  asset: AssetDetails;
  descriptors: ReadonlyArray<StreamDescriptor>;
}

/**
 * Boundary to the media-hosting service.
 */
export interface StreamCatalog {
  resolve(locator: string): Promise<CatalogEntry>;
}
