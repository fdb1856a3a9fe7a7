import type {
  AudioStreamDescriptor,
  RetrieveFn,
  VideoStreamDescriptor,
} from '@tubemux/core';

const noop: RetrieveFn = async () => undefined;

export function videoStream(
  itag: number,
  resolution: string,
  container = 'mp4',
  retrieve: RetrieveFn = noop
): VideoStreamDescriptor {
  return { kind: 'video', itag, resolution, container, retrieve };
}

export function audioStream(
  itag: number,
  bitrate: number,
  container = 'mp4',
  retrieve: RetrieveFn = noop
): AudioStreamDescriptor {
  return { kind: 'audio', itag, bitrate, container, retrieve };
}
