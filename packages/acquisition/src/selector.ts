/**
 * Resolution Selector
 *
 * Derives the distinct video qualities of a catalog and resolves a choice
 * to a concrete (video, audio) pair.
 */

import {
  InvalidChoiceError,
  StreamsUnavailableError,
  type AudioStreamDescriptor,
  type Selection,
  type StreamDescriptor,
  type StreamKind,
  type VideoStreamDescriptor,
} from '@tubemux/core';

/** Container every selected representation must have */
export const SELECTABLE_CONTAINER = 'mp4';

export type ChoiceResult =
  | { ok: true; resolution: string; index: number }
  | { ok: false; error: InvalidChoiceError };

/**
 * `1080p60 HDR` → `1080p`. Frame rate and dynamic range are variants of
 * one resolution, not resolutions of their own.
 */
export function nominalResolution(label: string): string {
  const match = /^(\d+)p/.exec(label.trim());
  return match ? `${match[1]}p` : label.trim();
}

/**
 * Pixel height of a label; labels without one rank last
 */
export function resolutionHeight(label: string): number {
  const match = /^(\d+)p/.exec(label.trim());
  return match ? parseInt(match[1] ?? '0', 10) : -1;
}

function isSelectableVideo(descriptor: StreamDescriptor): descriptor is VideoStreamDescriptor {
  return descriptor.kind === 'video' && descriptor.container === SELECTABLE_CONTAINER;
}

function isSelectableAudio(descriptor: StreamDescriptor): descriptor is AudioStreamDescriptor {
  return descriptor.kind === 'audio' && descriptor.container === SELECTABLE_CONTAINER;
}

/**
 * Distinct video resolution labels, best first
 */
export function availableResolutions(descriptors: ReadonlyArray<StreamDescriptor>): string[] {
  const labels = new Set<string>();
  for (const descriptor of descriptors.filter(isSelectableVideo)) {
    labels.add(nominalResolution(descriptor.resolution));
  }

  return [...labels].sort((a, b) => resolutionHeight(b) - resolutionHeight(a));
}

/**
 * Parse a 1-based ordinal typed by the user. Never throws.
 */
export function selectResolution(available: ReadonlyArray<string>, rawInput: string): ChoiceResult {
  const trimmed = rawInput.trim();

  if (!/^[+-]?\d+$/.test(trimmed)) {
    return { ok: false, error: new InvalidChoiceError(rawInput, 'malformed', available.length) };
  }

  const index = parseInt(trimmed, 10) - 1;
  const resolution = available[index];

  if (index < 0 || resolution === undefined) {
    return { ok: false, error: new InvalidChoiceError(rawInput, 'out-of-range', available.length) };
  }

  return { ok: true, resolution, index };
}

/**
 * Pick the first video descriptor with the chosen label and the
 * highest-bitrate audio descriptor, independent of the video choice.
 */
export function resolveDescriptors(
  descriptors: ReadonlyArray<StreamDescriptor>,
  resolution: string
): Selection {
  const video = descriptors
    .filter(isSelectableVideo)
    .find((descriptor) => nominalResolution(descriptor.resolution) === resolution);

  const audio = descriptors
    .filter(isSelectableAudio)
    .reduce<AudioStreamDescriptor | undefined>(
      (best, candidate) => (best === undefined || candidate.bitrate > best.bitrate ? candidate : best),
      undefined
    );

  if (!video || !audio) {
    const missing: StreamKind[] = [];
    if (!video) missing.push('video');
    if (!audio) missing.push('audio');
    throw new StreamsUnavailableError(missing, resolution);
  }

  return { video, audio };
}
