import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CleanupFailedError, TubemuxError } from '@tubemux/core';
import { pathExists } from '@tubemux/utils';
import { ArtifactLifecycle, outputFileName, temporaryFileName } from '../src/lifecycle.js';

describe('file names', () => {
  it('should name temporaries after the asset and stream kind', () => {
    expect(temporaryFileName('abc123', 'video', 'mp4')).toBe('abc123_video.mp4');
    expect(temporaryFileName('abc123', 'audio', 'mp4')).toBe('abc123_audio.mp4');
  });

  it('should name the output after the normalized title and resolution', () => {
    expect(outputFileName('My Vidéo: Part 1!', '1080p60 HDR')).toBe('my-video-part-1_1080p60-HDR.mp4');
  });

  it('should give non-Latin titles their own output name', () => {
    expect(outputFileName('Привет мир', '720p')).toBe('privet-mir_720p.mp4');
    expect(outputFileName('東京', '720p')).toBe('dong-jing_720p.mp4');
  });

  it('should fall back when title and resolution are empty after cleaning', () => {
    expect(outputFileName('???', '')).toBe('untitled_unknown.mp4');
  });
});

describe('ArtifactLifecycle', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tubemux-lifecycle-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const plan = (destinationDir: string) => ({
    destinationDir,
    assetId: 'abc123',
    title: 'Test Clip',
    resolution: '720p',
    videoContainer: 'mp4',
    audioContainer: 'mp4',
  });

  it('should place every artifact in the destination directory', () => {
    const lifecycle = new ArtifactLifecycle(plan(dir));
    expect(lifecycle.paths).toEqual({
      videoPath: join(dir, 'abc123_video.mp4'),
      audioPath: join(dir, 'abc123_audio.mp4'),
      outputPath: join(dir, 'test-clip_720p.mp4'),
    });
  });

  it('should refuse an output path that collides with a temporary', () => {
    expect(
      () => new ArtifactLifecycle({ ...plan(dir), assetId: 'clip', title: 'Clip', resolution: 'video' })
    ).toThrow(TubemuxError);
  });

  it('should remove both temporaries and tolerate missing ones', async () => {
    const lifecycle = new ArtifactLifecycle(plan(dir));
    await writeFile(lifecycle.paths.videoPath, 'video');

    const failures = await lifecycle.cleanup();

    expect(failures).toEqual([]);
    expect(await pathExists(lifecycle.paths.videoPath)).toBe(false);
    expect(await pathExists(lifecycle.paths.audioPath)).toBe(false);
  });

  it('should return removal failures instead of throwing', async () => {
    const lifecycle = new ArtifactLifecycle(plan(dir));
    await mkdir(lifecycle.paths.videoPath);
    await writeFile(lifecycle.paths.audioPath, 'audio');

    const failures = await lifecycle.cleanup();

    expect(failures).toHaveLength(1);
    expect(failures[0]).toBeInstanceOf(CleanupFailedError);
    expect(failures[0]?.details).toEqual({ path: lifecycle.paths.videoPath });
    expect(await pathExists(lifecycle.paths.audioPath)).toBe(false);
  });
});
