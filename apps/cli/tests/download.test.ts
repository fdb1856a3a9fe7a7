import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MuxFailedError, RunCancelledError, StreamsUnavailableError } from '@tubemux/core';

const run = vi.hoisted(() => vi.fn());
const prompter = vi.hoisted(() => ({ ask: vi.fn(), close: vi.fn() }));

vi.mock('../src/lib/prompt.js', () => ({
  Prompter: class {
    readonly ask = prompter.ask;
    readonly close = prompter.close;
  },
}));

vi.mock('@tubemux/pipeline', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@tubemux/pipeline')>();
  return {
    ...actual,
    DownloadRunner: class {
      readonly events = new actual.RunEventBus();
      readonly run = run;
    },
  };
});

import { downloadCommand } from '../src/commands/download.js';

const stripColors = (text: string): string => text.replace(/\u001b\[\d+m/g, '');

describe('downloadCommand', () => {
  let home: string;

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), 'tubemux-home-'));
    vi.stubEnv('HOME', home);
    vi.stubEnv('USERPROFILE', home);
    vi.stubEnv('TUBEMUX_OUTPUT_DIR', '');
    vi.stubEnv('TUBEMUX_DEBUG', '');
    vi.stubEnv('XDG_VIDEOS_DIR', '');
    vi.stubEnv('FFMPEG_PATH', '');
    run.mockReset();
    prompter.ask.mockReset();
    prompter.close.mockReset();
    vi.spyOn(process.stderr, 'write').mockReturnValue(true);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await rm(home, { recursive: true, force: true });
  });

  const options = { outputDir: '/videos', clear: false };

  it('should exit 0 and print where the file was saved', async () => {
    run.mockResolvedValue({ outputPath: '/videos/test-clip_720p.mp4' });

    await expect(downloadCommand('https://youtu.be/abc123', options)).resolves.toBe(0);

    expect(run).toHaveBeenCalledWith(
      expect.objectContaining({ locator: 'https://youtu.be/abc123', signal: expect.any(AbortSignal) })
    );
    const lines = vi.mocked(console.log).mock.calls.map((call) => stripColors(call.join(' ')));
    expect(lines).toContain('  Saved to: /videos/test-clip_720p.mp4');
  });

  it('should exit 0 when the run is cancelled', async () => {
    run.mockRejectedValue(new RunCancelledError('RETRIEVING'));

    await expect(downloadCommand('https://youtu.be/abc123', options)).resolves.toBe(0);
    expect(console.warn).toHaveBeenCalledWith(expect.any(String), 'Operation cancelled by user.');
  });

  it('should exit 1 and name the failing stage', async () => {
    run.mockRejectedValue(new StreamsUnavailableError(['audio'], '720p'));

    await expect(downloadCommand('https://youtu.be/abc123', options)).resolves.toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      expect.any(String),
      'Failed while selecting streams: No audio stream available for 720p'
    );
  });

  it('should show the tail of the muxer diagnostics', async () => {
    run.mockRejectedValue(new MuxFailedError('ffmpeg', 1, 'Stream mapping\nConversion failed!\n'));

    await expect(downloadCommand('https://youtu.be/abc123', options)).resolves.toBe(1);
    const printed = vi.mocked(console.error).mock.calls.map((call) => stripColors(call.join(' ')));
    expect(printed).toContain('Stream mapping\nConversion failed!');
  });

  it('should not leave a SIGINT listener behind', async () => {
    run.mockResolvedValue({ outputPath: '/videos/test-clip_720p.mp4' });
    const before = process.listenerCount('SIGINT');

    await downloadCommand('https://youtu.be/abc123', options);

    expect(process.listenerCount('SIGINT')).toBe(before);
  });

  it('should ask for the URL and the resolution through one prompter', async () => {
    prompter.ask.mockResolvedValueOnce('https://youtu.be/abc123').mockResolvedValueOnce('2');
    run.mockImplementation(async ({ promptResolution }: { promptResolution: () => Promise<string> }) => {
      await expect(promptResolution()).resolves.toBe('2');
      return { outputPath: '/videos/test-clip_720p.mp4' };
    });

    await expect(downloadCommand(undefined, options)).resolves.toBe(0);

    expect(run).toHaveBeenCalledWith(expect.objectContaining({ locator: 'https://youtu.be/abc123' }));
    expect(prompter.ask).toHaveBeenCalledTimes(2);
    expect(prompter.close).toHaveBeenCalledTimes(1);
  });

  it('should keep handling SIGINT for the whole run', async () => {
    const before = process.listeners('SIGINT');
    run.mockImplementation(async ({ signal }: { signal: AbortSignal }) => {
      const added = process.listeners('SIGINT').filter((listener) => !before.includes(listener));
      expect(added).toHaveLength(1);

      const [onInterrupt] = added;
      onInterrupt?.('SIGINT');
      onInterrupt?.('SIGINT');

      expect(signal.aborted).toBe(true);
      expect(process.listenerCount('SIGINT')).toBe(before.length + 1);
      throw new RunCancelledError('RETRIEVING');
    });

    await expect(downloadCommand('https://youtu.be/abc123', options)).resolves.toBe(0);
    expect(process.listenerCount('SIGINT')).toBe(before.length);
  });

  it('should use defaults when no config file exists under the home directory', async () => {
    run.mockResolvedValue({ outputPath: join(home, 'Videos', 'test-clip_720p.mp4') });

    await expect(downloadCommand('https://youtu.be/abc123', { clear: false })).resolves.toBe(0);
  });
});
