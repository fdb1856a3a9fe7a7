import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { defaultConfigFile, defaultMediaDir, loadConfig, type ConfigSources } from '../src/config/index.js';

describe('defaultMediaDir', () => {
  it('should use Movies on macOS', () => {
    expect(defaultMediaDir('darwin', '/home/tester', '/ignored')).toBe('/home/tester/Movies');
  });

  it('should follow XDG_VIDEOS_DIR on Linux', () => {
    expect(defaultMediaDir('linux', '/home/tester', '$HOME/Clips')).toBe('/home/tester/Clips');
  });

  it('should fall back to Videos', () => {
    expect(defaultMediaDir('linux', '/home/tester')).toBe('/home/tester/Videos');
    expect(defaultMediaDir('win32', '/home/tester', '/ignored')).toBe('/home/tester/Videos');
  });
});

describe('loadConfig', () => {
  let dir: string;
  let sources: ConfigSources;

  const writeConfig = async (content: unknown): Promise<void> => {
    await writeFile(join(dir, 'config.json'), typeof content === 'string' ? content : JSON.stringify(content));
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tubemux-config-'));
    sources = { env: {}, configFile: join(dir, 'config.json'), homeDir: '/home/tester', platform: 'linux' };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should use defaults when there is no config file', () => {
    expect(loadConfig({}, sources)).toEqual({
      outputDir: '/home/tester/Videos',
      ffmpegPath: 'ffmpeg',
      audioCodec: 'aac',
      clearScreen: true,
      debug: false,
      configFile: join(dir, 'config.json'),
    });
  });

  it('should read settings from the config file', async () => {
    await writeConfig({ outputDir: '/from/file', audioCodec: 'libopus', clearScreen: false, ffmpegPath: '/opt/ffmpeg' });

    expect(loadConfig({}, sources)).toMatchObject({
      outputDir: '/from/file',
      audioCodec: 'libopus',
      clearScreen: false,
      ffmpegPath: '/opt/ffmpeg',
    });
  });

  it('should let the environment override the file and flags override both', async () => {
    await writeConfig({ outputDir: '/from/file', clearScreen: true });
    const env = { TUBEMUX_OUTPUT_DIR: '/from/env', TUBEMUX_DEBUG: 'true' };

    expect(loadConfig({}, { ...sources, env })).toMatchObject({ outputDir: '/from/env', debug: true });
    expect(loadConfig({ outputDir: '/from/flag', clear: false }, { ...sources, env })).toMatchObject({
      outputDir: '/from/flag',
      clearScreen: false,
    });
  });

  it('should prefer --ffmpeg, then an existing FFMPEG_PATH, then the file', async () => {
    const envBinary = join(dir, 'ffmpeg-env');
    await writeFile(envBinary, '');
    await writeConfig({ ffmpegPath: '/opt/ffmpeg' });

    expect(loadConfig({ ffmpeg: '/flag/ffmpeg' }, { ...sources, env: { FFMPEG_PATH: envBinary } }).ffmpegPath).toBe(
      '/flag/ffmpeg'
    );
    expect(loadConfig({}, { ...sources, env: { FFMPEG_PATH: envBinary } }).ffmpegPath).toBe(envBinary);
    expect(loadConfig({}, { ...sources, env: { FFMPEG_PATH: join(dir, 'missing') } }).ffmpegPath).toBe(
      '/opt/ffmpeg'
    );
  });

  it('should ignore a config file that is not JSON', async () => {
    await writeConfig('{ not json');
    expect(loadConfig({}, sources).audioCodec).toBe('aac');
  });

  it('should ignore a config file that cannot be read', async () => {
    await mkdir(join(dir, 'config.json'));
    expect(loadConfig({}, sources)).toMatchObject({ outputDir: '/home/tester/Videos', audioCodec: 'aac' });
  });

  it('should treat empty environment variables as unset', () => {
    const env = { TUBEMUX_OUTPUT_DIR: '', XDG_VIDEOS_DIR: '', TUBEMUX_DEBUG: '', FFMPEG_PATH: '' };
    expect(loadConfig({}, { ...sources, env })).toMatchObject({
      outputDir: '/home/tester/Videos',
      debug: false,
      ffmpegPath: 'ffmpeg',
    });
  });

  it('should look for the config file under the home directory', async () => {
    await mkdir(join(dir, '.tubemux'));
    await writeFile(defaultConfigFile(dir), JSON.stringify({ audioCodec: 'libopus' }));

    const config = loadConfig({}, { env: {}, homeDir: dir, platform: 'linux' });

    expect(config.configFile).toBe(join(dir, '.tubemux', 'config.json'));
    expect(config.audioCodec).toBe('libopus');
  });

  it('should reject a config file with invalid values', async () => {
    await writeConfig({ audioCodec: 5 });
    expect(() => loadConfig({}, sources)).toThrow(
      `Invalid config file ${join(dir, 'config.json')}: audioCodec: Expected string, received number`
    );
  });
});
