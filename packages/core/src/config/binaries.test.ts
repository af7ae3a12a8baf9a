import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getBinariesConfig, resolveBinaryPath } from './binaries.js';

describe('resolveBinaryPath', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'vidshrink-bin-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('uses an existing path from the environment', async () => {
    const ffmpeg = join(root, 'ffmpeg');
    await writeFile(ffmpeg, '');

    expect(resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', { FFMPEG_PATH: ffmpeg })).toEqual({
      name: 'ffmpeg',
      envVar: 'FFMPEG_PATH',
      resolvedPath: ffmpeg,
      fromEnv: true,
    });
  });

  it('falls back to the bare name when the configured path is missing', () => {
    const config = resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', { FFMPEG_PATH: join(root, 'absent') });

    expect(config.resolvedPath).toBe('ffmpeg');
    expect(config.fromEnv).toBe(false);
  });

  it('resolves every binary the tool runs', () => {
    const config = getBinariesConfig({});

    expect(config.ffmpeg.resolvedPath).toBe('ffmpeg');
    expect(config.ffprobe.resolvedPath).toBe('ffprobe');
    expect(config.mediainfo.resolvedPath).toBe('mediainfo');
  });
});
