import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { chmod, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { executeCommand, executeShellCommand } from '@vidshrink/utils';
import { FFmpegEncoder } from './ffmpeg.js';
import { resolveEncodeOptions } from './encodeOptions.js';

vi.mock('@vidshrink/utils', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@vidshrink/utils')>();
  return { ...actual, executeCommand: vi.fn(), executeShellCommand: vi.fn() };
});

const shell = vi.mocked(executeShellCommand);
const run = vi.mocked(executeCommand);

describe('FFmpegEncoder', () => {
  beforeEach(() => {
    shell.mockReset();
    run.mockReset();
  });

  it('builds the command line with quoted paths and ordered flags', () => {
    const encoder = new FFmpegEncoder();
    const options = resolveEncodeOptions('libx265', '24', 'quarter');

    expect(encoder.buildCommandLine('/in/holiday clip.mp4', '/out/holiday clip.mp4', options)).toBe(
      'ffmpeg -i "/in/holiday clip.mp4" -vcodec libx265 -crf 24 ' +
        '-vf "scale=trunc(iw/8)*2:trunc(ih/8)*2" "/out/holiday clip.mp4"'
    );
  });

  it('passes a raw filter through untouched', () => {
    const encoder = new FFmpegEncoder();
    const options = resolveEncodeOptions('libx264', '28', undefined, "'scale=1280:-2'");

    expect(encoder.buildCommandLine('a.mkv', 'b.mkv', options)).toBe(
      `ffmpeg -i "a.mkv" -vcodec libx264 -crf 28 -vf 'scale=1280:-2' "b.mkv"`
    );
  });

  it('adds -y when overwriting and quotes a binary path with spaces', () => {
    const encoder = new FFmpegEncoder('/opt/media tools/ffmpeg', { overwrite: true });
    const options = resolveEncodeOptions('libx265', '24');

    expect(encoder.buildCommandLine('a.mp4', 'b.mp4', options)).toBe(
      '"/opt/media tools/ffmpeg" -y -i "a.mp4" -vcodec libx265 -crf 24 "b.mp4"'
    );
  });

  it('escapes shell expansions in file names', () => {
    const encoder = new FFmpegEncoder();
    const options = resolveEncodeOptions('libx265', '24');

    expect(encoder.buildCommandLine('Price $5 `x`.mp4', 'say "hi" \\ now.mp4', options)).toBe(
      'ffmpeg -i "Price \\$5 \\`x\\`.mp4" -vcodec libx265 -crf 24 "say \\"hi\\" \\\\ now.mp4"'
    );
  });

  describe.skipIf(process.platform === 'win32')('through the shell', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'vidshrink-ffmpeg-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('hands file names with shell metacharacters over unchanged', async () => {
      const { executeShellCommand: runShell } =
        await vi.importActual<typeof import('@vidshrink/utils')>('@vidshrink/utils');
      const printArgs = join(dir, 'print-args');
      await writeFile(printArgs, '#!/bin/sh\nfor arg in "$@"; do printf \'%s\\n\' "$arg"; done\n');
      await chmod(printArgs, 0o755);

      const input = 'Price $HOME `echo hacked`.mp4';
      const output = 'say "hi" \\ $(echo now).mp4';
      const line = new FFmpegEncoder(printArgs).buildCommandLine(input, output, resolveEncodeOptions('libx265', '24'));

      const result = await runShell(line, { timeout: 5000 });

      expect(result.exitCode).toBe(0);
      expect(result.stdout.split('\n').slice(0, -1)).toEqual([
        '-i', input, '-vcodec', 'libx265', '-crf', '24', output,
      ]);
    });
  });

  it('reports a non-zero exit instead of throwing', async () => {
    shell.mockResolvedValue({
      exitCode: 1,
      stdout: '',
      stderr: 'Unknown encoder',
      duration: 42,
      timedOut: false,
    });
    const encoder = new FFmpegEncoder();
    const options = resolveEncodeOptions('nope', '24');

    const outcome = await encoder.encode('a.mp4', 'b.mp4', options);

    expect(outcome).toEqual({
      command: 'ffmpeg -i "a.mp4" -vcodec nope -crf 24 "b.mp4"',
      exitCode: 1,
      durationMs: 42,
      timedOut: false,
      stderr: 'Unknown encoder',
    });
    expect(shell).toHaveBeenCalledWith(outcome.command, { timeout: 0 });
  });

  it('hands the configured timeout to the shell', async () => {
    shell.mockResolvedValue({ exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false });
    const encoder = new FFmpegEncoder('ffmpeg', { timeoutMs: 5000 });

    await encoder.encode('a.mp4', 'b.mp4', resolveEncodeOptions('libx265', '24'));

    expect(shell).toHaveBeenCalledWith(expect.any(String), { timeout: 5000 });
  });

  it('checks availability with ffmpeg -version', async () => {
    run.mockResolvedValue({ exitCode: 0, stdout: 'ffmpeg version 6.1', stderr: '', duration: 1, timedOut: false });

    expect(await new FFmpegEncoder('/usr/bin/ffmpeg').isAvailable()).toBe(true);
    expect(run).toHaveBeenCalledWith('/usr/bin/ffmpeg', ['-version'], { timeout: 5000 });
  });

  it('is unavailable when the binary cannot be spawned', async () => {
    run.mockRejectedValue(new Error('spawn ffmpeg ENOENT'));

    expect(await new FFmpegEncoder().isAvailable()).toBe(false);
  });
});
