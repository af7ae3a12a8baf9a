import { describe, it, expect } from 'vitest';
import { ValidationError } from '@vidshrink/core';
import { buildCompressConfig } from './index.js';

describe('buildCompressConfig', () => {
  it('fills in defaults from only --data', () => {
    const config = buildCompressConfig({ data: 'videos' }, {});

    expect(config.job).toEqual({
      inputPath: 'videos',
      outputPath: 'videos',
      minSize: 0,
      recursive: false,
      verbose: false,
      options: { codec: 'libx265', quality: '24', filter: undefined },
      scalePreset: undefined,
    });
    expect(config.probe).toBe('mediainfo');
    expect(config.overwrite).toBe(false);
    expect(config.encodeTimeoutMs).toBe(0);
    expect(config.binaries).toEqual({ ffmpeg: 'ffmpeg', ffprobe: 'ffprobe', mediainfo: 'mediainfo' });
    expect(config.warnings).toEqual([]);
    expect(Object.keys(config)).toEqual(['job', 'probe', 'overwrite', 'encodeTimeoutMs', 'binaries', 'warnings']);
  });

  it('takes options as commander hands them over', () => {
    const config = buildCompressConfig(
      {
        data: 'in',
        out: 'out',
        minsize: '1048576',
        recursive: true,
        verbose: true,
        vcodec: 'libx264',
        crf: '28',
        vf: 'scale=1280:-2',
      },
      {}
    );

    expect(config.job).toMatchObject({
      inputPath: 'in',
      outputPath: 'out',
      minSize: 1048576,
      recursive: true,
      verbose: true,
      options: { codec: 'libx264', quality: '28', filter: 'scale=1280:-2' },
    });
  });

  it('lets --scale win over --vf and warns about it', () => {
    const config = buildCompressConfig({ data: 'in', scale: 'quarter', vf: 'scale=1280:-2' }, {});

    expect(config.job.options.filter).toBe('"scale=trunc(iw/8)*2:trunc(ih/8)*2"');
    expect(config.job.scalePreset).toBe('quarter');
    expect(config.warnings).toEqual([
      '--scale quarter overrides --vf scale=1280:-2; the raw filter is ignored',
    ]);
  });

  it('requires --data', () => {
    expect(() => buildCompressConfig({}, {})).toThrow(ValidationError);
    expect(() => buildCompressConfig({}, {})).toThrow(
      'Validation failed for data: input file or directory is required'
    );
  });

  it('rejects an unknown scale preset', () => {
    expect(() => buildCompressConfig({ data: 'in', scale: 'tenth' }, {})).toThrow(
      /^Validation failed for scale:/
    );
  });

  it('rejects a negative or non-numeric minimum size', () => {
    expect(() => buildCompressConfig({ data: 'in', minsize: '-5' }, {})).toThrow(
      /^Validation failed for minsize:/
    );
    expect(() => buildCompressConfig({ data: 'in', minsize: 'big' }, {})).toThrow(
      /^Validation failed for minsize:/
    );
  });

  it('reads the probe backend and encode timeout from the environment', () => {
    const config = buildCompressConfig(
      { data: 'in' },
      { VIDSHRINK_PROBE: 'ffprobe', ENCODE_TIMEOUT_MS: '60000' }
    );

    expect(config.probe).toBe('ffprobe');
    expect(config.encodeTimeoutMs).toBe(60000);
  });

  it('prefers --probe over the environment', () => {
    const config = buildCompressConfig({ data: 'in', probe: 'mediainfo' }, { VIDSHRINK_PROBE: 'ffprobe' });

    expect(config.probe).toBe('mediainfo');
  });

  it('rejects an invalid environment', () => {
    expect(() => buildCompressConfig({ data: 'in' }, { LOG_LEVEL: 'loud' })).toThrow(
      /^Validation failed for LOG_LEVEL:/
    );
  });

  it('freezes the result', () => {
    const config = buildCompressConfig({ data: 'in' }, {});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.job)).toBe(true);
    expect(Object.isFrozen(config.job.options)).toBe(true);
  });
});
