/**
 * CLI Configuration
 *
 * Validates the parsed command-line options and the environment into one
 * frozen config built once per run.
 */

import { z } from 'zod';
import { getBinariesConfig, ValidationError } from '@vidshrink/core';
import { PROBE_BACKENDS, type ProbeBackend } from '@vidshrink/media';
import {
  SCALE_PRESETS,
  resolveEncodeOptions,
  type TraversalJob,
} from '@vidshrink/processing';

// Environment schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  VIDSHRINK_PROBE: z.enum(PROBE_BACKENDS).default('mediainfo'),
  ENCODE_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
});

// Command-line options as commander hands them over
const optionsSchema = z.object({
  data: z.string({ required_error: 'input file or directory is required' }).min(1),
  out: z.string().min(1).optional(),
  minsize: z.coerce.number().int().min(0).default(0),
  recursive: z.boolean().default(false),
  verbose: z.boolean().default(false),
  vcodec: z.string().min(1).default('libx265'),
  crf: z.string().min(1).default('24'),
  scale: z.enum(SCALE_PRESETS).optional(),
  vf: z.string().optional(),
  probe: z.enum(PROBE_BACKENDS).optional(),
  overwrite: z.boolean().default(false),
});

export interface CompressConfig {
  readonly job: TraversalJob;
  readonly probe: ProbeBackend;
  readonly overwrite: boolean;
  readonly encodeTimeoutMs: number;
  readonly binaries: {
    readonly ffmpeg: string;
    readonly ffprobe: string;
    readonly mediainfo: string;
  };
  // Non-fatal problems with the options, reported before the run
  readonly warnings: readonly string[];
}

function toValidationError(error: z.ZodError, fallbackField: string): ValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : fallbackField;
  return new ValidationError(field, issue?.message ?? 'invalid value');
}

/**
 * Build the run configuration.
 * Throws ValidationError on anything the traversal cannot start with.
 */
export function buildCompressConfig(
  rawOptions: unknown,
  env: NodeJS.ProcessEnv = process.env
): CompressConfig {
  const envResult = envSchema.safeParse(env);
  if (!envResult.success) {
    throw toValidationError(envResult.error, 'environment');
  }

  const optionsResult = optionsSchema.safeParse(rawOptions);
  if (!optionsResult.success) {
    throw toValidationError(optionsResult.error, 'options');
  }

  const options = optionsResult.data;
  const warnings: string[] = [];

  if (options.scale !== undefined && options.vf !== undefined) {
    warnings.push(`--scale ${options.scale} overrides --vf ${options.vf}; the raw filter is ignored`);
  }

  const binaries = getBinariesConfig(env);

  return Object.freeze({
    job: Object.freeze({
      inputPath: options.data,
      outputPath: options.out ?? options.data,
      minSize: options.minsize,
      recursive: options.recursive,
      verbose: options.verbose,
      options: resolveEncodeOptions(options.vcodec, options.crf, options.scale, options.vf),
      scalePreset: options.scale,
    }),
    probe: options.probe ?? envResult.data.VIDSHRINK_PROBE,
    overwrite: options.overwrite,
    encodeTimeoutMs: envResult.data.ENCODE_TIMEOUT_MS,
    binaries: Object.freeze({
      ffmpeg: binaries.ffmpeg.resolvedPath,
      ffprobe: binaries.ffprobe.resolvedPath,
      mediainfo: binaries.mediainfo.resolvedPath,
    }),
    warnings: Object.freeze(warnings),
  });
}
