/**
 * Encode Options
 * 
 * Resolves the user-facing codec / quality / scaling settings into the
 * ordered ffmpeg flags applied to every transcoded file.
 */

export const SCALE_PRESETS = ['half', 'third', 'quarter', 'fifth'] as const;

export type ScalePreset = (typeof SCALE_PRESETS)[number];

// Width and height are divided by the divisor, then doubled, so the
// result is half/third/... of the source rounded down to an even number
export const SCALE_DIVISORS: Readonly<Record<ScalePreset, number>> = {
  half: 4,
  third: 6,
  quarter: 8,
  fifth: 10,
};

export interface EncodeOptions {
  readonly codec: string;
  readonly quality: string;
  readonly filter: string | undefined;
}

// Command-line order; some encoders care about it
export const ENCODE_FLAGS = [
  ['codec', '-vcodec'],
  ['quality', '-crf'],
  ['filter', '-vf'],
] as const satisfies ReadonlyArray<readonly [keyof EncodeOptions, string]>;

/**
 * Scale filter for a preset, wrapped in double quotes for the shell
 */
export function scaleFilter(preset: ScalePreset): string {
  const divisor = SCALE_DIVISORS[preset];
  return `"scale=trunc(iw/${divisor})*2:trunc(ih/${divisor})*2"`;
}

/**
 * Output frame size a preset produces for a given source size
 */
export function scaledDimensions(
  width: number,
  height: number,
  preset: ScalePreset
): { width: number; height: number } {
  const divisor = SCALE_DIVISORS[preset];
  return {
    width: Math.floor(width / divisor) * 2,
    height: Math.floor(height / divisor) * 2,
  };
}

/**
 * Build the encode options. A scale preset always replaces the raw filter.
 */
export function resolveEncodeOptions(
  codec: string,
  quality: string,
  scalePreset?: ScalePreset,
  rawFilter?: string
): EncodeOptions {
  return Object.freeze({
    codec,
    quality,
    filter: scalePreset !== undefined ? scaleFilter(scalePreset) : rawFilter,
  });
}

/**
 * Ordered flag/value pairs for the command line.
 * An absent or empty filter is left out rather than emitted as a bare -vf.
 */
export function encodeOptionPairs(options: EncodeOptions): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const [key, flag] of ENCODE_FLAGS) {
    const value = options[key];
    if (value === undefined || value === '') continue;
    pairs.push([flag, value]);
  }
  return pairs;
}
