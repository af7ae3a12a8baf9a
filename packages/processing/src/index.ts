/**
 * @vidshrink/processing
 * 
 * Transcoding policy layer.
 * 
 * - Resolve codec / CRF / scale settings into ffmpeg flags once per run
 * - Walk the input tree, transcoding videos above the size threshold
 * - Copy everything else with its metadata
 */

// Option resolution
export {
  SCALE_PRESETS,
  SCALE_DIVISORS,
  ENCODE_FLAGS,
  scaleFilter,
  scaledDimensions,
  resolveEncodeOptions,
  encodeOptionPairs,
  type ScalePreset,
  type EncodeOptions,
} from './encodeOptions.js';

// FFmpeg wrapper
export { FFmpegEncoder, type FFmpegEncoderSettings } from './ffmpeg.js';

// Traversal
export { TreeWalker, temporarySibling, type TreeWalkerDeps } from './walker.js';

// Types
export type {
  EncodeOutcome,
  VideoEncoder,
  TraversalJob,
  EncodeFailure,
  WalkSummary,
} from './types.js';
