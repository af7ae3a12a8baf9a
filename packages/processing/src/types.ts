/**
 * Processing Types
 */

import type { EncodeOptions, ScalePreset } from './encodeOptions.js';

export interface EncodeOutcome {
  command: string;
  exitCode: number;
  durationMs: number;
  timedOut: boolean;
  stderr: string;
}

/**
 * Anything that can turn one video file into another
 */
export interface VideoEncoder {
  encode(inputPath: string, outputPath: string, options: EncodeOptions): Promise<EncodeOutcome>;
}

/**
 * One traversal, built once from the parsed configuration
 */
export interface TraversalJob {
  readonly inputPath: string;
  readonly outputPath: string;
  readonly minSize: number;       // bytes; files at or below are copied
  readonly recursive: boolean;    // descend instead of deep-copying subdirectories
  readonly options: EncodeOptions;
  readonly verbose: boolean;
  readonly scalePreset?: ScalePreset;  // only used to describe the resize in progress lines
}

export interface EncodeFailure {
  inputPath: string;
  outputPath: string;
  exitCode: number;
  timedOut: boolean;
  command: string;
}

export interface WalkSummary {
  transcoded: string[];
  copied: string[];       // non-video files and videos at or below minSize
  treeCopied: string[];   // subdirectories copied wholesale
  linked: string[];       // dangling symlinks reproduced as links
  skipped: string[];      // sockets, FIFOs and the like
  failures: EncodeFailure[];
  encodeMs: number;       // wall-clock time spent in the encoder
}
