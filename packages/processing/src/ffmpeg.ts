/**
 * FFmpeg Wrapper
 * 
 * Runs one ffmpeg process per transcoded file through the shell:
 *   ffmpeg -i "<input>" -vcodec <codec> -crf <crf> -vf <filter> "<output>"
 * Flag values go through verbatim, so quoting embedded in them is honoured.
 * Paths are double-quoted with the characters the shell still expands
 * inside double quotes escaped.
 */

import { executeCommand, executeShellCommand, createLogger } from '@vidshrink/utils';
import { encodeOptionPairs, type EncodeOptions } from './encodeOptions.js';
import type { EncodeOutcome, VideoEncoder } from './types.js';

export interface FFmpegEncoderSettings {
  overwrite?: boolean;  // pass -y so existing outputs are replaced
  timeoutMs?: number;   // 0 or unset: wait as long as the encode takes
}

const log = createLogger({ component: 'ffmpeg' });

function quotePath(path: string): string {
  // cmd does not expand $ or ` and Windows names cannot hold "
  if (process.platform === 'win32') {
    return `"${path}"`;
  }
  return `"${path.replace(/[\\"$`]/g, '\\$&')}"`;
}

function quoteIfNeeded(path: string): string {
  return /[\s\\"$`'&|;<>()*?]/.test(path) ? quotePath(path) : path;
}

export class FFmpegEncoder implements VideoEncoder {
  private ffmpegPath: string;
  private settings: FFmpegEncoderSettings;

  constructor(ffmpegPath: string = 'ffmpeg', settings: FFmpegEncoderSettings = {}) {
    this.ffmpegPath = ffmpegPath;
    this.settings = settings;
  }

  /**
   * Build the full shell command line for one file
   */
  buildCommandLine(inputPath: string, outputPath: string, options: EncodeOptions): string {
    const parts: string[] = [quoteIfNeeded(this.ffmpegPath)];

    if (this.settings.overwrite) {
      parts.push('-y');
    }

    parts.push('-i', quotePath(inputPath));

    for (const [flag, value] of encodeOptionPairs(options)) {
      parts.push(flag, value);
    }

    parts.push(quotePath(outputPath));

    return parts.join(' ');
  }

  /**
   * Encode one file and report how the process exited.
   * A non-zero exit is reported, not thrown; a spawn failure rejects.
   */
  async encode(inputPath: string, outputPath: string, options: EncodeOptions): Promise<EncodeOutcome> {
    const command = this.buildCommandLine(inputPath, outputPath, options);
    log.debug({ command }, 'Running ffmpeg');

    const result = await executeShellCommand(command, {
      timeout: this.settings.timeoutMs ?? 0,
    });

    return {
      command,
      exitCode: result.exitCode,
      durationMs: result.duration,
      timedOut: result.timedOut,
      stderr: result.stderr,
    };
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffmpegPath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
