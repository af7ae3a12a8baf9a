/**
 * FFProbe Wrapper
 * 
 * Safe wrapper for ffprobe command execution.
 * Cover art (attached_pic streams) does not make a file a video, and
 * neither do the single-frame streams ffprobe reports for still images
 * and text files.
 */

import { executeCommand, logger } from '@vidshrink/utils';
import { ProbeError } from '@vidshrink/core';
import type { MediaClassification, MediaInspector } from '../types.js';

export interface FFProbeStream {
  index: number;
  codec_name?: string;
  codec_type: 'video' | 'audio' | 'subtitle' | 'data' | 'attachment';
  width?: number;
  height?: number;
  disposition?: Record<string, number>;
}

export interface FFProbeResult {
  format?: {
    filename: string;
    format_name: string;
    size?: string;
  };
  streams?: FFProbeStream[];
}

// Demuxers that read a picture (or a text page) as a "video" stream
const STILL_IMAGE_FORMATS = new Set(['image2', 'tty', 'webp', 'apng']);

// Picture codecs; animated GIF/PNG/WebP count as images, as mediainfo reports them
const STILL_IMAGE_CODECS = new Set([
  'png', 'bmp', 'tiff', 'webp', 'gif', 'jpeg2000', 'jpegls', 'ansi', 'pam', 'ppm', 'pgm', 'pbm', 'qoi',
]);

function isStillImageFormat(formatName: string | undefined): boolean {
  // format_name may list aliases, e.g. "image2,jpeg_pipe"
  return (formatName ?? '')
    .split(',')
    .some((name) => STILL_IMAGE_FORMATS.has(name) || name.endsWith('_pipe'));
}

function isMotionVideo(stream: FFProbeStream): boolean {
  return (
    stream.codec_type === 'video' &&
    stream.disposition?.['attached_pic'] !== 1 &&
    !STILL_IMAGE_CODECS.has(stream.codec_name ?? '')
  );
}

export class FFProbe implements MediaInspector {
  readonly name = 'ffprobe';
  private ffprobePath: string;

  constructor(ffprobePath: string = 'ffprobe') {
    this.ffprobePath = ffprobePath;
  }

  /**
   * Probe a media file; null when ffprobe does not recognise it as media
   */
  async probe(filePath: string): Promise<FFProbeResult | null> {
    const args = [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ];

    const result = await executeCommand(this.ffprobePath, args, {
      timeout: 60000, // 1 minute timeout
    });

    if (result.exitCode !== 0) {
      logger.debug({ filePath, stderr: result.stderr.trim() }, 'ffprobe rejected file');
      return null;
    }

    try {
      return JSON.parse(result.stdout) as FFProbeResult;
    } catch {
      throw new ProbeError(this.name, filePath, `unparsable output: ${result.stdout.substring(0, 200)}`);
    }
  }

  async classify(filePath: string): Promise<MediaClassification> {
    const result = await this.probe(filePath);
    if (!result || isStillImageFormat(result.format?.format_name)) {
      return { isVideo: false };
    }

    const video = (result.streams ?? []).find(isMotionVideo);
    if (!video) {
      return { isVideo: false };
    }

    return {
      isVideo: true,
      width: video.width,
      height: video.height,
    };
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
