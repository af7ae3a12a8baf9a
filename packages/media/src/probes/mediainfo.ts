/**
 * MediaInfo Wrapper
 * 
 * Safe wrapper for mediainfo command execution.
 * A file is a video when any of its tracks is of type Video.
 */

import { executeCommand } from '@vidshrink/utils';
import { ProbeError } from '@vidshrink/core';
import type { MediaClassification, MediaInspector } from '../types.js';

export interface MediaInfoTrack {
  '@type': 'General' | 'Video' | 'Audio' | 'Text' | 'Image' | 'Menu' | 'Other';
  // General
  Format?: string;
  FileSize?: string;
  Duration?: string;
  // Video
  Width?: string;
  Height?: string;
  FrameRate?: string;
}

export interface MediaInfoResult {
  // mediainfo emits null for files it cannot parse at all (e.g. empty files)
  media?: {
    '@ref': string;
    track?: MediaInfoTrack[];
  } | null;
}

function parseDimension(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = parseInt(value, 10);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export class MediaInfoProbe implements MediaInspector {
  readonly name = 'mediainfo';
  private mediainfoPath: string;

  constructor(mediainfoPath: string = 'mediainfo') {
    this.mediainfoPath = mediainfoPath;
  }

  /**
   * Probe a media file with mediainfo
   */
  async probe(filePath: string): Promise<MediaInfoResult> {
    const args = [
      '--Output=JSON',
      filePath,
    ];

    const result = await executeCommand(this.mediainfoPath, args, {
      timeout: 60000,
    });

    if (result.exitCode !== 0) {
      throw new ProbeError(this.name, filePath, `exit code ${result.exitCode}: ${result.stderr.trim()}`);
    }

    try {
      return JSON.parse(result.stdout) as MediaInfoResult;
    } catch {
      throw new ProbeError(this.name, filePath, `unparsable output: ${result.stdout.substring(0, 200)}`);
    }
  }

  async classify(filePath: string): Promise<MediaClassification> {
    const result = await this.probe(filePath);
    const tracks = result.media?.track ?? [];
    const video = tracks.find((track) => track['@type'] === 'Video');

    if (!video) {
      return { isVideo: false };
    }

    return {
      isVideo: true,
      width: parseDimension(video.Width),
      height: parseDimension(video.Height),
    };
  }

  /**
   * Check if mediainfo is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await executeCommand(this.mediainfoPath, ['--version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
