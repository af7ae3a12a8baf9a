/**
 * Media Types
 */

/**
 * What the traversal needs to know about a file
 */
export interface MediaClassification {
  isVideo: boolean;
  // Dimensions of the first video track, when the probe reports them
  width?: number;
  height?: number;
}

/**
 * Read-only media inspection
 */
export interface MediaInspector {
  readonly name: string;
  classify(filePath: string): Promise<MediaClassification>;
  isAvailable(): Promise<boolean>;
}

export const PROBE_BACKENDS = ['mediainfo', 'ffprobe'] as const;

export type ProbeBackend = (typeof PROBE_BACKENDS)[number];
