import { FFProbe } from './probes/ffprobe.js';
import { MediaInfoProbe } from './probes/mediainfo.js';
import type { MediaInspector, ProbeBackend } from './types.js';

export interface InspectorPaths {
  mediainfo: string;
  ffprobe: string;
}

/**
 * Pick the inspection backend
 */
export function createInspector(backend: ProbeBackend, paths: InspectorPaths): MediaInspector {
  switch (backend) {
    case 'ffprobe':
      return new FFProbe(paths.ffprobe);
    case 'mediainfo':
      return new MediaInfoProbe(paths.mediainfo);
  }
}
