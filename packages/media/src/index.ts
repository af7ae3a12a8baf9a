/**
 * @vidshrink/media
 * 
 * Media inspection layer.
 * 
 * Responsibilities:
 * - Probe files with mediainfo or ffprobe
 * - Classify a file as video or not, with its frame size when known
 */

// Probing
export { FFProbe, type FFProbeResult, type FFProbeStream } from './probes/ffprobe.js';
export { MediaInfoProbe, type MediaInfoResult, type MediaInfoTrack } from './probes/mediainfo.js';

// Backend selection
export { createInspector, type InspectorPaths } from './inspector.js';

// Types
export {
  PROBE_BACKENDS,
  type ProbeBackend,
  type MediaClassification,
  type MediaInspector,
} from './types.js';
