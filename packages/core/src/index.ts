/**
 * @vidshrink/core
 * 
 * Core package containing:
 * - Error taxonomy
 * - External binary resolution
 */

// Errors
export { 
  VidshrinkError,
  ValidationError,
  FilesystemError,
  ProbeError,
} from './errors/index.js';

// Binary Configuration
export {
  getBinariesConfig,
  resolveBinaryPath,
  type BinaryConfig,
  type BinariesConfig,
} from './config/binaries.js';
