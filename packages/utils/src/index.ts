/**
 * @vidshrink/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Type guards
 * - Time formatting
 * - Logger
 */

// Command execution
export {
  executeCommand,
  executeShellCommand,
  type CommandResult,
  type CommandOptions,
} from './command.js';

// File operations
export {
  ensureDir,
  getFileSizeBytes,
  isDirectory,
  isSamePath,
  copyFilePreserving,
  copySymlink,
  copyTree,
  moveFile,
  removeFile,
  classifyPath,
  type PathKind,
} from './file.js';

// Type guards
export { isErrnoException } from './guards.js';

// Time utilities
export {
  formatDuration,
  elapsedSeconds,
} from './time.js';

// Logger
export { logger, createLogger, type Logger } from './logger.js';
