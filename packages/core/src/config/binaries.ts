/**
 * Binary Configuration
 * 
 * Centralized configuration for external binary paths.
 * 
 * Priority order:
 * 1. Environment variables (e.g., FFMPEG_PATH)
 * 2. System PATH
 */

import { existsSync } from 'node:fs';

/**
 * Binary configuration interface
 */
export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string;
  fromEnv: boolean;
}

/**
 * All supported binaries
 */
export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
  mediainfo: BinaryConfig;
}

/**
 * Resolve a binary path: an existing file named by the environment
 * variable, otherwise the bare name for PATH lookup
 */
export function resolveBinaryPath(
  name: string,
  envVar: string,
  env: NodeJS.ProcessEnv = process.env
): BinaryConfig {
  const envPath = env[envVar];
  if (envPath && existsSync(envPath)) {
    return {
      name,
      envVar,
      resolvedPath: envPath,
      fromEnv: true,
    };
  }

  // Let it fail at spawn time if the name is not on PATH
  return {
    name,
    envVar,
    resolvedPath: name,
    fromEnv: false,
  };
}

/**
 * Get all binary configurations
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    ffmpeg: resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', env),
    ffprobe: resolveBinaryPath('ffprobe', 'FFPROBE_PATH', env),
    mediainfo: resolveBinaryPath('mediainfo', 'MEDIAINFO_PATH', env),
  };
}
