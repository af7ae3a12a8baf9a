/**
 * File Operations
 *
 * Metadata-preserving copy primitives and small stat helpers.
 */

import {
  mkdir,
  stat,
  lstat,
  rename,
  readdir,
  readlink,
  symlink,
  rm,
  chmod,
  utimes,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { isErrnoException } from './guards.js';

/**
 * Ensure a directory exists, creating it and any missing parents.
 * An existing directory is fine; anything else in the way rejects.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Get file size in bytes
 */
export async function getFileSizeBytes(filePath: string): Promise<number> {
  const stats = await stat(filePath);
  return stats.size;
}

/**
 * Check whether a path exists and is a directory (symlinks followed)
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * Two paths name the same location once resolved
 */
export function isSamePath(a: string, b: string): boolean {
  return resolve(a) === resolve(b);
}

/**
 * Copy permission bits and access/modification times
 */
async function copyStats(source: string, destination: string): Promise<void> {
  const stats = await stat(source);
  await chmod(destination, stats.mode & 0o7777);
  await utimes(destination, stats.atime, stats.mtime);
}

/**
 * Copy a file's bytes, then its permission bits and timestamps
 */
export async function copyFilePreserving(
  source: string,
  destination: string
): Promise<void> {
  await fsCopyFile(source, destination);
  await copyStats(source, destination);
}

/**
 * Recreate a symlink at a new location with the same (possibly dangling) target
 */
export async function copySymlink(
  source: string,
  destination: string
): Promise<void> {
  const target = await readlink(source);
  await rm(destination, { force: true });
  await symlink(target, destination);
}

/**
 * Deep-copy a directory tree.
 *
 * Symlinks are recreated as symlinks, never followed, so dangling links
 * survive. Directory permissions and timestamps are copied after their
 * contents. Sockets and FIFOs are not copied. The destination and any
 * `exclude` path met inside the source are left out.
 */
export async function copyTree(
  source: string,
  destination: string,
  exclude: readonly string[] = []
): Promise<void> {
  const skip = [destination, ...exclude].map((path) => resolve(path));
  await copyTreeEntries(source, destination, skip);
}

async function copyTreeEntries(
  source: string,
  destination: string,
  skip: readonly string[]
): Promise<void> {
  const entries = await readdir(source, { withFileTypes: true });
  await ensureDir(destination);

  for (const entry of entries) {
    const from = join(source, entry.name);
    const to = join(destination, entry.name);

    if (skip.includes(resolve(from))) {
      continue;
    }

    if (entry.isSymbolicLink()) {
      await copySymlink(from, to);
    } else if (entry.isDirectory()) {
      await copyTreeEntries(from, to, skip);
    } else if (entry.isFile()) {
      await copyFilePreserving(from, to);
    }
  }

  await copyStats(source, destination);
}

/**
 * Move a file, replacing whatever is at the destination
 */
export async function moveFile(
  source: string,
  destination: string
): Promise<void> {
  await rename(source, destination);
}

/**
 * Remove a file if it exists
 */
export async function removeFile(filePath: string): Promise<void> {
  await rm(filePath, { force: true });
}

export type PathKind = 'file' | 'directory' | 'dangling-link' | 'other';

/**
 * Classify a path, following symlinks.
 * A symlink whose target is missing is reported as 'dangling-link'.
 */
export async function classifyPath(path: string): Promise<PathKind> {
  try {
    const stats = await stat(path);
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'other';
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      const linkStats = await lstat(path);
      if (linkStats.isSymbolicLink()) return 'dangling-link';
    }
    throw error;
  }
}
