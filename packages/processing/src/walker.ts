/**
 * Tree Walker
 *
 * Depth-first traversal deciding, for each entry, whether to transcode,
 * copy, descend, or deep-copy a whole subtree.
 *
 * - Files: non-video and videos at or below minSize are copied with their
 *   metadata; everything else goes through the encoder.
 * - Directories: descended into when recursive, otherwise copied as-is
 *   (symlinks kept, contents never inspected).
 * - Filesystem errors abort the traversal. Encoder failures do not; they
 *   are collected in the summary.
 */

import { readdir } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import {
  classifyPath,
  copyFilePreserving,
  copySymlink,
  copyTree,
  createLogger,
  ensureDir,
  getFileSizeBytes,
  isDirectory,
  isSamePath,
  moveFile,
  removeFile,
  type Logger,
} from '@vidshrink/utils';
import { FilesystemError, ValidationError, VidshrinkError } from '@vidshrink/core';
import type { MediaClassification, MediaInspector } from '@vidshrink/media';
import { scaledDimensions } from './encodeOptions.js';
import type { TraversalJob, VideoEncoder, WalkSummary } from './types.js';

export interface TreeWalkerDeps {
  inspector: MediaInspector;
  encoder: VideoEncoder;
  logger?: Logger;
}

function emptySummary(): WalkSummary {
  return {
    transcoded: [],
    copied: [],
    treeCopied: [],
    linked: [],
    skipped: [],
    failures: [],
    encodeMs: 0,
  };
}

/**
 * Where an in-place encode writes before replacing the original.
 * The extension is kept so ffmpeg picks the same container.
 */
export function temporarySibling(filePath: string): string {
  const ext = extname(filePath);
  return join(dirname(filePath), `.${basename(filePath, ext)}.vidshrink-tmp${ext}`);
}

export class TreeWalker {
  private inspector: MediaInspector;
  private encoder: VideoEncoder;
  private log: Logger;

  constructor(deps: TreeWalkerDeps) {
    this.inspector = deps.inspector;
    this.encoder = deps.encoder;
    this.log = deps.logger ?? createLogger({ component: 'walker' });
  }

  /**
   * Run one traversal from the job's input path
   */
  async process(job: TraversalJob): Promise<WalkSummary> {
    const summary = emptySummary();
    const { inputPath } = job;
    const kind = await this.fsStep('stat', inputPath, () => classifyPath(inputPath));

    switch (kind) {
      case 'directory':
        await this.processDirectory(inputPath, job.outputPath, job, summary);
        break;
      case 'file': {
        const outputPath = await this.fileOutputPath(inputPath, job.outputPath);
        const parent = dirname(outputPath);
        await this.fsStep('mkdir', parent, () => ensureDir(parent));
        await this.processFile(inputPath, outputPath, job, summary);
        break;
      }
      default:
        throw new ValidationError('data', `${inputPath} is neither a file nor a directory`);
    }

    return summary;
  }

  /**
   * A single input file written into an existing directory keeps its name
   */
  private async fileOutputPath(inputPath: string, outputPath: string): Promise<string> {
    if (isSamePath(inputPath, outputPath)) {
      return outputPath;
    }
    const outputIsDir = await this.fsStep('stat', outputPath, () => isDirectory(outputPath));
    return outputIsDir ? join(outputPath, basename(inputPath)) : outputPath;
  }

  async processFile(
    inputPath: string,
    outputPath: string,
    job: TraversalJob,
    summary: WalkSummary
  ): Promise<void> {
    const media = await this.inspector.classify(inputPath);

    if (!media.isVideo) {
      this.report(job, { inputPath }, `Skipping ${inputPath}: Not a video file`);
      await this.copyFile(inputPath, outputPath);
      summary.copied.push(inputPath);
      return;
    }

    const size = await this.fsStep('stat', inputPath, () => getFileSizeBytes(inputPath));
    if (size <= job.minSize) {
      this.report(
        job,
        { inputPath, size, minSize: job.minSize },
        `Skipping ${inputPath}: Size ${size} not above minsize ${job.minSize}`
      );
      await this.copyFile(inputPath, outputPath);
      summary.copied.push(inputPath);
      return;
    }

    this.report(
      job,
      { inputPath, outputPath, size },
      `Compressing ${inputPath} into ${outputPath}${this.describeResize(media, job)}`
    );
    await this.transcode(inputPath, outputPath, job, summary);
  }

  async processDirectory(
    inputDir: string,
    outputDir: string,
    job: TraversalJob,
    summary: WalkSummary
  ): Promise<void> {
    await this.fsStep('mkdir', outputDir, () => ensureDir(outputDir));

    const names = await this.fsStep('readdir', inputDir, () => readdir(inputDir));
    names.sort();

    for (const name of names) {
      const inputPath = join(inputDir, name);
      const outputPath = join(outputDir, name);

      // An output directory nested in the input tree is never re-read
      if (isSamePath(inputPath, job.outputPath)) {
        this.log.debug({ inputPath }, 'Skipping output directory');
        continue;
      }

      const kind = await this.fsStep('stat', inputPath, () => classifyPath(inputPath));

      switch (kind) {
        case 'file':
          await this.processFile(inputPath, outputPath, job, summary);
          break;

        case 'directory':
          if (job.recursive) {
            await this.processDirectory(inputPath, outputPath, job, summary);
          } else {
            this.report(job, { inputPath }, `Copying directory ${inputPath} into ${outputPath}`);
            if (!isSamePath(inputPath, outputPath)) {
              await this.fsStep('copy', inputPath, () => copyTree(inputPath, outputPath, [job.outputPath]));
            }
            summary.treeCopied.push(inputPath);
          }
          break;

        case 'dangling-link':
          this.report(job, { inputPath }, `Copying dangling link ${inputPath}`);
          if (!isSamePath(inputPath, outputPath)) {
            await this.fsStep('copy', inputPath, () => copySymlink(inputPath, outputPath));
          }
          summary.linked.push(inputPath);
          break;

        case 'other':
          this.log.warn({ inputPath }, `Skipping ${inputPath}: not a regular file or directory`);
          summary.skipped.push(inputPath);
          break;
      }
    }

    this.report(job, { inputDir, outputDir }, `Compressed directory ${inputDir} into ${outputDir}`);
  }

  private async transcode(
    inputPath: string,
    outputPath: string,
    job: TraversalJob,
    summary: WalkSummary
  ): Promise<void> {
    const inPlace = isSamePath(inputPath, outputPath);
    const target = inPlace ? temporarySibling(outputPath) : outputPath;

    const outcome = await this.encoder.encode(inputPath, target, job.options);
    summary.encodeMs += outcome.durationMs;

    if (outcome.exitCode !== 0) {
      if (inPlace) {
        await this.fsStep('remove', target, () => removeFile(target));
      }
      summary.failures.push({
        inputPath,
        outputPath,
        exitCode: outcome.exitCode,
        timedOut: outcome.timedOut,
        command: outcome.command,
      });
      this.log.warn(
        { inputPath, exitCode: outcome.exitCode, timedOut: outcome.timedOut, stderr: outcome.stderr.slice(-500) },
        `Encoder failed on ${inputPath}`
      );
      return;
    }

    if (inPlace) {
      await this.fsStep('rename', target, () => moveFile(target, outputPath));
    }
    summary.transcoded.push(inputPath);
  }

  private async copyFile(inputPath: string, outputPath: string): Promise<void> {
    if (isSamePath(inputPath, outputPath)) {
      this.log.debug({ inputPath }, 'Output is the input, nothing to copy');
      return;
    }
    await this.fsStep('copy', inputPath, () => copyFilePreserving(inputPath, outputPath));
  }

  private describeResize(media: MediaClassification, job: TraversalJob): string {
    if (job.scalePreset === undefined || media.width === undefined || media.height === undefined) {
      return '';
    }
    const scaled = scaledDimensions(media.width, media.height, job.scalePreset);
    return ` (${media.width}x${media.height} -> ${scaled.width}x${scaled.height})`;
  }

  private report(job: TraversalJob, fields: Record<string, unknown>, message: string): void {
    if (job.verbose) {
      this.log.info(fields, message);
    }
  }

  private async fsStep<T>(operation: string, path: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof VidshrinkError) throw error;
      throw new FilesystemError(operation, path, error);
    }
  }
}
