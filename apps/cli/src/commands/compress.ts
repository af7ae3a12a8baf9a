/**
 * Compress Command
 *
 * Walk --data, transcoding videos above --minsize into --out and copying
 * everything else.
 */

import ora from 'ora';
import chalk from 'chalk';
import { elapsedSeconds, formatDuration, logger } from '@vidshrink/utils';
import { createInspector } from '@vidshrink/media';
import { FFmpegEncoder, TreeWalker, type WalkSummary } from '@vidshrink/processing';
import { buildCompressConfig, type CompressConfig } from '../config/index.js';
import {
  printError,
  printHeader,
  printInfo,
  printKeyValue,
  printSuccess,
  printWarning,
} from '../lib/output.js';

export async function compressCommand(options: Record<string, unknown>): Promise<void> {
  const startedAt = Date.now();

  let config: CompressConfig;
  try {
    config = buildCompressConfig(options);
  } catch (error) {
    printError(error instanceof Error ? error.message : 'Invalid configuration');
    process.exit(1);
  }

  const { job } = config;

  if (job.verbose && !logger.isLevelEnabled('info')) {
    logger.level = 'info';
  }

  for (const warning of config.warnings) {
    printWarning(warning);
  }

  const inspector = createInspector(config.probe, config.binaries);
  const encoder = new FFmpegEncoder(config.binaries.ffmpeg, {
    overwrite: config.overwrite,
    timeoutMs: config.encodeTimeoutMs,
  });

  if (!(await inspector.isAvailable())) {
    printError(`${inspector.name} not found (${config.binaries[config.probe]}); install it or set its path in the environment`);
    process.exit(1);
  }
  if (!(await encoder.isAvailable())) {
    printError(`ffmpeg not found (${config.binaries.ffmpeg}); install it or set FFMPEG_PATH`);
    process.exit(1);
  }

  const walker = new TreeWalker({ inspector, encoder });

  // Progress lines come from the walker in verbose mode; a spinner otherwise
  const spinner = job.verbose ? null : ora(`Compressing ${job.inputPath}...`).start();

  try {
    const summary = await walker.process(job);
    spinner?.stop();

    if (job.verbose) {
      printSummary(summary);
    }

    if (summary.failures.length > 0) {
      printWarning(`${summary.failures.length} file(s) failed to encode:`);
      for (const failure of summary.failures) {
        const reason = failure.timedOut ? 'timed out' : `exit code ${failure.exitCode}`;
        console.warn(`  ${failure.inputPath} ${chalk.gray(`(${reason})`)}`);
      }
    }

    printSuccess(`Successfully compressed: ${job.inputPath} into ${job.outputPath}`);
    printInfo(`Program finished in ${elapsedSeconds(startedAt).toFixed(2)} secs.`);
  } catch (error) {
    spinner?.fail('Compression aborted');
    printError(error instanceof Error ? error.message : 'Unknown error');
    logger.debug({ err: error }, 'Traversal aborted');
    process.exit(1);
  }
}

function printSummary(summary: WalkSummary): void {
  printHeader('Summary');
  printKeyValue('Transcoded', summary.transcoded.length);
  printKeyValue('Copied', summary.copied.length);
  printKeyValue('Directories copied', summary.treeCopied.length);
  if (summary.linked.length > 0) {
    printKeyValue('Dangling links copied', summary.linked.length);
  }
  if (summary.skipped.length > 0) {
    printKeyValue('Skipped', summary.skipped.length);
  }
  printKeyValue('Time encoding', formatDuration(summary.encodeMs));
  console.log();
}
