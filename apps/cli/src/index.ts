#!/usr/bin/env -S npx tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for vidshrink.
 * Parsing only; the traversal lives in @vidshrink/processing.
 */

// Must load before @vidshrink/utils reads LOG_LEVEL
import 'dotenv/config';
import { Command, Option } from 'commander';
import chalk from 'chalk';
import { PROBE_BACKENDS } from '@vidshrink/media';
import { SCALE_PRESETS } from '@vidshrink/processing';
import { compressCommand } from './commands/compress.js';

const program = new Command();

program
  .name('vidshrink')
  .description('Compress the videos in a file or directory tree with ffmpeg')
  .version('0.1.0')
  .option('-d, --data <path>', 'Input file/directory')
  .option('-o, --out <path>', 'Output file/directory (default: same as --data)')
  .option('-m, --minsize <bytes>', 'Minimum size of a video file to compress, in bytes', '0')
  .option('-r, --recursive', 'Recursively process subdirectories instead of copying them')
  .option('-v, --verbose', 'Print progress and skip messages')
  .option('--vcodec <codec>', 'Video codec, passed directly to ffmpeg', 'libx265')
  .option(
    '--crf <value>',
    'Constant Rate Factor; lower values mean higher bitrate and quality (24-30 is reasonable for H.265)',
    '24'
  )
  .addOption(
    new Option('-s, --scale <preset>', 'Down-scaling factor; overrides --vf')
      .choices(SCALE_PRESETS)
  )
  .option('--vf <filter>', 'ffmpeg style video filter, e.g. "scale=1280:-2"')
  .addOption(
    new Option('--probe <backend>', 'Media inspection tool (default: $VIDSHRINK_PROBE or mediainfo)')
      .choices(PROBE_BACKENDS)
  )
  .option('--overwrite', 'Let ffmpeg replace existing output files')
  .action(compressCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  if (err.code === 'commander.invalidArgument') {
    console.log('Run', chalk.cyan('vidshrink --help'), 'for available options');
  }
  process.exit(1);
});

// Parse and execute
await program.parseAsync();
