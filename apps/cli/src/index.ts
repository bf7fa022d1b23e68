#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Command-line front end for the transcode-kit engine. The engine packages
 * do the work; this layer parses options and renders run events.
 */

// Must stay first: sets up the environment the shared logger reads
import './config/index.js';

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';

import { convertCommand } from './commands/convert.js';
import { encodersCommand } from './commands/encoders.js';
import { presetsCommand } from './commands/presets.js';
import { probeCommand } from './commands/probe.js';
import { printError } from './lib/output.js';

const program = new Command();

program
  .name('transcode-kit')
  .description('Batch media conversion on top of ffmpeg')
  .version('1.0.0')
  .option('--debug', 'Enable debug logging');

// ============================================
// CONVERSION
// ============================================

program
  .command('convert <inputs...>')
  .description('Convert files, or every supported file in the given folders')
  .option('-o, --output <dir>', 'Output folder (default: TRANSCODE_KIT_OUTPUT_DIR or ~/Videos/converted)')
  .option('--preset <name>', 'Start from a saved or built-in preset')
  .option('--save-preset <name>', 'Save the resulting settings as a preset')
  .option('-f, --format <ext>', 'Video output: mp4, mkv, webm, mov, avi, gif')
  .option('--image-format <ext>', 'Image output: jpg, png, webp, bmp, tiff')
  .option('--crf <n>', 'Quality, 14 (best) to 35')
  .option('--speed-preset <name>', 'x264/x265 preset, ultrafast to veryslow')
  .option('--portrait <mode>', 'off, crop-1080x1920, blur-1080x1920, crop-720x1280, blur-720x1280')
  .option('--image-quality <n>', 'Image quality, 1-100')
  .option('--overwrite', 'Replace existing outputs instead of numbering them')
  .option('--fast-copy', 'Stream copy when nothing needs re-encoding')
  .option('--trim-start <time>', 'Seconds, MM:SS or HH:MM:SS')
  .option('--trim-end <time>', 'Seconds, MM:SS or HH:MM:SS')
  .option('--merge [name]', 'Concatenate all videos into one output')
  .option('--resize <WxH>', 'Target size, e.g. 1280x720, 1280x or x720')
  .option('--crop <WxH+X+Y>', 'Crop rectangle, e.g. 640x360+0+60')
  .option('--rotate <r>', '0, cw90, ccw90, 180')
  .option('--speed <factor>', 'Playback speed, e.g. 0.5 or 2')
  .option('--watermark <file>', 'Image to overlay')
  .option('--watermark-position <pos>', 'top-left, top-right, bottom-left, bottom-right, center')
  .option('--watermark-opacity <n>', 'Watermark opacity, 0-100')
  .option('--watermark-scale <n>', 'Watermark size in percent of its own size, 1-200')
  .option('--text <text>', 'Text to draw')
  .option('--text-position <pos>', 'top-left, top-right, bottom-left, bottom-right, center')
  .option('--text-size <n>', 'Font size')
  .option('--text-color <color>', 'Font color')
  .option('--text-box [color]', 'Draw a box behind the text')
  .option('--text-box-opacity <n>', 'Text box opacity, 0-100')
  .option('--font <file>', 'Font file for the text')
  .option('--codec <name>', 'auto, h264, h265, av1, vp9')
  .option('--hw <vendor>', 'auto, cpu, nvidia, intel, amd')
  .option('--strip-metadata', 'Drop all source metadata')
  .option('--copy-metadata', 'Copy source metadata')
  .option('--title <text>', 'Title tag')
  .option('--comment <text>', 'Comment tag')
  .option('--author <text>', 'Artist tag')
  .option('--copyright <text>', 'Copyright tag')
  .action(convertCommand);

// ============================================
// INSPECTION
// ============================================

program
  .command('probe <file>')
  .description('Show duration, codecs, resolution and size of a media file')
  .option('--json', 'Output in JSON format')
  .action(probeCommand);

program
  .command('encoders')
  .description('List the encoders the installed ffmpeg provides')
  .option('--json', 'Output in JSON format')
  .action(encodersCommand);

program
  .command('presets [name]')
  .description('List presets, or show one')
  .option('--delete <name>', 'Delete a saved preset')
  .option('--json', 'Output in JSON format')
  .action(presetsCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    if (error.code === 'commander.unknownCommand') {
      console.log('Run', chalk.cyan('transcode-kit --help'), 'for available commands');
    }
    process.exitCode = error.exitCode;
  } else {
    printError(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
