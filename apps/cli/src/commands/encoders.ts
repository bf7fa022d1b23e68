/**
 * Encoders Command
 *
 * List what the installed ffmpeg can encode with. Hardware encoders the
 * resolver knows about are highlighted.
 */

import chalk from 'chalk';
import { isHardwareEncoder } from '@transcode-kit/processing';
import { createEngine } from '../lib/engine.js';
import { printError, printHeader, printInfo, printJson, printKeyValue } from '../lib/output.js';

interface EncodersOptions {
  json?: boolean;
}

export async function encodersCommand(options: EncodersOptions): Promise<void> {
  const engine = createEngine();
  if (!engine.encoders) {
    printError('ffmpeg not found. Set FFMPEG_PATH or put ffmpeg on PATH.');
    process.exitCode = 1;
    return;
  }

  const encoders = [...(await engine.encoders.detectEncoders())].sort();
  const hardware = encoders.filter(isHardwareEncoder);

  if (options.json) {
    printJson({ ffmpeg: engine.ffmpegPath, encoders, hardware });
    return;
  }

  printHeader('Encoders');
  printKeyValue('ffmpeg', `${engine.ffmpegPath ?? '-'} (${engine.binaries.ffmpeg.source ?? 'unknown'})`);
  printKeyValue('ffprobe', engine.binaries.ffprobe.resolvedPath ?? chalk.gray('not found'));
  console.log();

  if (encoders.length === 0) {
    printInfo('The encoder listing was empty or could not be read');
    return;
  }
  for (const name of encoders) {
    console.log(isHardwareEncoder(name) ? `  ${chalk.green(name)} ${chalk.gray('(hardware)')}` : `  ${name}`);
  }
  console.log();
  printInfo(`${encoders.length} encoders, ${hardware.length} hardware`);
}
