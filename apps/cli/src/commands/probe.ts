/**
 * Probe Command
 *
 * Print what ffprobe reports for one file.
 */

import { basename, resolve } from 'node:path';
import ora from 'ora';
import { describeMedia } from '@transcode-kit/processing';
import { expandHome, formatBytes, formatClock } from '@transcode-kit/utils';
import { createEngine } from '../lib/engine.js';
import { printError, printHeader, printJson, printKeyValue } from '../lib/output.js';

interface ProbeOptions {
  json?: boolean;
}

export async function probeCommand(file: string, options: ProbeOptions): Promise<void> {
  const { prober } = createEngine();
  if (!prober) {
    printError('ffprobe not found. Set FFPROBE_PATH or put ffprobe on PATH.');
    process.exitCode = 1;
    return;
  }

  const filePath = resolve(expandHome(file));
  const spinner = ora('Probing media file...').start();
  const info = await prober.probeMedia(filePath);

  if (!info) {
    spinner.fail('Probe failed');
    process.exitCode = 1;
    return;
  }
  spinner.stop();

  if (options.json) {
    printJson(info);
    return;
  }

  printHeader(describeMedia(basename(filePath), info));
  printKeyValue('Duration', formatClock(info.duration));
  printKeyValue('Container', info.formatName ?? '-');
  printKeyValue('Video', info.videoCodec ?? 'none');
  printKeyValue('Audio', info.audioCodec ?? 'none');
  printKeyValue(
    'Resolution',
    info.width !== null && info.height !== null ? `${info.width}x${info.height}` : '-'
  );
  printKeyValue('Size', formatBytes(info.sizeBytes));
}
