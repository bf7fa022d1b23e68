/**
 * Command Assembler
 *
 * Full argument vectors for the three command shapes: single video, still
 * image, and N-way merge through the concat demuxer. Filter, codec and
 * metadata handling is shared between them.
 */

import { randomUUID } from 'node:crypto';
import { tmpdir } from 'node:os';
import { join, resolve } from 'node:path';
import type { ConversionSettings } from '@transcode-kit/core';
import { getExtension, safeWriteFile } from '@transcode-kit/utils';
import { FFmpegCommandBuilder } from './commandBuilder.js';
import {
  encoderQualityArgs,
  resolveCodec,
  selectEncoder,
  takesSpeedPreset,
  usesYuv420,
} from './codecResolver.js';
import {
  buildAudioSpeedFilter,
  buildImageFilterSpec,
  buildVideoFilterSpec,
  type FilterBuildOptions,
  type FilterSpec,
  type WarnFn,
} from './filterGraph.js';

const FASTSTART_CONTAINERS: ReadonlySet<string> = new Set(['mp4', 'mov', 'm4v']);
const DEFAULT_VIDEO_MAP = '0:v:0?';
const DEFAULT_AUDIO_MAP = '0:a:0?';

/**
 * Everything derived from the settings before a video command is built.
 * Computed once per output so warnings are reported once.
 */
export interface VideoPlan {
  outExt: string;
  filter: FilterSpec;
  audioFilter: string | null;
  trimArgs: string[];
}

export interface VideoCommandOptions {
  settings: ConversionSettings;
  plan: VideoPlan;
  /** Stream copy instead of re-encoding; decided by the fast-path checker */
  fastCopy: boolean;
  capabilities: ReadonlySet<string>;
  warn?: WarnFn;
}

/**
 * `-ss`/`-to` in seconds with millisecond precision. An end at or before the
 * start is dropped.
 */
export function buildTrimArgs(settings: ConversionSettings, warn?: WarnFn): string[] {
  const { trimStart: start, trimEnd: end } = settings;
  const args: string[] = [];
  if (start !== null) {
    args.push('-ss', start.toFixed(3));
  }
  if (end !== null) {
    if (start !== null && end <= start) {
      warn?.('Trim end is not after trim start. Ignoring end.');
    } else {
      args.push('-to', end.toFixed(3));
    }
  }
  return args;
}

export function planVideo(
  settings: ConversionSettings,
  outExt: string,
  options: FilterBuildOptions = {}
): VideoPlan {
  const ext = outExt.replace(/^\./, '').toLowerCase();
  return {
    outExt: ext,
    filter: buildVideoFilterSpec(settings, ext, options),
    audioFilter: buildAudioSpeedFilter(settings),
    trimArgs: buildTrimArgs(settings, options.warn),
  };
}

/**
 * Strip and copy are exclusive; strip wins. Free-text fields follow.
 */
function applyMetadata(builder: FFmpegCommandBuilder, settings: ConversionSettings): void {
  if (settings.stripMetadata) {
    builder.setMetadataSource(-1);
  } else if (settings.copyMetadata) {
    builder.setMetadataSource(0);
  }

  const fields: [string, string][] = [
    ['title', settings.metaTitle],
    ['comment', settings.metaComment],
    ['artist', settings.metaAuthor],
    ['copyright', settings.metaCopyright],
  ];
  for (const [key, raw] of fields) {
    const value = raw.trim();
    if (value) {
      builder.addMetadata(key, value);
    }
  }
}

function applyFaststart(builder: FFmpegCommandBuilder, outExt: string): void {
  if (FASTSTART_CONTAINERS.has(outExt)) {
    builder.setOutputOptions({ movflags: '+faststart' });
  }
}

/**
 * Shared tail of the single-file and merge commands: filter, maps, encoder
 * and audio settings
 */
function applyVideoPipeline(builder: FFmpegCommandBuilder, options: VideoCommandOptions): void {
  const { settings, plan, capabilities, warn } = options;

  for (const extra of plan.filter.kind === 'complex' ? plan.filter.extraInputs : []) {
    builder.addInput(extra);
  }
  builder.addTrimArgs(...plan.trimArgs);

  if (options.fastCopy) {
    builder.map('0').streamCopy();
    applyFaststart(builder, plan.outExt);
    applyMetadata(builder, settings);
    return;
  }

  switch (plan.filter.kind) {
    case 'simple':
      builder.setVideoFilter(plan.filter.chain).map(DEFAULT_VIDEO_MAP);
      break;
    case 'complex':
      builder.setComplexFilter(plan.filter.graph).map(plan.filter.outputLabel);
      break;
    case 'none':
      builder.map(DEFAULT_VIDEO_MAP);
      break;
  }

  if (plan.outExt === 'gif') {
    builder.disableAudio();
    applyMetadata(builder, settings);
    return;
  }

  builder.map(DEFAULT_AUDIO_MAP);
  if (plan.audioFilter) {
    builder.addAudioFilter(plan.audioFilter);
  }

  const codec = resolveCodec(plan.outExt, settings.videoCodec, warn);
  const selection = selectEncoder(codec, settings.hwEncoder, capabilities, warn);
  builder.setVideoCodec({
    codec: selection.encoder,
    preset: takesSpeedPreset(selection) ? settings.speedPreset : undefined,
    qualityArgs: encoderQualityArgs(selection.encoder, settings.crf),
    pixFmt: usesYuv420(selection.encoder) ? 'yuv420p' : undefined,
  });
  builder.setAudioCodec(
    plan.outExt === 'webm'
      ? { codec: 'libopus', bitrate: '128k' }
      : { codec: 'aac', bitrate: '192k' }
  );

  applyFaststart(builder, plan.outExt);
  applyMetadata(builder, settings);
}

export function buildVideoCommand(
  inputPath: string,
  outputPath: string,
  options: VideoCommandOptions
): string[] {
  const builder = new FFmpegCommandBuilder()
    .setOverwrite(options.settings.overwrite)
    .addInput(inputPath)
    .setOutput(outputPath);

  applyVideoPipeline(builder, options);
  return builder.build();
}

/**
 * Concatenation of the files listed in a concat manifest
 */
export function buildMergeCommand(
  manifestPath: string,
  outputPath: string,
  options: VideoCommandOptions
): string[] {
  const builder = new FFmpegCommandBuilder()
    .setOverwrite(options.settings.overwrite)
    .addInput(manifestPath, { format: 'concat', extraArgs: ['-safe', '0'] })
    .setOutput(outputPath);

  applyVideoPipeline(builder, options);
  return builder.build();
}

/**
 * JPEG `-q:v` runs 2 (best) to 31 (worst)
 */
export function jpegQualityScale(quality: number): number {
  return Math.max(2, Math.min(31, Math.round(31 - (quality / 100) * 29)));
}

function imageQualityArgs(outExt: string, quality: number): string[] {
  if (outExt === 'jpg' || outExt === 'jpeg') {
    return ['-q:v', String(jpegQualityScale(quality))];
  }
  if (outExt === 'webp') {
    return ['-q:v', String(Math.max(0, Math.min(100, Math.trunc(quality))))];
  }
  return [];
}

export function buildImageCommand(
  inputPath: string,
  outputPath: string,
  settings: ConversionSettings,
  options: FilterBuildOptions = {}
): string[] {
  const builder = new FFmpegCommandBuilder()
    .setOverwrite(settings.overwrite)
    .addInput(inputPath)
    .setOutput(outputPath);

  const filter = buildImageFilterSpec(settings, options);
  if (filter.kind === 'simple') {
    builder.setVideoFilter(filter.chain);
  } else if (filter.kind === 'complex') {
    for (const extra of filter.extraInputs) {
      builder.addInput(extra);
    }
    builder.setComplexFilter(filter.graph).map(filter.outputLabel);
  }

  applyMetadata(builder, settings);
  builder.setOutputOptions({ extraArgs: imageQualityArgs(getExtension(outputPath), settings.imageQuality) });
  return builder.build();
}

/**
 * Escape one path for a concat manifest line (`file '<path>'`)
 */
export function concatManifestLine(filePath: string): string {
  const normalized = resolve(filePath).replace(/\\/g, '/').replace(/'/g, "'\\''");
  return `file '${normalized}'`;
}

/**
 * Write the concat demuxer manifest to a fresh temporary file. The caller
 * deletes it once the merge has finished.
 */
export async function writeConcatManifest(
  inputs: readonly string[],
  dir: string = tmpdir()
): Promise<string> {
  const manifestPath = join(dir, `transcode-kit-concat-${randomUUID()}.txt`);
  const body = inputs.map((input) => `${concatManifestLine(input)}\n`).join('');
  await safeWriteFile(manifestPath, body);
  return manifestPath;
}
