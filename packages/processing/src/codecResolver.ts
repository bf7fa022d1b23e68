/**
 * Codec / Encoder Resolver
 *
 * Maps (output container, codec choice, hardware preference, detected
 * encoders) to one concrete ffmpeg encoder. Incompatible combinations never
 * fail: they fall back to a safe choice and report a warning.
 */

import {
  HW_VENDOR_PRIORITY,
  type HwPreference,
  type HwVendor,
  type VideoCodecChoice,
} from '@transcode-kit/core';
import type { WarnFn } from './filterGraph.js';

export type CodecFamily = 'h264' | 'h265' | 'av1' | 'vp9' | 'gif';
export type EncodableCodec = Exclude<CodecFamily, 'gif'>;

export interface EncoderSelection {
  encoder: string;
  hardware: boolean;
}

/**
 * Video codecs (as ffprobe names them) each container can carry.
 * Containers missing from the table accept anything.
 */
const CONTAINER_CODECS: Readonly<Record<string, ReadonlySet<string>>> = {
  mp4: new Set(['h264', 'hevc', 'h265', 'av1']),
  m4v: new Set(['h264', 'hevc', 'h265', 'av1']),
  mov: new Set(['h264', 'hevc', 'h265', 'av1']),
  webm: new Set(['vp8', 'vp9', 'av1']),
  avi: new Set(['mpeg4', 'h264', 'xvid']),
};

/** Codec families each container can be encoded to */
const CONTAINER_FAMILIES: Readonly<Record<string, ReadonlySet<EncodableCodec>>> = {
  mp4: new Set<EncodableCodec>(['h264', 'h265', 'av1']),
  m4v: new Set<EncodableCodec>(['h264', 'h265', 'av1']),
  mov: new Set<EncodableCodec>(['h264', 'h265', 'av1']),
  webm: new Set<EncodableCodec>(['vp9', 'av1']),
  avi: new Set<EncodableCodec>(['h264']),
};

const HARDWARE_ENCODERS: Readonly<Record<HwVendor, Partial<Record<EncodableCodec, string>>>> = {
  nvidia: { h264: 'h264_nvenc', h265: 'hevc_nvenc', av1: 'av1_nvenc' },
  intel: { h264: 'h264_qsv', h265: 'hevc_qsv', av1: 'av1_qsv' },
  amd: { h264: 'h264_amf', h265: 'hevc_amf', av1: 'av1_amf' },
};

const HARDWARE_ENCODER_NAMES: ReadonlySet<string> = new Set(
  Object.values(HARDWARE_ENCODERS).flatMap((byCodec) =>
    Object.values(byCodec).filter((name): name is string => typeof name === 'string')
  )
);

const DEFAULT_SOFTWARE_ENCODER = 'libx264';

/** Encoders that take `-pix_fmt yuv420p` */
const YUV420_ENCODERS: ReadonlySet<string> = new Set([
  'libx264', 'libx265',
  'h264_nvenc', 'hevc_nvenc',
  'h264_qsv', 'hevc_qsv',
  'h264_amf', 'hevc_amf',
]);

/** Software encoders that take `-preset <speed>` */
const SPEED_PRESET_ENCODERS: ReadonlySet<string> = new Set(['libx264', 'libx265']);

function normalizeExt(ext: string): string {
  return ext.replace(/^\./, '').toLowerCase();
}

/**
 * Whether a probed video codec may be stream-copied into the container
 */
export function containerSupportsCodec(ext: string, videoCodec: string): boolean {
  const allowed = CONTAINER_CODECS[normalizeExt(ext)];
  return allowed === undefined || allowed.has(videoCodec.toLowerCase());
}

/**
 * Codec families the container accepts when encoding; null means any
 */
export function allowedCodecFamilies(ext: string): ReadonlySet<EncodableCodec> | null {
  return CONTAINER_FAMILIES[normalizeExt(ext)] ?? null;
}

export function resolveCodec(outExt: string, choice: VideoCodecChoice, warn?: WarnFn): CodecFamily {
  const ext = normalizeExt(outExt);
  if (ext === 'gif') {
    return 'gif';
  }
  if (choice === 'auto') {
    return ext === 'webm' ? 'vp9' : 'h264';
  }

  const allowed = CONTAINER_FAMILIES[ext];
  if (allowed === undefined || allowed.has(choice)) {
    return choice;
  }
  if (ext === 'webm') {
    warn?.('WebM supports only VP9/AV1. Switching to VP9.');
    return 'vp9';
  }
  warn?.(`${choice.toUpperCase()} is not compatible with ${ext.toUpperCase()}. Switching to H.264.`);
  return 'h264';
}

function softwareEncoder(codec: EncodableCodec, capabilities: ReadonlySet<string>): string {
  switch (codec) {
    case 'h264':
      return 'libx264';
    case 'h265':
      return 'libx265';
    case 'av1':
      return capabilities.has('libsvtav1') ? 'libsvtav1' : 'libaom-av1';
    case 'vp9':
      return 'libvpx-vp9';
  }
}

/**
 * Software encoder for the family, downgraded to libx264 when the
 * capability listing is known and lacks it
 */
function softwareSelection(
  codec: EncodableCodec,
  capabilities: ReadonlySet<string>,
  warn?: WarnFn
): EncoderSelection {
  const encoder = softwareEncoder(codec, capabilities);
  if (capabilities.size > 0 && !capabilities.has(encoder)) {
    warn?.(`Encoder ${encoder} is unavailable. Switching to ${DEFAULT_SOFTWARE_ENCODER}.`);
    return { encoder: DEFAULT_SOFTWARE_ENCODER, hardware: false };
  }
  return { encoder, hardware: false };
}

export function selectEncoder(
  codec: CodecFamily,
  preference: HwPreference,
  capabilities: ReadonlySet<string>,
  warn?: WarnFn
): EncoderSelection {
  if (codec === 'gif') {
    return { encoder: 'gif', hardware: false };
  }

  if (preference === 'cpu') {
    return softwareSelection(codec, capabilities, warn);
  }

  if (preference === 'auto') {
    for (const vendor of HW_VENDOR_PRIORITY) {
      const encoder = HARDWARE_ENCODERS[vendor][codec];
      if (encoder && capabilities.has(encoder)) {
        return { encoder, hardware: true };
      }
    }
    return softwareSelection(codec, capabilities, warn);
  }

  const encoder = HARDWARE_ENCODERS[preference][codec];
  if (encoder && capabilities.has(encoder)) {
    return { encoder, hardware: true };
  }
  warn?.('The selected GPU encoder is unavailable. Using CPU.');
  return softwareSelection(codec, capabilities, warn);
}

export function encoderQualityArgs(encoder: string, crf: number): string[] {
  const q = String(crf);
  if (['libx264', 'libx265', 'libsvtav1', 'libaom-av1'].includes(encoder)) {
    return ['-crf', q];
  }
  if (encoder === 'libvpx-vp9') {
    return ['-crf', q, '-b:v', '0'];
  }
  if (encoder.endsWith('_nvenc')) {
    return ['-rc:v', 'vbr', '-cq', q, '-b:v', '0'];
  }
  if (encoder.endsWith('_qsv')) {
    return ['-global_quality', q];
  }
  if (encoder.endsWith('_amf')) {
    return ['-rc', 'cqp', '-qp_i', q, '-qp_p', q, '-qp_b', q];
  }
  return [];
}

export function usesYuv420(encoder: string): boolean {
  return YUV420_ENCODERS.has(encoder);
}

export function takesSpeedPreset(selection: EncoderSelection): boolean {
  return !selection.hardware && SPEED_PRESET_ENCODERS.has(selection.encoder);
}

/**
 * Whether an encoder id is one of the vendor hardware encoders the resolver can pick
 */
export function isHardwareEncoder(encoder: string): boolean {
  return HARDWARE_ENCODER_NAMES.has(encoder);
}
