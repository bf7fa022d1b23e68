/**
 * Settings Input
 *
 * Turns raw `convert` option values into a ConversionSettings record on top of
 * a base (defaults or a preset). Bad values are reported through `warn` and
 * leave the base value in place; nothing here throws.
 */

import { existsSync } from 'node:fs';
import {
  CRF_MAX,
  CRF_MIN,
  WATERMARK_SCALE_MAX,
  WATERMARK_SCALE_MIN,
  ENCODER_SPEED_PRESETS,
  HW_PREFERENCES,
  OUT_IMAGE_FORMATS,
  OUT_VIDEO_FORMATS,
  OVERLAY_POSITIONS,
  PORTRAIT_MODES,
  ROTATIONS,
  VIDEO_CODEC_CHOICES,
  createSettings,
  type ConversionSettings,
} from '@transcode-kit/core';
import { parseOptionalFloat, parseOptionalInt, parseTimeToSeconds } from '@transcode-kit/utils';

/** Option values as commander hands them over */
export interface ConvertOptions {
  output?: string;
  preset?: string;
  savePreset?: string;
  format?: string;
  imageFormat?: string;
  crf?: string;
  speedPreset?: string;
  portrait?: string;
  imageQuality?: string;
  overwrite?: boolean;
  fastCopy?: boolean;
  trimStart?: string;
  trimEnd?: string;
  merge?: string | boolean;
  resize?: string;
  crop?: string;
  rotate?: string;
  speed?: string;
  watermark?: string;
  watermarkPosition?: string;
  watermarkOpacity?: string;
  watermarkScale?: string;
  text?: string;
  textPosition?: string;
  textSize?: string;
  textColor?: string;
  textBox?: string | boolean;
  textBoxOpacity?: string;
  font?: string;
  codec?: string;
  hw?: string;
  stripMetadata?: boolean;
  copyMetadata?: boolean;
  title?: string;
  comment?: string;
  author?: string;
  copyright?: string;
}

type Warn = (message: string) => void;

type SettingsDraft = { -readonly [K in keyof ConversionSettings]: ConversionSettings[K] };

interface IntRange {
  min: number;
  max: number;
}

function pickOption<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  label: string,
  fallback: T,
  warn: Warn
): T {
  if (value === undefined) return fallback;
  const wanted = value.trim().toLowerCase();
  const match = allowed.find((option) => option === wanted);
  if (match === undefined) {
    warn(`Unknown ${label} "${value}" (expected one of: ${allowed.join(', ')}). Keeping ${fallback}.`);
    return fallback;
  }
  return match;
}

function intOption(
  value: string | undefined,
  label: string,
  fallback: number,
  warn: Warn,
  range?: IntRange
): number {
  if (value === undefined) return fallback;
  const parsed = parseOptionalInt(value);
  if (parsed === null) {
    warn(`Invalid ${label} "${value}". Ignoring it.`);
    return fallback;
  }
  if (range && (parsed < range.min || parsed > range.max)) {
    const clamped = Math.max(range.min, Math.min(range.max, parsed));
    warn(`${label} must be between ${range.min} and ${range.max}. Using ${clamped}.`);
    return clamped;
  }
  return parsed;
}

function timeOption(
  value: string | undefined,
  label: string,
  fallback: number | null,
  warn: Warn
): number | null {
  if (value === undefined) return fallback;
  if (!value.trim()) return null;
  const parsed = parseTimeToSeconds(value);
  if (parsed === null) {
    warn(`Invalid ${label} "${value}". Use seconds, MM:SS or HH:MM:SS.`);
    return fallback;
  }
  return parsed;
}

/**
 * `1280x720`, `1280x` or `x720`; a zero or missing side stays unset
 */
export function parseResize(value: string): { width: number | null; height: number | null } | null {
  const match = /^(\d*)x(\d*)$/i.exec(value.trim());
  if (!match) return null;
  const side = (digits: string | undefined): number | null => {
    const n = digits ? Number.parseInt(digits, 10) : 0;
    return n > 0 ? n : null;
  };
  const width = side(match[1]);
  const height = side(match[2]);
  return width === null && height === null ? null : { width, height };
}

/**
 * `WIDTHxHEIGHT` with an optional `+X+Y` offset
 */
export function parseCrop(
  value: string
): { width: number; height: number; x: number | null; y: number | null } | null {
  const match = /^(\d+)x(\d+)(?:\+(\d+)\+(\d+))?$/i.exec(value.trim());
  if (!match) return null;
  const width = Number.parseInt(match[1] ?? '0', 10);
  const height = Number.parseInt(match[2] ?? '0', 10);
  if (width <= 0 || height <= 0) return null;
  return {
    width,
    height,
    x: match[3] === undefined ? null : Number.parseInt(match[3], 10),
    y: match[4] === undefined ? null : Number.parseInt(match[4], 10),
  };
}

export function optionsToSettings(
  options: ConvertOptions,
  base: ConversionSettings,
  warn: Warn,
  fileExists: (filePath: string) => boolean = existsSync
): ConversionSettings {
  const draft: SettingsDraft = { ...base };

  draft.outVideoFormat = pickOption(options.format, OUT_VIDEO_FORMATS, 'format', base.outVideoFormat, warn);
  draft.outImageFormat = pickOption(
    options.imageFormat, OUT_IMAGE_FORMATS, 'image format', base.outImageFormat, warn
  );
  draft.crf = intOption(options.crf, 'CRF', base.crf, warn, { min: CRF_MIN, max: CRF_MAX });
  draft.speedPreset = pickOption(
    options.speedPreset, ENCODER_SPEED_PRESETS, 'speed preset', base.speedPreset, warn
  );
  draft.portrait = pickOption(options.portrait, PORTRAIT_MODES, 'portrait mode', base.portrait, warn);
  draft.imageQuality = intOption(options.imageQuality, 'Image quality', base.imageQuality, warn, {
    min: 1,
    max: 100,
  });
  draft.overwrite = options.overwrite ?? base.overwrite;
  draft.fastCopy = options.fastCopy ?? base.fastCopy;

  draft.trimStart = timeOption(options.trimStart, 'trim start', base.trimStart, warn);
  draft.trimEnd = timeOption(options.trimEnd, 'trim end', base.trimEnd, warn);
  if (options.merge !== undefined) {
    draft.merge = true;
    if (typeof options.merge === 'string' && options.merge.trim()) {
      draft.mergeName = options.merge.trim();
    }
  }

  if (options.resize !== undefined) {
    const size = parseResize(options.resize);
    if (size) {
      draft.resizeWidth = size.width;
      draft.resizeHeight = size.height;
    } else {
      warn(`Invalid resize "${options.resize}". Use WIDTHxHEIGHT, WIDTHx or xHEIGHT.`);
    }
  }
  if (options.crop !== undefined) {
    const crop = parseCrop(options.crop);
    if (crop) {
      draft.cropWidth = crop.width;
      draft.cropHeight = crop.height;
      draft.cropX = crop.x;
      draft.cropY = crop.y;
    } else {
      warn(`Invalid crop "${options.crop}". Use WIDTHxHEIGHT or WIDTHxHEIGHT+X+Y.`);
    }
  }
  draft.rotate = pickOption(options.rotate, ROTATIONS, 'rotation', base.rotate, warn);
  if (options.speed !== undefined) {
    const speed = parseOptionalFloat(options.speed);
    if (speed === null) {
      warn(`Invalid speed "${options.speed}". Ignoring it.`);
    } else if (speed <= 0) {
      warn('Speed must be greater than 0. Ignoring it.');
      draft.speed = null;
    } else {
      draft.speed = speed;
    }
  }

  if (options.watermark !== undefined) {
    draft.watermarkPath = options.watermark.trim();
  }
  draft.watermarkPosition = pickOption(
    options.watermarkPosition, OVERLAY_POSITIONS, 'watermark position', base.watermarkPosition, warn
  );
  draft.watermarkOpacity = intOption(
    options.watermarkOpacity, 'Watermark opacity', base.watermarkOpacity, warn, { min: 0, max: 100 }
  );
  draft.watermarkScale = intOption(
    options.watermarkScale, 'Watermark scale', base.watermarkScale, warn, {
      min: WATERMARK_SCALE_MIN,
      max: WATERMARK_SCALE_MAX,
    }
  );

  draft.text = options.text ?? base.text;
  draft.textPosition = pickOption(
    options.textPosition, OVERLAY_POSITIONS, 'text position', base.textPosition, warn
  );
  draft.textSize = intOption(options.textSize, 'Text size', base.textSize, warn, { min: 1, max: 1000 });
  draft.textColor = options.textColor?.trim() || base.textColor;
  if (options.textBox !== undefined) {
    draft.textBox = true;
    if (typeof options.textBox === 'string' && options.textBox.trim()) {
      draft.textBoxColor = options.textBox.trim();
    }
  }
  draft.textBoxOpacity = intOption(
    options.textBoxOpacity, 'Text box opacity', base.textBoxOpacity, warn, { min: 0, max: 100 }
  );
  if (options.font !== undefined) {
    const font = options.font.trim();
    if (font && !fileExists(font)) {
      warn(`Font file not found: ${font}`);
      draft.textFont = '';
    } else {
      draft.textFont = font;
    }
  }

  draft.videoCodec = pickOption(options.codec, VIDEO_CODEC_CHOICES, 'codec', base.videoCodec, warn);
  draft.hwEncoder = pickOption(options.hw, HW_PREFERENCES, 'hardware preference', base.hwEncoder, warn);

  draft.stripMetadata = options.stripMetadata ?? base.stripMetadata;
  draft.copyMetadata = options.copyMetadata ?? base.copyMetadata;
  draft.metaTitle = options.title ?? base.metaTitle;
  draft.metaComment = options.comment ?? base.metaComment;
  draft.metaAuthor = options.author ?? base.metaAuthor;
  draft.metaCopyright = options.copyright ?? base.metaCopyright;

  return createSettings(draft);
}
