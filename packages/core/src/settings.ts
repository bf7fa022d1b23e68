/**
 * Conversion Settings
 *
 * One flat, serializable configuration for an entire run. The schema is the
 * single source of the documented defaults: every field falls back to its
 * default when missing or malformed, so decoding never throws.
 */

import { z } from 'zod';
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
} from './constants.js';

// Older preset files stored numeric fields as strings ("640", "")
function numericInput(value: unknown): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    const parsed = Number(trimmed);
    return Number.isNaN(parsed) ? value : parsed;
  }
  return value;
}

const optionalDimension = z
  .preprocess(numericInput, z.number().int().positive().nullable())
  .catch(null);

const optionalOffset = z
  .preprocess(numericInput, z.number().int().nonnegative().nullable())
  .catch(null);

const optionalSeconds = z
  .preprocess(numericInput, z.number().nonnegative().nullable())
  .catch(null);

const percent = (fallback: number, min = 0, max = 100) =>
  z.preprocess(numericInput, z.number().int().min(min).max(max)).catch(fallback);

const text = (fallback: string) => z.string().catch(fallback);
const flag = (fallback: boolean) => z.boolean().catch(fallback);

export const conversionSettingsSchema = z.object({
  outVideoFormat: z.enum(OUT_VIDEO_FORMATS).catch('mp4'),
  outImageFormat: z.enum(OUT_IMAGE_FORMATS).catch('jpg'),
  crf: z.preprocess(numericInput, z.number().int().min(CRF_MIN).max(CRF_MAX)).catch(23),
  speedPreset: z.enum(ENCODER_SPEED_PRESETS).catch('medium'),
  portrait: z.enum(PORTRAIT_MODES).catch('off'),
  imageQuality: percent(90, 1),
  overwrite: flag(false),
  fastCopy: flag(false),

  trimStart: optionalSeconds,
  trimEnd: optionalSeconds,
  merge: flag(false),
  mergeName: text('merged'),

  resizeWidth: optionalDimension,
  resizeHeight: optionalDimension,
  cropWidth: optionalDimension,
  cropHeight: optionalDimension,
  cropX: optionalOffset,
  cropY: optionalOffset,
  rotate: z.enum(ROTATIONS).catch('0'),
  speed: z.preprocess(numericInput, z.number().positive().finite().nullable()).catch(null),

  watermarkPath: text(''),
  watermarkPosition: z.enum(OVERLAY_POSITIONS).catch('bottom-right'),
  watermarkOpacity: percent(80),
  watermarkScale: percent(30, WATERMARK_SCALE_MIN, WATERMARK_SCALE_MAX),

  text: text(''),
  textPosition: z.enum(OVERLAY_POSITIONS).catch('bottom-right'),
  textSize: z.preprocess(numericInput, z.number().int().positive()).catch(24),
  textColor: text('white'),
  textBox: flag(false),
  textBoxColor: text('black'),
  textBoxOpacity: percent(50),
  textFont: text(''),

  videoCodec: z.enum(VIDEO_CODEC_CHOICES).catch('auto'),
  hwEncoder: z.enum(HW_PREFERENCES).catch('auto'),

  stripMetadata: flag(false),
  copyMetadata: flag(false),
  metaTitle: text(''),
  metaComment: text(''),
  metaAuthor: text(''),
  metaCopyright: text(''),
});

export type ConversionSettings = Readonly<z.infer<typeof conversionSettingsSchema>>;

export const DEFAULT_SETTINGS: ConversionSettings = Object.freeze(conversionSettingsSchema.parse({}));

/**
 * Build a settings value from defaults plus overrides. No validation happens
 * here; consumers handle out-of-range values where they use them.
 */
export function createSettings(overrides: Partial<ConversionSettings> = {}): ConversionSettings {
  return Object.freeze({ ...DEFAULT_SETTINGS, ...overrides });
}

/**
 * Decode an untrusted record (preset file entry). Missing or malformed fields
 * take their documented defaults; unknown keys are dropped.
 */
export function decodeSettings(raw: unknown): ConversionSettings {
  const source = typeof raw === 'object' && raw !== null && !Array.isArray(raw) ? raw : {};
  return Object.freeze(conversionSettingsSchema.parse(source));
}
