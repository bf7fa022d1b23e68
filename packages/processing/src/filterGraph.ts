/**
 * Filter-Graph Builder
 *
 * Turns the geometric/overlay part of the settings into either nothing, a
 * flat `-vf` chain, or a labeled `-filter_complex` graph plus the auxiliary
 * inputs (watermark image) the command has to attach.
 *
 * Video chain order (filters are position sensitive):
 *   portrait → resize → crop → rotate → setpts → drawtext → GIF constraints
 *
 * A complex graph is used only when a second visual input (watermark) or the
 * blurred-background portrait composite is involved.
 */

import { existsSync } from 'node:fs';
import {
  PORTRAIT_PRESETS,
  SPEED_EPSILON,
  type ConversionSettings,
  type OverlayPosition,
  type Rotation,
} from '@transcode-kit/core';
import { expandHome } from '@transcode-kit/utils';

export type WarnFn = (message: string) => void;

export type FilterSpec =
  | { kind: 'none' }
  | { kind: 'simple'; chain: string }
  | { kind: 'complex'; graph: string; outputLabel: string; extraInputs: string[] };

export interface FilterBuildOptions {
  warn?: WarnFn;
  /** Existence check for the watermark file; defaults to the filesystem */
  fileExists?: (filePath: string) => boolean;
}

const ROTATION_FILTERS: Readonly<Record<Rotation, string | null>> = {
  '0': null,
  cw90: 'transpose=1',
  ccw90: 'transpose=2',
  '180': 'transpose=1,transpose=1',
};

/** Overlay coordinates; `w`/`h` are the overlaid image's own size */
const OVERLAY_POSITION_EXPR: Readonly<Record<OverlayPosition, string>> = {
  'top-left': '10:10',
  'top-right': 'W-w-10:10',
  'bottom-left': '10:H-h-10',
  'bottom-right': 'W-w-10:H-h-10',
  center: '(W-w)/2:(H-h)/2',
};

/** drawtext coordinates; `tw`/`th` are the rendered text's measured size */
const TEXT_POSITION_EXPR: Readonly<Record<OverlayPosition, [string, string]>> = {
  'top-left': ['10', '10'],
  'top-right': ['W-tw-10', '10'],
  'bottom-left': ['10', 'H-th-10'],
  'bottom-right': ['W-tw-10', 'H-th-10'],
  center: ['(W-tw)/2', '(H-th)/2'],
};

const BASE_LABEL = 'vbase';
const WATERMARK_LABEL = 'wm';
const OUTPUT_LABEL = 'vout';

/**
 * Escape text for drawtext's `text='...'` value
 */
export function escapeDrawtext(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/:/g, '\\:').replace(/'/g, "\\'");
}

/**
 * Escape a file path embedded in a filter argument
 */
export function escapeFilterPath(filePath: string): string {
  return filePath.replace(/\\/g, '/').replace(/:/g, '\\:');
}

function clampPercent(value: number, min = 0): number {
  return Math.max(min, Math.min(100, Math.trunc(value))) / 100;
}

// Upscaling is allowed, so only the lower bound applies
function scaleFactor(percent: number): number {
  return Math.max(1, Math.trunc(percent)) / 100;
}

export function buildResizeFilter(settings: ConversionSettings): string | null {
  const { resizeWidth, resizeHeight } = settings;
  if (resizeWidth === null && resizeHeight === null) {
    return null;
  }
  return `scale=${resizeWidth ?? -1}:${resizeHeight ?? -1}`;
}

export function buildCropFilter(settings: ConversionSettings): string | null {
  const { cropWidth, cropHeight } = settings;
  if (cropWidth === null || cropHeight === null) {
    return null;
  }
  return `crop=${cropWidth}:${cropHeight}:${settings.cropX ?? 0}:${settings.cropY ?? 0}`;
}

export function buildRotateFilter(settings: ConversionSettings): string | null {
  return ROTATION_FILTERS[settings.rotate] ?? null;
}

/**
 * Effective playback speed, or null when it is unset, non-positive, infinite or 1.0
 */
export function effectiveSpeed(settings: ConversionSettings): number | null {
  const { speed } = settings;
  if (speed === null || !(speed > 0) || !Number.isFinite(speed)) {
    return null;
  }
  if (Math.abs(speed - 1) <= SPEED_EPSILON) {
    return null;
  }
  return speed;
}

/**
 * Split a speed factor into atempo steps that each stay within [0.5, 2.0]
 */
export function buildAtempoChain(speed: number): number[] {
  if (!(speed > 0) || !Number.isFinite(speed)) {
    return [];
  }
  const factors: number[] = [];
  let remaining = speed;
  while (remaining > 2.0) {
    factors.push(2.0);
    remaining /= 2.0;
  }
  while (remaining < 0.5) {
    factors.push(0.5);
    remaining /= 0.5;
  }
  factors.push(remaining);
  return factors;
}

/**
 * Audio counterpart of the speed change (`-filter:a` value)
 */
export function buildAudioSpeedFilter(settings: ConversionSettings): string | null {
  const speed = effectiveSpeed(settings);
  if (speed === null) {
    return null;
  }
  const chain = buildAtempoChain(speed).map((factor) => `atempo=${factor.toFixed(3)}`);
  return chain.length > 0 ? chain.join(',') : null;
}

export function buildTextFilter(settings: ConversionSettings): string | null {
  const text = settings.text.trim();
  if (!text) {
    return null;
  }

  const color = settings.textColor.trim() || 'white';
  const [x, y] = TEXT_POSITION_EXPR[settings.textPosition] ?? TEXT_POSITION_EXPR['top-left'];
  let draw = `drawtext=text='${escapeDrawtext(text)}':x=${x}:y=${y}:fontsize=${settings.textSize}:fontcolor=${color}`;

  const fontFile = settings.textFont.trim();
  if (fontFile) {
    draw += `:fontfile='${escapeFilterPath(expandHome(fontFile))}'`;
  }
  if (settings.textBox) {
    const opacity = clampPercent(settings.textBoxOpacity);
    const boxColor = settings.textBoxColor.trim() || 'black';
    draw += `:box=1:boxcolor=${boxColor}@${opacity.toFixed(2)}`;
  }
  return draw;
}

/**
 * Scale + hard crop to the portrait target. Sources wider than 9:16 are
 * scaled to the target height, narrower ones to the target width.
 */
function portraitCropChain(width: number, height: number): string {
  return `scale='if(gt(a,9/16),-2,${width})':'if(gt(a,9/16),${height},-2)',crop=${width}:${height},setsar=1`;
}

/**
 * Blurred, filled background with the fitted source centered on top
 */
function portraitBlurGraph(width: number, height: number): string {
  return (
    `[0:v]scale=${width}:${height}:force_original_aspect_ratio=increase,boxblur=20:1,crop=${width}:${height}[bg];` +
    `[0:v]scale=${width}:${height}:force_original_aspect_ratio=decrease[fg];` +
    `[bg][fg]overlay=(W-w)/2:(H-h)/2,setsar=1`
  );
}

function resolveWatermark(settings: ConversionSettings, options: FilterBuildOptions): string[] {
  const raw = settings.watermarkPath.trim();
  if (!raw) {
    return [];
  }
  const watermarkPath = expandHome(raw);
  const exists = options.fileExists ?? existsSync;
  if (!exists(watermarkPath)) {
    options.warn?.(`Watermark file not found: ${raw}`);
    return [];
  }
  return [watermarkPath];
}

/**
 * Watermark input scaled by its percentage, faded via the alpha channel and
 * composited onto `baseLabel`
 */
function watermarkGraphParts(settings: ConversionSettings, baseLabel: string): string[] {
  const scale = scaleFactor(settings.watermarkScale);
  const opacity = clampPercent(settings.watermarkOpacity);
  const position = OVERLAY_POSITION_EXPR[settings.watermarkPosition] ?? OVERLAY_POSITION_EXPR['top-left'];
  return [
    `[1:v]format=rgba,scale=iw*${scale}:ih*${scale},colorchannelmixer=aa=${opacity}[${WATERMARK_LABEL}]`,
    `[${baseLabel}][${WATERMARK_LABEL}]overlay=${position}[${OUTPUT_LABEL}]`,
  ];
}

function toFilterSpec(
  filters: string[],
  watermarkInputs: string[],
  settings: ConversionSettings,
  blurGraph: string | null
): FilterSpec {
  if (blurGraph === null && watermarkInputs.length === 0) {
    return filters.length > 0 ? { kind: 'simple', chain: filters.join(',') } : { kind: 'none' };
  }

  const parts: string[] = [];
  if (blurGraph !== null) {
    const tail = filters.length > 0 ? `,${filters.join(',')}` : '';
    parts.push(`${blurGraph}${tail}[${BASE_LABEL}]`);
  } else {
    const chain = filters.length > 0 ? filters.join(',') : 'null';
    parts.push(`[0:v]${chain}[${BASE_LABEL}]`);
  }

  let outputLabel = BASE_LABEL;
  if (watermarkInputs.length > 0) {
    parts.push(...watermarkGraphParts(settings, BASE_LABEL));
    outputLabel = OUTPUT_LABEL;
  }

  return {
    kind: 'complex',
    graph: parts.join(';'),
    outputLabel: `[${outputLabel}]`,
    extraInputs: watermarkInputs,
  };
}

/**
 * Video filter spec for one output container (extension with or without dot)
 */
export function buildVideoFilterSpec(
  settings: ConversionSettings,
  outExt: string,
  options: FilterBuildOptions = {}
): FilterSpec {
  const portrait = PORTRAIT_PRESETS[settings.portrait] ?? null;
  const filters: string[] = [];

  // The portrait target already fixes the output size
  const resize = buildResizeFilter(settings);
  if (resize && !portrait) {
    filters.push(resize);
  }

  const crop = buildCropFilter(settings);
  if (crop) filters.push(crop);

  const rotate = buildRotateFilter(settings);
  if (rotate) filters.push(rotate);

  const speed = effectiveSpeed(settings);
  if (speed !== null) {
    filters.push(`setpts=PTS/${speed}`);
  }

  const text = buildTextFilter(settings);
  if (text) filters.push(text);

  let blurGraph: string | null = null;
  if (portrait?.mode === 'crop') {
    filters.unshift(portraitCropChain(portrait.width, portrait.height));
  } else if (portrait?.mode === 'blur') {
    blurGraph = portraitBlurGraph(portrait.width, portrait.height);
  }

  if (outExt.replace(/^\./, '').toLowerCase() === 'gif') {
    filters.push('fps=12');
    if (resize === null) {
      filters.push('scale=640:-1:flags=lanczos');
    }
  }

  return toFilterSpec(filters, resolveWatermark(settings, options), settings, blurGraph);
}

/**
 * Still-image filter spec: resize, crop, rotate, text and watermark only
 */
export function buildImageFilterSpec(
  settings: ConversionSettings,
  options: FilterBuildOptions = {}
): FilterSpec {
  const filters = [
    buildResizeFilter(settings),
    buildCropFilter(settings),
    buildRotateFilter(settings),
    buildTextFilter(settings),
  ].filter((f): f is string => f !== null);

  return toFilterSpec(filters, resolveWatermark(settings, options), settings, null);
}
