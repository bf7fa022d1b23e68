/**
 * Domain Constants
 *
 * Closed option sets shared by the engine and the presentation layer.
 */

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  'mov', 'mp4', 'mkv', 'webm', 'avi', 'm4v', 'flv', 'wmv', 'mts', 'm2ts',
]);

export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set([
  'jpg', 'jpeg', 'png', 'webp', 'bmp', 'tif', 'tiff', 'heic', 'heif',
]);

export const OUT_VIDEO_FORMATS = ['mp4', 'mkv', 'webm', 'mov', 'avi', 'gif'] as const;
export type OutVideoFormat = (typeof OUT_VIDEO_FORMATS)[number];

export const OUT_IMAGE_FORMATS = ['jpg', 'png', 'webp', 'bmp', 'tiff'] as const;
export type OutImageFormat = (typeof OUT_IMAGE_FORMATS)[number];

/** x264/x265 speed presets */
export const ENCODER_SPEED_PRESETS = [
  'ultrafast', 'superfast', 'veryfast', 'faster', 'fast',
  'medium', 'slow', 'slower', 'veryslow',
] as const;
export type EncoderSpeedPreset = (typeof ENCODER_SPEED_PRESETS)[number];

export const CRF_MIN = 14;
export const CRF_MAX = 35;

/** Watermark size as a percentage of the image's own size */
export const WATERMARK_SCALE_MIN = 1;
export const WATERMARK_SCALE_MAX = 200;

export const VIDEO_CODEC_CHOICES = ['auto', 'h264', 'h265', 'av1', 'vp9'] as const;
export type VideoCodecChoice = (typeof VIDEO_CODEC_CHOICES)[number];

export const HW_PREFERENCES = ['auto', 'cpu', 'nvidia', 'intel', 'amd'] as const;
export type HwPreference = (typeof HW_PREFERENCES)[number];

/** Vendor probe order for `auto` */
export const HW_VENDOR_PRIORITY = ['nvidia', 'intel', 'amd'] as const;
export type HwVendor = (typeof HW_VENDOR_PRIORITY)[number];

export const ROTATIONS = ['0', 'cw90', 'ccw90', '180'] as const;
export type Rotation = (typeof ROTATIONS)[number];

export const OVERLAY_POSITIONS = [
  'top-left', 'top-right', 'bottom-left', 'bottom-right', 'center',
] as const;
export type OverlayPosition = (typeof OVERLAY_POSITIONS)[number];

export const PORTRAIT_MODES = [
  'off', 'crop-1080x1920', 'blur-1080x1920', 'crop-720x1280', 'blur-720x1280',
] as const;
export type PortraitMode = (typeof PORTRAIT_MODES)[number];

export interface PortraitPreset {
  mode: 'crop' | 'blur';
  width: number;
  height: number;
}

export const PORTRAIT_PRESETS: Readonly<Record<PortraitMode, PortraitPreset | null>> = {
  off: null,
  'crop-1080x1920': { mode: 'crop', width: 1080, height: 1920 },
  'blur-1080x1920': { mode: 'blur', width: 1080, height: 1920 },
  'crop-720x1280': { mode: 'crop', width: 720, height: 1280 },
  'blur-720x1280': { mode: 'blur', width: 720, height: 1280 },
};

/** Tolerance below which a playback speed counts as 1.0 */
export const SPEED_EPSILON = 0.001;
