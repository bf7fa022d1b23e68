/**
 * Preset Store
 *
 * Named settings records persisted as JSON:
 *
 *   { "version": 1, "presets": { "<name>": { ...ConversionSettings } } }
 *
 * An un-versioned flat map (name → settings) from older files is accepted on
 * load and rewritten in the versioned shape on the next save.
 */

import { z } from 'zod';
import { createLogger, safeReadFile, safeWriteFile } from '@transcode-kit/utils';
import { createSettings, decodeSettings, type ConversionSettings } from './settings.js';

const log = createLogger({ module: 'presets' });

export const PRESET_FILE_VERSION = 1;

export type PresetMap = Record<string, ConversionSettings>;

const versionedFileSchema = z.object({
  version: z.number().int(),
  presets: z.record(z.unknown()),
});

const legacyFileSchema = z.record(z.unknown());

export const BUILTIN_PRESETS: Readonly<PresetMap> = {
  'H.264 balanced (MP4)': createSettings({
    outVideoFormat: 'mp4', crf: 23, speedPreset: 'medium', videoCodec: 'h264', hwEncoder: 'auto',
  }),
  'H.265 smaller (MP4)': createSettings({
    outVideoFormat: 'mp4', crf: 26, speedPreset: 'slow', videoCodec: 'h265', hwEncoder: 'auto',
  }),
  'AV1 quality (MKV)': createSettings({
    outVideoFormat: 'mkv', crf: 30, speedPreset: 'medium', videoCodec: 'av1', hwEncoder: 'auto',
  }),
  'WebM VP9 (web)': createSettings({
    outVideoFormat: 'webm', crf: 28, speedPreset: 'slow', videoCodec: 'vp9', hwEncoder: 'auto',
  }),
  'NVENC H.264 fast': createSettings({
    outVideoFormat: 'mp4', crf: 23, speedPreset: 'fast', videoCodec: 'h264', hwEncoder: 'nvidia',
  }),
  'Fast copy': createSettings({ fastCopy: true }),
  'GIF 640w': createSettings({ outVideoFormat: 'gif', resizeWidth: 640 }),
  'Photo JPG 90': createSettings({ outImageFormat: 'jpg', imageQuality: 90 }),
  'Photo WebP 80': createSettings({ outImageFormat: 'webp', imageQuality: 80 }),
};

/**
 * Parse the JSON text of a preset file into decoded records.
 * Unreadable content yields an empty map.
 */
export function parsePresetFile(content: string): PresetMap {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    log.warn({ error }, 'Preset file is not valid JSON, ignoring it');
    return {};
  }

  const versioned = versionedFileSchema.safeParse(data);
  const entries = versioned.success
    ? versioned.data.presets
    : legacyFileSchema.safeParse(data).data;

  if (!entries) {
    return {};
  }
  if (versioned.success && versioned.data.version > PRESET_FILE_VERSION) {
    log.warn({ version: versioned.data.version }, 'Preset file written by a newer version');
  }

  const presets: PresetMap = {};
  for (const [name, raw] of Object.entries(entries)) {
    presets[name] = decodeSettings(raw);
  }
  return presets;
}

/**
 * Serialize presets in the versioned file shape
 */
export function serializePresets(presets: PresetMap): string {
  return JSON.stringify({ version: PRESET_FILE_VERSION, presets }, null, 2);
}

export class PresetStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  /**
   * Built-in presets overlaid with the user's saved ones
   */
  async load(): Promise<PresetMap> {
    const content = await safeReadFile(this.filePath);
    const saved = content === null ? {} : parsePresetFile(content);
    return { ...BUILTIN_PRESETS, ...saved };
  }

  async save(presets: PresetMap): Promise<void> {
    await safeWriteFile(this.filePath, serializePresets(presets));
    log.debug({ path: this.filePath, count: Object.keys(presets).length }, 'Presets saved');
  }

  async get(name: string): Promise<ConversionSettings | null> {
    const presets = await this.load();
    return presets[name] ?? null;
  }

  async put(name: string, settings: ConversionSettings): Promise<void> {
    const presets = await this.load();
    presets[name] = settings;
    await this.save(presets);
  }

  /**
   * Returns false when no preset had that name
   */
  async remove(name: string): Promise<boolean> {
    const presets = await this.load();
    if (!(name in presets)) {
      return false;
    }
    delete presets[name];
    await this.save(presets);
    return true;
  }
}
