/**
 * Media Types
 */

import { getExtension } from '@transcode-kit/utils';
import { IMAGE_EXTENSIONS, VIDEO_EXTENSIONS } from '../constants.js';

/**
 * Probed facts about one file. Populated once per run, never mutated.
 */
export interface MediaInfo {
  readonly duration: number | null; // seconds
  readonly videoCodec: string | null;
  readonly audioCodec: string | null;
  readonly width: number | null;
  readonly height: number | null;
  readonly formatName: string | null;
  readonly sizeBytes: number | null;
}

export type MediaKind = 'video' | 'image';

/**
 * One queued unit of work
 */
export interface TaskItem {
  readonly path: string;
  readonly kind: MediaKind;
}

/**
 * Classify a file by its extension alone
 */
export function detectMediaKind(filePath: string): MediaKind | null {
  const ext = getExtension(filePath);
  if (VIDEO_EXTENSIONS.has(ext)) return 'video';
  if (IMAGE_EXTENSIONS.has(ext)) return 'image';
  return null;
}

/**
 * Create a task for a supported file, or null for anything else
 */
export function createTaskItem(filePath: string): TaskItem | null {
  const kind = detectMediaKind(filePath);
  return kind ? { path: filePath, kind } : null;
}
