/**
 * Events a conversion run reports to its presentation layer
 */

import type { MediaInfo, TaskState } from '@transcode-kit/core';
import type { ProgressSnapshot } from './progressParser.js';

export type RunLogLevel = 'info' | 'warn' | 'error' | 'ok';

export type ConversionEvent =
  | { type: 'log'; level: RunLogLevel; message: string }
  | { type: 'status'; message: string }
  | ({ type: 'progress' } & ProgressSnapshot)
  | { type: 'probe'; path: string; info: MediaInfo }
  | { type: 'file-done'; path: string; state: TaskState }
  | { type: 'run-failed'; message: string }
  | { type: 'run-completed'; cancelled: boolean };

export type ConversionEventType = ConversionEvent['type'];

/**
 * Progress events supersede each other, so a full channel may drop old ones
 */
export function isSupersedable(event: ConversionEvent): boolean {
  return event.type === 'progress';
}
