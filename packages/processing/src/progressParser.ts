/**
 * Progress Parser
 *
 * Reads ffmpeg's `-progress pipe:1` stream (blocks of `key=value` lines, each
 * block closed by `progress=continue` or `progress=end`) and turns it into
 * per-file and whole-run percentages and ETAs.
 */

import { parseFFmpegTime } from '@transcode-kit/utils';

export interface ProgressSnapshot {
  /** 0-100, null without a known file duration */
  filePercent: number | null;
  /** Seconds of output written so far */
  outTime: number;
  fileDuration: number | null;
  /** Seconds */
  fileEta: number | null;
  /** 0-100 */
  totalPercent: number;
  totalEta: number | null;
}

/**
 * Where the run stood when the current file started
 */
export interface RunPosition {
  totalFiles: number;
  /** Sum of the probed durations of every video in the run (0 when unknown) */
  totalDuration: number;
  doneFiles: number;
  doneDuration: number;
  /** Epoch milliseconds */
  runStartedAt: number;
}

export type Clock = () => number;

/**
 * Remaining time extrapolated from the elapsed time and the fraction done
 */
export function estimateEta(elapsedSeconds: number, fraction: number): number | null {
  if (!(fraction > 0)) {
    return null;
  }
  const total = elapsedSeconds / fraction;
  return Math.max(total - elapsedSeconds, 0);
}

function toPercent(fraction: number): number {
  return Math.max(0, Math.min(100, fraction * 100));
}

export class FFmpegProgressParser {
  private outTime = 0;
  private speed: number | null = null;
  private readonly fileStartedAt: number;

  constructor(
    private readonly fileDuration: number | null,
    private readonly run: RunPosition,
    private readonly now: Clock = Date.now
  ) {
    this.fileStartedAt = now();
  }

  /**
   * Feed one line. Returns a snapshot when the line closes a progress block.
   */
  parseLine(rawLine: string): ProgressSnapshot | null {
    const line = rawLine.trim();
    const separator = line.indexOf('=');
    if (separator <= 0) {
      return null;
    }
    const key = line.slice(0, separator);
    const value = line.slice(separator + 1).trim();

    switch (key) {
      // Both are microseconds despite the name
      case 'out_time_us':
      case 'out_time_ms': {
        const micros = Number.parseInt(value, 10);
        if (Number.isFinite(micros)) {
          this.outTime = Math.max(0, micros / 1_000_000);
        }
        break;
      }
      case 'out_time': {
        const parsed = parseFFmpegTime(value);
        if (parsed !== null) {
          this.outTime = Math.max(0, parsed);
        }
        break;
      }
      case 'speed': {
        const parsed = Number.parseFloat(value.replace('x', ''));
        if (Number.isFinite(parsed)) {
          this.speed = parsed;
        }
        break;
      }
      case 'progress':
        return this.snapshot();
    }
    return null;
  }

  getOutTime(): number {
    return this.outTime;
  }

  getSpeed(): number | null {
    return this.speed;
  }

  /**
   * Percentages and ETAs for the values seen so far
   */
  snapshot(): ProgressSnapshot {
    const now = this.now();
    const duration = this.fileDuration !== null && this.fileDuration > 0 ? this.fileDuration : null;

    let fileFraction: number | null = null;
    let fileEta: number | null = null;
    if (duration !== null) {
      fileFraction = Math.min(this.outTime / duration, 1);
      if (this.speed !== null && this.speed > 0) {
        fileEta = Math.max((duration - this.outTime) / this.speed, 0);
      } else {
        const elapsed = Math.max((now - this.fileStartedAt) / 1000, 0.001);
        fileEta = estimateEta(elapsed, fileFraction);
      }
    }

    const { totalDuration, totalFiles, doneFiles, doneDuration, runStartedAt } = this.run;
    const totalFraction =
      totalDuration > 0
        ? Math.min((doneDuration + this.outTime) / totalDuration, 1)
        : (doneFiles + (fileFraction ?? 0)) / Math.max(totalFiles, 1);
    const runElapsed = Math.max((now - runStartedAt) / 1000, 0);

    return {
      filePercent: fileFraction === null ? null : toPercent(fileFraction),
      outTime: this.outTime,
      fileDuration: duration,
      fileEta,
      totalPercent: toPercent(totalFraction),
      totalEta: estimateEta(runElapsed, totalFraction),
    };
  }
}
