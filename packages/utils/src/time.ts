/**
 * Time & Size Formatting
 */

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Format seconds as `MM:SS`, or `HH:MM:SS` past an hour. Absent → `--:--`
 */
export function formatClock(seconds: number | null | undefined): string {
  if (seconds === null || seconds === undefined || !Number.isFinite(seconds) || seconds < 0) {
    return '--:--';
  }

  const total = Math.round(seconds);
  const h = Math.floor(total / 3600);
  const m = Math.floor((total % 3600) / 60);
  const s = total % 60;
  const pad = (n: number): string => String(n).padStart(2, '0');

  if (h > 0) {
    return `${pad(h)}:${pad(m)}:${pad(s)}`;
  }
  return `${pad(m)}:${pad(s)}`;
}

/**
 * Format bytes to human readable (one decimal). Absent → `--`
 */
export function formatBytes(bytes: number | null | undefined): string {
  if (bytes === null || bytes === undefined) return '--';

  let value = bytes;
  for (const unit of ['B', 'KB', 'MB', 'GB', 'TB']) {
    if (value < 1024) {
      return `${value.toFixed(1)} ${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)} PB`;
}

/**
 * Parse user time input: `12.5`, `MM:SS` or `HH:MM:SS(.ms)`. Returns null when unparsable
 */
export function parseTimeToSeconds(text: string): number | null {
  const raw = text.trim();
  if (!raw) return null;

  if (/^\d+(\.\d+)?$/.test(raw)) {
    return parseFloat(raw);
  }

  const parts = raw.split(':');
  if (parts.length === 2) {
    const [minutes, seconds] = parts;
    if (/^\d+$/.test(minutes ?? '') && /^\d+(\.\d+)?$/.test(seconds ?? '')) {
      return parseInt(minutes ?? '0', 10) * 60 + parseFloat(seconds ?? '0');
    }
    return null;
  }
  return parseFFmpegTime(raw);
}

/**
 * Parse FFmpeg time format (`HH:MM:SS.micro` or plain seconds) to seconds
 */
export function parseFFmpegTime(value: string): number | null {
  const raw = value.trim();
  if (!raw) return null;

  if (/^\d+(\.\d+)?$/.test(raw)) {
    return parseFloat(raw);
  }

  const match = raw.match(/^(-?\d+):(\d+):(\d+(?:\.\d+)?)$/);
  if (!match) return null;

  const [, hours, minutes, seconds] = match;
  return parseInt(hours ?? '0', 10) * 3600 + parseInt(minutes ?? '0', 10) * 60 + parseFloat(seconds ?? '0');
}
