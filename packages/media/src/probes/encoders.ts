/**
 * Encoder Capability Detection
 *
 * Parses `ffmpeg -hide_banner -encoders`, whose body looks like:
 *
 *   Encoders:
 *    V..... = Video
 *    ...
 *    ------
 *    V....D libx264              libx264 H.264 / AVC / MPEG-4 AVC (codec h264)
 */

import { createLogger, executeCommand } from '@transcode-kit/utils';

const log = createLogger({ module: 'encoders' });

/**
 * Extract encoder identifiers, one per line of the listing
 */
export function parseEncoderList(stdout: string): Set<string> {
  const encoders = new Set<string>();
  let inBody = false;

  for (const rawLine of stdout.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('Encoders:')) continue;
    if (line.startsWith('--')) {
      inBody = true;
      continue;
    }
    const parts = line.split(/\s+/);
    // Legend lines ("V..... = Video") come before the dashed separator
    if (!inBody && parts[1] === '=') continue;
    const id = parts[1];
    if (id) {
      encoders.add(id);
    }
  }

  return encoders;
}

export class EncoderDetector {
  private cached: Set<string> | null = null;

  constructor(private readonly ffmpegPath: string) {}

  /**
   * List available encoders. Runs once and caches the result unless `refresh`
   * is set. Any failure yields an empty set.
   */
  async detectEncoders(refresh = false): Promise<Set<string>> {
    if (this.cached && !refresh) {
      return this.cached;
    }

    let encoders = new Set<string>();
    try {
      const result = await executeCommand(this.ffmpegPath, ['-hide_banner', '-encoders'], {
        timeout: 15000,
      });
      if (result.exitCode === 0) {
        encoders = parseEncoderList(result.stdout);
      } else {
        log.warn({ exitCode: result.exitCode }, 'Encoder listing failed');
      }
    } catch (error) {
      log.warn({ error }, 'Encoder listing could not be started');
    }

    log.debug({ count: encoders.size }, 'Encoders detected');
    this.cached = encoders;
    return encoders;
  }
}
