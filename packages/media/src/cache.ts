/**
 * Per-run MediaInfo cache keyed by file path
 */

import type { MediaInfo } from '@transcode-kit/core';

export interface MediaProber {
  probeMedia(filePath: string): Promise<MediaInfo | null>;
}

export class MediaInfoCache {
  private readonly entries = new Map<string, MediaInfo>();

  constructor(private readonly prober: MediaProber) {}

  /**
   * Probe once per path; later calls return the cached facts.
   * Failed probes are not cached so a later run can retry them.
   */
  async get(filePath: string): Promise<MediaInfo | null> {
    const cached = this.entries.get(filePath);
    if (cached) {
      return cached;
    }
    const info = await this.prober.probeMedia(filePath);
    if (info) {
      this.entries.set(filePath, info);
    }
    return info;
  }

  peek(filePath: string): MediaInfo | undefined {
    return this.entries.get(filePath);
  }

  clear(): void {
    this.entries.clear();
  }

  snapshot(): ReadonlyMap<string, MediaInfo> {
    return new Map(this.entries);
  }
}
