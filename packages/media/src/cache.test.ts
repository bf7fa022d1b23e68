/**
 * Media Info Cache Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { MediaInfo } from '@transcode-kit/core';
import { MediaInfoCache, type MediaProber } from './cache.js';

const INFO: MediaInfo = {
  duration: 3,
  videoCodec: 'h264',
  audioCodec: null,
  width: 640,
  height: 360,
  formatName: 'mp4',
  sizeBytes: 100,
};

describe('MediaInfoCache', () => {
  it('should probe each path once', async () => {
    const probeMedia = vi.fn(async (_filePath: string): Promise<MediaInfo | null> => INFO);
    const prober: MediaProber = { probeMedia };
    const cache = new MediaInfoCache(prober);

    expect(await cache.get('/in/a.mp4')).toBe(INFO);
    expect(await cache.get('/in/a.mp4')).toBe(INFO);
    expect(probeMedia).toHaveBeenCalledTimes(1);
    expect(cache.peek('/in/a.mp4')).toBe(INFO);
  });

  it('should not cache failed probes', async () => {
    const probeMedia = vi.fn(async (_filePath: string): Promise<MediaInfo | null> => null);
    const cache = new MediaInfoCache({ probeMedia });

    expect(await cache.get('/in/bad.mp4')).toBeNull();
    expect(await cache.get('/in/bad.mp4')).toBeNull();
    expect(probeMedia).toHaveBeenCalledTimes(2);
    expect(cache.peek('/in/bad.mp4')).toBeUndefined();
  });

  it('should hand out detached snapshots and clear', async () => {
    const cache = new MediaInfoCache({ probeMedia: async () => INFO });
    await cache.get('/in/a.mp4');

    const snapshot = cache.snapshot();
    cache.clear();

    expect(snapshot.get('/in/a.mp4')).toBe(INFO);
    expect(cache.snapshot().size).toBe(0);
  });
});
