/**
 * Binary Discovery Tests
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { discoverBinaries, findOnPath } from './binaries.js';

describe('Binary Discovery', () => {
  let dir: string;
  let binDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'transcode-kit-bin-'));
    binDir = join(dir, 'tools');
    await mkdir(binDir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function touch(...names: string[]): Promise<void> {
    await Promise.all(names.map((name) => writeFile(join(binDir, name), '')));
  }

  it('should prefer the environment variable and find ffprobe beside it', async () => {
    await touch('ffmpeg', 'ffprobe');
    const found = discoverBinaries({
      env: { FFMPEG_PATH: join(binDir, 'ffmpeg') },
      platform: 'linux',
      localDirs: [],
    });

    expect(found.ffmpeg).toEqual({
      name: 'ffmpeg',
      envVar: 'FFMPEG_PATH',
      resolvedPath: join(binDir, 'ffmpeg'),
      source: 'env',
    });
    expect(found.ffprobe.source).toBe('sibling');
    expect(found.ffprobe.resolvedPath).toBe(join(binDir, 'ffprobe'));
  });

  it('should ignore an environment path that does not exist', async () => {
    await touch('ffmpeg');
    const found = discoverBinaries({
      env: { FFMPEG_PATH: join(dir, 'missing'), PATH: binDir },
      platform: 'linux',
      localDirs: [],
    });
    expect(found.ffmpeg.source).toBe('path');
  });

  it('should search local folders before PATH', async () => {
    await touch('ffmpeg');
    const found = discoverBinaries({ env: {}, platform: 'linux', localDirs: [binDir] });
    expect(found.ffmpeg.source).toBe('local');
  });

  it('should use the .exe name on Windows', async () => {
    await touch('ffmpeg.exe');
    expect(findOnPath('ffmpeg.exe', { PATH: binDir })).toBe(join(binDir, 'ffmpeg.exe'));
    const found = discoverBinaries({ env: {}, platform: 'win32', localDirs: [binDir] });
    expect(found.ffmpeg.resolvedPath).toBe(join(binDir, 'ffmpeg.exe'));
  });

  it('should resolve to null when nothing is found', () => {
    const found = discoverBinaries({ env: { PATH: '' }, platform: 'linux', localDirs: [] });
    expect(found.ffmpeg).toEqual({ name: 'ffmpeg', envVar: 'FFMPEG_PATH', resolvedPath: null, source: null });
    expect(found.ffprobe.resolvedPath).toBeNull();
  });
});
