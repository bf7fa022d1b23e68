/**
 * Path Utilities Tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { expandHome, getBasename, getExtension, safeOutputName } from './path.js';

describe('Path Utilities', () => {
  describe('getExtension', () => {
    it('should lowercase and drop the dot', () => {
      expect(getExtension('/media/Clip.MP4')).toBe('mp4');
      expect(getExtension('README')).toBe('');
    });
  });

  describe('getBasename', () => {
    it('should strip only the last extension', () => {
      expect(getBasename('/media/clip.final.mov')).toBe('clip.final');
    });
  });

  describe('expandHome', () => {
    it('should expand a leading tilde', () => {
      expect(expandHome('~/videos')).toBe(join(homedir(), 'videos'));
      expect(expandHome('~')).toBe(homedir());
      expect(expandHome('/abs/~/x')).toBe('/abs/~/x');
    });
  });

  describe('safeOutputName', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'transcode-kit-path-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should use the input name with the new extension', async () => {
      expect(await safeOutputName(dir, '/elsewhere/clip.mov', '.mp4')).toBe(join(dir, 'clip.mp4'));
    });

    it('should count up past existing files', async () => {
      await writeFile(join(dir, 'clip.mp4'), '');
      await writeFile(join(dir, 'clip (1).mp4'), '');
      expect(await safeOutputName(dir, '/elsewhere/clip.mov', 'mp4')).toBe(join(dir, 'clip (2).mp4'));
    });
  });
});
