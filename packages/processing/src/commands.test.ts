/**
 * Command Assembler Tests
 */

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { createSettings, type ConversionSettings } from '@transcode-kit/core';
import {
  buildImageCommand,
  buildMergeCommand,
  buildTrimArgs,
  buildVideoCommand,
  concatManifestLine,
  jpegQualityScale,
  planVideo,
  writeConcatManifest,
} from './commands.js';
import { fastCopyAllowed } from './fastPath.js';

function videoCommand(
  settings: ConversionSettings,
  input: string,
  output: string,
  capabilities: ReadonlySet<string> = new Set(['libx264']),
  fastCopy = false
): string[] {
  const plan = planVideo(settings, output.slice(output.lastIndexOf('.')), { fileExists: () => true });
  return buildVideoCommand(input, output, { settings, plan, fastCopy, capabilities });
}

describe('Command Assembler', () => {
  describe('buildTrimArgs', () => {
    it('should format both ends with millisecond precision', () => {
      const settings = createSettings({ trimStart: 1.5, trimEnd: 4 });
      expect(buildTrimArgs(settings)).toEqual(['-ss', '1.500', '-to', '4.000']);
    });

    it('should accept an end without a start', () => {
      expect(buildTrimArgs(createSettings({ trimEnd: 4 }))).toEqual(['-to', '4.000']);
    });

    it('should drop an end that is not after the start', () => {
      const warn = vi.fn();
      const settings = createSettings({ trimStart: 10, trimEnd: 5 });
      expect(buildTrimArgs(settings, warn)).toEqual(['-ss', '10.000']);
      expect(warn).toHaveBeenCalledWith('Trim end is not after trim start. Ignoring end.');
    });
  });

  describe('buildVideoCommand', () => {
    it('should stream copy clip.mov into mp4', () => {
      const settings = createSettings({ fastCopy: true });
      const plan = planVideo(settings, 'mp4');
      const decision = fastCopyAllowed({
        inputPath: '/in/clip.mov',
        outExt: plan.outExt,
        info: {
          duration: 10,
          videoCodec: 'h264',
          audioCodec: 'aac',
          width: 1920,
          height: 1080,
          formatName: 'mov,mp4,m4a,3gp,3g2,mj2',
          sizeBytes: 2048,
        },
        videoFiltersUsed: plan.filter.kind !== 'none',
        audioFilterUsed: plan.audioFilter !== null,
      });
      expect(decision).toEqual({ allowed: true });

      const args = buildVideoCommand('/in/clip.mov', '/out/clip.mp4', {
        settings,
        plan,
        fastCopy: decision.allowed,
        capabilities: new Set(),
      });
      expect(args).toEqual([
        '-n', '-i', '/in/clip.mov',
        '-map', '0', '-c', 'copy',
        '-movflags', '+faststart',
        '/out/clip.mp4',
      ]);
    });

    it('should re-encode with the default software pipeline', () => {
      const args = videoCommand(createSettings({ overwrite: true }), '/in/a.mkv', '/out/a.mp4');
      expect(args).toEqual([
        '-y', '-i', '/in/a.mkv',
        '-map', '0:v:0?', '-map', '0:a:0?',
        '-c:v', 'libx264', '-preset', 'medium', '-crf', '23', '-pix_fmt', 'yuv420p',
        '-c:a', 'aac', '-b:a', '192k',
        '-movflags', '+faststart',
        '/out/a.mp4',
      ]);
    });

    it('should put trim args right after the input', () => {
      const settings = createSettings({ trimStart: 10, trimEnd: 5 });
      const args = videoCommand(settings, '/in/a.mp4', '/out/a.mkv');
      expect(args.slice(0, 5)).toEqual(['-n', '-i', '/in/a.mp4', '-ss', '10.000']);
      expect(args).not.toContain('-to');
    });

    it('should drop audio and codecs for GIF', () => {
      const settings = createSettings({ outVideoFormat: 'gif' });
      expect(videoCommand(settings, '/in/a.mp4', '/out/a.gif')).toEqual([
        '-n', '-i', '/in/a.mp4',
        '-vf', 'fps=12,scale=640:-1:flags=lanczos',
        '-map', '0:v:0?', '-an',
        '/out/a.gif',
      ]);
    });

    it('should use opus, tempo and metadata policy for WebM', () => {
      const settings = createSettings({
        outVideoFormat: 'webm',
        hwEncoder: 'cpu',
        crf: 30,
        speed: 2,
        stripMetadata: true,
        copyMetadata: true,
        metaTitle: ' Trip ',
        metaAuthor: 'Ann',
      });
      expect(videoCommand(settings, '/in/a.mp4', '/out/a.webm', new Set())).toEqual([
        '-n', '-i', '/in/a.mp4',
        '-vf', 'setpts=PTS/2',
        '-map', '0:v:0?', '-map', '0:a:0?',
        '-filter:a', 'atempo=2.000',
        '-c:v', 'libvpx-vp9', '-crf', '30', '-b:v', '0',
        '-c:a', 'libopus', '-b:a', '128k',
        '-map_metadata', '-1',
        '-metadata', 'title=Trip',
        '-metadata', 'artist=Ann',
        '/out/a.webm',
      ]);
    });

    it('should copy metadata and add comment and copyright', () => {
      const settings = createSettings({
        copyMetadata: true,
        metaComment: 'cut',
        metaCopyright: '2024 Example',
      });
      const args = videoCommand(settings, '/in/a.mp4', '/out/a.mkv');
      expect(args.slice(-7)).toEqual([
        '-map_metadata', '0',
        '-metadata', 'comment=cut',
        '-metadata', 'copyright=2024 Example',
        '/out/a.mkv',
      ]);
    });

    it('should use the hardware encoder without a speed preset', () => {
      const args = videoCommand(createSettings(), '/in/a.mp4', '/out/b.mp4', new Set(['libx264', 'h264_nvenc']));
      const codecStart = args.indexOf('-c:v');
      expect(args.slice(codecStart, codecStart + 12)).toEqual([
        '-c:v', 'h264_nvenc',
        '-rc:v', 'vbr', '-cq', '23', '-b:v', '0',
        '-pix_fmt', 'yuv420p',
        '-c:a', 'aac',
      ]);
      expect(args).not.toContain('-preset');
    });

    it('should map the complex graph output for blur portrait', () => {
      const settings = createSettings({ portrait: 'blur-1080x1920' });
      const args = videoCommand(settings, '/in/wide.mp4', '/out/wide.mp4');
      expect(args).not.toContain('-vf');
      const graph = args[args.indexOf('-filter_complex') + 1];
      expect(graph).toContain('[bg]');
      expect(graph).toContain('[fg]');
      expect(graph?.endsWith('[vbase]')).toBe(true);
      expect(args.slice(args.indexOf('-filter_complex') + 2, args.indexOf('-filter_complex') + 4)).toEqual([
        '-map', '[vbase]',
      ]);
    });

    it('should attach the watermark as the second input', () => {
      const settings = createSettings({ watermarkPath: '/media/logo.png' });
      const args = videoCommand(settings, '/in/a.mp4', '/out/a.mp4');
      expect(args.slice(0, 5)).toEqual(['-n', '-i', '/in/a.mp4', '-i', '/media/logo.png']);
      expect(args[5]).toBe('-filter_complex');
      expect(args.slice(7, 11)).toEqual(['-map', '[vout]', '-map', '0:a:0?']);
    });
  });

  describe('buildMergeCommand', () => {
    it('should read the manifest through the concat demuxer', () => {
      const settings = createSettings();
      const plan = planVideo(settings, 'mp4');
      expect(
        buildMergeCommand('/tmp/list.txt', '/out/merged.mp4', {
          settings,
          plan,
          fastCopy: true,
          capabilities: new Set(),
        })
      ).toEqual([
        '-n', '-f', 'concat', '-safe', '0', '-i', '/tmp/list.txt',
        '-map', '0', '-c', 'copy',
        '-movflags', '+faststart',
        '/out/merged.mp4',
      ]);
    });

    it('should re-encode a merge when copy is not allowed', () => {
      const settings = createSettings({ overwrite: true, outVideoFormat: 'mkv' });
      const plan = planVideo(settings, 'mkv');
      expect(
        buildMergeCommand('/tmp/list.txt', '/out/merged.mkv', {
          settings,
          plan,
          fastCopy: false,
          capabilities: new Set(['libx264']),
        })
      ).toEqual([
        '-y', '-f', 'concat', '-safe', '0', '-i', '/tmp/list.txt',
        '-map', '0:v:0?', '-map', '0:a:0?',
        '-c:v', 'libx264', '-preset', 'medium', '-crf', '23', '-pix_fmt', 'yuv420p',
        '-c:a', 'aac', '-b:a', '192k',
        '/out/merged.mkv',
      ]);
    });
  });

  describe('buildImageCommand', () => {
    it('should map JPEG quality onto the 2-31 scale', () => {
      expect(jpegQualityScale(100)).toBe(2);
      expect(jpegQualityScale(90)).toBe(5);
      expect(jpegQualityScale(50)).toBe(17);
      expect(jpegQualityScale(1)).toBe(31);
    });

    it('should build a JPEG command', () => {
      expect(buildImageCommand('/in/p.png', '/out/p.jpg', createSettings())).toEqual([
        '-n', '-i', '/in/p.png', '-q:v', '5', '/out/p.jpg',
      ]);
    });

    it('should pass WebP quality through', () => {
      const settings = createSettings({ imageQuality: 80, resizeWidth: 800 });
      expect(buildImageCommand('/in/p.png', '/out/p.webp', settings)).toEqual([
        '-n', '-i', '/in/p.png', '-vf', 'scale=800:-1', '-q:v', '80', '/out/p.webp',
      ]);
    });

    it('should carry no quality flag for PNG', () => {
      const settings = createSettings({ copyMetadata: true });
      expect(buildImageCommand('/in/p.jpg', '/out/p.png', settings)).toEqual([
        '-n', '-i', '/in/p.jpg', '-map_metadata', '0', '/out/p.png',
      ]);
    });
  });

  describe('concat manifest', () => {
    let dir: string | null = null;

    afterEach(async () => {
      if (dir) {
        await rm(dir, { recursive: true, force: true });
        dir = null;
      }
    });

    it('should escape single quotes', () => {
      expect(concatManifestLine("/media/it's.mp4")).toBe("file '/media/it'\\''s.mp4'");
    });

    it('should write one line per input', async () => {
      dir = await mkdtemp(join(tmpdir(), 'transcode-kit-test-'));
      const manifest = await writeConcatManifest(['/media/a.mp4', '/media/b.mp4'], dir);
      expect(manifest.startsWith(dir)).toBe(true);
      expect(await readFile(manifest, 'utf8')).toBe("file '/media/a.mp4'\nfile '/media/b.mp4'\n");
    });
  });
});
