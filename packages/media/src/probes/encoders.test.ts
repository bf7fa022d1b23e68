/**
 * Encoder Listing Tests
 */

import { describe, it, expect } from 'vitest';
import { EncoderDetector, parseEncoderList } from './encoders.js';

const LISTING = [
  'Encoders:',
  ' V..... = Video',
  ' A..... = Audio',
  ' .F.... = Frame-level multithreading',
  ' ------',
  ' V....D libx264              libx264 H.264 / AVC / MPEG-4 AVC (codec h264)',
  ' V....D h264_nvenc           NVIDIA NVENC H.264 encoder (codec h264)',
  ' A....D aac                  AAC (Advanced Audio Coding)',
  '',
].join('\n');

describe('parseEncoderList', () => {
  it('should collect identifiers after the separator', () => {
    expect([...parseEncoderList(LISTING)]).toEqual(['libx264', 'h264_nvenc', 'aac']);
  });

  it('should handle CRLF output', () => {
    expect(parseEncoderList(LISTING.replace(/\n/g, '\r\n')).has('aac')).toBe(true);
  });

  it('should return an empty set for empty output', () => {
    expect(parseEncoderList('').size).toBe(0);
  });
});

describe('EncoderDetector', () => {
  it('should cache an empty listing when ffmpeg cannot be started', async () => {
    const detector = new EncoderDetector('/nonexistent/transcode-kit/ffmpeg');
    const first = await detector.detectEncoders();

    expect(first.size).toBe(0);
    expect(await detector.detectEncoders()).toBe(first);
    expect(await detector.detectEncoders(true)).not.toBe(first);
  });
});
