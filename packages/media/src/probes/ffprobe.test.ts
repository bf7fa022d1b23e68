/**
 * FFProbe Output Parsing Tests
 */

import { describe, it, expect } from 'vitest';
import { FFProbe, parseProbeOutput } from './ffprobe.js';

describe('parseProbeOutput', () => {
  it('should take the first video and audio streams', () => {
    const stdout = JSON.stringify({
      format: { duration: '12.5', size: '2048', format_name: 'matroska,webm' },
      streams: [
        { codec_type: 'audio', codec_name: 'opus' },
        { codec_type: 'video', codec_name: 'vp9', width: 1280, height: 720 },
        { codec_type: 'video', codec_name: 'mjpeg', width: 10, height: 10 },
      ],
    });

    expect(parseProbeOutput(stdout)).toEqual({
      duration: 12.5,
      videoCodec: 'vp9',
      audioCodec: 'opus',
      width: 1280,
      height: 720,
      formatName: 'matroska,webm',
      sizeBytes: 2048,
    });
  });

  it('should treat unavailable numbers as unknown', () => {
    const stdout = JSON.stringify({ format: { duration: 'N/A' }, streams: [] });
    expect(parseProbeOutput(stdout)).toEqual({
      duration: null,
      videoCodec: null,
      audioCodec: null,
      width: null,
      height: null,
      formatName: null,
      sizeBytes: null,
    });
  });

  it('should accept an empty object', () => {
    expect(parseProbeOutput('{}')?.duration).toBeNull();
  });

  it('should reject text that is not ffprobe JSON', () => {
    expect(parseProbeOutput('not json')).toBeNull();
    expect(parseProbeOutput('[]')).toBeNull();
  });
});

describe('FFProbe', () => {
  it('should report null when ffprobe cannot be started', async () => {
    const probe = new FFProbe('/nonexistent/transcode-kit/ffprobe');
    expect(await probe.probeMedia('/in/a.mp4')).toBeNull();
  });
});
