/**
 * Progress Parser Tests
 */

import { describe, it, expect } from 'vitest';
import { estimateEta, FFmpegProgressParser, type RunPosition } from './progressParser.js';

function run(overrides: Partial<RunPosition> = {}): RunPosition {
  return {
    totalFiles: 1,
    totalDuration: 0,
    doneFiles: 0,
    doneDuration: 0,
    runStartedAt: 0,
    ...overrides,
  };
}

describe('Progress Parser', () => {
  describe('estimateEta', () => {
    it('should extrapolate from the fraction done', () => {
      expect(estimateEta(10, 0.5)).toBe(10);
      expect(estimateEta(10, 1)).toBe(0);
    });

    it('should return null before any progress', () => {
      expect(estimateEta(10, 0)).toBeNull();
    });
  });

  describe('FFmpegProgressParser', () => {
    it('should emit a snapshot only when a block closes', () => {
      const parser = new FFmpegProgressParser(100, run({ totalFiles: 2, doneFiles: 1 }), () => 10_000);

      expect(parser.parseLine('out_time_us=50000000')).toBeNull();
      expect(parser.parseLine('speed=2.0x')).toBeNull();
      const snapshot = parser.parseLine('progress=continue');

      expect(snapshot).not.toBeNull();
      expect(snapshot?.filePercent).toBe(50);
      expect(snapshot?.outTime).toBe(50);
      expect(snapshot?.fileDuration).toBe(100);
      expect(snapshot?.fileEta).toBe(25);
      expect(snapshot?.totalPercent).toBe(75);
      expect(snapshot?.totalEta).toBeCloseTo(10 / 3, 9);
    });

    it('should fall back to elapsed time without a speed', () => {
      let now = 0;
      const parser = new FFmpegProgressParser(
        200,
        run({ totalFiles: 2, doneFiles: 1, totalDuration: 400, doneDuration: 100 }),
        () => now
      );
      now = 20_000;

      parser.parseLine('out_time=00:00:50.000000');
      const snapshot = parser.parseLine('progress=continue');

      expect(snapshot?.filePercent).toBe(25);
      expect(snapshot?.fileEta).toBe(60);
      expect(snapshot?.totalPercent).toBe(37.5);
      expect(snapshot?.totalEta).toBeCloseTo(100 / 3, 9);
    });

    it('should read out_time_ms as microseconds', () => {
      const parser = new FFmpegProgressParser(10, run());
      parser.parseLine('out_time_ms=1500000');
      expect(parser.getOutTime()).toBe(1.5);
    });

    it('should report no file percentage for an unknown duration', () => {
      const parser = new FFmpegProgressParser(null, run({ totalFiles: 4, doneFiles: 1 }), () => 0);
      parser.parseLine('out_time_us=3000000');
      const snapshot = parser.parseLine('progress=end');

      expect(snapshot?.filePercent).toBeNull();
      expect(snapshot?.fileEta).toBeNull();
      expect(snapshot?.totalPercent).toBe(25);
    });

    it('should ignore malformed and unavailable values', () => {
      const parser = new FFmpegProgressParser(10, run());
      parser.parseLine('out_time_us=2000000');

      expect(parser.parseLine('garbage')).toBeNull();
      expect(parser.parseLine('=orphan')).toBeNull();
      parser.parseLine('speed=N/A');
      parser.parseLine('out_time_us=N/A');

      expect(parser.getSpeed()).toBeNull();
      expect(parser.getOutTime()).toBe(2);
    });

    it('should clamp percentages and negative times', () => {
      const parser = new FFmpegProgressParser(10, run(), () => 0);

      parser.parseLine('out_time_us=-5');
      expect(parser.getOutTime()).toBe(0);

      parser.parseLine('out_time_us=12000000');
      const snapshot = parser.parseLine('progress=end');
      expect(snapshot?.filePercent).toBe(100);
      expect(snapshot?.totalPercent).toBe(100);
    });
  });
});
