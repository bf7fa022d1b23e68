/**
 * Settings Input Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_SETTINGS, createSettings } from '@transcode-kit/core';
import { optionsToSettings, parseCrop, parseResize } from './settingsInput.js';

describe('optionsToSettings', () => {
  it('should return the base unchanged without options', () => {
    const warn = vi.fn();
    expect(optionsToSettings({}, DEFAULT_SETTINGS, warn)).toEqual(DEFAULT_SETTINGS);
    expect(warn).not.toHaveBeenCalled();
  });

  it('should map every kind of option', () => {
    const warn = vi.fn();
    const settings = optionsToSettings(
      {
        format: 'WEBM',
        crf: '30',
        resize: '1280x',
        crop: '640x360+0+60',
        rotate: 'cw90',
        speed: '1.5',
        merge: 'holiday',
        textBox: true,
        trimStart: '1:30',
        trimEnd: '95.5',
        title: 'Trip',
        hw: 'nvidia',
      },
      DEFAULT_SETTINGS,
      warn
    );

    expect(warn).not.toHaveBeenCalled();
    expect(settings).toMatchObject({
      outVideoFormat: 'webm',
      crf: 30,
      resizeWidth: 1280,
      resizeHeight: null,
      cropWidth: 640,
      cropHeight: 360,
      cropX: 0,
      cropY: 60,
      rotate: 'cw90',
      speed: 1.5,
      merge: true,
      mergeName: 'holiday',
      textBox: true,
      textBoxColor: 'black',
      trimStart: 90,
      trimEnd: 95.5,
      metaTitle: 'Trip',
      hwEncoder: 'nvidia',
    });
  });

  it('should keep preset values that are not overridden', () => {
    const base = createSettings({ crf: 19, outVideoFormat: 'mkv' });
    const settings = optionsToSettings({ overwrite: true }, base, vi.fn());
    expect(settings.crf).toBe(19);
    expect(settings.outVideoFormat).toBe('mkv');
    expect(settings.overwrite).toBe(true);
  });

  it('should keep the default merge name for a bare --merge', () => {
    const settings = optionsToSettings({ merge: true }, DEFAULT_SETTINGS, vi.fn());
    expect(settings.merge).toBe(true);
    expect(settings.mergeName).toBe('merged');
  });

  it('should warn about an unknown choice and keep the base', () => {
    const warn = vi.fn();
    const settings = optionsToSettings({ format: 'flv' }, DEFAULT_SETTINGS, warn);
    expect(settings.outVideoFormat).toBe('mp4');
    expect(warn).toHaveBeenCalledWith(
      'Unknown format "flv" (expected one of: mp4, mkv, webm, mov, avi, gif). Keeping mp4.'
    );
  });

  it('should clamp the CRF into range', () => {
    const warn = vi.fn();
    expect(optionsToSettings({ crf: '50' }, DEFAULT_SETTINGS, warn).crf).toBe(35);
    expect(warn).toHaveBeenCalledWith('CRF must be between 14 and 35. Using 35.');
  });

  it('should accept watermark scales up to 200 percent', () => {
    const warn = vi.fn();
    expect(optionsToSettings({ watermarkScale: '150' }, DEFAULT_SETTINGS, warn).watermarkScale).toBe(150);
    expect(warn).not.toHaveBeenCalled();

    expect(optionsToSettings({ watermarkScale: '250' }, DEFAULT_SETTINGS, warn).watermarkScale).toBe(200);
    expect(warn).toHaveBeenCalledWith('Watermark scale must be between 1 and 200. Using 200.');
  });

  it('should reject a speed beyond the double range', () => {
    const warn = vi.fn();
    expect(optionsToSettings({ speed: '1e400' }, DEFAULT_SETTINGS, warn).speed).toBeNull();
    expect(warn).toHaveBeenCalledWith('Invalid speed "1e400". Ignoring it.');
  });

  it('should treat a non-positive speed as unset', () => {
    const warn = vi.fn();
    const base = createSettings({ speed: 2 });
    expect(optionsToSettings({ speed: '0' }, base, warn).speed).toBeNull();
    expect(warn).toHaveBeenCalledWith('Speed must be greater than 0. Ignoring it.');
  });

  it('should ignore an unparsable speed', () => {
    const warn = vi.fn();
    expect(optionsToSettings({ speed: 'fast' }, DEFAULT_SETTINGS, warn).speed).toBeNull();
    expect(warn).toHaveBeenCalledWith('Invalid speed "fast". Ignoring it.');
  });

  it('should reject malformed trim times', () => {
    const warn = vi.fn();
    expect(optionsToSettings({ trimStart: 'abc' }, DEFAULT_SETTINGS, warn).trimStart).toBeNull();
    expect(warn).toHaveBeenCalledWith('Invalid trim start "abc". Use seconds, MM:SS or HH:MM:SS.');
  });

  it('should drop a font file that does not exist', () => {
    const warn = vi.fn();
    const settings = optionsToSettings({ font: '/fonts/none.ttf' }, DEFAULT_SETTINGS, warn, () => false);
    expect(settings.textFont).toBe('');
    expect(warn).toHaveBeenCalledWith('Font file not found: /fonts/none.ttf');
  });
});

describe('parseResize', () => {
  it('should accept one or both sides', () => {
    expect(parseResize('1280x720')).toEqual({ width: 1280, height: 720 });
    expect(parseResize('x720')).toEqual({ width: null, height: 720 });
  });

  it('should reject sizes without any side', () => {
    expect(parseResize('x')).toBeNull();
    expect(parseResize('0x0')).toBeNull();
    expect(parseResize('big')).toBeNull();
  });
});

describe('parseCrop', () => {
  it('should read the optional offset', () => {
    expect(parseCrop('640x360')).toEqual({ width: 640, height: 360, x: null, y: null });
    expect(parseCrop('640x360+10+20')).toEqual({ width: 640, height: 360, x: 10, y: 20 });
  });

  it('should reject empty rectangles', () => {
    expect(parseCrop('0x10')).toBeNull();
    expect(parseCrop('640x')).toBeNull();
  });
});
