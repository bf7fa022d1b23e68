/**
 * CLI Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { parseCliConfig } from './index.js';

describe('parseCliConfig', () => {
  it('should default to folders under the home directory', () => {
    expect(parseCliConfig({}, '/home/tester')).toEqual({
      logLevel: 'warn',
      configDir: '/home/tester/.transcode-kit',
      presetFile: '/home/tester/.transcode-kit/presets.json',
      defaultOutputDir: '/home/tester/Videos/converted',
    });
  });

  it('should honour explicit locations', () => {
    const config = parseCliConfig(
      { TRANSCODE_KIT_HOME: '/etc/tk', TRANSCODE_KIT_OUTPUT_DIR: '~/out', LOG_LEVEL: 'debug' },
      '/home/tester'
    );
    expect(config.configDir).toBe('/etc/tk');
    expect(config.presetFile).toBe('/etc/tk/presets.json');
    expect(config.defaultOutputDir).toBe('/home/tester/out');
    expect(config.logLevel).toBe('debug');
  });

  it('should reject an unknown log level', () => {
    expect(() => parseCliConfig({ LOG_LEVEL: 'loud' }, '/home/tester')).toThrow();
  });
});
