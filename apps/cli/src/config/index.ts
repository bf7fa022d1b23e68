/**
 * CLI Configuration
 *
 * Imported before anything that creates a logger: the log level has to be in
 * the environment when the shared pino instance is built.
 */

import { config as dotenvConfig } from 'dotenv';
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';

// .env from the working directory
dotenvConfig();

if (process.argv.includes('--debug')) {
  process.env['LOG_LEVEL'] = 'debug';
}
// Diagnostics stay quiet unless asked for; run output goes through the event channel
process.env['LOG_LEVEL'] ??= 'warn';

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  // Read again by binary discovery; validated here so a blank value is reported
  FFMPEG_PATH: z.string().min(1).optional(),
  FFPROBE_PATH: z.string().min(1).optional(),
  TRANSCODE_KIT_HOME: z.string().min(1).default('~/.transcode-kit'),
  TRANSCODE_KIT_OUTPUT_DIR: z.string().min(1).default('~/Videos/converted'),
});

export interface CliConfig {
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  configDir: string;
  presetFile: string;
  defaultOutputDir: string;
}

function resolveHomePath(p: string, home: string): string {
  if (p === '~') return home;
  if (p.startsWith('~/') || p.startsWith('~\\')) {
    return join(home, p.slice(2));
  }
  return isAbsolute(p) ? p : resolve(p);
}

/**
 * Validate the environment. Throws a ZodError listing every bad variable.
 */
export function parseCliConfig(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): CliConfig {
  const parsed = envSchema.parse(env);
  const configDir = resolveHomePath(parsed.TRANSCODE_KIT_HOME, home);

  return {
    logLevel: parsed.LOG_LEVEL,
    configDir,
    presetFile: join(configDir, 'presets.json'),
    defaultOutputDir: resolveHomePath(parsed.TRANSCODE_KIT_OUTPUT_DIR, home),
  };
}

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

export const config: CliConfig = parseCliConfig();
