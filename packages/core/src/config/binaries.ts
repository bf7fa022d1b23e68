/**
 * Binary Configuration
 *
 * Locates the external transcoder (ffmpeg) and its companion prober (ffprobe).
 *
 * Priority order:
 * 1. Environment variable (FFMPEG_PATH / FFPROBE_PATH)
 * 2. For ffprobe: the directory of the resolved ffmpeg
 * 3. Bundled binary folder (binaries/<os>/ at the repository root)
 * 4. Current working directory, then ./bin
 * 5. Every directory on PATH
 */

import { existsSync, statSync } from 'node:fs';
import { delimiter, dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Binary folder location - relative to packages/core/src/config/
const BINARY_ROOT = resolve(__dirname, '../../../../binaries');

/**
 * OS-specific subfolder
 */
function getOsFolder(platform: NodeJS.Platform): string {
  switch (platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

export interface BinaryConfig {
  name: string;
  envVar: string;
  resolvedPath: string | null;
  source: 'env' | 'sibling' | 'local' | 'path' | null;
}

export interface BinariesConfig {
  ffmpeg: BinaryConfig;
  ffprobe: BinaryConfig;
}

export interface DiscoveryOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  cwd?: string;
  /** Replaces the default local search folders */
  localDirs?: string[];
}

function isFile(filePath: string): boolean {
  try {
    return existsSync(filePath) && statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Search each directory on PATH for an executable
 */
export function findOnPath(
  exeName: string,
  env: NodeJS.ProcessEnv = process.env
): string | null {
  const pathVar = env['PATH'] ?? env['Path'] ?? '';
  for (const dir of pathVar.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, exeName);
    if (isFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

function resolveBinaryPath(
  name: string,
  envVar: string,
  options: DiscoveryOptions,
  siblingDir?: string
): BinaryConfig {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const cwd = options.cwd ?? process.cwd();
  const exeName = platform === 'win32' ? `${name}.exe` : name;

  const envPath = env[envVar];
  if (envPath && isFile(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  if (siblingDir) {
    const sibling = join(siblingDir, exeName);
    if (isFile(sibling)) {
      return { name, envVar, resolvedPath: sibling, source: 'sibling' };
    }
  }

  const localDirs = options.localDirs ?? [
    join(BINARY_ROOT, getOsFolder(platform)),
    cwd,
    join(cwd, 'bin'),
  ];
  for (const dir of localDirs) {
    const candidate = join(dir, exeName);
    if (isFile(candidate)) {
      return { name, envVar, resolvedPath: candidate, source: 'local' };
    }
  }

  const onPath = findOnPath(exeName, env);
  if (onPath) {
    return { name, envVar, resolvedPath: onPath, source: 'path' };
  }

  return { name, envVar, resolvedPath: null, source: null };
}

/**
 * Discover ffmpeg and ffprobe. Missing binaries resolve to `null`.
 */
export function discoverBinaries(options: DiscoveryOptions = {}): BinariesConfig {
  const ffmpeg = resolveBinaryPath('ffmpeg', 'FFMPEG_PATH', options);
  const ffprobe = resolveBinaryPath(
    'ffprobe',
    'FFPROBE_PATH',
    options,
    ffmpeg.resolvedPath ? dirname(resolve(ffmpeg.resolvedPath)) : undefined
  );
  return { ffmpeg, ffprobe };
}

/**
 * Get the bundled binary folder paths for user reference
 */
export function getBinaryFolders(platform: NodeJS.Platform = process.platform): { root: string; os: string } {
  return {
    root: BINARY_ROOT,
    os: join(BINARY_ROOT, getOsFolder(platform)),
  };
}
