/**
 * Path Utilities
 */

import { join, extname, basename } from 'node:path';
import { homedir } from 'node:os';
import { pathExists } from './file.js';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Expand a leading `~` to the user's home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') return homedir();
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return join(homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Pick an output path in `outDir` named after `inputPath` that does not exist yet.
 *
 * `clip.mp4` → `clip.mp4`, then `clip (1).mp4`, `clip (2).mp4`, ...
 */
export async function safeOutputName(
  outDir: string,
  inputPath: string,
  outExt: string
): Promise<string> {
  const ext = outExt.replace(/^\./, '');
  const base = getBasename(inputPath);

  const first = join(outDir, `${base}.${ext}`);
  if (!(await pathExists(first))) {
    return first;
  }

  for (let i = 1; ; i++) {
    const candidate = join(outDir, `${base} (${i}).${ext}`);
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }
}
