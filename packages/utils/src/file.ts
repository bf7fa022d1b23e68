/**
 * File Operations
 * 
 * Safe file operations with proper error handling.
 */

import { 
  mkdir, 
  writeFile, 
  readFile, 
  stat, 
  unlink,
  access,
} from 'node:fs/promises';
import { dirname } from 'node:path';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Safely write a file, ensuring the directory exists
 */
export async function safeWriteFile(
  filePath: string,
  content: string | Buffer
): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, content, 'utf8');
}

/**
 * Safely read a file, returning null if it doesn't exist
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Check whether a path exists
 */
export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Delete a file; a file that is already gone is not an error
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await unlink(filePath);
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
}

/**
 * Get file size in bytes, or null when the file can't be stat'ed
 */
export async function getFileSizeBytes(filePath: string): Promise<number | null> {
  try {
    const stats = await stat(filePath);
    return stats.size;
  } catch {
    return null;
  }
}
