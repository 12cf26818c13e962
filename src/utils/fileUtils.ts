import { promises as fs } from 'fs';
import { constants } from 'fs';
import path from 'path';
import { isErrorWithCode } from '../types/index.js';

/**
 * File utilities for atomic operations and safe file handling
 */

function isNotFound(error: unknown): boolean {
  return isErrorWithCode(error) && error.code === 'ENOENT';
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.access(dirPath, constants.F_OK);
  } catch {
    await fs.mkdir(dirPath, { recursive: true });
  }
}

/**
 * Write data to a file atomically using temp file + rename
 */
export async function writeFileAtomic(filePath: string, data: string): Promise<void> {
  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}.${Math.random().toString(36).slice(2, 11)}`;

  try {
    await ensureDirectory(path.dirname(filePath));

    const handle = await fs.open(tempPath, 'w');
    try {
      await handle.writeFile(data, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    // Atomic rename
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await removeFileSafe(tempPath);
    throw error;
  }
}

/**
 * Read a file safely, returning null if it doesn't exist
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * List all files below a directory (recursively) with a specific extension.
 * Paths are returned relative to `dirPath`, using forward slashes.
 */
export async function listFilesRecursive(dirPath: string, extension: string): Promise<string[]> {
  const results: string[] = [];

  async function walk(current: string, relative: string): Promise<void> {
    let entries;
    try {
      entries = await fs.readdir(current, { withFileTypes: true });
    } catch (error) {
      if (isNotFound(error)) {
        return;
      }
      throw error;
    }

    for (const entry of entries) {
      const entryRelative = relative ? `${relative}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        // proper-lockfile keeps its lock as a "<file>.lock" directory
        if (!entry.name.endsWith('.lock')) {
          await walk(path.join(current, entry.name), entryRelative);
        }
      } else if (entry.isFile() && entry.name.endsWith(extension)) {
        results.push(entryRelative);
      }
    }
  }

  await walk(dirPath, '');
  return results.sort();
}

/**
 * Remove a file safely (no error if it doesn't exist)
 */
export async function removeFileSafe(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
}

/**
 * Rename a file, returning false if the source doesn't exist
 */
export async function renameSafe(fromPath: string, toPath: string): Promise<boolean> {
  try {
    await fs.rename(fromPath, toPath);
    return true;
  } catch (error) {
    if (isNotFound(error)) {
      return false;
    }
    throw error;
  }
}
