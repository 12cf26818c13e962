import { createHash } from 'crypto';
import path from 'path';
import { ValidationError } from './errors.js';

export * from './fileUtils.js';
export * from './validation.js';

// Longest encoded path kept verbatim in a lock slot name; longer paths are hashed
const MAX_SLOT_NAME_LENGTH = 200;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Jittered exponential backoff, capped at 32x the base delay
 */
export async function backoff(attempt: number, baseDelayMs: number = 5): Promise<void> {
  const delay = baseDelayMs * Math.min(2 ** attempt, 32);
  await sleep(delay + Math.random() * delay);
}

/**
 * Remove duplicates, keeping first-seen order
 */
export function unique<T>(values: T[]): T[] {
  return values.filter((value, index, self) => self.indexOf(value) === index);
}

/**
 * Normalise a project-relative file path to POSIX form.
 * `src\\a.py`, `./src/a.py` and `src//a.py` all become `src/a.py`.
 */
export function normalizeFilePath(filePath: string): string {
  let normalized = path.posix.normalize(filePath.trim().replace(/\\/g, '/'));
  if (normalized.length > 1) {
    normalized = normalized.replace(/\/+$/, '');
  }
  if (normalized === '.' || normalized === '' || normalized.split('/').includes('..')) {
    throw new ValidationError(`Invalid file path: ${filePath}`, [
      { field: 'files', message: 'File path must name a file inside the project', value: filePath },
    ]);
  }
  return normalized;
}

/**
 * Storage key segment for a file's lock slot: lowercase hex of the path,
 * or a sha256 digest when the encoding would make an overlong file name.
 * Hex keeps distinct paths in distinct files on case-insensitive filesystems.
 */
export function lockSlotName(filePath: string): string {
  const encoded = Buffer.from(filePath, 'utf8').toString('hex');
  if (encoded.length <= MAX_SLOT_NAME_LENGTH) {
    return encoded;
  }
  return `sha256_${createHash('sha256').update(filePath).digest('hex')}`;
}
