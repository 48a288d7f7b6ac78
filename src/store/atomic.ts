/**
 * Atomic file write operations using write-file-atomic.
 * Writes are crash-safe: temp file -> fsync -> rename, so a reader sees
 * either the old content or the new one, never a partial file.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TasklaneError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Write data to a file atomically.
 * Creates parent directories if they don't exist.
 */
export async function atomicWrite(
  filePath: string,
  data: string,
  options?: { mode?: number; encoding?: BufferEncoding },
): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, data, {
      encoding: options?.encoding ?? 'utf8',
      mode: options?.mode,
    });
  } catch (err) {
    throw new TasklaneError(
      ExitCode.FILE_ERROR,
      `Atomic write failed: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Read a file and return its contents.
 * Returns null if the file does not exist.
 */
export async function safeReadFile(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isNotFound(err)) {
      return null;
    }
    throw new TasklaneError(
      ExitCode.FILE_ERROR,
      `Failed to read: ${filePath}`,
      { cause: err },
    );
  }
}

/**
 * Serialize JSON with consistent formatting (2-space indent, trailing newline).
 */
export function serializeJson(data: unknown, indent = 2): string {
  return JSON.stringify(data, null, indent) + '\n';
}

/**
 * Write JSON data atomically with consistent formatting.
 */
export async function atomicWriteJson(
  filePath: string,
  data: unknown,
  options?: { indent?: number },
): Promise<void> {
  await atomicWrite(filePath, serializeJson(data, options?.indent));
}

/** True for an ENOENT error from node:fs. */
export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
