/**
 * JSON read helpers and content digests for tasklane state files.
 */

import { createHash } from 'node:crypto';
import { safeReadFile } from './atomic.js';
import { TasklaneError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;
  return parseJsonText(content, filePath);
}

/**
 * Parse JSON text, mapping syntax errors to a VALIDATION_ERROR naming the file.
 */
export function parseJsonText(content: string, source: string): unknown {
  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    throw new TasklaneError(
      ExitCode.VALIDATION_ERROR,
      `Invalid JSON in: ${source}`,
      { cause: err },
    );
  }
}

/**
 * Full SHA-256 hex digest of raw file content.
 */
export function sha256(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/** True when a parsed JSON value is a plain object. */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
