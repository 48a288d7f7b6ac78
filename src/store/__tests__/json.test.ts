/**
 * Tests for JSON reads and digests.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { readJson, sha256, parseJsonText, isJsonObject } from '../json.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('readJson', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tasklane-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads and parses valid JSON', async () => {
    const filePath = join(tempDir, 'data.json');
    await writeFile(filePath, '{"key": "value"}');
    expect(await readJson(filePath)).toEqual({ key: 'value' });
  });

  it('returns null for missing files', async () => {
    expect(await readJson(join(tempDir, 'missing.json'))).toBeNull();
  });

  it('throws VALIDATION_ERROR naming the file on invalid JSON', async () => {
    const filePath = join(tempDir, 'bad.json');
    await writeFile(filePath, '{invalid}');
    await expect(readJson(filePath)).rejects.toMatchObject({
      code: ExitCode.VALIDATION_ERROR,
      message: `Invalid JSON in: ${filePath}`,
    });
  });
});

describe('parseJsonText', () => {
  it('names the source in the error', () => {
    expect(() => parseJsonText('nope', 'plan.json')).toThrow('Invalid JSON in: plan.json');
  });
});

describe('sha256', () => {
  it('is the full hex digest', () => {
    expect(sha256('')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });
});

describe('isJsonObject', () => {
  it('accepts plain objects only', () => {
    expect(isJsonObject({})).toBe(true);
    expect(isJsonObject([])).toBe(false);
    expect(isJsonObject(null)).toBe(false);
    expect(isJsonObject('x')).toBe(false);
  });
});
