/**
 * Tests for atomic file operations.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { atomicWrite, atomicWriteJson, safeReadFile, serializeJson, isNotFound } from '../atomic.js';
import { TasklaneError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('atomicWrite', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tasklane-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes a file atomically', async () => {
    const filePath = join(tempDir, 'task-graph.json');
    await atomicWrite(filePath, '{"version":1}');
    expect(await readFile(filePath, 'utf8')).toBe('{"version":1}');
  });

  it('creates parent directories if needed', async () => {
    const filePath = join(tempDir, '.tasklane', 'backups', 'x.json');
    await atomicWrite(filePath, 'nested');
    expect(await readFile(filePath, 'utf8')).toBe('nested');
  });

  it('overwrites existing files', async () => {
    const filePath = join(tempDir, 'progress.json');
    await atomicWrite(filePath, 'first');
    await atomicWrite(filePath, 'second');
    expect(await readFile(filePath, 'utf8')).toBe('second');
  });

  it('throws FILE_ERROR when the target is a directory', async () => {
    const filePath = join(tempDir, 'occupied');
    await mkdir(filePath);
    const err = await atomicWrite(filePath, 'data').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TasklaneError);
    expect(err).toMatchObject({ code: ExitCode.FILE_ERROR, message: `Atomic write failed: ${filePath}` });
  });
});

describe('atomicWriteJson', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tasklane-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('writes JSON with 2-space indent and a trailing newline', async () => {
    const filePath = join(tempDir, 'data.json');
    await atomicWriteJson(filePath, { sprintId: 'sprint-1', version: 1 });
    expect(await readFile(filePath, 'utf8')).toBe('{\n  "sprintId": "sprint-1",\n  "version": 1\n}\n');
  });

  it('supports custom indentation', async () => {
    const filePath = join(tempDir, 'data.json');
    await atomicWriteJson(filePath, { a: 1 }, { indent: 4 });
    expect(await readFile(filePath, 'utf8')).toBe('{\n    "a": 1\n}\n');
  });
});

describe('serializeJson', () => {
  it('is stable for equal input', () => {
    expect(serializeJson({ b: [1, 2] })).toBe(serializeJson({ b: [1, 2] }));
    expect(serializeJson([])).toBe('[]\n');
  });
});

describe('safeReadFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'tasklane-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('reads existing file', async () => {
    const filePath = join(tempDir, 'test.txt');
    await writeFile(filePath, 'content');
    expect(await safeReadFile(filePath)).toBe('content');
  });

  it('returns null for missing file', async () => {
    expect(await safeReadFile(join(tempDir, 'nonexistent.txt'))).toBeNull();
  });

  it('wraps other read failures in FILE_ERROR', async () => {
    await expect(safeReadFile(tempDir)).rejects.toMatchObject({ code: ExitCode.FILE_ERROR });
  });
});

describe('isNotFound', () => {
  it('recognises ENOENT only', () => {
    expect(isNotFound(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
    expect(isNotFound(Object.assign(new Error('busy'), { code: 'EBUSY' }))).toBe(false);
    expect(isNotFound('ENOENT')).toBe(false);
  });
});
