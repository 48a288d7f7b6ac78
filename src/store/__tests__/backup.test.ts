/**
 * Tests for snapshot backups: manifests, rotation, checksum verification.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile, access } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  createSnapshot,
  formatBackupId,
  listSnapshots,
  restoreSnapshot,
  rotateSnapshots,
} from '../backup.js';
import { sha256 } from '../json.js';
import { ExitCode } from '../../types/exit-codes.js';

const FILES = ['a.json', 'b.json'] as const;

describe('backup', () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = await mkdtemp(join(tmpdir(), 'tasklane-test-'));
    await writeFile(join(stateDir, 'a.json'), '{"a":1}\n');
  });

  afterEach(async () => {
    await rm(stateDir, { recursive: true, force: true });
  });

  it('formats ids from the timestamp', () => {
    expect(formatBackupId(new Date('2026-01-05T09:00:00.000Z'))).toBe('2026-01-05T09-00-00-000Z');
  });

  it('writes a manifest with digests of the files that exist', async () => {
    const now = new Date('2026-01-05T09:00:00.000Z');
    const manifest = await createSnapshot(stateDir, 'task_start', { fileNames: FILES, now });

    expect(manifest).toEqual({
      id: '2026-01-05T09-00-00-000Z',
      createdAt: '2026-01-05T09:00:00.000Z',
      operation: 'task_start',
      files: [{ name: 'a.json', sha256: sha256('{"a":1}\n') }],
    });
    const onDisk: unknown = JSON.parse(
      await readFile(join(stateDir, 'backups', manifest.id, 'manifest.json'), 'utf8'),
    );
    expect(onDisk).toEqual(manifest);
  });

  it('suffixes the id when two snapshots share a timestamp', async () => {
    const now = new Date('2026-01-05T09:00:00.000Z');
    await createSnapshot(stateDir, 'one', { fileNames: FILES, now });
    const second = await createSnapshot(stateDir, 'two', { fileNames: FILES, now });
    expect(second.id).toBe('2026-01-05T09-00-00-000Z-1');

    const ids = (await listSnapshots(stateDir)).map((s) => s.id);
    expect(ids).toEqual(['2026-01-05T09-00-00-000Z-1', '2026-01-05T09-00-00-000Z']);
  });

  it('keeps only the newest maxSnapshots', async () => {
    for (const minute of ['01', '02', '03']) {
      await createSnapshot(stateDir, `op-${minute}`, {
        fileNames: FILES,
        maxSnapshots: 2,
        now: new Date(`2026-01-05T09:${minute}:00.000Z`),
      });
    }
    const ops = (await listSnapshots(stateDir)).map((s) => s.operation);
    expect(ops).toEqual(['op-03', 'op-02']);
  });

  it('rotateSnapshots returns the removed ids', async () => {
    await createSnapshot(stateDir, 'old', { fileNames: FILES, now: new Date('2026-01-05T09:01:00.000Z'), rotate: false });
    await createSnapshot(stateDir, 'new', { fileNames: FILES, now: new Date('2026-01-05T09:02:00.000Z'), rotate: false });
    expect(await rotateSnapshots(stateDir, 1)).toEqual(['2026-01-05T09-01-00-000Z']);
  });

  it('returns an empty list without a backups directory', async () => {
    expect(await listSnapshots(stateDir)).toEqual([]);
  });

  it('restores content and removes files the snapshot did not hold', async () => {
    const manifest = await createSnapshot(stateDir, 'before', { fileNames: FILES });
    await writeFile(join(stateDir, 'a.json'), '{"a":2}\n');
    await writeFile(join(stateDir, 'b.json'), '{"b":1}\n');

    await restoreSnapshot(stateDir, manifest.id, FILES);

    expect(await readFile(join(stateDir, 'a.json'), 'utf8')).toBe('{"a":1}\n');
    await expect(access(join(stateDir, 'b.json'))).rejects.toThrow();
  });

  it('refuses a snapshot whose file no longer matches its digest', async () => {
    const manifest = await createSnapshot(stateDir, 'before', { fileNames: FILES });
    await writeFile(join(stateDir, 'backups', manifest.id, 'a.json'), 'tampered');
    await writeFile(join(stateDir, 'a.json'), 'current');

    await expect(restoreSnapshot(stateDir, manifest.id, FILES)).rejects.toMatchObject({
      code: ExitCode.STATE_CORRUPTION,
      message: `Backup ${manifest.id} is damaged: checksum mismatch for a.json`,
    });
    expect(await readFile(join(stateDir, 'a.json'), 'utf8')).toBe('current');
  });

  it('reports an unknown id as NOT_FOUND', async () => {
    await expect(restoreSnapshot(stateDir, 'nope', FILES)).rejects.toMatchObject({
      code: ExitCode.NOT_FOUND,
      message: 'Backup not found: nope',
    });
  });
});
