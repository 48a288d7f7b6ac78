/**
 * Timestamped snapshot backups of the state directory.
 *
 * Each snapshot is a directory under backups/ holding a copy of every state
 * file that existed plus a manifest.json with per-file SHA-256 digests.
 * A rotating window of the newest snapshots is kept.
 */

import { copyFile, mkdir, readdir, readFile, rm, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { atomicWrite, atomicWriteJson, isNotFound, safeReadFile } from './atomic.js';
import { parseJsonText, sha256 } from './json.js';
import { TasklaneError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';

export const DEFAULT_MAX_SNAPSHOTS = 10;
const MANIFEST_FILE = 'manifest.json';

const manifestSchema = z.object({
  id: z.string().min(1),
  createdAt: z.string(),
  operation: z.string(),
  files: z.array(z.object({
    name: z.string().min(1),
    sha256: z.string().regex(/^[0-9a-f]{64}$/),
  }).strict()),
}).strict();

export type BackupManifest = z.infer<typeof manifestSchema>;

export interface SnapshotOptions {
  /** State file names to copy; files that don't exist are skipped. */
  fileNames: readonly string[];
  maxSnapshots?: number;
  /** Rotate old snapshots after this one is written (default true). */
  rotate?: boolean;
  now?: Date;
}

/**
 * Filesystem-safe backup id for a point in time: 2026-10-18T12-00-00-000Z.
 */
export function formatBackupId(date: Date): string {
  return date.toISOString().replace(/[:.]/g, '-');
}

function compareIds(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true });
}

/** Create the snapshot directory, adding -1, -2, ... when the id is taken. */
async function reserveSnapshotDir(backupDir: string, baseId: string): Promise<string> {
  await mkdir(backupDir, { recursive: true });
  for (let attempt = 0; ; attempt++) {
    const id = attempt === 0 ? baseId : `${baseId}-${attempt}`;
    try {
      await mkdir(join(backupDir, id));
      return id;
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && err.code === 'EEXIST')) throw err;
    }
  }
}

/**
 * Snapshot the given state files into a new backup directory and rotate old ones.
 */
export async function createSnapshot(
  stateDir: string,
  operation: string,
  options: SnapshotOptions,
): Promise<BackupManifest> {
  const backupDir = join(stateDir, 'backups');
  const now = options.now ?? new Date();
  try {
    const id = await reserveSnapshotDir(backupDir, formatBackupId(now));
    const files: BackupManifest['files'] = [];

    for (const name of options.fileNames) {
      let content: Buffer;
      try {
        content = await readFile(join(stateDir, name));
      } catch (err) {
        if (isNotFound(err)) continue;
        throw err;
      }
      await copyFile(join(stateDir, name), join(backupDir, id, name));
      files.push({ name, sha256: sha256(content) });
    }

    const manifest: BackupManifest = { id, createdAt: now.toISOString(), operation, files };
    await atomicWriteJson(join(backupDir, id, MANIFEST_FILE), manifest);
    getLogger('backup').debug({ id, operation, files: files.length }, 'snapshot created');

    if (options.rotate !== false) {
      await rotateSnapshots(stateDir, options.maxSnapshots ?? DEFAULT_MAX_SNAPSHOTS);
    }
    return manifest;
  } catch (err) {
    if (err instanceof TasklaneError) throw err;
    throw new TasklaneError(
      ExitCode.FILE_ERROR,
      `Backup failed for: ${stateDir}`,
      { cause: err },
    );
  }
}

async function readManifest(backupDir: string, id: string): Promise<BackupManifest | null> {
  const content = await safeReadFile(join(backupDir, id, MANIFEST_FILE));
  if (content === null) return null;
  const parsed = manifestSchema.safeParse(parseJsonText(content, join(backupDir, id, MANIFEST_FILE)));
  return parsed.success ? parsed.data : null;
}

/**
 * List snapshots, newest first. Directories without a readable manifest are ignored.
 */
export async function listSnapshots(stateDir: string): Promise<BackupManifest[]> {
  const backupDir = join(stateDir, 'backups');
  let entries: string[];
  try {
    entries = await readdir(backupDir);
  } catch (err) {
    if (isNotFound(err)) return [];
    throw err;
  }

  const manifests: BackupManifest[] = [];
  for (const entry of entries.sort(compareIds).reverse()) {
    const manifest = await readManifest(backupDir, entry);
    if (manifest) manifests.push(manifest);
  }
  return manifests;
}

/**
 * Delete all but the newest `maxSnapshots` snapshots.
 * Returns the ids that were removed.
 */
export async function rotateSnapshots(stateDir: string, maxSnapshots: number): Promise<string[]> {
  const snapshots = await listSnapshots(stateDir);
  const excess = snapshots.slice(Math.max(maxSnapshots, 1));
  for (const snapshot of excess) {
    await rm(join(stateDir, 'backups', snapshot.id), { recursive: true, force: true });
  }
  if (excess.length > 0) {
    getLogger('backup').debug({ removed: excess.map((s) => s.id) }, 'snapshots rotated');
  }
  return excess.map((s) => s.id);
}

/**
 * Restore the state files of a snapshot.
 *
 * Every file in the manifest is checked against its digest before anything
 * is written. Files listed in `fileNames` that the snapshot does not hold
 * (they did not exist when it was taken) are removed.
 */
export async function restoreSnapshot(
  stateDir: string,
  id: string,
  fileNames: readonly string[],
): Promise<BackupManifest> {
  const backupDir = join(stateDir, 'backups');
  const manifest = await readManifest(backupDir, id);
  if (!manifest) {
    throw new TasklaneError(
      ExitCode.NOT_FOUND,
      `Backup not found: ${id}`,
      { fix: 'List available backups with `tasklane backup list`' },
    );
  }

  const contents = new Map<string, Buffer>();
  for (const file of manifest.files) {
    const content = await readFile(join(backupDir, id, file.name));
    if (sha256(content) !== file.sha256) {
      throw new TasklaneError(
        ExitCode.STATE_CORRUPTION,
        `Backup ${id} is damaged: checksum mismatch for ${file.name}`,
      );
    }
    contents.set(file.name, content);
  }

  for (const [name, content] of contents) {
    await atomicWrite(join(stateDir, name), content.toString('utf8'));
  }
  for (const name of fileNames) {
    if (contents.has(name)) continue;
    try {
      await unlink(join(stateDir, name));
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
  }

  getLogger('backup').info({ id, files: manifest.files.length }, 'snapshot restored');
  return manifest;
}
