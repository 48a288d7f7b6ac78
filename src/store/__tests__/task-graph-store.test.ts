/**
 * Tests for TaskGraphStore: load, transactional updates, rollback, restore.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, writeFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { TaskGraphStore, type StateWriter } from '../task-graph-store.js';
import { atomicWrite } from '../atomic.js';
import { sha256 } from '../json.js';
import { CycleDetectedError, SchemaError, StateCorruptionError } from '../../core/errors.js';
import { DEFAULT_GUARDRAILS } from '../../core/scope/guardrails.js';
import { ExitCode } from '../../types/exit-codes.js';
import {
  createTempProject,
  initStore,
  makeState,
  taskOf,
  twoMilestoneSprint,
  type TempProject,
} from '../../../tests/helpers/sprint-fixtures.js';

const STATE_FILE_NAMES = ['task-graph.json', 'progress.json', 'deferred-features.json'];

async function readStateFiles(stateDir: string): Promise<string[]> {
  return Promise.all(STATE_FILE_NAMES.map((name) => readFile(join(stateDir, name), 'utf8')));
}

describe('TaskGraphStore', () => {
  let project: TempProject;

  beforeEach(async () => {
    project = await createTempProject();
  });

  afterEach(async () => {
    await project.cleanup();
  });

  describe('initialize and load', () => {
    it('round-trips the initial state', async () => {
      const state = makeState(twoMilestoneSprint());
      const store = await initStore(project, state);

      expect(await store.exists()).toBe(true);
      expect(await store.load()).toEqual(state);
    });

    it('refuses to overwrite without force', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      await expect(store.initialize(makeState(twoMilestoneSprint()))).rejects.toMatchObject({
        code: ExitCode.ALREADY_EXISTS,
        message: `A task graph already exists in ${project.stateDir}`,
      });
    });

    it('backs up the old state when forced', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      const { backupId } = await store.initialize(makeState([{ id: 'M1', tasks: [{ id: 'X' }] }]), { force: true });

      expect(backupId).not.toBeNull();
      expect((await store.load()).graph.tasks.map((t) => t.id)).toEqual(['X', 'T001']);
      expect((await store.listBackups()).map((b) => b.id)).toEqual([backupId]);
    });

    it('reports a missing graph as NOT_FOUND', async () => {
      const store = new TaskGraphStore({ stateDir: project.stateDir });
      expect(await store.exists()).toBe(false);
      await expect(store.load()).rejects.toMatchObject({
        code: ExitCode.NOT_FOUND,
        message: `No task graph found in ${project.stateDir}`,
      });
    });

    it('reports a missing progress file as a schema issue', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      await unlink(join(project.stateDir, 'progress.json'));

      const err = await store.load().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(SchemaError);
      expect(err).toMatchObject({ issues: [{ code: 'MISSING_FILE', file: 'progress.json' }] });
    });

    it('treats a missing deferred list as empty', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      await unlink(join(project.stateDir, 'deferred-features.json'));
      expect((await store.load()).deferred).toEqual({ features: [] });
    });

    it('rejects a cyclic graph on disk', async () => {
      const state = makeState(twoMilestoneSprint());
      const store = await initStore(project, state);
      taskOf(state, 'A').dependencies = ['B'];
      taskOf(state, 'B').dependencies = ['A'];
      await writeFile(join(project.stateDir, 'task-graph.json'), JSON.stringify(state.graph));

      const err = await store.load().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(CycleDetectedError);
      expect(err).toMatchObject({ cycle: ['A', 'B', 'A'], code: ExitCode.CIRCULAR_REFERENCE });
    });
  });

  describe('documents', () => {
    it('falls back to default guardrails and an empty registry', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      expect(await store.loadGuardrails()).toEqual(DEFAULT_GUARDRAILS);
      expect(await store.loadTechRegistry()).toEqual({ approved: {} });
    });

    it('reads a tech registry from disk', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      await writeFile(
        join(project.stateDir, 'tech-registry.json'),
        JSON.stringify({ approved: { zod: '3.23.8' } }),
      );
      expect(await store.loadTechRegistry()).toEqual({ approved: { zod: '3.23.8' } });
    });
  });

  describe('atomicUpdate', () => {
    it('writes only the files whose content changed', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));

      const { result, written, backupId } = await store.atomicUpdate('rename', (state) => {
        taskOf(state, 'A').title = 'Renamed';
        return 'done';
      });

      expect(result).toBe('done');
      expect(written).toEqual(['task-graph.json']);
      expect(taskOf(await store.load(), 'A').title).toBe('Renamed');
      expect((await store.listBackups())[0]?.id).toBe(backupId);
    });

    it('writes nothing when the mutation throws', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      const before = await readStateFiles(project.stateDir);

      await expect(store.atomicUpdate('boom', (state) => {
        taskOf(state, 'A').title = 'Half done';
        throw new Error('mutation failed');
      })).rejects.toThrow('mutation failed');

      expect(await readStateFiles(project.stateDir)).toEqual(before);
    });

    it('rejects a mutation that breaks integrity, writing nothing', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      const before = await readStateFiles(project.stateDir);

      const err = await store.atomicUpdate('bad-dep', (state) => {
        taskOf(state, 'A').dependencies = ['ZZZ'];
      }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(SchemaError);
      expect(err).toMatchObject({
        message: 'State validation failed with 1 issue(s): Task A depends on ZZZ, which does not exist',
      });
      expect(await readStateFiles(project.stateDir)).toEqual(before);
    });

    it('keeps earlier backups when mutations are rejected', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()), { maxSnapshots: 2 });
      const { backupId } = await store.atomicUpdate('rename', (state) => {
        taskOf(state, 'A').title = 'Renamed';
      });

      for (let i = 0; i < 3; i++) {
        await store.atomicUpdate('boom', () => {
          throw new Error('mutation failed');
        }).catch(() => undefined);
        await store.atomicUpdate('bad-dep', (state) => {
          taskOf(state, 'A').dependencies = ['ZZZ'];
        }).catch(() => undefined);
      }

      expect((await store.listBackups()).map((b) => b.id)).toEqual([backupId]);
    });

    it('rejects a mutation that introduces a cycle', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      await expect(store.atomicUpdate('cycle', (state) => {
        taskOf(state, 'A').dependencies = ['B'];
        taskOf(state, 'B').dependencies = ['A'];
      })).rejects.toBeInstanceOf(CycleDetectedError);
    });

    it('restores every file when a write fails part way', async () => {
      await initStore(project, makeState(twoMilestoneSprint()));
      const before = await readStateFiles(project.stateDir);
      const digests = before.map((text) => sha256(text));

      let calls = 0;
      const failingWriter: StateWriter = async (filePath, content) => {
        calls++;
        if (calls === 2) throw new Error('disk full');
        await atomicWrite(filePath, content);
      };
      const store = new TaskGraphStore({ stateDir: project.stateDir, writer: failingWriter });

      const err = await store.atomicUpdate('rename', (state) => {
        taskOf(state, 'A').title = 'Renamed';
        state.progress.history.push({ timestamp: '2026-01-05T10:00:00.000Z', action: 'note' });
      }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(StateCorruptionError);
      const backupId = err instanceof StateCorruptionError ? err.backupId : '';
      expect(err).toMatchObject({
        code: ExitCode.STATE_CORRUPTION,
        message: `Write failed during rename: disk full; state restored from backup ${backupId}`,
      });
      const after = await readStateFiles(project.stateDir);
      expect(after).toEqual(before);
      expect(after.map((text) => sha256(text))).toEqual(digests);
    });
  });

  describe('backups', () => {
    it('restores an earlier snapshot and keeps a safety snapshot', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      const { backupId } = await store.atomicUpdate('rename', (state) => {
        taskOf(state, 'A').title = 'Renamed';
      });

      const { restored, safetyBackupId } = await store.restoreBackup(backupId);

      expect(restored.id).toBe(backupId);
      expect(safetyBackupId).not.toBe(backupId);
      expect(taskOf(await store.load(), 'A').title).toBe('Task A');

      await store.restoreBackup(safetyBackupId);
      expect(taskOf(await store.load(), 'A').title).toBe('Renamed');
    });

    it('reports an unknown backup id', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      await expect(store.restoreBackup('missing')).rejects.toMatchObject({
        code: ExitCode.NOT_FOUND,
        message: 'Backup not found: missing',
      });
    });

    it('takes manual snapshots', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()));
      const manifest = await store.createSnapshot();
      expect(manifest.operation).toBe('manual');
      expect(manifest.files.map((f) => f.name)).toEqual(STATE_FILE_NAMES);
    });

    it('rotates to maxSnapshots', async () => {
      const store = await initStore(project, makeState(twoMilestoneSprint()), { maxSnapshots: 2 });
      for (let i = 0; i < 4; i++) {
        await store.createSnapshot(`snap-${i}`);
      }
      expect((await store.listBackups()).map((b) => b.operation)).toEqual(['snap-3', 'snap-2']);
    });
  });
});
