/**
 * TaskGraphStore - the only way state files are read or written.
 *
 * Reads are lock-free and always go to disk; nothing is cached between
 * calls. Every write goes through atomicUpdate(): lock, snapshot, mutate a
 * copy, re-validate, write, release. A failed update leaves the files
 * byte-identical to what they were before the call.
 */

import { access, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { ZodError, ZodType } from 'zod';
import { atomicWrite, isNotFound, safeReadFile, serializeJson } from './atomic.js';
import {
  DEFAULT_MAX_SNAPSHOTS,
  createSnapshot,
  listSnapshots,
  restoreSnapshot,
  rotateSnapshots,
  type BackupManifest,
} from './backup.js';
import { parseJsonText } from './json.js';
import { withLock } from './lock.js';
import {
  deferredFeaturesSchema,
  progressSchema,
  taskGraphSchema,
} from './validation-schemas.js';
import { SchemaError, StateCorruptionError, TasklaneError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { STATE_FILES, getStateDir } from '../core/paths.js';
import { DEFAULT_GUARDRAILS } from '../core/scope/guardrails.js';
import { cycleCheck } from '../core/tasks/dependency-check.js';
import { checkStateIntegrity } from '../core/validation/integrity.js';
import { parseDocument } from '../core/validation/schema-validator.js';
import type { LockConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import type { GuardrailConfig, TechRegistry } from '../types/scope.js';
import type { IntegrityIssue, SprintState } from '../types/task.js';

/** Files written by atomicUpdate, in write order. */
const MUTABLE_FILES = [STATE_FILES.taskGraph, STATE_FILES.progress, STATE_FILES.deferred] as const;

/** Every file captured by a snapshot. */
const SNAPSHOT_FILES: readonly string[] = [
  ...MUTABLE_FILES,
  STATE_FILES.guardrails,
  STATE_FILES.techRegistry,
];

/** Writes one serialized state file. Replaceable so tests can simulate I/O failure. */
export type StateWriter = (filePath: string, content: string) => Promise<void>;

export interface TaskGraphStoreOptions {
  /** Project directory the state directory is resolved from. */
  cwd?: string;
  /** Explicit state directory, overriding cwd/TASKLANE_DIR resolution. */
  stateDir?: string;
  lock?: Partial<LockConfig>;
  maxSnapshots?: number;
  writer?: StateWriter;
}

/** Outcome of a committed update. */
export interface UpdateResult<T> {
  result: T;
  backupId: string;
  /** State file names whose content changed. */
  written: string[];
}

/** Mutation applied to a private copy of the state. May be async. */
export type StateMutation<T> = (state: SprintState) => T | Promise<T>;

function zodIssues(error: ZodError, file: string): IntegrityIssue[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return {
      code: 'SCHEMA',
      file,
      path,
      message: `${file}${path ? ` ${path}` : ''}: ${issue.message}`,
    };
  });
}

function parseWith<T>(schema: ZodType<T>, raw: unknown, file: string, issues: IntegrityIssue[]): T | null {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  issues.push(...zodIssues(parsed.error, file));
  return null;
}

function serializeState(state: SprintState): Map<string, string> {
  return new Map<string, string>([
    [STATE_FILES.taskGraph, serializeJson(state.graph)],
    [STATE_FILES.progress, serializeJson(state.progress)],
    [STATE_FILES.deferred, serializeJson(state.deferred)],
  ]);
}

/**
 * Parse raw file contents and run the full integrity and cycle checks.
 * Throws SchemaError with every issue found, or CycleDetectedError.
 */
export function validateState(raw: { graph: unknown; progress: unknown; deferred: unknown }): SprintState {
  const issues: IntegrityIssue[] = [];
  const graph = parseWith(taskGraphSchema, raw.graph, STATE_FILES.taskGraph, issues);
  const progress = parseWith(progressSchema, raw.progress, STATE_FILES.progress, issues);
  const deferred = parseWith(deferredFeaturesSchema, raw.deferred, STATE_FILES.deferred, issues);
  if (!graph || !progress || !deferred) {
    throw new SchemaError(issues);
  }

  const state: SprintState = { graph, progress, deferred };
  const integrity = checkStateIntegrity(state);
  if (integrity.length > 0) {
    throw new SchemaError(integrity);
  }
  cycleCheck(graph.tasks);
  return state;
}

/**
 * File-backed store for one state directory.
 */
export class TaskGraphStore {
  readonly stateDir: string;

  private readonly lockConfig: Partial<LockConfig>;
  private readonly maxSnapshots: number | undefined;
  private readonly writer: StateWriter;

  constructor(options: TaskGraphStoreOptions = {}) {
    this.stateDir = options.stateDir ?? getStateDir(options.cwd);
    this.lockConfig = options.lock ?? {};
    this.maxSnapshots = options.maxSnapshots;
    this.writer = options.writer ?? ((filePath, content) => atomicWrite(filePath, content));
  }

  /** Absolute path of a file in the state directory. */
  path(fileName: string): string {
    return join(this.stateDir, fileName);
  }

  /** True when a task graph has been initialised here. */
  async exists(): Promise<boolean> {
    try {
      await access(this.path(STATE_FILES.taskGraph));
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }

  private async readRaw(fileName: string): Promise<{ text: string | null; value: unknown }> {
    const text = await safeReadFile(this.path(fileName));
    return { text, value: text === null ? null : parseJsonText(text, this.path(fileName)) };
  }

  private async readAll(): Promise<{ texts: Map<string, string | null>; state: SprintState }> {
    const graph = await this.readRaw(STATE_FILES.taskGraph);
    if (graph.text === null) {
      throw new TasklaneError(
        ExitCode.NOT_FOUND,
        `No task graph found in ${this.stateDir}`,
        { fix: 'Create one with `tasklane init --plan <plan.json>`' },
      );
    }
    const progress = await this.readRaw(STATE_FILES.progress);
    if (progress.text === null) {
      throw new SchemaError([{
        code: 'MISSING_FILE',
        file: STATE_FILES.progress,
        message: `${STATE_FILES.progress} is missing`,
      }]);
    }
    const deferred = await this.readRaw(STATE_FILES.deferred);

    const state = validateState({
      graph: graph.value,
      progress: progress.value,
      deferred: deferred.text === null ? { features: [] } : deferred.value,
    });
    const texts = new Map<string, string | null>([
      [STATE_FILES.taskGraph, graph.text],
      [STATE_FILES.progress, progress.text],
      [STATE_FILES.deferred, deferred.text],
    ]);
    return { texts, state };
  }

  /**
   * Load and validate the task graph, progress tracker and deferred list.
   */
  async load(): Promise<SprintState> {
    return (await this.readAll()).state;
  }

  /** guardrails.json, or the defaults when absent. */
  async loadGuardrails(): Promise<GuardrailConfig> {
    const { value } = await this.readRaw(STATE_FILES.guardrails);
    if (value === null) return structuredClone(DEFAULT_GUARDRAILS);
    return parseDocument('guardrails', value, this.path(STATE_FILES.guardrails));
  }

  /** tech-registry.json, or an empty registry when absent. */
  async loadTechRegistry(): Promise<TechRegistry> {
    const { value } = await this.readRaw(STATE_FILES.techRegistry);
    if (value === null) return { approved: {} };
    return parseDocument('tech-registry', value, this.path(STATE_FILES.techRegistry));
  }

  private lockOptions(): Partial<LockConfig> & { lockfilePath: string } {
    return { ...this.lockConfig, lockfilePath: this.path('.lock') };
  }

  private async snapshot(operation: string, rotate = true): Promise<BackupManifest> {
    return createSnapshot(this.stateDir, operation, {
      fileNames: SNAPSHOT_FILES,
      maxSnapshots: this.maxSnapshots,
      rotate,
    });
  }

  private async requireState(): Promise<void> {
    if (!(await this.exists())) {
      throw new TasklaneError(
        ExitCode.NOT_FOUND,
        `No task graph found in ${this.stateDir}`,
        { fix: 'Create one with `tasklane init --plan <plan.json>`' },
      );
    }
  }

  /**
   * Write the files whose serialized form differs from what was read.
   * On failure every file is restored from the snapshot.
   */
  private async commit(
    operation: string,
    backupId: string,
    before: Map<string, string | null>,
    state: SprintState,
  ): Promise<string[]> {
    const next = serializeState(state);
    const changed = MUTABLE_FILES.filter((name) => next.get(name) !== before.get(name));

    try {
      for (const name of changed) {
        await this.writer(this.path(name), next.get(name) ?? '');
      }
    } catch (err) {
      getLogger('store').error({ err, operation, backupId }, 'state write failed, restoring snapshot');
      await restoreSnapshot(this.stateDir, backupId, MUTABLE_FILES);
      throw new StateCorruptionError(operation, backupId, err);
    }
    return changed;
  }

  /**
   * Apply a mutation as one transaction.
   *
   * The mutation receives a fresh, private copy of the state. Errors it
   * throws, and validation failures of its result, surface unchanged with
   * nothing written and no snapshot taken.
   */
  async atomicUpdate<T>(operation: string, mutation: StateMutation<T>): Promise<UpdateResult<T>> {
    await this.requireState();
    return withLock(this.stateDir, async () => {
      const { texts, state } = await this.readAll();

      const draft = structuredClone(state);
      const result = await mutation(draft);
      const validated = validateState(draft);

      // Rejected mutations leave the snapshot ring untouched.
      const manifest = await this.snapshot(operation);
      const written = await this.commit(operation, manifest.id, texts, validated);
      getLogger('store').info({ operation, backupId: manifest.id, written }, 'transaction committed');
      return { result, backupId: manifest.id, written };
    }, this.lockOptions());
  }

  /**
   * Write a brand-new state (sprint initialisation).
   * Refuses to overwrite an existing graph unless `force` is set, in which
   * case the old state is snapshotted first.
   */
  async initialize(state: SprintState, options: { force?: boolean } = {}): Promise<{ backupId: string | null }> {
    await mkdir(this.stateDir, { recursive: true });
    return withLock(this.stateDir, async () => {
      const existed = await this.exists();
      if (existed && !options.force) {
        throw new TasklaneError(
          ExitCode.ALREADY_EXISTS,
          `A task graph already exists in ${this.stateDir}`,
          { fix: 'Pass --force to replace it (the current state is backed up first)' },
        );
      }
      const validated = validateState(state);
      const manifest = existed ? await this.snapshot('init') : null;
      const before = new Map<string, string | null>();

      if (manifest) {
        await this.commit('init', manifest.id, before, validated);
      } else {
        for (const [name, content] of serializeState(validated)) {
          await this.writer(this.path(name), content);
        }
      }
      getLogger('store').info({ sprintId: validated.graph.sprintId, replaced: existed }, 'sprint initialised');
      return { backupId: manifest?.id ?? null };
    }, this.lockOptions());
  }

  /** Take a manual snapshot under the lock. */
  async createSnapshot(operation = 'manual'): Promise<BackupManifest> {
    await this.requireState();
    return withLock(this.stateDir, () => this.snapshot(operation), this.lockOptions());
  }

  /** Snapshots, newest first. */
  async listBackups(): Promise<BackupManifest[]> {
    return listSnapshots(this.stateDir);
  }

  /**
   * Restore a snapshot under the lock, after snapshotting the current state.
   * The restored files must pass validation; otherwise the safety snapshot is
   * put back and the validation error surfaces.
   */
  async restoreBackup(id: string): Promise<{ restored: BackupManifest; safetyBackupId: string }> {
    await this.requireState();
    return withLock(this.stateDir, async () => {
      const known = (await listSnapshots(this.stateDir)).some((s) => s.id === id);
      if (!known) {
        throw new TasklaneError(
          ExitCode.NOT_FOUND,
          `Backup not found: ${id}`,
          { fix: 'List available backups with `tasklane backup list`' },
        );
      }
      // Rotation waits until the restore is done so it cannot remove `id`.
      const safety = await this.snapshot(`restore ${id}`, false);
      const restored = await restoreSnapshot(this.stateDir, id, SNAPSHOT_FILES);
      try {
        await this.readAll();
      } catch (err) {
        await restoreSnapshot(this.stateDir, safety.id, SNAPSHOT_FILES);
        throw err;
      }
      await rotateSnapshots(this.stateDir, this.maxSnapshots ?? DEFAULT_MAX_SNAPSHOTS);
      getLogger('store').info({ id, safetyBackupId: safety.id }, 'backup restored');
      return { restored, safetyBackupId: safety.id };
    }, this.lockOptions());
  }
}
