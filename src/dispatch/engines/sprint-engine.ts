/**
 * Sprint Engine
 *
 * One function per operation. Each opens the store for the project, calls
 * into core and returns an EngineResult; nothing here throws.
 * Business logic lives in src/core/.
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';
import { loadConfig, getConfigValue } from '../../core/config.js';
import { CycleDetectedError, SchemaError, TasklaneError } from '../../core/errors.js';
import {
  applyEnhancementToStore,
  deferFeature,
  listDeferred,
  type EnhancementRequest,
  type EnhancementResult,
  type FeatureTaskInput,
} from '../../core/enhancement/index.js';
import {
  addRemediationTask,
  getMilestoneStatus,
  recordValidation,
  type MilestoneStatusReport,
  type RemediationInput,
} from '../../core/milestones/index.js';
import { checkScopeCompliance, type ScopeComplianceReport } from '../../core/scope/index.js';
import { getHistory, type HistoryResult } from '../../core/sprint/history.js';
import { initSprint, readPlanFile, type InitResult } from '../../core/sprint/init.js';
import { getSprintStatus, type SprintStatusReport } from '../../core/sprint/status.js';
import { completeTask, startTask, type TaskCompleteResult, type TaskStartResult } from '../../core/task-work/index.js';
import { nextTask, validateDependencies, type DependencyReport, type NextTaskResult } from '../../core/tasks/resolver.js';
import { showTask, type TaskDetail } from '../../core/tasks/show.js';
import { isNotFound } from '../../store/atomic.js';
import type { BackupManifest } from '../../store/backup.js';
import { parseJsonText } from '../../store/json.js';
import { TaskGraphStore } from '../../store/task-graph-store.js';
import { featureTasksFileSchema } from '../../store/validation-schemas.js';
import type { ResolvedValue, TasklaneConfig } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { ChangeSet } from '../../types/scope.js';
import type { DeferredFeature, IntegrityIssue, TechnologyRef, ValidationOutcome } from '../../types/task.js';
import { runEngine, type EngineResult } from './_error.js';

// ============================================================================
// Helpers
// ============================================================================

/** Open the store for a project with its configured lock and backup settings. */
export async function openStore(projectRoot: string): Promise<TaskGraphStore> {
  const config = await loadConfig(projectRoot);
  return new TaskGraphStore({
    cwd: projectRoot,
    lock: config.lock,
    maxSnapshots: config.backup.maxSnapshots,
  });
}

/**
 * Split `name@version`. Scoped names keep their leading `@`.
 */
export function parseNameAtVersion(spec: string): TechnologyRef {
  const at = spec.lastIndexOf('@');
  if (at <= 0 || at === spec.length - 1) {
    throw new TasklaneError(
      ExitCode.INVALID_INPUT,
      `Expected name@version, got "${spec}"`,
    );
  }
  return { name: spec.slice(0, at), version: spec.slice(at + 1) };
}

/** Changes reported for a task, as given on the command line. */
export interface ChangeInput {
  files?: string[];
  /** `name@version` entries. */
  dependencies?: string[];
  /** Read each changed file's content for content guardrails. */
  readContents?: boolean;
}

/**
 * Build a ChangeSet. Files are read relative to the project root; a file
 * that no longer exists (deleted by the change) has no content to check.
 */
export async function buildChangeSet(projectRoot: string, input: ChangeInput): Promise<ChangeSet | undefined> {
  const files = input.files ?? [];
  const dependencies = input.dependencies ?? [];
  if (files.length === 0 && dependencies.length === 0) return undefined;

  const changes: ChangeSet = { files };
  if (dependencies.length > 0) {
    changes.dependencies = Object.fromEntries(
      dependencies.map(parseNameAtVersion).map((ref) => [ref.name, ref.version]),
    );
  }
  if (input.readContents) {
    const contents: Record<string, string> = {};
    for (const file of files) {
      try {
        contents[file] = await readFile(isAbsolute(file) ? file : join(projectRoot, file), 'utf8');
      } catch (err) {
        if (!isNotFound(err)) {
          throw new TasklaneError(ExitCode.FILE_ERROR, `Failed to read: ${file}`, { cause: err });
        }
      }
    }
    changes.contents = contents;
  }
  return changes;
}

/** Parse an enhancement tasks file: a JSON array of feature tasks. */
export async function readFeatureTasksFile(filePath: string): Promise<FeatureTaskInput[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (err) {
    if (isNotFound(err)) {
      throw new TasklaneError(ExitCode.NOT_FOUND, `Tasks file not found: ${filePath}`);
    }
    throw new TasklaneError(ExitCode.FILE_ERROR, `Failed to read: ${filePath}`, { cause: err });
  }
  const parsed = featureTasksFileSchema.safeParse(parseJsonText(text, filePath));
  if (!parsed.success) {
    throw new SchemaError(
      parsed.error.issues.map((issue) => ({
        code: 'TASKS_FILE_SCHEMA',
        file: filePath,
        path: issue.path.join('.'),
        message: `${filePath} ${issue.path.join('.')}: ${issue.message}`,
      })),
      { source: filePath },
    );
  }
  return parsed.data;
}

// ============================================================================
// Queries
// ============================================================================

export async function sprintStatus(projectRoot: string): Promise<EngineResult<SprintStatusReport>> {
  return runEngine(async () => getSprintStatus(await openStore(projectRoot)));
}

export async function sprintNext(projectRoot: string, taskId?: string): Promise<EngineResult<NextTaskResult>> {
  return runEngine(async () => nextTask(await (await openStore(projectRoot)).load(), taskId));
}

export async function taskShow(projectRoot: string, taskId: string): Promise<EngineResult<TaskDetail>> {
  return runEngine(async () => showTask(await openStore(projectRoot), taskId));
}

export async function taskDeps(projectRoot: string, taskId: string): Promise<EngineResult<DependencyReport>> {
  return runEngine(async () => {
    const { graph } = await (await openStore(projectRoot)).load();
    return validateDependencies(graph, taskId);
  });
}

export async function scopeCheck(
  projectRoot: string,
  taskId: string,
  input: ChangeInput & { technologies?: string[] } = {},
): Promise<EngineResult<ScopeComplianceReport>> {
  return runEngine(async () => {
    const store = await openStore(projectRoot);
    const changes = await buildChangeSet(projectRoot, input);
    return checkScopeCompliance(store, taskId, {
      ...(changes && { changes }),
      ...(input.technologies && input.technologies.length > 0
        ? { technologies: input.technologies.map(parseNameAtVersion) }
        : {}),
    });
  });
}

export async function milestoneShow(projectRoot: string, milestoneId: string): Promise<EngineResult<MilestoneStatusReport>> {
  return runEngine(async () => getMilestoneStatus(await (await openStore(projectRoot)).load(), milestoneId));
}

export async function featureDeferredList(projectRoot: string): Promise<EngineResult<{ features: DeferredFeature[] }>> {
  return runEngine(async () => ({ features: await listDeferred(await openStore(projectRoot)) }));
}

export async function sprintHistory(projectRoot: string, limit?: number): Promise<EngineResult<HistoryResult>> {
  return runEngine(async () => getHistory(await openStore(projectRoot), limit === undefined ? {} : { limit }));
}

/** Result of `tasklane check`. */
export interface IntegrityReport {
  valid: boolean;
  stateDir: string;
  issues: IntegrityIssue[];
  cycle: string[] | null;
}

/**
 * Full integrity check. Schema, referential and cycle problems are reported
 * rather than raised; a missing state directory is still an error.
 */
export async function sprintCheck(projectRoot: string): Promise<EngineResult<IntegrityReport>> {
  return runEngine(async () => {
    const store = await openStore(projectRoot);
    const issues: IntegrityIssue[] = [];
    let cycle: string[] | null = null;

    try {
      await store.load();
    } catch (err) {
      if (err instanceof SchemaError) issues.push(...err.issues);
      else if (err instanceof CycleDetectedError) cycle = err.cycle;
      else throw err;
    }

    const documents: Array<[string, () => Promise<unknown>]> = [
      ['guardrails.json', () => store.loadGuardrails()],
      ['tech-registry.json', () => store.loadTechRegistry()],
    ];
    for (const [file, load] of documents) {
      try {
        await load();
      } catch (err) {
        if (!(err instanceof TasklaneError) || err.code !== ExitCode.VALIDATION_ERROR) throw err;
        issues.push({ code: 'DOCUMENT_SCHEMA', file, message: err.message });
      }
    }

    return { valid: issues.length === 0 && cycle === null, stateDir: store.stateDir, issues, cycle };
  });
}

// ============================================================================
// Mutations
// ============================================================================

export async function taskStart(projectRoot: string, taskId: string): Promise<EngineResult<TaskStartResult>> {
  return runEngine(async () => startTask(await openStore(projectRoot), taskId));
}

export async function taskComplete(
  projectRoot: string,
  taskId: string,
  input: ChangeInput = {},
): Promise<EngineResult<TaskCompleteResult>> {
  return runEngine(async () => {
    const store = await openStore(projectRoot);
    const changes = await buildChangeSet(projectRoot, input);
    return completeTask(store, taskId, changes ? { changes } : {});
  });
}

export async function sprintEnhance(
  projectRoot: string,
  request: EnhancementRequest,
  options: { dryRun?: boolean } = {},
): Promise<EngineResult<EnhancementResult>> {
  return runEngine(async () => applyEnhancementToStore(await openStore(projectRoot), request, options));
}

export async function milestoneValidate(
  projectRoot: string,
  milestoneId: string,
  outcome: ValidationOutcome,
  issues: string[] = [],
): Promise<EngineResult<Awaited<ReturnType<typeof recordValidation>>>> {
  return runEngine(async () => recordValidation(await openStore(projectRoot), milestoneId, outcome, issues));
}

export async function milestoneRemediate(
  projectRoot: string,
  milestoneId: string,
  input: RemediationInput,
): Promise<EngineResult<Awaited<ReturnType<typeof addRemediationTask>>>> {
  return runEngine(async () => addRemediationTask(await openStore(projectRoot), milestoneId, input));
}

export async function featureDefer(
  projectRoot: string,
  description: string,
  reason: string,
): Promise<EngineResult<DeferredFeature>> {
  return runEngine(async () => deferFeature(await openStore(projectRoot), description, reason));
}

export async function sprintInit(
  projectRoot: string,
  planPath: string,
  options: { force?: boolean } = {},
): Promise<EngineResult<InitResult>> {
  return runEngine(async () => {
    const config = await loadConfig(projectRoot);
    const plan = await readPlanFile(isAbsolute(planPath) ? planPath : join(projectRoot, planPath));
    return initSprint(await openStore(projectRoot), plan, config, options);
  });
}

// ============================================================================
// Backups
// ============================================================================

export async function backupList(projectRoot: string): Promise<EngineResult<{ backups: BackupManifest[] }>> {
  return runEngine(async () => ({ backups: await (await openStore(projectRoot)).listBackups() }));
}

export async function backupCreate(projectRoot: string): Promise<EngineResult<BackupManifest>> {
  return runEngine(async () => (await openStore(projectRoot)).createSnapshot('manual'));
}

export async function backupRestore(
  projectRoot: string,
  backupId: string,
): Promise<EngineResult<{ restored: BackupManifest; safetyBackupId: string }>> {
  return runEngine(async () => (await openStore(projectRoot)).restoreBackup(backupId));
}

// ============================================================================
// Config
// ============================================================================

export async function configGet(projectRoot: string, key: string): Promise<EngineResult<ResolvedValue & { key: string }>> {
  return runEngine(async () => {
    const resolved = await getConfigValue(key, projectRoot);
    if (resolved.value === undefined) {
      throw new TasklaneError(ExitCode.NOT_FOUND, `Config key '${key}' not found`);
    }
    return { key, ...resolved };
  });
}

export async function configList(projectRoot: string): Promise<EngineResult<TasklaneConfig>> {
  return runEngine(() => loadConfig(projectRoot));
}
