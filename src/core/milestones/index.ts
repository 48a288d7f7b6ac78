/**
 * Milestone gating: automatic transitions driven by task progress, the
 * external validation gate, and remediation after a failed validation.
 */

import type {
  Milestone,
  ScopeBoundary,
  SprintState,
  Task,
  TaskGraph,
  ValidationOutcome,
  ValidationRecord,
} from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { TasklaneError } from '../errors.js';
import { getLogger } from '../logger.js';
import { appendHistory, syncProgress } from '../sprint/progress.js';
import { createIdAllocator } from '../tasks/ids.js';
import { milestoneTasks } from '../tasks/resolver.js';
import { cycleCheck } from '../tasks/dependency-check.js';
import type { TaskGraphStore } from '../../store/task-graph-store.js';
import { transitionMilestone } from './state-machine.js';

/** Effective task capacity of a milestone. */
export interface MilestoneCapacity {
  min: number;
  max: number;
}

/** Report for `tasklane milestone <id>`. */
export interface MilestoneStatusReport {
  id: string;
  title: string;
  status: Milestone['status'];
  position: number;
  isCurrent: boolean;
  gateHolding: boolean;
  capacity: MilestoneCapacity;
  counts: {
    total: number;
    work: number;
    completed: number;
    inProgress: number;
    pending: number;
  };
  validationTaskId: string | null;
  tasks: Array<{ id: string; title: string; type: Task['type']; status: Task['status'] }>;
  latestValidation: ValidationRecord | null;
}

export interface RemediationInput {
  title: string;
  dependencies?: string[];
  scope?: Partial<ScopeBoundary>;
}

export function capacityOf(milestone: Milestone, graph: TaskGraph): MilestoneCapacity {
  return milestone.capacity ?? {
    min: graph.milestoneStrategy.minTasks,
    max: graph.milestoneStrategy.maxTasks,
  };
}

/** Make the milestone's validation task wait for newly added work. */
export function gateOn(tasks: Task[], milestone: Milestone, workIds: readonly string[]): void {
  const validation = tasks.find((t) => t.type === 'validation' && t.milestoneId === milestone.id);
  if (validation) {
    validation.dependencies = [...new Set([...validation.dependencies, ...workIds])];
  }
}

/** Look up a milestone by id, or throw NOT_FOUND. */
export function requireMilestone(graph: TaskGraph, milestoneId: string): Milestone {
  const milestone = graph.milestones.find((m) => m.id === milestoneId);
  if (!milestone) {
    throw new TasklaneError(ExitCode.NOT_FOUND, `Milestone not found: ${milestoneId}`);
  }
  return milestone;
}

/**
 * Point progress at the first milestone after `fromIndex` that is not
 * validated, or mark the sprint finished when there is none.
 */
function advanceCurrent(state: SprintState, fromIndex: number, timestamp: string): void {
  const { graph, progress } = state;
  const next = graph.milestones.slice(fromIndex + 1).find((m) => m.status !== 'validated') ?? null;
  progress.currentMilestoneId = next?.id ?? null;
  progress.validationPending = next?.status === 'complete';
  if (next) {
    appendHistory(progress, 'milestone_current', timestamp, { milestoneId: next.id });
  } else {
    appendHistory(progress, 'sprint_completed', timestamp);
  }
}

// ============================================================================
// Automatic transitions
// ============================================================================

/**
 * A task of the milestone started: a not_started milestone moves to in_progress.
 */
export function onTaskStarted(state: SprintState, task: Task, timestamp: string): void {
  const milestone = requireMilestone(state.graph, task.milestoneId);
  if (milestone.status === 'not_started') {
    transitionMilestone(milestone, 'task_started');
    appendHistory(state.progress, 'milestone_started', timestamp, { milestoneId: milestone.id });
    getLogger('milestones').info({ milestoneId: milestone.id }, 'milestone started');
  }
}

/**
 * A task completed: once every work task of its milestone is completed the
 * milestone becomes complete, and the gate closes if it is the current one.
 */
export function onTaskCompleted(state: SprintState, task: Task, timestamp: string): void {
  const { graph, progress } = state;
  const milestone = requireMilestone(graph, task.milestoneId);
  if (milestone.status !== 'in_progress') return;

  const work = milestoneTasks(graph, milestone).filter((t) => t.type === 'work');
  if (!work.every((t) => t.status === 'completed')) return;

  transitionMilestone(milestone, 'work_completed');
  appendHistory(progress, 'milestone_complete', timestamp, { milestoneId: milestone.id });
  if (progress.currentMilestoneId === milestone.id) {
    progress.validationPending = true;
  }
  getLogger('milestones').info({ milestoneId: milestone.id }, 'milestone complete, awaiting validation');
}

// ============================================================================
// Validation gate
// ============================================================================

/**
 * Record the external validator's verdict on the current milestone (mutates).
 *
 * passed: the validation task completes, the milestone is validated and the
 * next milestone becomes current. failed: the milestone reopens so
 * remediation tasks can be added.
 */
export function applyValidation(
  state: SprintState,
  milestoneId: string,
  outcome: ValidationOutcome,
  issues: string[],
  timestamp: string,
): ValidationRecord {
  const { graph, progress } = state;
  const milestone = requireMilestone(graph, milestoneId);

  if (milestone.status !== 'complete') {
    throw new TasklaneError(
      ExitCode.LIFECYCLE_TRANSITION_INVALID,
      `Milestone ${milestoneId} is ${milestone.status}; only a complete milestone can be validated`,
      { details: { milestoneId, status: milestone.status } },
    );
  }
  if (progress.currentMilestoneId !== milestoneId) {
    throw new TasklaneError(
      ExitCode.MILESTONE_BLOCKED,
      `Milestone ${milestoneId} cannot be validated before the current milestone ${progress.currentMilestoneId ?? '(none)'}`,
      { details: { milestoneId, currentMilestoneId: progress.currentMilestoneId } },
    );
  }

  const record: ValidationRecord = { milestoneId, timestamp, status: outcome, issues };
  progress.validations.push(record);

  if (outcome === 'passed') {
    for (const task of milestoneTasks(graph, milestone)) {
      if (task.type === 'validation') {
        task.status = 'completed';
        task.completedAt = timestamp;
      }
    }
    transitionMilestone(milestone, 'validation_passed');
    appendHistory(progress, 'milestone_validated', timestamp, { milestoneId });
    advanceCurrent(state, graph.milestones.indexOf(milestone), timestamp);
  } else {
    transitionMilestone(milestone, 'validation_failed');
    progress.validationPending = false;
    appendHistory(progress, 'milestone_validation_failed', timestamp, {
      milestoneId,
      details: { issues },
    });
  }

  syncProgress(graph, progress);
  getLogger('milestones').info({ milestoneId, outcome, issues: issues.length }, 'validation recorded');
  return record;
}

/**
 * Insert a remediation work task before the trailing validation task of an
 * in-progress milestone (mutates). Remediation does not count against the
 * milestone's capacity maximum.
 */
export function applyRemediation(
  state: SprintState,
  milestoneId: string,
  input: RemediationInput,
  timestamp: string,
): Task {
  const { graph, progress } = state;
  const milestone = requireMilestone(graph, milestoneId);
  if (milestone.status !== 'in_progress') {
    throw new TasklaneError(
      ExitCode.LIFECYCLE_TRANSITION_INVALID,
      `Milestone ${milestoneId} is ${milestone.status}; remediation tasks go into an in-progress milestone`,
      { fix: 'Remediation follows a failed validation: `tasklane validate-milestone <id> --failed`' },
    );
  }

  const ids = createIdAllocator(graph);
  const task: Task = {
    id: ids.nextTaskId(),
    title: input.title,
    type: 'work',
    status: 'pending',
    milestoneId,
    dependencies: input.dependencies ?? [],
    scope: {
      mustImplement: input.scope?.mustImplement ?? [],
      mustNotImplement: input.scope?.mustNotImplement ?? [],
      maxFileChanges: input.scope?.maxFileChanges ?? graph.scopeEnforcement.defaultMaxFileChanges,
    },
  };

  graph.tasks.push(task);
  milestone.taskIds.splice(Math.max(milestone.taskIds.length - 1, 0), 0, task.id);
  gateOn(graph.tasks, milestone, [task.id]);
  cycleCheck(graph.tasks);

  appendHistory(progress, 'remediation_added', timestamp, { taskId: task.id, milestoneId });
  syncProgress(graph, progress);
  return task;
}

/**
 * Status report for one milestone.
 */
export function getMilestoneStatus(state: SprintState, milestoneId: string): MilestoneStatusReport {
  const { graph, progress } = state;
  const milestone = requireMilestone(graph, milestoneId);
  const tasks = milestoneTasks(graph, milestone);
  const isCurrent = progress.currentMilestoneId === milestoneId;
  const records = progress.validations.filter((v) => v.milestoneId === milestoneId);

  return {
    id: milestone.id,
    title: milestone.title,
    status: milestone.status,
    position: graph.milestones.indexOf(milestone) + 1,
    isCurrent,
    gateHolding: isCurrent && milestone.status === 'complete',
    capacity: capacityOf(milestone, graph),
    counts: {
      total: tasks.length,
      work: tasks.filter((t) => t.type === 'work').length,
      completed: tasks.filter((t) => t.status === 'completed').length,
      inProgress: tasks.filter((t) => t.status === 'in_progress').length,
      pending: tasks.filter((t) => t.status === 'pending').length,
    },
    validationTaskId: tasks.find((t) => t.type === 'validation')?.id ?? null,
    tasks: tasks.map((t) => ({ id: t.id, title: t.title, type: t.type, status: t.status })),
    latestValidation: records[records.length - 1] ?? null,
  };
}

// ============================================================================
// Store-backed operations
// ============================================================================

export async function recordValidation(
  store: TaskGraphStore,
  milestoneId: string,
  outcome: ValidationOutcome,
  issues: string[] = [],
): Promise<{ record: ValidationRecord; currentMilestoneId: string | null; backupId: string }> {
  const { result, backupId } = await store.atomicUpdate(`validate-milestone ${milestoneId}`, (state) => {
    const record = applyValidation(state, milestoneId, outcome, issues, new Date().toISOString());
    return { record, currentMilestoneId: state.progress.currentMilestoneId };
  });
  return { ...result, backupId };
}

export async function addRemediationTask(
  store: TaskGraphStore,
  milestoneId: string,
  input: RemediationInput,
): Promise<{ task: Task; backupId: string }> {
  const { result, backupId } = await store.atomicUpdate(`remediate ${milestoneId}`, (state) =>
    applyRemediation(state, milestoneId, input, new Date().toISOString()),
  );
  return { task: result, backupId };
}
