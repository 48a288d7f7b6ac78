/**
 * Task work operations: start and complete.
 *
 * The apply* functions mutate a state copy inside atomicUpdate; the async
 * wrappers run them as one transaction each.
 */

import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { MilestoneStatus, SprintState, Task } from '../../types/task.js';
import type { TaskGraphStore } from '../../store/task-graph-store.js';
import type { ChangeSet } from '../../types/scope.js';
import { assertScope } from '../scope/scope-guard.js';
import { onTaskCompleted, onTaskStarted } from '../milestones/index.js';
import { appendHistory, syncProgress } from '../sprint/progress.js';
import { nextTask, requireTask } from '../tasks/resolver.js';

/** Result of starting work on a task. */
export interface TaskStartResult {
  taskId: string;
  taskTitle: string;
  milestoneId: string;
  milestoneStatus: MilestoneStatus;
}

/** Result of completing a task. */
export interface TaskCompleteResult {
  taskId: string;
  milestoneId: string;
  milestoneStatus: MilestoneStatus;
  validationPending: boolean;
  unblocked: string[];
}

/**
 * Mark a task in_progress after the resolver has cleared it (mutates).
 */
export function applyStart(state: SprintState, taskId: string, timestamp: string): TaskStartResult {
  const resolved = nextTask(state, taskId);
  if (resolved.kind !== 'task') {
    throw new TasklaneError(ExitCode.GENERAL_ERROR, `Task ${taskId} cannot be started`);
  }
  const task = resolved.task;

  task.status = 'in_progress';
  task.startedAt = timestamp;
  onTaskStarted(state, task, timestamp);
  appendHistory(state.progress, 'task_started', timestamp, { taskId, milestoneId: task.milestoneId });
  syncProgress(state.graph, state.progress);

  const milestone = state.graph.milestones.find((m) => m.id === task.milestoneId);
  return {
    taskId,
    taskTitle: task.title,
    milestoneId: task.milestoneId,
    milestoneStatus: milestone?.status ?? 'not_started',
  };
}

function assertCompletable(task: Task): void {
  if (task.type === 'validation') {
    throw new TasklaneError(
      ExitCode.INVALID_INPUT,
      `Task ${task.id} is a validation task; record the validation outcome instead`,
      { fix: `tasklane validate-milestone ${task.milestoneId} --passed` },
    );
  }
  if (task.status === 'completed') {
    throw new TasklaneError(ExitCode.TASK_COMPLETED, `Task ${task.id} is already completed`);
  }
  if (task.status === 'pending') {
    throw new TasklaneError(
      ExitCode.LIFECYCLE_TRANSITION_INVALID,
      `Task ${task.id} is pending; start it before completing it`,
      { fix: `tasklane start ${task.id}` },
    );
  }
}

/**
 * Mark an in-progress task completed and drive the milestone forward (mutates).
 */
export function applyComplete(state: SprintState, taskId: string, timestamp: string): TaskCompleteResult {
  const { graph, progress } = state;
  const task = requireTask(graph, taskId);
  assertCompletable(task);

  task.status = 'completed';
  task.completedAt = timestamp;
  appendHistory(progress, 'task_completed', timestamp, { taskId, milestoneId: task.milestoneId });
  onTaskCompleted(state, task, timestamp);
  syncProgress(graph, progress);

  // Dependents whose last open dependency was this task.
  const completed = new Set(graph.tasks.filter((t) => t.status === 'completed').map((t) => t.id));
  const unblocked = graph.tasks
    .filter((t) => t.status === 'pending' && t.dependencies.includes(taskId))
    .filter((t) => t.dependencies.every((d) => completed.has(d)))
    .map((t) => t.id);

  const milestone = graph.milestones.find((m) => m.id === task.milestoneId);
  return {
    taskId,
    milestoneId: task.milestoneId,
    milestoneStatus: milestone?.status ?? 'in_progress',
    validationPending: progress.validationPending,
    unblocked,
  };
}

/**
 * Start working on a specific task.
 */
export async function startTask(store: TaskGraphStore, taskId: string): Promise<TaskStartResult> {
  if (!taskId) {
    throw new TasklaneError(ExitCode.INVALID_INPUT, 'Task ID is required');
  }
  const { result } = await store.atomicUpdate(`start ${taskId}`, (state) =>
    applyStart(state, taskId, new Date().toISOString()),
  );
  return result;
}

/**
 * Complete a task.
 *
 * When the changes made for the task are given, the scope post-check runs
 * first and a violation leaves the task in progress.
 */
export async function completeTask(
  store: TaskGraphStore,
  taskId: string,
  options: { changes?: ChangeSet } = {},
): Promise<TaskCompleteResult> {
  if (!taskId) {
    throw new TasklaneError(ExitCode.INVALID_INPUT, 'Task ID is required');
  }
  const changes = options.changes;
  const guardrails = changes ? await store.loadGuardrails() : null;
  const { result } = await store.atomicUpdate(`complete ${taskId}`, (state) => {
    if (changes && guardrails) {
      const task = requireTask(state.graph, taskId);
      assertCompletable(task);
      assertScope(task, changes, guardrails, {
        enforcePrereleaseBan: state.graph.scopeEnforcement.enforcePrereleaseBan,
      });
    }
    return applyComplete(state, taskId, new Date().toISOString());
  });
  return result;
}
