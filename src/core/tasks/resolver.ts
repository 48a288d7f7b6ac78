/**
 * Dependency resolver - decides which task may run next.
 *
 * Order of checks for `next`: the validation gate, then the current
 * milestone's work tasks in declared order (their position in the
 * milestone's taskIds). Later milestones are never offered while the
 * current one is open.
 */

import type {
  Milestone,
  ProgressTracker,
  SprintState,
  Task,
  TaskGraph,
  UnmetDependency,
} from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { DependencyUnsatisfiedError, TasklaneError, ValidationPendingError } from '../errors.js';
import {
  getDependentIds,
  getLeafBlockers,
  getTransitiveBlockers,
  getUnmetDependencies,
} from './dependency-check.js';

/** A task the scheduler is waiting on. */
export interface WaitingTask {
  id: string;
  status: Task['status'];
  unmet: UnmetDependency[];
}

export type NextTaskResult =
  | { kind: 'task'; task: Task; milestoneId: string }
  | { kind: 'blocked'; reason: 'validation_pending'; milestoneId: string }
  | { kind: 'blocked'; reason: 'no_eligible_tasks'; milestoneId: string; waitingOn: WaitingTask[] }
  | { kind: 'sprint_complete' };

/** Dependency report for one task. */
export interface DependencyReport {
  taskId: string;
  status: Task['status'];
  eligible: boolean;
  dependencies: Array<{ id: string; status: Task['status'] | 'missing' }>;
  unmet: UnmetDependency[];
  transitiveBlockers: string[];
  leafBlockers: string[];
  dependents: string[];
}

/**
 * True when the task is pending and every dependency is completed.
 */
export function isEligible(task: Task, graph: TaskGraph): boolean {
  return task.status === 'pending' && getUnmetDependencies(task, graph.tasks).length === 0;
}

/** Look up a task by id, or throw NOT_FOUND. */
export function requireTask(graph: TaskGraph, taskId: string): Task {
  const task = graph.tasks.find((t) => t.id === taskId);
  if (!task) {
    throw new TasklaneError(
      ExitCode.NOT_FOUND,
      `Task not found: ${taskId}`,
      { fix: 'Use `tasklane status` to see the task ids of this sprint' },
    );
  }
  return task;
}

/** The milestone progress points at, or null once the sprint is complete. */
export function getCurrentMilestone(graph: TaskGraph, progress: ProgressTracker): Milestone | null {
  if (progress.currentMilestoneId === null) return null;
  return graph.milestones.find((m) => m.id === progress.currentMilestoneId) ?? null;
}

/** Tasks of a milestone in declared order. */
export function milestoneTasks(graph: TaskGraph, milestone: Milestone): Task[] {
  const taskMap = new Map(graph.tasks.map((t) => [t.id, t]));
  return milestone.taskIds.flatMap((id) => {
    const task = taskMap.get(id);
    return task ? [task] : [];
  });
}

function resolveRequested(state: SprintState, taskId: string): NextTaskResult {
  const { graph, progress } = state;
  const task = requireTask(graph, taskId);

  if (progress.validationPending && progress.currentMilestoneId !== null) {
    throw new ValidationPendingError(
      progress.currentMilestoneId,
      `Milestone ${progress.currentMilestoneId} is complete and awaiting validation; no task can start until it is validated`,
    );
  }
  if (task.status !== 'pending') {
    throw new TasklaneError(
      ExitCode.TASK_NOT_PENDING,
      `Task ${taskId} is ${task.status}, not pending`,
    );
  }
  if (task.type === 'validation') {
    throw new TasklaneError(
      ExitCode.DEPENDENCY_ERROR,
      `Task ${taskId} is the validation task of milestone ${task.milestoneId}; it completes when the validation is recorded`,
      {
        fix: `Report the outcome with \`tasklane validate-milestone ${task.milestoneId} --passed\` or \`--failed\``,
        details: { taskId, milestoneId: task.milestoneId },
      },
    );
  }

  const unmet = getUnmetDependencies(task, graph.tasks);
  if (unmet.length > 0) {
    throw new DependencyUnsatisfiedError(taskId, unmet);
  }
  return { kind: 'task', task, milestoneId: task.milestoneId };
}

/**
 * Select the next task to work on, or check that a requested one may start.
 *
 * Without an id, blocking conditions come back as results. With an id they
 * are thrown, since the caller asked for something specific.
 */
export function nextTask(state: SprintState, requestedId?: string): NextTaskResult {
  if (requestedId !== undefined) {
    return resolveRequested(state, requestedId);
  }

  const { graph, progress } = state;
  const current = getCurrentMilestone(graph, progress);
  if (!current) {
    return { kind: 'sprint_complete' };
  }
  if (progress.validationPending) {
    return { kind: 'blocked', reason: 'validation_pending', milestoneId: current.id };
  }

  const work = milestoneTasks(graph, current).filter((t) => t.type === 'work');
  const next = work.find((t) => isEligible(t, graph));
  if (next) {
    return { kind: 'task', task: next, milestoneId: current.id };
  }

  const waitingOn = work
    .filter((t) => t.status !== 'completed')
    .map((t) => ({ id: t.id, status: t.status, unmet: getUnmetDependencies(t, graph.tasks) }));
  return { kind: 'blocked', reason: 'no_eligible_tasks', milestoneId: current.id, waitingOn };
}

/**
 * Dependencies, blockers and dependents of one task.
 */
export function validateDependencies(graph: TaskGraph, taskId: string): DependencyReport {
  const task = requireTask(graph, taskId);
  const statusById = new Map(graph.tasks.map((t) => [t.id, t.status]));
  return {
    taskId,
    status: task.status,
    eligible: isEligible(task, graph),
    dependencies: task.dependencies.map((id) => ({ id, status: statusById.get(id) ?? 'missing' })),
    unmet: getUnmetDependencies(task, graph.tasks),
    transitiveBlockers: getTransitiveBlockers(taskId, graph.tasks),
    leafBlockers: getLeafBlockers(taskId, graph.tasks),
    dependents: getDependentIds(taskId, graph.tasks),
  };
}
