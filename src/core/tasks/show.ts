/**
 * Show full task details by ID.
 */

import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { MilestoneStatus, SprintState, Task, UnmetDependency } from '../../types/task.js';
import type { TaskGraphStore } from '../../store/task-graph-store.js';
import { getDependentIds, getUnmetDependencies } from './dependency-check.js';
import { isEligible, requireTask } from './resolver.js';

/** Task enriched with its milestone and dependency state. */
export interface TaskDetail extends Task {
  milestone: { id: string; title: string; status: MilestoneStatus; isCurrent: boolean } | null;
  eligible: boolean;
  dependencyStatus: Array<{ id: string; status: Task['status'] | 'missing'; title: string | null }>;
  unmet: UnmetDependency[];
  dependents: string[];
}

/**
 * Task details from an already loaded state.
 */
export function describeTask(state: SprintState, taskId: string): TaskDetail {
  const { graph, progress } = state;
  const task = requireTask(graph, taskId);
  const milestone = graph.milestones.find((m) => m.id === task.milestoneId);
  const byId = new Map(graph.tasks.map((t) => [t.id, t]));

  return {
    ...task,
    milestone: milestone
      ? {
          id: milestone.id,
          title: milestone.title,
          status: milestone.status,
          isCurrent: progress.currentMilestoneId === milestone.id,
        }
      : null,
    eligible: isEligible(task, graph),
    dependencyStatus: task.dependencies.map((id) => {
      const dep = byId.get(id);
      return { id, status: dep?.status ?? 'missing', title: dep?.title ?? null };
    }),
    unmet: getUnmetDependencies(task, graph.tasks),
    dependents: getDependentIds(taskId, graph.tasks),
  };
}

/**
 * Get a task by ID with enriched details.
 */
export async function showTask(store: TaskGraphStore, taskId: string): Promise<TaskDetail> {
  if (!taskId) {
    throw new TasklaneError(ExitCode.INVALID_INPUT, 'Task ID is required');
  }
  return describeTask(await store.load(), taskId);
}
