/**
 * Derived progress fields. Counters and the sprint status are always
 * recomputed from the task graph, never incremented in place.
 */

import type {
  HistoryEntry,
  ProgressTracker,
  SprintStatus,
  TaskGraph,
} from '../../types/task.js';

/** Completed and total task counts of a graph. */
export function countTasks(graph: TaskGraph): ProgressTracker['counters'] {
  return {
    completed: graph.tasks.filter((t) => t.status === 'completed').length,
    total: graph.tasks.length,
  };
}

/** Sprint status implied by the graph and the gate fields of the tracker. */
export function deriveSprintStatus(
  graph: TaskGraph,
  progress: Pick<ProgressTracker, 'currentMilestoneId' | 'validationPending'>,
): SprintStatus {
  if (progress.currentMilestoneId === null) return 'completed';
  if (progress.validationPending) return 'awaiting_validation';
  const started = graph.tasks.some((t) => t.status !== 'pending')
    || graph.milestones.some((m) => m.status !== 'not_started');
  return started ? 'active' : 'planned';
}

/** Recompute counters and sprint status in place after a mutation. */
export function syncProgress(graph: TaskGraph, progress: ProgressTracker): void {
  progress.counters = countTasks(graph);
  progress.status = deriveSprintStatus(graph, progress);
}

/** Append one entry to the append-only history. */
export function appendHistory(
  progress: ProgressTracker,
  action: string,
  timestamp: string,
  fields: Omit<HistoryEntry, 'timestamp' | 'action'> = {},
): void {
  progress.history.push({ timestamp, action, ...fields });
}
