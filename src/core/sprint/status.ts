/**
 * Sprint status summary.
 *
 * Output depends only on the state files, so two reads with no mutation in
 * between produce identical results.
 */

import type { MilestoneStatus, SprintState, SprintStatus, TaskStatus } from '../../types/task.js';
import type { TaskGraphStore } from '../../store/task-graph-store.js';
import { getCurrentMilestone, milestoneTasks, nextTask } from '../tasks/resolver.js';

export interface MilestoneSummary {
  id: string;
  title: string;
  status: MilestoneStatus;
  isCurrent: boolean;
  completed: number;
  total: number;
}

export interface SprintStatusReport {
  sprintId: string;
  status: SprintStatus;
  currentMilestoneId: string | null;
  validationPending: boolean;
  counters: { completed: number; total: number };
  inProgress: Array<{ id: string; title: string }>;
  next:
    | { kind: 'task'; taskId: string; title: string }
    | { kind: 'blocked'; reason: 'validation_pending' | 'no_eligible_tasks' }
    | { kind: 'sprint_complete' };
  milestones: MilestoneSummary[];
  deferredFeatures: number;
}

function countBy(statuses: TaskStatus[], status: TaskStatus): number {
  return statuses.filter((s) => s === status).length;
}

export function getCurrentStatus(state: SprintState): SprintStatusReport {
  const { graph, progress } = state;
  const current = getCurrentMilestone(graph, progress);
  const resolved = nextTask(state);

  return {
    sprintId: graph.sprintId,
    status: progress.status,
    currentMilestoneId: current?.id ?? null,
    validationPending: progress.validationPending,
    counters: { ...progress.counters },
    inProgress: graph.tasks
      .filter((t) => t.status === 'in_progress')
      .map((t) => ({ id: t.id, title: t.title })),
    next: resolved.kind === 'task'
      ? { kind: 'task', taskId: resolved.task.id, title: resolved.task.title }
      : resolved.kind === 'blocked'
        ? { kind: 'blocked', reason: resolved.reason }
        : { kind: 'sprint_complete' },
    milestones: graph.milestones.map((m) => {
      const statuses = milestoneTasks(graph, m).map((t) => t.status);
      return {
        id: m.id,
        title: m.title,
        status: m.status,
        isCurrent: m.id === current?.id,
        completed: countBy(statuses, 'completed'),
        total: statuses.length,
      };
    }),
    deferredFeatures: state.deferred.features.length,
  };
}

export async function getSprintStatus(store: TaskGraphStore): Promise<SprintStatusReport> {
  return getCurrentStatus(await store.load());
}
