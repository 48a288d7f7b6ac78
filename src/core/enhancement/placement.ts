/**
 * Placement of enhancement tasks in an existing task graph.
 *
 * R is the index of the latest milestone holding something the feature
 * depends on (-1 if none). D is the index of the earliest milestone holding
 * a task that must depend on the feature (Infinity if none). The feature
 * goes into the earliest open milestone in [R, D] with room for it, or into
 * new milestones inserted after max(R, current) and before D.
 */

import type { Milestone, ProgressTracker, TaskGraph } from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { OPEN_MILESTONE_STATUSES } from '../../store/status-registry.js';
import { TasklaneError } from '../errors.js';
import { capacityOf } from '../milestones/index.js';

/** Where a feature's tasks will go. */
export type PlacementPlan =
  | {
      kind: 'existing';
      milestoneId: string;
      milestoneIndex: number;
      /** Position in the milestone's taskIds the tasks are inserted at. */
      position: number;
      bounds: PlacementBounds;
    }
  | {
      kind: 'new_milestones';
      /** Index in graph.milestones the first new milestone is inserted at. */
      insertAt: number;
      /** Work-task count of each new milestone, in order. */
      chunks: number[];
      bounds: PlacementBounds;
    };

export interface PlacementBounds {
  /** Latest milestone index holding a dependency, -1 if none. */
  earliest: number;
  /** Earliest milestone index holding a dependent, null if none. */
  latest: number | null;
  current: number;
}

export interface PlacementRequest {
  /** Number of work tasks in the feature. */
  size: number;
  /** Existing task ids the feature depends on. */
  dependencies: readonly string[];
  /** Existing task ids that will depend on the feature. */
  dependents: readonly string[];
}

function milestoneIndexOf(graph: TaskGraph, taskId: string): number {
  const idx = graph.milestones.findIndex((m) => m.taskIds.includes(taskId));
  if (idx === -1) {
    throw new TasklaneError(ExitCode.NOT_FOUND, `Task not found: ${taskId}`);
  }
  return idx;
}

function placementFailed(message: string, details: Record<string, unknown>): TasklaneError {
  return new TasklaneError(ExitCode.PLACEMENT_FAILED, message, {
    details,
    fix: 'Adjust the feature dependencies, or defer it with `tasklane defer`',
  });
}

/**
 * Position for the feature inside a candidate milestone: before the
 * trailing validation task, or before the first dependent when the
 * milestone holds dependents. Null when a dependency sits after that point.
 */
function insertionPosition(milestone: Milestone, request: PlacementRequest): number | null {
  const dependentPositions = request.dependents
    .map((id) => milestone.taskIds.indexOf(id))
    .filter((pos) => pos !== -1);
  const position = dependentPositions.length > 0
    ? Math.min(...dependentPositions)
    : milestone.taskIds.length - 1;
  const dependencyPositions = request.dependencies
    .map((id) => milestone.taskIds.indexOf(id))
    .filter((pos) => pos !== -1);
  if (dependencyPositions.some((pos) => pos >= position)) return null;
  return position;
}

/** Split `size` work tasks into milestones of at most `perMilestone`. */
export function splitIntoChunks(size: number, perMilestone: number): number[] {
  const chunks: number[] = [];
  for (let remaining = size; remaining > 0; remaining -= perMilestone) {
    chunks.push(Math.min(remaining, perMilestone));
  }
  return chunks;
}

/**
 * Decide where a feature of `request.size` work tasks goes.
 */
export function placement(graph: TaskGraph, progress: ProgressTracker, request: PlacementRequest): PlacementPlan {
  if (request.size < 1) {
    throw new TasklaneError(ExitCode.INVALID_INPUT, 'An enhancement needs at least one task');
  }

  const earliest = Math.max(-1, ...request.dependencies.map((id) => milestoneIndexOf(graph, id)));
  const latestRaw = Math.min(Infinity, ...request.dependents.map((id) => milestoneIndexOf(graph, id)));
  const latest = Number.isFinite(latestRaw) ? latestRaw : null;
  const current = progress.currentMilestoneId === null
    ? graph.milestones.length
    : graph.milestones.findIndex((m) => m.id === progress.currentMilestoneId);
  const bounds: PlacementBounds = { earliest, latest, current };

  if (latest !== null && earliest > latest) {
    throw placementFailed(
      `Feature depends on a task in milestone ${graph.milestones[earliest]?.id ?? earliest} but must precede a task in earlier milestone ${graph.milestones[latest]?.id ?? latest}`,
      { ...bounds },
    );
  }

  const last = Math.min(latest ?? graph.milestones.length - 1, graph.milestones.length - 1);
  for (let idx = Math.max(earliest, 0); idx <= last; idx++) {
    const milestone = graph.milestones[idx];
    if (!milestone || !OPEN_MILESTONE_STATUSES.has(milestone.status)) continue;
    if (milestone.taskIds.length + request.size > capacityOf(milestone, graph).max) continue;
    const position = insertionPosition(milestone, request);
    if (position === null) continue;
    return { kind: 'existing', milestoneId: milestone.id, milestoneIndex: idx, position, bounds };
  }

  const insertAt = Math.min(Math.max(earliest, current) + 1, graph.milestones.length);
  if (latest !== null && insertAt > latest) {
    throw placementFailed(
      `No open milestone between ${graph.milestones[Math.max(earliest, 0)]?.id ?? 'the start'} and ${graph.milestones[latest]?.id ?? latest} has room for ${request.size} task(s), and a new milestone cannot precede ${graph.milestones[latest]?.id ?? latest}`,
      { ...bounds, size: request.size },
    );
  }

  // New milestones take the default capacity; one slot is the validation task.
  const perMilestone = Math.max(graph.milestoneStrategy.maxTasks - 1, 1);
  return { kind: 'new_milestones', insertAt, chunks: splitIntoChunks(request.size, perMilestone), bounds };
}
