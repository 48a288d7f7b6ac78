/**
 * Dependency checking - validate the task dependency graph.
 *
 * The graph is acyclic by invariant: cycleCheck() runs on every load and
 * after every mutation, before anything is scheduled from it.
 */

import type { Task, UnmetDependency } from '../../types/task.js';
import { CycleDetectedError } from '../errors.js';

/** A dependency error. */
export interface DependencyError {
  code: string;
  taskId: string;
  message: string;
  relatedIds?: string[];
}

/**
 * Detect circular dependencies using DFS starting from one task.
 * Returns the cycle path if found (first id repeated at the end), empty array otherwise.
 */
export function detectCircularDeps(
  taskId: string,
  tasks: readonly Task[],
): string[] {
  const taskMap = new Map(tasks.map((t) => [t.id, t]));

  const visited = new Set<string>();
  const recursionStack = new Set<string>();
  const path: string[] = [];

  function dfs(id: string): string[] {
    visited.add(id);
    recursionStack.add(id);
    path.push(id);

    for (const depId of taskMap.get(id)?.dependencies ?? []) {
      if (!visited.has(depId)) {
        const cycle = dfs(depId);
        if (cycle.length > 0) return cycle;
      } else if (recursionStack.has(depId)) {
        const cycleStart = path.indexOf(depId);
        return [...path.slice(cycleStart), depId];
      }
    }

    path.pop();
    recursionStack.delete(id);
    return [];
  }

  return dfs(taskId);
}

/**
 * Find the first cycle anywhere in the graph, visiting tasks in array order.
 */
export function findCycle(tasks: readonly Task[]): string[] {
  const checked = new Set<string>();
  for (const task of tasks) {
    if (checked.has(task.id)) continue;
    const cycle = detectCircularDeps(task.id, tasks);
    if (cycle.length > 0) return cycle;
    // Everything reachable from an acyclic root is acyclic too.
    for (const id of reachableFrom(task.id, tasks)) checked.add(id);
  }
  return [];
}

/**
 * Throw CycleDetectedError if the dependency relation has a cycle.
 * A self-dependency is reported as the cycle `[id, id]`.
 */
export function cycleCheck(tasks: readonly Task[]): void {
  const cycle = findCycle(tasks);
  if (cycle.length > 0) {
    throw new CycleDetectedError(cycle);
  }
}

function reachableFrom(taskId: string, tasks: readonly Task[]): Set<string> {
  const taskMap = new Map(tasks.map((t) => [t.id, t]));
  const seen = new Set<string>();
  const stack = [taskId];
  while (stack.length > 0) {
    const id = stack.pop();
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    stack.push(...(taskMap.get(id)?.dependencies ?? []));
  }
  return seen;
}

/**
 * Validate dependencies for missing references, duplicates and self-references.
 */
export function validateDependencyRefs(tasks: readonly Task[]): DependencyError[] {
  const taskIds = new Set(tasks.map((t) => t.id));
  const errors: DependencyError[] = [];

  for (const task of tasks) {
    const seen = new Set<string>();
    for (const depId of task.dependencies) {
      if (seen.has(depId)) {
        errors.push({
          code: 'E_DEP_DUPLICATE',
          taskId: task.id,
          message: `Task ${task.id} lists dependency ${depId} more than once`,
          relatedIds: [depId],
        });
      }
      seen.add(depId);
      if (!taskIds.has(depId)) {
        errors.push({
          code: 'E_DEP_NOT_FOUND',
          taskId: task.id,
          message: `Task ${task.id} depends on ${depId}, which does not exist`,
          relatedIds: [depId],
        });
      }
    }
  }

  return errors;
}

/**
 * Get tasks that depend on a given task.
 */
export function getDependents(taskId: string, tasks: readonly Task[]): Task[] {
  return tasks.filter((t) => t.dependencies.includes(taskId));
}

/**
 * Get dependent IDs.
 */
export function getDependentIds(taskId: string, tasks: readonly Task[]): string[] {
  return getDependents(taskId, tasks).map((t) => t.id);
}

/**
 * Dependencies of a task that are not completed, with their current status.
 * A dependency id with no task behind it is reported as `missing`.
 */
export function getUnmetDependencies(task: Task, tasks: readonly Task[]): UnmetDependency[] {
  const taskMap = new Map(tasks.map((t) => [t.id, t]));
  const unmet: UnmetDependency[] = [];
  for (const depId of task.dependencies) {
    const dep = taskMap.get(depId);
    if (!dep) {
      unmet.push({ id: depId, status: 'missing' });
    } else if (dep.status !== 'completed') {
      unmet.push({ id: depId, status: dep.status });
    }
  }
  return unmet;
}

/**
 * Walk upstream recursively through a task's dependency chain.
 * Returns all non-completed dependency IDs (deduplicated).
 */
export function getTransitiveBlockers(taskId: string, tasks: readonly Task[]): string[] {
  const taskMap = new Map(tasks.map((t) => [t.id, t]));
  const blockers = new Set<string>();
  const visited = new Set<string>();

  function walk(id: string): void {
    if (visited.has(id)) return;
    visited.add(id);

    for (const depId of taskMap.get(id)?.dependencies ?? []) {
      const dep = taskMap.get(depId);
      if (!dep || dep.status === 'completed') continue;
      blockers.add(depId);
      walk(depId);
    }
  }

  walk(taskId);
  return [...blockers];
}

/**
 * From the transitive blockers, return only "leaf" blockers: those whose
 * own dependencies are all completed. These need action first.
 */
export function getLeafBlockers(taskId: string, tasks: readonly Task[]): string[] {
  const taskMap = new Map(tasks.map((t) => [t.id, t]));
  return getTransitiveBlockers(taskId, tasks).filter((id) =>
    (taskMap.get(id)?.dependencies ?? []).every(
      (depId) => taskMap.get(depId)?.status === 'completed',
    ),
  );
}
