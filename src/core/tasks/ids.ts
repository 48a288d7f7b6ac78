/**
 * Sequential id allocation for tasks (T###) and milestones (M#).
 * New ids continue after the highest numeric id already in the graph.
 */

function maxNumericSuffix(ids: readonly string[], prefix: string): number {
  const re = new RegExp(`^${prefix}(\\d+)$`);
  let max = 0;
  for (const id of ids) {
    const match = re.exec(id);
    if (match?.[1]) max = Math.max(max, parseInt(match[1], 10));
  }
  return max;
}

/** Allocates ids for one mutation, so several new records never collide. */
export interface IdAllocator {
  nextTaskId(): string;
  nextMilestoneId(): string;
}

/** Anything with task and milestone ids: a task graph, or a plan. */
export interface IdSource {
  tasks: ReadonlyArray<{ id: string }>;
  milestones: ReadonlyArray<{ id: string }>;
}

export function createIdAllocator(graph: IdSource): IdAllocator {
  let task = maxNumericSuffix(graph.tasks.map((t) => t.id), 'T');
  let milestone = maxNumericSuffix(graph.milestones.map((m) => m.id), 'M');
  return {
    nextTaskId: () => `T${String(++task).padStart(3, '0')}`,
    nextMilestoneId: () => `M${++milestone}`,
  };
}
