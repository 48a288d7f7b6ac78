/**
 * Read access to the append-only progress history.
 */

import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { HistoryEntry, ValidationRecord } from '../../types/task.js';
import type { TaskGraphStore } from '../../store/task-graph-store.js';

export interface HistoryResult {
  total: number;
  entries: HistoryEntry[];
  validations: ValidationRecord[];
}

/**
 * History entries, most recent first.
 */
export async function getHistory(store: TaskGraphStore, options: { limit?: number } = {}): Promise<HistoryResult> {
  const limit = options.limit;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new TasklaneError(ExitCode.INVALID_INPUT, `--limit must be a positive integer, got ${limit}`);
  }
  const { progress } = await store.load();
  const newestFirst = [...progress.history].reverse();
  return {
    total: progress.history.length,
    entries: limit === undefined ? newestFirst : newestFirst.slice(0, limit),
    validations: [...progress.validations].reverse(),
  };
}
