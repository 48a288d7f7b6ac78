/**
 * Scope compliance report for one task, read-only.
 */

import type { TaskGraphStore } from '../../store/task-graph-store.js';
import type { ChangeSet } from '../../types/scope.js';
import type { TechnologyRef } from '../../types/task.js';
import { requireTask } from '../tasks/resolver.js';
import {
  postCheck,
  preCheck,
  techCompliance,
  type ScopePostCheckResult,
  type ScopePreCheck,
  type TechComplianceResult,
} from './scope-guard.js';

export interface ScopeComplianceReport {
  taskId: string;
  compliant: boolean;
  boundary: ScopePreCheck;
  /** Null when no changes were supplied. */
  changes: ScopePostCheckResult | null;
  tech: TechComplianceResult;
}

export interface ScopeCheckInput {
  changes?: ChangeSet;
  /** Technologies to check instead of the task's declared ones. */
  technologies?: TechnologyRef[];
}

export async function checkScopeCompliance(
  store: TaskGraphStore,
  taskId: string,
  input: ScopeCheckInput = {},
): Promise<ScopeComplianceReport> {
  const { graph } = await store.load();
  const task = requireTask(graph, taskId);
  const guardrails = await store.loadGuardrails();
  const registry = await store.loadTechRegistry();

  const changes = input.changes
    ? postCheck(task, input.changes, guardrails, {
        enforcePrereleaseBan: graph.scopeEnforcement.enforcePrereleaseBan,
      })
    : null;
  const tech = techCompliance(task, registry, input.technologies);

  return {
    taskId,
    compliant: (changes?.compliant ?? true) && tech.compliant,
    boundary: preCheck(task, graph, guardrails),
    changes,
    tech,
  };
}

export * from './scope-guard.js';
export { DEFAULT_GUARDRAILS, DEFAULT_PRERELEASE_QUALIFIERS, findPrereleaseQualifier } from './guardrails.js';
