/**
 * Enhancement planner: adds post-planning feature work to the task graph
 * as one transaction, or records it as deferred.
 */

import type {
  DeferredFeature,
  Milestone,
  ScopeBoundary,
  SprintState,
  Task,
  TechnologyRef,
} from '../../types/task.js';
import { ExitCode } from '../../types/exit-codes.js';
import { validateState, type TaskGraphStore } from '../../store/task-graph-store.js';
import { TasklaneError } from '../errors.js';
import { getLogger } from '../logger.js';
import { capacityOf, gateOn } from '../milestones/index.js';
import { appendHistory, syncProgress } from '../sprint/progress.js';
import { createIdAllocator } from '../tasks/ids.js';
import { requireTask } from '../tasks/resolver.js';
import { placement, type PlacementPlan } from './placement.js';

/** Reference to an earlier task of the same feature: `@1` is its first task. */
const LOCAL_REF = /^@(\d+)$/;

export interface FeatureTaskInput {
  title: string;
  /** Existing task ids, or `@N` for the Nth task of this feature. */
  dependencies?: string[];
  scope?: Partial<ScopeBoundary>;
  technologies?: TechnologyRef[];
}

export interface EnhancementRequest {
  description: string;
  tasks: FeatureTaskInput[];
  /** Existing tasks every feature task depends on. */
  dependsOn?: string[];
  /** Existing tasks that must wait for the whole feature. */
  dependents?: string[];
}

export interface EnhancementResult {
  featureId: string;
  description: string;
  placement: PlacementPlan;
  tasks: Array<{ id: string; title: string; milestoneId: string }>;
  createdMilestones: string[];
  dryRun: boolean;
}

function nextNumberedId(prefix: string, ids: Iterable<string>): string {
  const re = new RegExp(`^${prefix}(\\d+)$`);
  let max = 0;
  for (const id of ids) {
    const match = re.exec(id);
    if (match?.[1]) max = Math.max(max, parseInt(match[1], 10));
  }
  return `${prefix}${max + 1}`;
}

function validateRequest(state: SprintState, request: EnhancementRequest): void {
  if (!request.description.trim()) {
    throw new TasklaneError(ExitCode.INVALID_INPUT, 'Enhancement description is required');
  }
  if (request.tasks.length === 0) {
    throw new TasklaneError(
      ExitCode.INVALID_INPUT,
      'An enhancement needs at least one task',
      { fix: 'Pass --task <title> (repeatable) or --tasks-file <file.json>' },
    );
  }

  for (const id of request.dependsOn ?? []) requireTask(state.graph, id);
  for (const id of request.dependents ?? []) {
    const task = requireTask(state.graph, id);
    if (task.status !== 'pending' || task.type !== 'work') {
      throw new TasklaneError(
        ExitCode.PLACEMENT_FAILED,
        `Task ${id} cannot become a dependent of the feature: it is a ${task.status} ${task.type} task`,
      );
    }
  }

  request.tasks.forEach((input, idx) => {
    for (const dep of input.dependencies ?? []) {
      const local = LOCAL_REF.exec(dep);
      if (!local) {
        requireTask(state.graph, dep);
      } else if (Number(local[1]) < 1 || Number(local[1]) > idx) {
        throw new TasklaneError(
          ExitCode.INVALID_INPUT,
          `Feature task ${idx + 1} (${input.title}) may only reference earlier feature tasks, not ${dep}`,
        );
      }
    }
  });
}

/** Existing task ids the feature depends on, feature-wide and per task. */
function externalDependencies(request: EnhancementRequest): string[] {
  const ids = new Set(request.dependsOn ?? []);
  for (const input of request.tasks) {
    for (const dep of input.dependencies ?? []) {
      if (!LOCAL_REF.test(dep)) ids.add(dep);
    }
  }
  return [...ids];
}

function buildValidationTask(id: string, milestone: Milestone, workIds: string[]): Task {
  return {
    id,
    title: `Validate ${milestone.title}`,
    type: 'validation',
    status: 'pending',
    milestoneId: milestone.id,
    dependencies: [...workIds],
    scope: { mustImplement: [], mustNotImplement: [], maxFileChanges: 0 },
  };
}

/**
 * Place and insert a feature into the state (mutates).
 */
export function applyEnhancement(state: SprintState, request: EnhancementRequest, timestamp: string): EnhancementResult {
  const { graph, progress } = state;
  validateRequest(state, request);

  const plan = placement(graph, progress, {
    size: request.tasks.length,
    dependencies: externalDependencies(request),
    dependents: request.dependents ?? [],
  });

  const featureId = nextNumberedId('F', graph.tasks.flatMap((t) => (t.enhancement ? [t.enhancement.featureId] : [])));
  const ids = createIdAllocator(graph);
  const workIds = request.tasks.map(() => ids.nextTaskId());

  const work = request.tasks.map((input, idx): Task => ({
    id: workIds[idx] ?? '',
    title: input.title,
    type: 'work',
    status: 'pending',
    milestoneId: '',
    dependencies: [
      ...new Set([
        ...(request.dependsOn ?? []),
        ...(input.dependencies ?? []).map((dep) => {
          const local = LOCAL_REF.exec(dep);
          return local ? workIds[Number(local[1]) - 1] ?? dep : dep;
        }),
      ]),
    ],
    scope: {
      mustImplement: input.scope?.mustImplement ?? [],
      mustNotImplement: input.scope?.mustNotImplement ?? [],
      maxFileChanges: input.scope?.maxFileChanges ?? graph.scopeEnforcement.defaultMaxFileChanges,
    },
    ...(input.technologies && { technologies: input.technologies }),
    enhancement: { featureId, description: request.description, addedAt: timestamp },
  }));

  const createdMilestones: string[] = [];
  if (plan.kind === 'existing') {
    const milestone = graph.milestones[plan.milestoneIndex];
    if (!milestone) {
      throw new TasklaneError(ExitCode.PLACEMENT_FAILED, `Milestone ${plan.milestoneId} disappeared during placement`);
    }
    for (const task of work) task.milestoneId = milestone.id;
    milestone.taskIds.splice(plan.position, 0, ...workIds);
    gateOn(graph.tasks, milestone, workIds);
    const max = capacityOf(milestone, graph).max;
    if (milestone.taskIds.length > max) {
      throw new TasklaneError(
        ExitCode.CAPACITY_EXCEEDED,
        `Milestone ${milestone.id} would hold ${milestone.taskIds.length} tasks, above its maximum of ${max}`,
      );
    }
    graph.tasks.push(...work);
  } else {
    const milestones: Milestone[] = [];
    let offset = 0;
    plan.chunks.forEach((size, chunkIdx) => {
      const chunk = work.slice(offset, offset + size);
      offset += size;
      const title = plan.chunks.length === 1
        ? request.description
        : `${request.description} (part ${chunkIdx + 1}/${plan.chunks.length})`;
      const milestone: Milestone = {
        id: ids.nextMilestoneId(),
        title,
        taskIds: chunk.map((t) => t.id),
        status: 'not_started',
      };
      const validation = buildValidationTask(ids.nextTaskId(), milestone, milestone.taskIds);
      milestone.taskIds.push(validation.id);
      for (const task of chunk) task.milestoneId = milestone.id;
      graph.tasks.push(...chunk, validation);
      milestones.push(milestone);
      createdMilestones.push(milestone.id);
    });
    graph.milestones.splice(plan.insertAt, 0, ...milestones);
  }

  for (const id of request.dependents ?? []) {
    const dependent = requireTask(graph, id);
    dependent.dependencies = [...new Set([...dependent.dependencies, ...workIds])];
  }

  if (progress.currentMilestoneId === null) {
    const reopened = graph.milestones.find((m) => m.status !== 'validated');
    progress.currentMilestoneId = reopened?.id ?? null;
    progress.validationPending = reopened?.status === 'complete';
  }

  appendHistory(progress, 'enhancement_applied', timestamp, {
    details: { featureId, description: request.description, tasks: workIds, createdMilestones },
  });
  syncProgress(graph, progress);

  getLogger('enhancement').info({ featureId, placement: plan.kind, tasks: workIds, createdMilestones }, 'enhancement placed');
  return {
    featureId,
    description: request.description,
    placement: plan,
    tasks: work.map((t) => ({ id: t.id, title: t.title, milestoneId: t.milestoneId })),
    createdMilestones,
    dryRun: false,
  };
}

/**
 * Apply an enhancement as one transaction. Any failure after insertion
 * (schema, cycle, capacity) rejects the whole change with nothing written.
 *
 * With `dryRun`, placement and validation run against a copy and nothing
 * is locked or written.
 */
export async function applyEnhancementToStore(
  store: TaskGraphStore,
  request: EnhancementRequest,
  options: { dryRun?: boolean } = {},
): Promise<EnhancementResult> {
  if (options.dryRun) {
    const draft = structuredClone(await store.load());
    const result = applyEnhancement(draft, request, new Date().toISOString());
    validateState(draft);
    return { ...result, dryRun: true };
  }
  const { result } = await store.atomicUpdate(`enhance ${request.description}`, (state) =>
    applyEnhancement(state, request, new Date().toISOString()),
  );
  return result;
}

/**
 * Record a feature as deferred instead of placing it (mutates).
 */
export function applyDefer(state: SprintState, description: string, reason: string, timestamp: string): DeferredFeature {
  if (!description.trim()) {
    throw new TasklaneError(ExitCode.INVALID_INPUT, 'Deferred feature description is required');
  }
  const feature: DeferredFeature = {
    id: nextNumberedId('D', state.deferred.features.map((f) => f.id)),
    description,
    reason,
    deferredAt: timestamp,
  };
  state.deferred.features.push(feature);
  appendHistory(state.progress, 'feature_deferred', timestamp, { details: { featureId: feature.id, description } });
  return feature;
}

export async function deferFeature(store: TaskGraphStore, description: string, reason: string): Promise<DeferredFeature> {
  const { result } = await store.atomicUpdate(`defer ${description}`, (state) =>
    applyDefer(state, description, reason, new Date().toISOString()),
  );
  return result;
}

export async function listDeferred(store: TaskGraphStore): Promise<DeferredFeature[]> {
  const { deferred } = await store.load();
  return deferred.features;
}
