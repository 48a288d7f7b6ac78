/**
 * Sprint initialisation from a planner's plan file.
 */

import { readFile } from 'node:fs/promises';
import type { z } from 'zod';
import { sprintPlanSchema } from '../../store/validation-schemas.js';
import { parseJsonText } from '../../store/json.js';
import { isNotFound } from '../../store/atomic.js';
import type { TaskGraphStore } from '../../store/task-graph-store.js';
import type { TasklaneConfig } from '../../types/config.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Milestone, SprintState, Task, TaskGraph } from '../../types/task.js';
import { SchemaError, TasklaneError } from '../errors.js';
import { createIdAllocator } from '../tasks/ids.js';
import { appendHistory, countTasks } from './progress.js';

export type SprintPlan = z.infer<typeof sprintPlanSchema>;

export interface InitResult {
  sprintId: string;
  milestones: number;
  tasks: number;
  /** Validation tasks appended to milestones whose plan had none. */
  addedValidationTasks: string[];
  replacedBackupId: string | null;
}

/** Parse and validate plan JSON. */
export function parsePlan(raw: unknown, source: string): SprintPlan {
  const parsed = sprintPlanSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SchemaError(
      parsed.error.issues.map((issue) => ({
        code: 'PLAN_SCHEMA',
        file: source,
        path: issue.path.join('.'),
        message: `${source} ${issue.path.join('.')}: ${issue.message}`,
      })),
      { source },
    );
  }
  return parsed.data;
}

/**
 * Build the initial state for a plan. Milestones whose task list does not
 * end in a validation task get one appended. Capacity maxima are enforced,
 * and a milestone without work tasks is refused.
 */
export function buildInitialState(
  plan: SprintPlan,
  config: Pick<TasklaneConfig, 'milestones' | 'scope'>,
  timestamp: string,
): { state: SprintState; addedValidationTasks: string[] } {
  const milestoneStrategy = plan.milestoneStrategy ?? {
    minTasks: config.milestones.defaultMinTasks,
    maxTasks: config.milestones.defaultMaxTasks,
  };
  const scopeEnforcement = {
    defaultMaxFileChanges: plan.scopeEnforcement?.defaultMaxFileChanges ?? config.scope.defaultMaxFileChanges,
    enforcePrereleaseBan: plan.scopeEnforcement?.enforcePrereleaseBan ?? true,
  };

  const graph: TaskGraph = {
    version: 1,
    sprintId: plan.sprintId,
    milestoneStrategy,
    scopeEnforcement,
    milestones: [],
    tasks: [],
  };
  const ids = createIdAllocator({
    tasks: plan.milestones.flatMap((m) => m.tasks),
    milestones: plan.milestones,
  });
  const addedValidationTasks: string[] = [];

  for (const planned of plan.milestones) {
    const tasks = planned.tasks.map((t): Task => ({
      id: t.id,
      title: t.title,
      type: t.type,
      status: 'pending',
      milestoneId: planned.id,
      dependencies: t.dependencies,
      scope: {
        mustImplement: t.scope?.mustImplement ?? [],
        mustNotImplement: t.scope?.mustNotImplement ?? [],
        maxFileChanges: t.scope?.maxFileChanges ?? scopeEnforcement.defaultMaxFileChanges,
      },
      ...(t.technologies && { technologies: t.technologies }),
    }));

    if (!tasks.some((t) => t.type === 'work')) {
      throw new TasklaneError(
        ExitCode.INVALID_INPUT,
        `Milestone ${planned.id} has no work tasks; a milestone needs work before it can be validated`,
        { fix: 'Add work tasks to the milestone, or merge its validation into a neighbouring milestone' },
      );
    }

    if (tasks[tasks.length - 1]?.type !== 'validation') {
      const validation: Task = {
        id: ids.nextTaskId(),
        title: `Validate ${planned.title}`,
        type: 'validation',
        status: 'pending',
        milestoneId: planned.id,
        dependencies: tasks.filter((t) => t.type === 'work').map((t) => t.id),
        scope: { mustImplement: [], mustNotImplement: [], maxFileChanges: 0 },
      };
      tasks.push(validation);
      addedValidationTasks.push(validation.id);
    }

    const milestone: Milestone = {
      id: planned.id,
      title: planned.title,
      taskIds: tasks.map((t) => t.id),
      status: 'not_started',
      ...(planned.capacity && { capacity: planned.capacity }),
    };
    const max = milestone.capacity?.max ?? milestoneStrategy.maxTasks;
    if (milestone.taskIds.length > max) {
      throw new TasklaneError(
        ExitCode.CAPACITY_EXCEEDED,
        `Milestone ${milestone.id} has ${milestone.taskIds.length} tasks (validation task included), above its maximum of ${max}`,
        { fix: 'Split the milestone in the plan, or raise milestoneStrategy.maxTasks' },
      );
    }
    graph.milestones.push(milestone);
    graph.tasks.push(...tasks);
  }

  const state: SprintState = {
    graph,
    progress: {
      sprintId: plan.sprintId,
      status: 'planned',
      currentMilestoneId: graph.milestones[0]?.id ?? null,
      validationPending: false,
      counters: countTasks(graph),
      history: [],
      validations: [],
    },
    deferred: { features: [] },
  };
  appendHistory(state.progress, 'sprint_initialized', timestamp, {
    details: { milestones: graph.milestones.length, tasks: graph.tasks.length },
  });
  return { state, addedValidationTasks };
}

/** Read a plan file. */
export async function readPlanFile(planPath: string): Promise<SprintPlan> {
  let text: string;
  try {
    text = await readFile(planPath, 'utf8');
  } catch (err) {
    if (isNotFound(err)) {
      throw new TasklaneError(ExitCode.NOT_FOUND, `Plan file not found: ${planPath}`);
    }
    throw new TasklaneError(ExitCode.FILE_ERROR, `Failed to read: ${planPath}`, { cause: err });
  }
  return parsePlan(parseJsonText(text, planPath), planPath);
}

/**
 * Initialise the state directory from a plan.
 */
export async function initSprint(
  store: TaskGraphStore,
  plan: SprintPlan,
  config: Pick<TasklaneConfig, 'milestones' | 'scope'>,
  options: { force?: boolean } = {},
): Promise<InitResult> {
  const { state, addedValidationTasks } = buildInitialState(plan, config, new Date().toISOString());
  const { backupId } = await store.initialize(state, options);
  return {
    sprintId: state.graph.sprintId,
    milestones: state.graph.milestones.length,
    tasks: state.graph.tasks.length,
    addedValidationTasks,
    replacedBackupId: backupId,
  };
}
