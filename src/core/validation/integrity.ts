/**
 * Structural integrity checker for the loaded sprint state.
 *
 * Runs after the zod schemas have accepted every file, so shapes are known
 * to be right; this module checks the relations between records. Every
 * problem is collected: callers get the whole list, not the first failure.
 */

import type {
  DeferredFeatures,
  IntegrityIssue,
  Milestone,
  ProgressTracker,
  SprintState,
  Task,
  TaskGraph,
} from '../../types/task.js';
import { STATE_FILES } from '../paths.js';
import { validateDependencyRefs } from '../tasks/dependency-check.js';
import { countTasks, deriveSprintStatus } from '../sprint/progress.js';

const GRAPH_FILE = STATE_FILES.taskGraph;
const PROGRESS_FILE = STATE_FILES.progress;

// ============================================================================
// Task graph
// ============================================================================

function duplicateIds(ids: readonly string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) dupes.add(id);
    seen.add(id);
  }
  return [...dupes];
}

function checkMilestoneStructure(milestone: Milestone, taskMap: Map<string, Task>): IntegrityIssue[] {
  const issues: IntegrityIssue[] = [];
  const at = { file: GRAPH_FILE, milestoneId: milestone.id };
  const members = milestone.taskIds.flatMap((id) => {
    const task = taskMap.get(id);
    return task ? [task] : [];
  });

  const validationTasks = members.filter((t) => t.type === 'validation');
  const last = taskMap.get(milestone.taskIds[milestone.taskIds.length - 1] ?? '');
  if (validationTasks.length !== 1 || last?.type !== 'validation') {
    issues.push({
      ...at,
      code: 'VALIDATION_TASK_POSITION',
      message: `Milestone ${milestone.id} must end with exactly one validation task (found ${validationTasks.length})`,
    });
  }

  const workTasks = members.filter((t) => t.type === 'work');
  if (workTasks.length === 0) {
    // Only work tasks move a milestone out of not_started.
    issues.push({
      ...at,
      code: 'NO_WORK_TASKS',
      message: `Milestone ${milestone.id} has no work tasks`,
    });
  }
  switch (milestone.status) {
    case 'not_started': {
      const started = members.filter((t) => t.status !== 'pending').map((t) => t.id);
      if (started.length > 0) {
        issues.push({
          ...at,
          code: 'NOT_STARTED_HAS_PROGRESS',
          message: `Milestone ${milestone.id} is not_started but has started tasks: ${started.join(', ')}`,
        });
      }
      break;
    }
    case 'in_progress':
      break;
    case 'complete': {
      const open = workTasks.filter((t) => t.status !== 'completed').map((t) => t.id);
      if (open.length > 0) {
        issues.push({
          ...at,
          code: 'COMPLETE_HAS_OPEN_WORK',
          message: `Milestone ${milestone.id} is complete but has unfinished work tasks: ${open.join(', ')}`,
        });
      }
      break;
    }
    case 'validated': {
      const open = members.filter((t) => t.status !== 'completed').map((t) => t.id);
      if (open.length > 0) {
        issues.push({
          ...at,
          code: 'VALIDATED_INCOMPLETE',
          message: `Milestone ${milestone.id} is validated but has unfinished tasks: ${open.join(', ')}`,
        });
      }
      break;
    }
  }

  for (const task of validationTasks) {
    if (task.status === 'completed' && milestone.status !== 'validated') {
      issues.push({
        ...at,
        taskId: task.id,
        code: 'VALIDATION_TASK_STATE',
        message: `Validation task ${task.id} is completed but milestone ${milestone.id} is ${milestone.status}`,
      });
    }
  }

  return issues;
}

/**
 * Referential integrity and milestone structure of the task graph.
 */
export function checkGraphIntegrity(graph: TaskGraph): IntegrityIssue[] {
  const issues: IntegrityIssue[] = [];

  if (graph.milestones.length === 0) {
    issues.push({ file: GRAPH_FILE, code: 'NO_MILESTONES', message: 'Task graph has no milestones' });
  }

  for (const id of duplicateIds(graph.tasks.map((t) => t.id))) {
    issues.push({ file: GRAPH_FILE, taskId: id, code: 'DUPLICATE_TASK_ID', message: `Task id ${id} is used more than once` });
  }
  for (const id of duplicateIds(graph.milestones.map((m) => m.id))) {
    issues.push({ file: GRAPH_FILE, milestoneId: id, code: 'DUPLICATE_MILESTONE_ID', message: `Milestone id ${id} is used more than once` });
  }

  for (const err of validateDependencyRefs(graph.tasks)) {
    issues.push({
      file: GRAPH_FILE,
      taskId: err.taskId,
      code: err.code === 'E_DEP_NOT_FOUND' ? 'MISSING_DEPENDENCY' : 'DUPLICATE_DEPENDENCY',
      message: err.message,
    });
  }

  const taskMap = new Map(graph.tasks.map((t) => [t.id, t]));
  const milestoneIds = new Set(graph.milestones.map((m) => m.id));
  const listedBy = new Map<string, string[]>();

  for (const milestone of graph.milestones) {
    for (const taskId of milestone.taskIds) {
      listedBy.set(taskId, [...(listedBy.get(taskId) ?? []), milestone.id]);
      const task = taskMap.get(taskId);
      if (!task) {
        issues.push({
          file: GRAPH_FILE,
          milestoneId: milestone.id,
          taskId,
          code: 'UNKNOWN_TASK',
          message: `Milestone ${milestone.id} lists unknown task ${taskId}`,
        });
      } else if (task.milestoneId !== milestone.id) {
        issues.push({
          file: GRAPH_FILE,
          milestoneId: milestone.id,
          taskId,
          code: 'TASK_MILESTONE_MISMATCH',
          message: `Task ${taskId} is listed by milestone ${milestone.id} but belongs to ${task.milestoneId}`,
        });
      }
    }
    issues.push(...checkMilestoneStructure(milestone, taskMap));
  }

  for (const task of graph.tasks) {
    const owners = listedBy.get(task.id) ?? [];
    if (!milestoneIds.has(task.milestoneId)) {
      issues.push({
        file: GRAPH_FILE,
        taskId: task.id,
        code: 'UNKNOWN_MILESTONE',
        message: `Task ${task.id} belongs to unknown milestone ${task.milestoneId}`,
      });
    } else if (owners.length === 0) {
      issues.push({
        file: GRAPH_FILE,
        taskId: task.id,
        code: 'ORPHAN_TASK',
        message: `Task ${task.id} is not listed by any milestone`,
      });
    }
    if (owners.length > 1) {
      issues.push({
        file: GRAPH_FILE,
        taskId: task.id,
        code: 'TASK_MULTIPLY_LISTED',
        message: `Task ${task.id} is listed by more than one milestone: ${owners.join(', ')}`,
      });
    }
  }

  return issues;
}

// ============================================================================
// Progress tracker
// ============================================================================

/**
 * Consistency of progress.json with the task graph.
 */
export function checkProgressConsistency(graph: TaskGraph, progress: ProgressTracker): IntegrityIssue[] {
  const issues: IntegrityIssue[] = [];
  const at = { file: PROGRESS_FILE };

  if (progress.sprintId !== graph.sprintId) {
    issues.push({ ...at, code: 'SPRINT_MISMATCH', message: `progress.json tracks sprint ${progress.sprintId} but the task graph is sprint ${graph.sprintId}` });
  }

  const counters = countTasks(graph);
  if (counters.completed !== progress.counters.completed || counters.total !== progress.counters.total) {
    issues.push({
      ...at,
      code: 'COUNTER_MISMATCH',
      message: `Counters say ${progress.counters.completed}/${progress.counters.total} completed but the graph has ${counters.completed}/${counters.total}`,
    });
  }

  const currentIdx = progress.currentMilestoneId === null
    ? -1
    : graph.milestones.findIndex((m) => m.id === progress.currentMilestoneId);
  const current = graph.milestones[currentIdx];

  if (progress.currentMilestoneId !== null && !current) {
    issues.push({ ...at, code: 'UNKNOWN_CURRENT_MILESTONE', message: `Current milestone ${progress.currentMilestoneId} does not exist` });
  }

  if (progress.currentMilestoneId === null) {
    const open = graph.milestones.filter((m) => m.status !== 'validated').map((m) => m.id);
    if (open.length > 0) {
      issues.push({ ...at, code: 'CURRENT_MISSING', message: `No current milestone although ${open.join(', ')} not validated` });
    }
  }

  if (current) {
    graph.milestones.forEach((m, idx) => {
      if (idx < currentIdx && m.status !== 'validated') {
        issues.push({ ...at, milestoneId: m.id, code: 'MILESTONE_ORDER', message: `Milestone ${m.id} precedes current milestone ${current.id} but is ${m.status}` });
      }
      if (idx > currentIdx && m.status === 'validated') {
        issues.push({ ...at, milestoneId: m.id, code: 'LATER_VALIDATED', message: `Milestone ${m.id} follows current milestone ${current.id} but is already validated` });
      }
    });
    if (current.status === 'validated') {
      issues.push({ ...at, milestoneId: current.id, code: 'CURRENT_VALIDATED', message: `Current milestone ${current.id} is already validated` });
    }
    if (progress.validationPending !== (current.status === 'complete')) {
      issues.push({
        ...at,
        milestoneId: current.id,
        code: 'VALIDATION_PENDING_MISMATCH',
        message: `validationPending is ${progress.validationPending} but current milestone ${current.id} is ${current.status}`,
      });
    }
  } else if (progress.validationPending) {
    issues.push({ ...at, code: 'VALIDATION_PENDING_MISMATCH', message: 'validationPending is true with no current milestone' });
  }

  const expectedStatus = deriveSprintStatus(graph, progress);
  if (progress.status !== expectedStatus) {
    issues.push({ ...at, code: 'SPRINT_STATUS_MISMATCH', message: `Sprint status is ${progress.status} but should be ${expectedStatus}` });
  }

  const milestoneIds = new Set(graph.milestones.map((m) => m.id));
  for (const record of progress.validations) {
    if (!milestoneIds.has(record.milestoneId)) {
      issues.push({ ...at, milestoneId: record.milestoneId, code: 'UNKNOWN_VALIDATION_MILESTONE', message: `Validation record references unknown milestone ${record.milestoneId}` });
    }
  }

  return issues;
}

function checkDeferred(deferred: DeferredFeatures): IntegrityIssue[] {
  return duplicateIds(deferred.features.map((f) => f.id)).map((id) => ({
    file: STATE_FILES.deferred,
    code: 'DUPLICATE_DEFERRED_ID',
    message: `Deferred feature id ${id} is used more than once`,
  }));
}

/**
 * Every integrity issue across the loaded state.
 * Progress checks are skipped when the graph itself is broken, since they
 * would only restate the same problem.
 */
export function checkStateIntegrity(state: SprintState): IntegrityIssue[] {
  const graphIssues = checkGraphIntegrity(state.graph);
  const progressIssues = graphIssues.length === 0
    ? checkProgressConsistency(state.graph, state.progress)
    : [];
  return [...graphIssues, ...progressIssues, ...checkDeferred(state.deferred)];
}
