/**
 * Human-readable renderers for sprint commands.
 *
 * Each renderer takes the typed result of one engine operation. In quiet
 * mode they print only the essential id (or nothing).
 */

import type { EnhancementResult } from '../../core/enhancement/index.js';
import type { MilestoneStatusReport } from '../../core/milestones/index.js';
import { describeStatus } from '../../core/milestones/state-machine.js';
import type { ScopeComplianceReport } from '../../core/scope/index.js';
import type { HistoryResult } from '../../core/sprint/history.js';
import type { InitResult } from '../../core/sprint/init.js';
import type { SprintStatusReport } from '../../core/sprint/status.js';
import type { TaskCompleteResult, TaskStartResult } from '../../core/task-work/index.js';
import type { DependencyReport, NextTaskResult } from '../../core/tasks/resolver.js';
import type { TaskDetail } from '../../core/tasks/show.js';
import type { IntegrityReport } from '../../dispatch/engines/sprint-engine.js';
import type { BackupManifest } from '../../store/backup.js';
import type { DeferredFeature, Task, ValidationRecord } from '../../types/task.js';
import {
  BOLD, DIM, NC, RED, GREEN, YELLOW,
  milestoneColor, milestoneSymbol, statusColor, statusSymbol,
} from './colors.js';

function taskLine(task: { id: string; title: string; status: Task['status'] }, indent = '  '): string {
  return `${indent}${statusColor(task.status)}${statusSymbol(task.status)}${NC} ${BOLD}${task.id}${NC} ${task.title}`;
}

// ---------------------------------------------------------------------------
// status
// ---------------------------------------------------------------------------

export function renderStatus(data: SprintStatusReport, quiet: boolean): string {
  if (quiet) return data.status;

  const lines: string[] = [];
  lines.push(`${BOLD}Sprint ${data.sprintId}${NC}  ${data.status}  ${DIM}${data.counters.completed}/${data.counters.total} tasks completed${NC}`);
  lines.push('');
  for (const m of data.milestones) {
    const marker = m.isCurrent ? `${BOLD}>${NC}` : ' ';
    lines.push(`${marker} ${milestoneColor(m.status)}${milestoneSymbol(m.status)}${NC} ${BOLD}${m.id}${NC} ${m.title}  ${DIM}${m.completed}/${m.total}, ${describeStatus(m.status)}${NC}`);
  }
  if (data.inProgress.length > 0) {
    lines.push('');
    lines.push(`${BOLD}In progress:${NC}`);
    for (const t of data.inProgress) lines.push(`  ${t.id} ${t.title}`);
  }
  lines.push('');
  switch (data.next.kind) {
    case 'task':
      lines.push(`${BOLD}Next:${NC} ${data.next.taskId} ${data.next.title}`);
      break;
    case 'blocked':
      lines.push(`${YELLOW}Blocked:${NC} ${data.next.reason === 'validation_pending' ? 'milestone awaiting validation' : 'no eligible task'}`);
      break;
    case 'sprint_complete':
      lines.push(`${GREEN}Sprint complete.${NC}`);
      break;
  }
  if (data.deferredFeatures > 0) lines.push(`${DIM}${data.deferredFeatures} deferred feature(s)${NC}`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// next
// ---------------------------------------------------------------------------

export function renderNext(data: NextTaskResult, quiet: boolean): string {
  switch (data.kind) {
    case 'task':
      if (quiet) return data.task.id;
      return `${BOLD}Next:${NC} ${BOLD}${data.task.id}${NC} ${data.task.title}  ${DIM}(${data.milestoneId})${NC}`;
    case 'sprint_complete':
      return quiet ? '' : `${GREEN}Sprint complete.${NC} No tasks remain.`;
    case 'blocked': {
      if (quiet) return '';
      if (data.reason === 'validation_pending') {
        return `${YELLOW}Blocked:${NC} milestone ${data.milestoneId} is complete and awaiting validation.`;
      }
      const lines = [`${YELLOW}Blocked:${NC} no eligible task in milestone ${data.milestoneId}.`];
      for (const w of data.waitingOn) {
        const unmet = w.unmet.map((d) => `${d.id} (${d.status})`).join(', ');
        lines.push(`  ${w.id} ${DIM}${w.status}${unmet ? `, waiting on ${unmet}` : ''}${NC}`);
      }
      return lines.join('\n');
    }
  }
}

// ---------------------------------------------------------------------------
// show / deps
// ---------------------------------------------------------------------------

export function renderTask(data: TaskDetail, quiet: boolean): string {
  if (quiet) return data.id;

  const lines: string[] = [];
  lines.push(`${statusColor(data.status)}${statusSymbol(data.status)}${NC} ${BOLD}${data.id}${NC} ${data.title}`);
  lines.push(`  ${DIM}Type:${NC} ${data.type}   ${DIM}Status:${NC} ${data.status}   ${DIM}Eligible:${NC} ${data.eligible ? 'yes' : 'no'}`);
  if (data.milestone) {
    lines.push(`  ${DIM}Milestone:${NC} ${data.milestone.id} ${data.milestone.title} (${describeStatus(data.milestone.status)})`);
  }
  if (data.dependencyStatus.length > 0) {
    lines.push(`  ${DIM}Depends on:${NC}`);
    for (const dep of data.dependencyStatus) {
      lines.push(`    ${dep.id} ${dep.title ?? ''} ${DIM}(${dep.status})${NC}`);
    }
  }
  if (data.dependents.length > 0) lines.push(`  ${DIM}Blocks:${NC} ${data.dependents.join(', ')}`);
  lines.push(`  ${DIM}Max file changes:${NC} ${data.scope.maxFileChanges}`);
  if (data.scope.mustImplement.length > 0) lines.push(`  ${DIM}Must implement:${NC} ${data.scope.mustImplement.join('; ')}`);
  if (data.scope.mustNotImplement.length > 0) lines.push(`  ${DIM}Must not implement:${NC} ${data.scope.mustNotImplement.join('; ')}`);
  if (data.technologies?.length) {
    lines.push(`  ${DIM}Technologies:${NC} ${data.technologies.map((t) => `${t.name}@${t.version}`).join(', ')}`);
  }
  return lines.join('\n');
}

export function renderDeps(data: DependencyReport, quiet: boolean): string {
  if (quiet) return data.unmet.map((d) => d.id).join('\n');

  const lines = [`${BOLD}${data.taskId}${NC} ${data.eligible ? `${GREEN}eligible${NC}` : `${YELLOW}not eligible${NC}`} ${DIM}(${data.status})${NC}`];
  if (data.dependencies.length === 0) {
    lines.push(`  ${DIM}No dependencies.${NC}`);
  }
  for (const dep of data.dependencies) {
    const colour = dep.status === 'completed' ? GREEN : dep.status === 'missing' ? RED : YELLOW;
    lines.push(`  ${colour}${dep.id}${NC} ${DIM}${dep.status}${NC}`);
  }
  if (data.leafBlockers.length > 0) lines.push(`  ${DIM}Root blockers:${NC} ${data.leafBlockers.join(', ')}`);
  if (data.dependents.length > 0) lines.push(`  ${DIM}Dependents:${NC} ${data.dependents.join(', ')}`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// scope
// ---------------------------------------------------------------------------

export function renderScope(data: ScopeComplianceReport, quiet: boolean): string {
  if (quiet) return data.compliant ? 'compliant' : 'non-compliant';

  const lines = [`${BOLD}${data.taskId}${NC} ${data.compliant ? `${GREEN}compliant${NC}` : `${RED}non-compliant${NC}`}`];
  lines.push(`  ${DIM}Max file changes:${NC} ${data.boundary.maxFileChanges}`);
  if (data.boundary.mustNotImplement.length > 0) {
    lines.push(`  ${DIM}Forbidden markers:${NC} ${data.boundary.mustNotImplement.join(', ')}`);
  }
  if (data.changes) {
    lines.push(`  ${DIM}Files changed:${NC} ${data.changes.filesChanged}`);
    for (const v of data.changes.violations) lines.push(`  ${RED}x${NC} ${v.message}`);
  }
  for (const o of data.tech.offenders) lines.push(`  ${RED}x${NC} ${o.message}`);
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// start / complete
// ---------------------------------------------------------------------------

export function renderStart(data: TaskStartResult, quiet: boolean): string {
  if (quiet) return data.taskId;
  return `${GREEN}Started${NC} ${BOLD}${data.taskId}${NC} ${data.taskTitle}  ${DIM}(${data.milestoneId}, ${describeStatus(data.milestoneStatus)})${NC}`;
}

export function renderComplete(data: TaskCompleteResult, quiet: boolean): string {
  if (quiet) return data.taskId;
  const lines = [`${GREEN}Completed${NC} ${BOLD}${data.taskId}${NC}  ${DIM}(${data.milestoneId}, ${describeStatus(data.milestoneStatus)})${NC}`];
  if (data.unblocked.length > 0) lines.push(`  ${DIM}Unblocked:${NC} ${data.unblocked.join(', ')}`);
  if (data.validationPending) {
    lines.push(`  ${YELLOW}Milestone ${data.milestoneId} is awaiting validation.${NC}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// milestone
// ---------------------------------------------------------------------------

export function renderMilestone(data: MilestoneStatusReport, quiet: boolean): string {
  if (quiet) return data.status;

  const lines: string[] = [];
  lines.push(`${milestoneColor(data.status)}${milestoneSymbol(data.status)}${NC} ${BOLD}${data.id}${NC} ${data.title}${data.isCurrent ? `  ${DIM}(current)${NC}` : ''}`);
  lines.push(`  ${DIM}Status:${NC} ${describeStatus(data.status)}`);
  lines.push(`  ${DIM}Tasks:${NC} ${data.counts.completed}/${data.counts.total} completed, capacity ${data.capacity.min}-${data.capacity.max}`);
  if (data.gateHolding) lines.push(`  ${YELLOW}Gate holding: later milestones wait for validation.${NC}`);
  for (const t of data.tasks) lines.push(taskLine(t, '    '));
  if (data.latestValidation) lines.push(`  ${DIM}Last validation:${NC} ${renderValidationRecord(data.latestValidation)}`);
  return lines.join('\n');
}

function renderValidationRecord(record: ValidationRecord): string {
  const outcome = record.status === 'passed' ? `${GREEN}passed${NC}` : `${RED}failed${NC}`;
  const issues = record.issues.length > 0 ? ` (${record.issues.join('; ')})` : '';
  return `${record.milestoneId} ${outcome}${issues}`;
}

export function renderValidation(
  data: { record: ValidationRecord; currentMilestoneId: string | null },
  quiet: boolean,
): string {
  if (quiet) return data.record.status;
  const current = data.currentMilestoneId ?? 'none (sprint complete)';
  return `Validation ${renderValidationRecord(data.record)}\n  ${DIM}Current milestone:${NC} ${current}`;
}

export function renderRemediation(data: { task: Task }, quiet: boolean): string {
  if (quiet) return data.task.id;
  return `${GREEN}Added${NC} remediation task ${BOLD}${data.task.id}${NC} ${data.task.title}  ${DIM}(${data.task.milestoneId})${NC}`;
}

// ---------------------------------------------------------------------------
// enhance / defer
// ---------------------------------------------------------------------------

export function renderEnhance(data: EnhancementResult, quiet: boolean): string {
  if (quiet) return data.tasks.map((t) => t.id).join('\n');

  const lines = [`${data.dryRun ? `${YELLOW}Dry run:${NC} would place` : `${GREEN}Placed${NC}`} feature ${BOLD}${data.featureId}${NC} ${data.description}`];
  const plan = data.placement;
  if (plan.kind === 'existing') {
    lines.push(`  ${DIM}Into milestone:${NC} ${plan.milestoneId} at position ${plan.position}`);
  } else {
    lines.push(`  ${DIM}New milestones:${NC} ${data.createdMilestones.join(', ')} (${plan.chunks.length} part(s))`);
  }
  for (const t of data.tasks) lines.push(`  ${t.id} ${t.title} ${DIM}(${t.milestoneId})${NC}`);
  return lines.join('\n');
}

export function renderDefer(data: DeferredFeature, quiet: boolean): string {
  if (quiet) return data.id;
  return `${YELLOW}Deferred${NC} ${BOLD}${data.id}${NC} ${data.description}${data.reason ? `  ${DIM}(${data.reason})${NC}` : ''}`;
}

export function renderDeferred(data: { features: DeferredFeature[] }, quiet: boolean): string {
  if (quiet) return data.features.map((f) => f.id).join('\n');
  if (data.features.length === 0) return 'No deferred features.';
  return data.features
    .map((f) => `  ${BOLD}${f.id}${NC} ${f.description}  ${DIM}${f.reason}${NC}`)
    .join('\n');
}

// ---------------------------------------------------------------------------
// init / check / history
// ---------------------------------------------------------------------------

export function renderInit(data: InitResult, quiet: boolean): string {
  if (quiet) return data.sprintId;
  const lines = [`${GREEN}Initialised${NC} sprint ${BOLD}${data.sprintId}${NC}: ${data.milestones} milestone(s), ${data.tasks} task(s)`];
  if (data.addedValidationTasks.length > 0) {
    lines.push(`  ${DIM}Added validation tasks:${NC} ${data.addedValidationTasks.join(', ')}`);
  }
  if (data.replacedBackupId) lines.push(`  ${DIM}Previous state saved as backup${NC} ${data.replacedBackupId}`);
  return lines.join('\n');
}

export function renderCheck(data: IntegrityReport, quiet: boolean): string {
  if (quiet) return data.valid ? 'valid' : 'invalid';
  if (data.valid) return `${GREEN}State is valid.${NC} ${DIM}${data.stateDir}${NC}`;
  const lines = [`${RED}${BOLD}State is invalid.${NC} ${DIM}${data.stateDir}${NC}`];
  for (const issue of data.issues) lines.push(`  ${RED}x${NC} ${DIM}${issue.code}${NC} ${issue.message}`);
  if (data.cycle) lines.push(`  ${RED}x${NC} ${DIM}CYCLE${NC} ${data.cycle.join(' -> ')}`);
  return lines.join('\n');
}

export function renderHistory(data: HistoryResult, quiet: boolean): string {
  if (quiet) return String(data.total);
  if (data.entries.length === 0) return 'No history.';
  return data.entries
    .map((e) => {
      const subject = [e.milestoneId, e.taskId].filter((s) => s !== undefined).join(' ');
      return `  ${DIM}${e.timestamp}${NC} ${e.action}${subject ? ` ${BOLD}${subject}${NC}` : ''}`;
    })
    .join('\n');
}

// ---------------------------------------------------------------------------
// backup
// ---------------------------------------------------------------------------

export function renderBackups(data: { backups: BackupManifest[] }, quiet: boolean): string {
  if (quiet) return data.backups.map((b) => b.id).join('\n');
  if (data.backups.length === 0) return 'No backups.';
  return data.backups
    .map((b) => `  ${BOLD}${b.id}${NC}  ${b.operation}  ${DIM}${b.files.length} file(s)${NC}`)
    .join('\n');
}

export function renderBackup(data: BackupManifest, quiet: boolean): string {
  if (quiet) return data.id;
  return `${GREEN}Backup created${NC} ${BOLD}${data.id}${NC} ${DIM}(${data.files.map((f) => f.name).join(', ')})${NC}`;
}

export function renderRestore(data: { restored: BackupManifest; safetyBackupId: string }, quiet: boolean): string {
  if (quiet) return data.restored.id;
  return `${GREEN}Restored${NC} backup ${BOLD}${data.restored.id}${NC}\n  ${DIM}State before restore saved as${NC} ${data.safetyBackupId}`;
}
