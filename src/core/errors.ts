/**
 * tasklane error types with exit code integration.
 *
 * Every failure surfaced to a caller is a TasklaneError (or a subclass
 * naming one of the taxonomy members). The exit code doubles as the
 * classification: see isRecoverableCode() for which ones a caller may retry.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';
import type { IntegrityIssue, UnmetDependency } from '../types/task.js';
import type { ScopeViolation, TechOffender } from '../types/scope.js';

/** Serialized error payload carried in operation results. */
export interface TasklaneErrorPayload {
  code: string;
  exitCode: ExitCode;
  name: string;
  message: string;
  recoverable: boolean;
  fix?: string;
  details?: Record<string, unknown>;
}

/**
 * Structured error class for tasklane operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class TasklaneError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TasklaneError';
    this.code = code;
    this.fix = options?.fix;
    this.details = options?.details;
  }

  /** String error code, e.g. E_DEPENDENCY_ERROR. */
  get errorCode(): string {
    return `E_${getExitCodeName(this.code)}`;
  }

  toJSON(): TasklaneErrorPayload {
    return {
      code: this.errorCode,
      exitCode: this.code,
      name: this.name,
      message: this.message,
      recoverable: isRecoverableCode(this.code),
      ...(this.fix && { fix: this.fix }),
      ...(this.details && { details: this.details }),
    };
  }
}

/** State files violate the schema or referential integrity. All issues are reported together. */
export class SchemaError extends TasklaneError {
  readonly issues: IntegrityIssue[];

  constructor(issues: IntegrityIssue[], options?: { cause?: unknown; source?: string }) {
    const where = options?.source ? ` in ${options.source}` : '';
    super(
      ExitCode.VALIDATION_ERROR,
      `State validation failed${where} with ${issues.length} issue(s): ${issues.map((i) => i.message).join('; ')}`,
      {
        fix: 'Repair the state files by hand or restore a backup with `tasklane backup restore <id>`',
        details: { issues },
        cause: options?.cause,
      },
    );
    this.name = 'SchemaError';
    this.issues = issues;
  }
}

/** The dependency relation contains a cycle. */
export class CycleDetectedError extends TasklaneError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(
      ExitCode.CIRCULAR_REFERENCE,
      `Dependency cycle detected: ${cycle.join(' -> ')}`,
      { details: { cycle } },
    );
    this.name = 'CycleDetectedError';
    this.cycle = cycle;
  }
}

/** A requested task has dependencies that are not completed. */
export class DependencyUnsatisfiedError extends TasklaneError {
  readonly taskId: string;
  readonly unmet: UnmetDependency[];

  constructor(taskId: string, unmet: UnmetDependency[]) {
    super(
      ExitCode.DEPENDENCY_ERROR,
      `Task ${taskId} has unmet dependencies: ${unmet.map((d) => `${d.id} (${d.status})`).join(', ')}`,
      {
        fix: `Complete ${unmet.map((d) => d.id).join(', ')} first, or pick another task with \`tasklane next\``,
        details: { taskId, unmet },
      },
    );
    this.name = 'DependencyUnsatisfiedError';
    this.taskId = taskId;
    this.unmet = unmet;
  }
}

/** A completed milestone is waiting for its external validation. */
export class ValidationPendingError extends TasklaneError {
  readonly milestoneId: string;

  constructor(milestoneId: string, message?: string) {
    super(
      ExitCode.VALIDATION_PENDING,
      message ?? `Milestone ${milestoneId} is complete and awaiting validation`,
      {
        fix: `Run the validation, then report it with \`tasklane validate-milestone ${milestoneId} --passed\` or \`--failed\``,
        details: { milestoneId },
      },
    );
    this.name = 'ValidationPendingError';
    this.milestoneId = milestoneId;
  }
}

/** Changes made for a task break its declared scope boundary or a guardrail. */
export class ScopeViolationError extends TasklaneError {
  readonly taskId: string;
  readonly violations: ScopeViolation[];

  constructor(taskId: string, violations: ScopeViolation[]) {
    super(
      ExitCode.SCOPE_VIOLATION,
      `Task ${taskId} violates its scope: ${violations.map((v) => v.message).join('; ')}`,
      { details: { taskId, violations } },
    );
    this.name = 'ScopeViolationError';
    this.taskId = taskId;
    this.violations = violations;
  }
}

/** A task references a technology or version outside the approved stack. */
export class TechNonComplianceError extends TasklaneError {
  readonly taskId: string;
  readonly offenders: TechOffender[];

  constructor(taskId: string, offenders: TechOffender[]) {
    super(
      ExitCode.TECH_NON_COMPLIANT,
      `Task ${taskId} is not tech compliant: ${offenders.map((o) => o.message).join('; ')}`,
      {
        fix: 'Use the exact approved version, or get the technology added to tech-registry.json',
        details: { taskId, offenders },
      },
    );
    this.name = 'TechNonComplianceError';
    this.taskId = taskId;
    this.offenders = offenders;
  }
}

/** Another process holds the state lock. */
export class LockContentionError extends TasklaneError {
  constructor(lockPath: string, cause?: unknown) {
    super(
      ExitCode.LOCK_TIMEOUT,
      `Failed to acquire lock: ${lockPath}`,
      {
        fix: 'Another tasklane process is writing the state. Wait and retry.',
        details: { lockPath },
        cause,
      },
    );
    this.name = 'LockContentionError';
  }
}

/** Writing state failed; the state files were restored from the pre-write backup. */
export class StateCorruptionError extends TasklaneError {
  readonly backupId: string;

  constructor(operation: string, backupId: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(
      ExitCode.STATE_CORRUPTION,
      `Write failed during ${operation}${reason}; state restored from backup ${backupId}`,
      { details: { operation, backupId }, cause },
    );
    this.name = 'StateCorruptionError';
    this.backupId = backupId;
  }
}
