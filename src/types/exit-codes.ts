/**
 * tasklane exit codes.
 * Ranges: 0 = success, 1-99 = errors, 100+ = special (non-error) states.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  DEPENDENCY_ERROR = 5,
  VALIDATION_ERROR = 6,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,

  // === GRAPH ERRORS (10-19) ===
  CIRCULAR_REFERENCE = 14,
  TASK_NOT_PENDING = 16,
  TASK_COMPLETED = 17,

  // === STATE ERRORS (20-29) ===
  CONCURRENT_MODIFICATION = 21,
  STATE_CORRUPTION = 23,

  // === MILESTONE GATE (40-49) ===
  VALIDATION_PENDING = 40,
  MILESTONE_BLOCKED = 41,
  LIFECYCLE_TRANSITION_INVALID = 42,

  // === SCOPE GUARD (50-59) ===
  SCOPE_VIOLATION = 50,
  TECH_NON_COMPLIANT = 51,

  // === ENHANCEMENT (60-69) ===
  CAPACITY_EXCEEDED = 60,
  PLACEMENT_FAILED = 61,

  // === SPECIAL CODES (100+) - NOT errors ===
  NO_DATA = 100,
  ALREADY_EXISTS = 101,
  NO_CHANGE = 102,
}

/** Check if an exit code represents an error (1-99). */
export function isErrorCode(code: ExitCode): boolean {
  return code >= 1 && code < 100;
}

/** Check if an exit code is recoverable (the caller may remediate and retry). */
export function isRecoverableCode(code: ExitCode): boolean {
  const nonRecoverable = new Set<ExitCode>([
    ExitCode.FILE_ERROR,
    ExitCode.VALIDATION_ERROR,
    ExitCode.CIRCULAR_REFERENCE,
    ExitCode.STATE_CORRUPTION,
    ExitCode.CONFIG_ERROR,
  ]);

  if (!isErrorCode(code)) return false;
  return !nonRecoverable.has(code);
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
