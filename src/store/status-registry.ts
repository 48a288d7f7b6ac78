/**
 * Status registry: single source of truth for all status enums.
 *
 * No other file may define status enum arrays as constants; schemas,
 * types and renderers derive from these.
 */

export const TASK_STATUSES = ['pending', 'in_progress', 'completed'] as const;

export const TASK_TYPES = ['work', 'validation'] as const;

export const MILESTONE_STATUSES = ['not_started', 'in_progress', 'complete', 'validated'] as const;

export const SPRINT_STATUSES = ['planned', 'active', 'awaiting_validation', 'completed'] as const;

export const VALIDATION_OUTCOMES = ['passed', 'failed'] as const;

export const GUARDRAIL_TARGETS = ['path', 'content', 'dependency'] as const;

// === DERIVED TYPES ===

export type TaskStatus       = typeof TASK_STATUSES[number];
export type TaskType         = typeof TASK_TYPES[number];
export type MilestoneStatus  = typeof MILESTONE_STATUSES[number];
export type SprintStatus     = typeof SPRINT_STATUSES[number];
export type ValidationOutcome = typeof VALIDATION_OUTCOMES[number];
export type GuardrailTarget  = typeof GUARDRAIL_TARGETS[number];

// === STATE SETS ===

/** Milestones that can still receive new tasks. */
export const OPEN_MILESTONE_STATUSES: ReadonlySet<MilestoneStatus> =
  new Set(['not_started', 'in_progress']);

// === DISPLAY SYMBOLS ===

export const TASK_STATUS_SYMBOLS_UNICODE: Record<TaskStatus, string> = {
  pending: '○',
  in_progress: '◉',
  completed: '✓',
};

export const TASK_STATUS_SYMBOLS_ASCII: Record<TaskStatus, string> = {
  pending: '[ ]',
  in_progress: '[>]',
  completed: '[x]',
};

export const MILESTONE_STATUS_SYMBOLS: Record<MilestoneStatus, string> = {
  not_started: '[ ]',
  in_progress: '[>]',
  complete: '[?]',
  validated: '[+]',
};
