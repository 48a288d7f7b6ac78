/**
 * tasklane - milestone-gated task orchestration for agent-driven sprints.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type {
  Task,
  Milestone,
  TaskGraph,
  ProgressTracker,
  ValidationRecord,
  DeferredFeature,
  SprintState,
  IntegrityIssue,
  UnmetDependency,
  EnhancementMeta,
} from './types/task.js';
export type { ChangeSet, GuardrailConfig, TechRegistry, ScopeViolation, TechOffender } from './types/scope.js';
export type { TasklaneConfig } from './types/config.js';

// Core
export {
  TasklaneError,
  SchemaError,
  CycleDetectedError,
  DependencyUnsatisfiedError,
  ValidationPendingError,
  ScopeViolationError,
  TechNonComplianceError,
  LockContentionError,
  StateCorruptionError,
} from './core/errors.js';
export { formatSuccess, formatError } from './core/output.js';
export type { Envelope, SuccessEnvelope, ErrorEnvelope } from './core/output.js';
export { loadConfig, getConfigValue } from './core/config.js';

// Store
export { TaskGraphStore, validateState } from './store/task-graph-store.js';

// Scheduling
export { nextTask, isEligible, validateDependencies } from './core/tasks/resolver.js';
export { showTask } from './core/tasks/show.js';
export { startTask, completeTask } from './core/task-work/index.js';

// Milestones
export { getMilestoneStatus, recordValidation, addRemediationTask } from './core/milestones/index.js';
export { canTransition, transitionMilestone } from './core/milestones/state-machine.js';

// Scope
export { checkScopeCompliance, preCheck, postCheck, techCompliance } from './core/scope/index.js';

// Enhancement
export { applyEnhancementToStore, deferFeature, listDeferred } from './core/enhancement/index.js';
export { placement } from './core/enhancement/placement.js';

// Sprint
export { initSprint, readPlanFile } from './core/sprint/init.js';
export { getSprintStatus } from './core/sprint/status.js';
export { getHistory } from './core/sprint/history.js';

// Operations
export * from './dispatch/engines/sprint-engine.js';
export type { EngineResult } from './dispatch/engines/_error.js';
