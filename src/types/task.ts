/**
 * Task graph and progress type definitions.
 * Persisted shapes are inferred from the zod schemas in store/validation-schemas.ts.
 */

import type { z } from 'zod';
import type {
  deferredFeatureSchema,
  deferredFeaturesSchema,
  enhancementMetaSchema,
  historyEntrySchema,
  milestoneSchema,
  progressSchema,
  scopeBoundarySchema,
  taskGraphSchema,
  taskSchema,
  technologyRefSchema,
  validationRecordSchema,
} from '../store/validation-schemas.js';
import type { TaskStatus } from '../store/status-registry.js';

export type {
  TaskStatus,
  TaskType,
  MilestoneStatus,
  SprintStatus,
  ValidationOutcome,
} from '../store/status-registry.js';

export type ScopeBoundary = z.infer<typeof scopeBoundarySchema>;
export type TechnologyRef = z.infer<typeof technologyRefSchema>;
export type EnhancementMeta = z.infer<typeof enhancementMetaSchema>;
export type Task = z.infer<typeof taskSchema>;
export type Milestone = z.infer<typeof milestoneSchema>;
export type TaskGraph = z.infer<typeof taskGraphSchema>;
export type HistoryEntry = z.infer<typeof historyEntrySchema>;
export type ValidationRecord = z.infer<typeof validationRecordSchema>;
export type ProgressTracker = z.infer<typeof progressSchema>;
export type DeferredFeature = z.infer<typeof deferredFeatureSchema>;
export type DeferredFeatures = z.infer<typeof deferredFeaturesSchema>;

/**
 * Everything loaded from the state directory in one invocation.
 * Guardrails and the tech registry are read separately (see core/scope).
 */
export interface SprintState {
  graph: TaskGraph;
  progress: ProgressTracker;
  deferred: DeferredFeatures;
}

/** A dependency that blocks a task, with the dependency's current status. */
export interface UnmetDependency {
  id: string;
  status: TaskStatus | 'missing';
}

/** One referential-integrity or consistency problem found in the state. */
export interface IntegrityIssue {
  code: string;
  message: string;
  file?: string;
  path?: string;
  taskId?: string;
  milestoneId?: string;
}
