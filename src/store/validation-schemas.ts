/**
 * zod schemas for the persisted state files.
 *
 * Every object is strict: an unknown field is a validation error rather than
 * something silently carried along. Enums are the closed unions from the
 * status registry.
 */

import { z } from 'zod';
import {
  MILESTONE_STATUSES,
  SPRINT_STATUSES,
  TASK_STATUSES,
  TASK_TYPES,
  VALIDATION_OUTCOMES,
} from './status-registry.js';

const idSchema = z.string().min(1).regex(/^[A-Za-z0-9_.-]+$/, 'must contain only letters, digits, dot, dash or underscore');

export const scopeBoundarySchema = z.object({
  mustImplement: z.array(z.string().min(1)),
  mustNotImplement: z.array(z.string().min(1)),
  maxFileChanges: z.number().int().min(0),
}).strict();

export const technologyRefSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
}).strict();

export const enhancementMetaSchema = z.object({
  featureId: idSchema,
  description: z.string().min(1),
  addedAt: z.string(),
}).strict();

export const taskSchema = z.object({
  id: idSchema,
  title: z.string().min(1),
  type: z.enum(TASK_TYPES),
  status: z.enum(TASK_STATUSES),
  milestoneId: idSchema,
  dependencies: z.array(idSchema),
  scope: scopeBoundarySchema,
  technologies: z.array(technologyRefSchema).optional(),
  enhancement: enhancementMetaSchema.optional(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
}).strict();

export const capacitySchema = z.object({
  min: z.number().int().min(1),
  max: z.number().int().min(2),
}).strict().refine((c) => c.min <= c.max, { message: 'capacity.min must not exceed capacity.max' });

export const milestoneSchema = z.object({
  id: idSchema,
  title: z.string().min(1),
  taskIds: z.array(idSchema).min(1),
  status: z.enum(MILESTONE_STATUSES),
  capacity: capacitySchema.optional(),
}).strict();

export const milestoneStrategySchema = z.object({
  minTasks: z.number().int().min(1),
  maxTasks: z.number().int().min(2),
}).strict().refine((s) => s.minTasks <= s.maxTasks, { message: 'minTasks must not exceed maxTasks' });

export const scopeEnforcementSchema = z.object({
  defaultMaxFileChanges: z.number().int().min(0),
  enforcePrereleaseBan: z.boolean(),
}).strict();

export const taskGraphSchema = z.object({
  version: z.literal(1),
  sprintId: idSchema,
  milestoneStrategy: milestoneStrategySchema,
  scopeEnforcement: scopeEnforcementSchema,
  milestones: z.array(milestoneSchema),
  tasks: z.array(taskSchema),
}).strict();

export const historyEntrySchema = z.object({
  timestamp: z.string(),
  action: z.string().min(1),
  taskId: idSchema.optional(),
  milestoneId: idSchema.optional(),
  details: z.record(z.string(), z.unknown()).optional(),
}).strict();

export const validationRecordSchema = z.object({
  milestoneId: idSchema,
  timestamp: z.string(),
  status: z.enum(VALIDATION_OUTCOMES),
  issues: z.array(z.string()),
}).strict();

export const progressSchema = z.object({
  sprintId: idSchema,
  status: z.enum(SPRINT_STATUSES),
  currentMilestoneId: idSchema.nullable(),
  validationPending: z.boolean(),
  counters: z.object({
    completed: z.number().int().min(0),
    total: z.number().int().min(0),
  }).strict(),
  history: z.array(historyEntrySchema),
  validations: z.array(validationRecordSchema),
}).strict();

export const deferredFeatureSchema = z.object({
  id: idSchema,
  description: z.string().min(1),
  reason: z.string(),
  deferredAt: z.string(),
}).strict();

export const deferredFeaturesSchema = z.object({
  features: z.array(deferredFeatureSchema),
}).strict();

// === PLAN INPUT ===

/** A task as written by the planner; status and ownership are filled in on init. */
export const planTaskSchema = z.object({
  id: idSchema,
  title: z.string().min(1),
  type: z.enum(TASK_TYPES).default('work'),
  dependencies: z.array(idSchema).default([]),
  scope: scopeBoundarySchema.partial().optional(),
  technologies: z.array(technologyRefSchema).optional(),
}).strict();

export const planMilestoneSchema = z.object({
  id: idSchema,
  title: z.string().min(1),
  capacity: capacitySchema.optional(),
  tasks: z.array(planTaskSchema).min(1),
}).strict();

export const sprintPlanSchema = z.object({
  sprintId: idSchema,
  milestoneStrategy: milestoneStrategySchema.optional(),
  scopeEnforcement: scopeEnforcementSchema.partial().optional(),
  milestones: z.array(planMilestoneSchema).min(1),
}).strict();

// === ENHANCEMENT INPUT ===

/** One task of a feature, as given in an enhancement tasks file. Local refs are `@N`. */
export const featureTaskSchema = z.object({
  title: z.string().min(1),
  dependencies: z.array(z.string().regex(/^(@\d+|[A-Za-z0-9_.-]+)$/, 'must be a task id or @N')).optional(),
  scope: scopeBoundarySchema.partial().optional(),
  technologies: z.array(technologyRefSchema).optional(),
}).strict();

export const featureTasksFileSchema = z.array(featureTaskSchema).min(1);
