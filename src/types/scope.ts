/**
 * Scope guard and guardrail type definitions.
 */

import type { GuardrailTarget } from '../store/status-registry.js';

export type { GuardrailTarget };

/** A forbidden pattern declared in guardrails.json. */
export interface ForbiddenPattern {
  id: string;
  /** Regular expression source, matched case-insensitively. */
  pattern: string;
  target: GuardrailTarget;
  description?: string;
}

/** guardrails.json */
export interface GuardrailConfig {
  forbiddenPatterns: ForbiddenPattern[];
  prereleaseQualifiers: string[];
}

/** tech-registry.json: technology name → the single approved version. */
export interface TechRegistry {
  approved: Record<string, string>;
}

/** Changes made (or proposed) while executing a task. */
export interface ChangeSet {
  files: string[];
  /** File path → content, for content-targeted guardrails. */
  contents?: Record<string, string>;
  /** Dependency name → version spec added or changed. */
  dependencies?: Record<string, string>;
}

export type ScopeViolationKind =
  | 'file_budget'
  | 'forbidden_marker'
  | 'forbidden_pattern'
  | 'prerelease_dependency';

/** One precise scope violation. */
export interface ScopeViolation {
  kind: ScopeViolationKind;
  message: string;
  file?: string;
  dependency?: string;
  pattern?: string;
  limit?: number;
  actual?: number;
}

/** A technology reference that does not match the approved stack. */
export interface TechOffender {
  name: string;
  version: string;
  approvedVersion: string | null;
  message: string;
}
