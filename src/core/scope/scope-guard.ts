/**
 * Scope guard: what a task may touch, and whether the changes made for it
 * stayed inside that boundary.
 *
 * Violations are reported, never corrected. Every check runs; the caller
 * gets the complete list.
 */

import type {
  ChangeSet,
  ForbiddenPattern,
  GuardrailConfig,
  ScopeViolation,
  TechOffender,
  TechRegistry,
} from '../../types/scope.js';
import type { Task, TaskGraph, TechnologyRef } from '../../types/task.js';
import { ScopeViolationError, TechNonComplianceError } from '../errors.js';
import { findPrereleaseQualifier } from './guardrails.js';
import { compilePattern, matchesMarker, normalizePath } from './patterns.js';

/** Boundary surfaced before a task starts. */
export interface ScopePreCheck {
  taskId: string;
  mustImplement: string[];
  mustNotImplement: string[];
  maxFileChanges: number;
  forbiddenPatterns: ForbiddenPattern[];
  prereleaseBanEnforced: boolean;
  prereleaseQualifiers: string[];
  technologies: TechnologyRef[];
}

export interface ScopePostCheckResult {
  taskId: string;
  compliant: boolean;
  filesChanged: number;
  maxFileChanges: number;
  violations: ScopeViolation[];
}

export interface TechComplianceResult {
  taskId: string;
  compliant: boolean;
  checked: TechnologyRef[];
  offenders: TechOffender[];
}

export interface PostCheckOptions {
  /** Check dependency versions for prerelease qualifiers (default true). */
  enforcePrereleaseBan?: boolean;
}

/**
 * The scope a task must respect, with the guardrails in force.
 */
export function preCheck(task: Task, graph: TaskGraph, guardrails: GuardrailConfig): ScopePreCheck {
  return {
    taskId: task.id,
    mustImplement: [...task.scope.mustImplement],
    mustNotImplement: [...task.scope.mustNotImplement],
    maxFileChanges: task.scope.maxFileChanges,
    forbiddenPatterns: guardrails.forbiddenPatterns,
    prereleaseBanEnforced: graph.scopeEnforcement.enforcePrereleaseBan,
    prereleaseQualifiers: guardrails.prereleaseQualifiers,
    technologies: task.technologies ?? [],
  };
}

function uniqueFiles(files: readonly string[]): string[] {
  return [...new Set(files.map(normalizePath))];
}

function budgetViolations(files: readonly string[], limit: number): ScopeViolation[] {
  if (files.length <= limit) return [];
  return files.slice(limit).map((file): ScopeViolation => ({
    kind: 'file_budget',
    message: `File ${file} exceeds the change budget of ${limit} (${files.length} files changed)`,
    file,
    limit,
    actual: files.length,
  }));
}

function markerViolations(files: readonly string[], markers: readonly string[]): ScopeViolation[] {
  const violations: ScopeViolation[] = [];
  for (const file of files) {
    for (const marker of markers) {
      if (matchesMarker(file, marker)) {
        violations.push({
          kind: 'forbidden_marker',
          message: `File ${file} matches forbidden marker "${marker}"`,
          file,
          pattern: marker,
        });
      }
    }
  }
  return violations;
}

function guardrailViolations(
  files: readonly string[],
  changes: ChangeSet,
  patterns: readonly ForbiddenPattern[],
): ScopeViolation[] {
  const violations: ScopeViolation[] = [];
  for (const guardrail of patterns) {
    const re = compilePattern(guardrail);
    const label = `guardrail ${guardrail.id} (/${guardrail.pattern}/)`;
    switch (guardrail.target) {
      case 'path':
        for (const file of files) {
          if (re.test(file)) {
            violations.push({ kind: 'forbidden_pattern', message: `File ${file} matches ${label}`, file, pattern: guardrail.pattern });
          }
        }
        break;
      case 'content':
        for (const [file, content] of Object.entries(changes.contents ?? {})) {
          if (re.test(content)) {
            violations.push({ kind: 'forbidden_pattern', message: `Content of ${normalizePath(file)} matches ${label}`, file: normalizePath(file), pattern: guardrail.pattern });
          }
        }
        break;
      case 'dependency':
        for (const [name, version] of Object.entries(changes.dependencies ?? {})) {
          const spec = `${name}@${version}`;
          if (re.test(spec)) {
            violations.push({ kind: 'forbidden_pattern', message: `Dependency ${spec} matches ${label}`, dependency: spec, pattern: guardrail.pattern });
          }
        }
        break;
    }
  }
  return violations;
}

function prereleaseViolations(changes: ChangeSet, qualifiers: readonly string[]): ScopeViolation[] {
  const violations: ScopeViolation[] = [];
  for (const [name, version] of Object.entries(changes.dependencies ?? {})) {
    const qualifier = findPrereleaseQualifier(version, qualifiers);
    if (qualifier !== null) {
      const spec = `${name}@${version}`;
      violations.push({
        kind: 'prerelease_dependency',
        message: `Dependency ${spec} uses prerelease qualifier "${qualifier}"`,
        dependency: spec,
        pattern: qualifier,
      });
    }
  }
  return violations;
}

/**
 * Check the changes made for a task against its scope and the guardrails.
 */
export function postCheck(
  task: Task,
  changes: ChangeSet,
  guardrails: GuardrailConfig,
  options: PostCheckOptions = {},
): ScopePostCheckResult {
  const files = uniqueFiles(changes.files);
  const violations = [
    ...budgetViolations(files, task.scope.maxFileChanges),
    ...markerViolations(files, task.scope.mustNotImplement),
    ...guardrailViolations(files, changes, guardrails.forbiddenPatterns),
    ...(options.enforcePrereleaseBan === false ? [] : prereleaseViolations(changes, guardrails.prereleaseQualifiers)),
  ];
  return {
    taskId: task.id,
    compliant: violations.length === 0,
    filesChanged: files.length,
    maxFileChanges: task.scope.maxFileChanges,
    violations,
  };
}

/** postCheck, throwing ScopeViolationError when anything is out of bounds. */
export function assertScope(
  task: Task,
  changes: ChangeSet,
  guardrails: GuardrailConfig,
  options: PostCheckOptions = {},
): ScopePostCheckResult {
  const result = postCheck(task, changes, guardrails, options);
  if (!result.compliant) {
    throw new ScopeViolationError(task.id, result.violations);
  }
  return result;
}

/**
 * Compare referenced technologies with the approved stack.
 * Versions must be byte-equal; a range such as `^1.2.0` never matches.
 *
 * @param referenced - Technologies to check; defaults to the task's own list
 */
export function techCompliance(
  task: Task,
  registry: TechRegistry,
  referenced?: readonly TechnologyRef[],
): TechComplianceResult {
  const checked = [...(referenced ?? task.technologies ?? [])];
  const offenders: TechOffender[] = [];

  for (const tech of checked) {
    const approvedVersion = Object.hasOwn(registry.approved, tech.name)
      ? registry.approved[tech.name] ?? null
      : null;
    if (approvedVersion === null) {
      offenders.push({
        name: tech.name,
        version: tech.version,
        approvedVersion: null,
        message: `${tech.name}@${tech.version} is not approved`,
      });
    } else if (tech.version !== approvedVersion) {
      offenders.push({
        name: tech.name,
        version: tech.version,
        approvedVersion,
        message: `${tech.name}@${tech.version} does not match approved version ${approvedVersion}`,
      });
    }
  }

  return { taskId: task.id, compliant: offenders.length === 0, checked, offenders };
}

/** techCompliance, throwing TechNonComplianceError on any offender. */
export function assertTechCompliance(
  task: Task,
  registry: TechRegistry,
  referenced?: readonly TechnologyRef[],
): TechComplianceResult {
  const result = techCompliance(task, registry, referenced);
  if (!result.compliant) {
    throw new TechNonComplianceError(task.id, result.offenders);
  }
  return result;
}
