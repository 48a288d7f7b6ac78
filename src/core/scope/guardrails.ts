/**
 * Guardrail defaults and prerelease-qualifier detection.
 */

import type { GuardrailConfig } from '../../types/scope.js';

/** Prerelease qualifiers banned in dependency versions unless guardrails.json says otherwise. */
export const DEFAULT_PRERELEASE_QUALIFIERS: readonly string[] = [
  'alpha',
  'beta',
  'rc',
  'canary',
  'next',
  'nightly',
  'dev',
  'preview',
  'snapshot',
];

/** Guardrails in effect when guardrails.json does not exist. */
export const DEFAULT_GUARDRAILS: GuardrailConfig = {
  forbiddenPatterns: [],
  prereleaseQualifiers: [...DEFAULT_PRERELEASE_QUALIFIERS],
};

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * The prerelease qualifier a version spec carries, or null.
 *
 * A qualifier counts when it appears as its own dot/dash/plus separated
 * segment, optionally followed by a number: `1.0.0-beta.2`, `2.0.0-rc1`,
 * `next`, `3.1.0-SNAPSHOT`. Words merely containing one (`devtools`) don't.
 */
export function findPrereleaseQualifier(
  version: string,
  qualifiers: readonly string[],
): string | null {
  for (const qualifier of qualifiers) {
    const re = new RegExp(`(^|[-.+@])${escapeRegExp(qualifier)}(\\d*)($|[-.+])`, 'i');
    if (re.test(version)) return qualifier;
  }
  return null;
}
