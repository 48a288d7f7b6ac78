/**
 * Marker and guardrail pattern matching.
 *
 * A mustNotImplement marker containing `*` or `?` is a path glob:
 * `**` spans directories, `*` stays within one segment, `?` is one
 * character. Any other marker matches as a case-insensitive substring.
 */

import type { ForbiddenPattern } from '../../types/scope.js';

export function isGlob(marker: string): boolean {
  return marker.includes('*') || marker.includes('?');
}

/** Convert a path glob to an anchored, case-insensitive RegExp. */
export function globToRegExp(glob: string): RegExp {
  let source = '';
  for (let i = 0; i < glob.length; i++) {
    const ch = glob.charAt(i);
    if (ch === '*' && glob.charAt(i + 1) === '*') {
      source += '.*';
      i++;
      // `**/` also matches zero directories
      if (glob.charAt(i + 1) === '/') {
        source += '/?';
        i++;
      }
    } else if (ch === '*') {
      source += '[^/]*';
    } else if (ch === '?') {
      source += '[^/]';
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 'i');
}

/** Normalise a changed-file path for matching: forward slashes, no leading `./`. */
export function normalizePath(path: string): string {
  return path.replace(/\\/g, '/').replace(/^\.\//, '');
}

/**
 * True when a file path hits a mustNotImplement marker.
 */
export function matchesMarker(path: string, marker: string): boolean {
  const normalized = normalizePath(path);
  if (isGlob(marker)) {
    return globToRegExp(normalizePath(marker)).test(normalized);
  }
  return normalized.toLowerCase().includes(marker.toLowerCase());
}

/** Compile a guardrail pattern (case-insensitive). */
export function compilePattern(pattern: ForbiddenPattern): RegExp {
  return new RegExp(pattern.pattern, 'i');
}
