/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain ASCII when color is not supported.
 *
 * Status symbols are sourced from the registry to keep icon definitions
 * co-located with the status values they describe.
 */
import {
  MILESTONE_STATUS_SYMBOLS,
  TASK_STATUS_SYMBOLS_ASCII,
  TASK_STATUS_SYMBOLS_UNICODE,
  type MilestoneStatus,
  type TaskStatus,
} from '../../store/status-registry.js';

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

/** Whether Unicode symbols are supported. */
const unicodeEnabled: boolean = (() => {
  const lang = process.env['LANG'] ?? '';
  if (lang === 'C' || lang === 'POSIX') return false;
  return lang.includes('UTF') || process.platform === 'darwin';
})();

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const BOLD = ansi('\x1b[1m');
export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');
export const GREEN = ansi('\x1b[0;32m');
export const YELLOW = ansi('\x1b[1;33m');
export const CYAN = ansi('\x1b[0;36m');

// ---------------------------------------------------------------------------
// Status symbols and colors
// ---------------------------------------------------------------------------

export function statusSymbol(status: TaskStatus): string {
  const map = unicodeEnabled ? TASK_STATUS_SYMBOLS_UNICODE : TASK_STATUS_SYMBOLS_ASCII;
  return map[status];
}

export function statusColor(status: TaskStatus): string {
  switch (status) {
    case 'pending':     return CYAN;
    case 'in_progress': return GREEN;
    case 'completed':   return DIM;
  }
}

export function milestoneSymbol(status: MilestoneStatus): string {
  return MILESTONE_STATUS_SYMBOLS[status];
}

export function milestoneColor(status: MilestoneStatus): string {
  switch (status) {
    case 'not_started': return DIM;
    case 'in_progress': return GREEN;
    case 'complete':    return YELLOW;
    case 'validated':   return CYAN;
  }
}
