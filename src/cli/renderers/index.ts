/**
 * Central output dispatch for CLI commands.
 *
 * Commands hand an EngineResult to cliOutput() together with the renderer
 * for their data. JSON (the default) prints the envelope from core/output;
 * --human prints the rendered text. The process exit code is set from the
 * error, or from `exitCodeFor` when a successful result still signals a
 * blocking condition.
 */

import { formatError, formatSuccess } from '../../core/output.js';
import type { EngineResult } from '../../dispatch/engines/_error.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getFormatContext } from '../format-context.js';
import { BOLD, DIM, NC, RED } from './colors.js';

/** Renders command data for a human reader. Returns '' to print nothing. */
export type HumanRenderer<T> = (data: T, quiet: boolean) => string;

export interface CliOutputOptions<T> {
  /** Operation name carried in the JSON envelope. */
  operation: string;
  render: HumanRenderer<T>;
  /** Non-zero exit code for a successful but blocking result. */
  exitCodeFor?: (data: T) => ExitCode;
}

/**
 * Output an engine result in the resolved format and set the exit code.
 */
export function cliOutput<T>(result: EngineResult<T>, opts: CliOutputOptions<T>): void {
  const ctx = getFormatContext();

  if (!result.success || result.data === undefined) {
    const error = result.error ?? {
      code: 'E_GENERAL_ERROR',
      message: `${opts.operation} returned no data`,
      exitCode: ExitCode.GENERAL_ERROR,
    };
    if (ctx.format === 'human') {
      console.error(`${RED}Error:${NC} ${error.message} ${DIM}(${error.code})${NC}`);
      if (error.fix && !ctx.quiet) console.error(`  ${DIM}Fix:${NC} ${error.fix}`);
    } else {
      console.log(formatError(error, opts.operation));
    }
    process.exitCode = error.exitCode;
    return;
  }

  const data = result.data;
  if (ctx.format === 'human') {
    const text = opts.render(data, ctx.quiet);
    if (text) console.log(text);
  } else {
    console.log(formatSuccess(data, opts.operation));
  }
  process.exitCode = opts.exitCodeFor?.(data) ?? ExitCode.SUCCESS;
}

// ---------------------------------------------------------------------------
// Generic renderer
// ---------------------------------------------------------------------------

function formatLabel(key: string): string {
  return key.replace(/([a-z])([A-Z])/g, '$1 $2').replace(/^./, (c) => c.toUpperCase());
}

function renderValue(value: unknown, indent: string, lines: string[]): void {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, val] of Object.entries(value)) {
      if (val !== null && typeof val === 'object') {
        lines.push(`${indent}${BOLD}${formatLabel(key)}:${NC}`);
        renderValue(val, `${indent}  `, lines);
      } else {
        lines.push(`${indent}${DIM}${formatLabel(key)}:${NC} ${String(val)}`);
      }
    }
    return;
  }
  if (Array.isArray(value)) {
    for (const item of value) {
      if (item !== null && typeof item === 'object') {
        lines.push(`${indent}-`);
        renderValue(item, `${indent}  `, lines);
      } else {
        lines.push(`${indent}- ${String(item)}`);
      }
    }
    return;
  }
  lines.push(`${indent}${String(value)}`);
}

/** Key/value rendering for results without a dedicated renderer. */
export function renderGeneric(data: unknown, quiet: boolean): string {
  if (quiet) return '';
  const lines: string[] = [];
  renderValue(data, '', lines);
  return lines.join('\n');
}
