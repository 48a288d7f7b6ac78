/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and renderers.
 */

import type { OutputFormat } from '../types/config.js';

/** Resolved output format with where it came from. */
export interface FlagResolution {
  format: OutputFormat;
  source: 'flag' | 'config' | 'default';
  quiet: boolean;
}

/**
 * Current resolved format for this CLI invocation.
 * Defaults to JSON until resolved by the preAction hook.
 */
let currentResolution: FlagResolution = {
  format: 'json',
  source: 'default',
  quiet: false,
};

let currentProjectRoot: string | null = null;

/**
 * Set the resolved format for this CLI invocation.
 * Called once from the preAction hook in src/cli/index.ts.
 */
export function setFormatContext(resolution: FlagResolution): void {
  currentResolution = resolution;
}

export function getFormatContext(): FlagResolution {
  return currentResolution;
}

/** Project directory the state directory is resolved from (--cwd, else process.cwd()). */
export function setProjectRoot(root: string): void {
  currentProjectRoot = root;
}

export function getProjectRoot(): string {
  return currentProjectRoot ?? process.cwd();
}
