/**
 * Path resolution for tasklane.
 *
 * Environment variables:
 *   TASKLANE_HOME - Global directory holding the user config (default: ~/.tasklane)
 *   TASKLANE_DIR  - Project state directory (default: .tasklane)
 */

import { resolve, dirname, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';

/** File names of every state file, in the order they are written. */
export const STATE_FILES = {
  taskGraph: 'task-graph.json',
  progress: 'progress.json',
  deferred: 'deferred-features.json',
  guardrails: 'guardrails.json',
  techRegistry: 'tech-registry.json',
} as const;

/**
 * Get the global tasklane home directory.
 * Respects TASKLANE_HOME env var, defaults to ~/.tasklane.
 */
export function getTasklaneHome(): string {
  return process.env['TASKLANE_HOME'] ?? join(homedir(), '.tasklane');
}

/**
 * Get the project state directory (relative unless TASKLANE_DIR is absolute).
 */
export function getStateDirName(): string {
  return process.env['TASKLANE_DIR'] ?? '.tasklane';
}

/**
 * Get the absolute path to the project state directory.
 */
export function getStateDir(cwd?: string): string {
  const dir = getStateDirName();
  if (isAbsolute(dir)) {
    return dir;
  }
  return resolve(cwd ?? process.cwd(), dir);
}

/**
 * Get the project root from the state directory.
 * With the default layout the project root is the state directory's parent.
 */
export function getProjectRoot(cwd?: string): string {
  if (isAbsolute(getStateDirName())) {
    return cwd ?? process.cwd();
  }
  return dirname(getStateDir(cwd));
}

/**
 * Get the path to the project's config.json file.
 */
export function getConfigPath(cwd?: string): string {
  return join(getStateDir(cwd), 'config.json');
}

/**
 * Get the global config file path.
 */
export function getGlobalConfigPath(): string {
  return join(getTasklaneHome(), 'config.json');
}
