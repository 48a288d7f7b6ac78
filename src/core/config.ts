/**
 * Configuration engine for tasklane.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import type { ConfigSource, ResolvedValue, TasklaneConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { isJsonObject, readJson } from '../store/json.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';
import { parseDocument } from './validation/schema-validator.js';

/** Default configuration values. */
export const DEFAULTS: TasklaneConfig = {
  version: '1.0.0',
  output: {
    defaultFormat: 'json',
  },
  lock: {
    staleMs: 10_000,
    retries: 3,
    minTimeoutMs: 100,
    maxTimeoutMs: 1000,
  },
  backup: {
    maxSnapshots: 10,
  },
  milestones: {
    defaultMinTasks: 3,
    defaultMaxTasks: 5,
  },
  scope: {
    defaultMaxFileChanges: 10,
  },
  logging: {
    level: 'info',
    filePath: 'logs/tasklane.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'TASKLANE_FORMAT': 'output.defaultFormat',
  'TASKLANE_LOCK_STALE_MS': 'lock.staleMs',
  'TASKLANE_LOCK_RETRIES': 'lock.retries',
  'TASKLANE_BACKUP_MAX_SNAPSHOTS': 'backup.maxSnapshots',
  'TASKLANE_MILESTONE_MAX_TASKS': 'milestones.defaultMaxTasks',
  'TASKLANE_LOG_LEVEL': 'logging.level',
  'TASKLANE_LOG_FILE': 'logging.filePath',
};

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isJsonObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current: Record<string, unknown> = obj;
  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i] ?? '';
    const next = current[part];
    if (isJsonObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[parts[parts.length - 1] ?? ''] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isJsonObject(sourceVal) && isJsonObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

/** Read one config file and validate it against schemas/config.schema.json. */
async function readConfigFile(path: string): Promise<Record<string, unknown> | null> {
  const raw = await readJson(path);
  if (raw === null) return null;
  parseDocument('config', raw, path, ExitCode.CONFIG_ERROR);
  return isJsonObject(raw) ? raw : null;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<TasklaneConfig> {
  let merged: Record<string, unknown> = structuredClone({ ...DEFAULTS });

  const globalConfig = await readConfigFile(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  const projectConfig = await readConfigFile(getConfigPath(cwd));
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configPath, parseEnvValue(envValue));
    }
  }

  // The merged result is re-validated so a bad env value is caught as well.
  const { version, ...rest } = parseDocument('config', merged, 'resolved configuration', ExitCode.CONFIG_ERROR);
  return {
    version: version ?? DEFAULTS.version,
    output: { ...DEFAULTS.output, ...rest.output },
    lock: { ...DEFAULTS.lock, ...rest.lock },
    backup: { ...DEFAULTS.backup, ...rest.backup },
    milestones: { ...DEFAULTS.milestones, ...rest.milestones },
    scope: { ...DEFAULTS.scope, ...rest.scope },
    logging: { ...DEFAULTS.logging, ...rest.logging },
  };
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(path: string, cwd?: string): Promise<ResolvedValue> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseEnvValue(envValue), source: 'env' };
    }
  }

  const layers: Array<[ConfigSource, string]> = [
    ['project', getConfigPath(cwd)],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, file] of layers) {
    const config = await readConfigFile(file);
    const val = getNestedValue(config, path);
    if (val !== undefined) {
      return { value: val, source };
    }
  }

  return { value: getNestedValue(DEFAULTS, path), source: 'default' };
}
