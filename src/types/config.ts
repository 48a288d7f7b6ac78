/**
 * Configuration type definitions for tasklane.
 * Covers project and global config with cascade resolution.
 */

/** Output format options. */
export type OutputFormat = 'json' | 'human';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
}

/** Cross-process lock configuration (proper-lockfile). */
export interface LockConfig {
  /** Age in ms after which a lock held by a dead process is considered stale. */
  staleMs: number;
  /** Acquisition attempts after the first before failing with LockContention. */
  retries: number;
  minTimeoutMs: number;
  maxTimeoutMs: number;
}

/** Backup configuration. */
export interface BackupConfig {
  /** Number of snapshots kept under backups/. */
  maxSnapshots: number;
}

/** Milestone capacity defaults applied to newly initialised graphs. */
export interface MilestoneConfig {
  defaultMinTasks: number;
  defaultMaxTasks: number;
}

/** Scope enforcement defaults. */
export interface ScopeConfig {
  defaultMaxFileChanges: number;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the state directory (default: 'logs/tasklane.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** tasklane configuration (config.json). */
export interface TasklaneConfig {
  version: string;
  output: OutputConfig;
  lock: LockConfig;
  backup: BackupConfig;
  milestones: MilestoneConfig;
  scope: ScopeConfig;
  logging: LoggingConfig;
}

/** Where a resolved config value came from. */
export type ConfigSource = 'default' | 'global' | 'project' | 'env';

/** A config value with its source. */
export interface ResolvedValue<T = unknown> {
  value: T;
  source: ConfigSource;
}
