/**
 * Centralized pino logger factory for tasklane.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout is reserved for command results, so diagnostics go to the log file,
 * or to stderr before initLogger() has run.
 */

import { pino } from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

/**
 * Convert bytes to a size string for pino-roll ('10m', '1g', '500k').
 */
function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param stateDir - Absolute path to the state directory
 * @param config   - Logging configuration from TasklaneConfig.logging
 */
export function initLogger(stateDir: string, config: LoggingConfig): pino.Logger {
  const dest = join(stateDir, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  // pino.transport() runs in a worker thread; pino-roll handles size+daily
  // rotation and retention.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger; returns a stderr fallback logger
 * so early startup code and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'store', 'resolver', 'enhancement')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (rootLogger) {
    return rootLogger.child({ subsystem });
  }
  if (!fallbackLogger) {
    fallbackLogger = pino(
      {
        level: process.env['TASKLANE_LOG_LEVEL'] ?? 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      },
      pino.destination(2),
    );
  }
  return fallbackLogger.child({ subsystem });
}

/**
 * Flush and close the logger. Call during graceful shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
