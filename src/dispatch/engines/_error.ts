/**
 * Centralized engine error helper.
 *
 * Engines never throw: every operation returns an EngineResult. Thrown
 * TasklaneErrors are converted here with their exit code, fix and details;
 * anything else becomes a GENERAL_ERROR.
 */

import { TasklaneError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { ExitCode, getExitCodeName } from '../../types/exit-codes.js';

/**
 * Canonical EngineResult type used by all engines.
 * `error` is absent on success.
 */
export interface EngineResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: EngineErrorInfo;
}

export interface EngineErrorInfo {
  code: string;
  message: string;
  exitCode: number;
  details?: Record<string, unknown>;
  fix?: string;
}

/**
 * Derive pino log level from exit code.
 *
 * - 100+: special/informational -> 'debug'
 * - internal errors (1, 3, 23): -> 'error'
 * - everything else is a user/domain error -> 'warn'
 */
function logLevel(exitCode: number): 'error' | 'warn' | 'debug' {
  if (exitCode === 0 || exitCode >= 100) return 'debug';
  if (exitCode === ExitCode.GENERAL_ERROR || exitCode === ExitCode.FILE_ERROR || exitCode === ExitCode.STATE_CORRUPTION) {
    return 'error';
  }
  return 'warn';
}

/**
 * Create a typed engine error result with pino logging and correct exit code.
 */
export function engineError<T>(
  exitCode: ExitCode,
  message: string,
  options?: {
    details?: Record<string, unknown>;
    fix?: string;
  },
): EngineResult<T> {
  const code = `E_${getExitCodeName(exitCode)}`;

  // Keep test output clean: skip engine logging under Vitest.
  if (process.env['VITEST'] !== 'true') {
    getLogger('engine')[logLevel(exitCode)](
      { code, exitCode, ...(options?.details && { details: options.details }) },
      message,
    );
  }

  return {
    success: false,
    error: {
      code,
      message,
      exitCode,
      ...(options?.details && { details: options.details }),
      ...(options?.fix && { fix: options.fix }),
    },
  };
}

/**
 * Convert anything thrown by a core operation into an error result.
 */
export function engineErrorFrom<T>(err: unknown): EngineResult<T> {
  if (err instanceof TasklaneError) {
    return engineError(err.code, err.message, {
      ...(err.details && { details: err.details }),
      ...(err.fix && { fix: err.fix }),
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return engineError(ExitCode.GENERAL_ERROR, message);
}

/**
 * Create an engine success result.
 */
export function engineSuccess<T>(data: T): EngineResult<T> {
  return { success: true, data };
}

/** Run an operation, capturing thrown errors as an error result. */
export async function runEngine<T>(operation: () => Promise<T>): Promise<EngineResult<T>> {
  try {
    return engineSuccess(await operation());
  } catch (err) {
    return engineErrorFrom<T>(err);
  }
}
