/**
 * JSON output envelope for CLI results.
 *
 * All CLI output is machine-parseable JSON by default. The envelope carries
 * no timestamps or request ids, so the same state always renders the same
 * bytes.
 */

import type { EngineErrorInfo } from '../dispatch/engines/_error.js';

export interface SuccessEnvelope<T = unknown> {
  success: true;
  operation: string;
  result: T;
}

export interface ErrorEnvelope {
  success: false;
  operation: string;
  result: null;
  error: EngineErrorInfo;
}

export type Envelope<T = unknown> = SuccessEnvelope<T> | ErrorEnvelope;

/**
 * Format a successful result.
 */
export function formatSuccess<T>(data: T, operation: string): string {
  const envelope: SuccessEnvelope<T> = { success: true, operation, result: data };
  return JSON.stringify(envelope);
}

/**
 * Format an error.
 */
export function formatError(error: EngineErrorInfo, operation: string): string {
  const envelope: ErrorEnvelope = { success: false, operation, result: null, error };
  return JSON.stringify(envelope);
}
