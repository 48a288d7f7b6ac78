/**
 * Cross-process locking using proper-lockfile.
 * Prevents concurrent tasklane invocations from interleaving writes to the
 * state directory. A lock left behind by a crashed process goes stale after
 * `staleMs` and is taken over by the next caller.
 */

import lockfile, { type LockOptions } from 'proper-lockfile';
import { LockContentionError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { LockConfig } from '../types/config.js';

/** Default lock options. */
export const DEFAULT_LOCK_CONFIG: LockConfig = {
  staleMs: 10_000,
  retries: 3,
  minTimeoutMs: 100,
  maxTimeoutMs: 1000,
};

/** A release function returned by acquireLock. */
export type ReleaseFn = () => Promise<void>;

function toLockOptions(config: LockConfig, lockfilePath?: string): LockOptions {
  return {
    stale: config.staleMs,
    retries: {
      retries: config.retries,
      minTimeout: config.minTimeoutMs,
      maxTimeout: config.maxTimeoutMs,
      factor: 2,
    },
    realpath: false,
    ...(lockfilePath && { lockfilePath }),
  };
}

/**
 * Acquire an exclusive lock on a path.
 * Fails with LockContentionError once the bounded retries are exhausted.
 * Returns a release function that must be called when done.
 */
export async function acquireLock(
  targetPath: string,
  options?: Partial<LockConfig> & { lockfilePath?: string },
): Promise<ReleaseFn> {
  const config = { ...DEFAULT_LOCK_CONFIG, ...options };
  try {
    return await lockfile.lock(targetPath, toLockOptions(config, options?.lockfilePath));
  } catch (err) {
    getLogger('lock').warn({ targetPath, err }, 'lock acquisition failed');
    throw new LockContentionError(options?.lockfilePath ?? `${targetPath}.lock`, err);
  }
}

/**
 * Execute a function while holding an exclusive lock.
 * The lock is released when the function completes or throws.
 */
export async function withLock<T>(
  targetPath: string,
  fn: () => Promise<T>,
  options?: Partial<LockConfig> & { lockfilePath?: string },
): Promise<T> {
  const release = await acquireLock(targetPath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}
