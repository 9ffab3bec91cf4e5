// SPDX-License-Identifier: Apache-2.0

import {type ZTreeLogger} from '../logging/ztree-logger.js';
import {Duration} from '../time/duration.js';
import {sleep} from '../helpers.js';
import {TreeStoreError} from './errors/tree-store-error.js';

export interface RetryOptions {
  /** total attempts per store operation, including the first */
  maxAttempts: number;
  /** wait before the second attempt; the wait grows linearly with each attempt */
  backoff: Duration;
}

export const NO_RETRY: RetryOptions = {maxAttempts: 1, backoff: Duration.ZERO};

export function isTransient(error: unknown): boolean {
  return error instanceof TreeStoreError && error.transient;
}

export function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Runs one store operation, repeating it while it fails with a transient error and attempts remain. The operation
 * receives the number of the attempt, starting at 1. The error of the last attempt is rethrown as is.
 */
export async function withRetry<T>(
  path: string,
  retry: RetryOptions,
  logger: ZTreeLogger,
  operation: (attempt: number) => Promise<T>,
): Promise<T> {
  const maxAttempts = Math.max(1, retry.maxAttempts);
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (!isTransient(error) || attempt >= maxAttempts) {
        throw error;
      }
      const wait = retry.backoff.multipliedBy(attempt);
      logger.warn(
        `Attempt ${attempt} of ${maxAttempts} at ${path} failed: ${reasonOf(error)}; retrying in ${wait.toMillis()}ms`,
      );
      await sleep(wait);
    }
  }
}
