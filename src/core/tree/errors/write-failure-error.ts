// SPDX-License-Identifier: Apache-2.0

import {TreeError} from './tree-error.js';
import {reasonOf} from '../retry.js';

/**
 * A destination write failed. `retryable` tells whether the failure was transient; by the time this is thrown the
 * retries are already spent.
 */
export class WriteFailureError extends TreeError {
  public constructor(
    path: string,
    public readonly retryable: boolean,
    cause: unknown = {},
  ) {
    super(`failed to write ZNode ${path}: ${reasonOf(cause)}`, path, cause, {retryable});
  }
}
