// SPDX-License-Identifier: Apache-2.0

import {TreeError} from './tree-error.js';
import {reasonOf} from '../retry.js';

/** A source node below the walk root could not be read; its subtree is skipped. */
export class ReadFailureError extends TreeError {
  public constructor(
    path: string,
    public readonly retryable: boolean,
    cause: unknown = {},
  ) {
    super(`failed to read ZNode ${path}: ${reasonOf(cause)}`, path, cause, {retryable});
  }
}
