// SPDX-License-Identifier: Apache-2.0

import {TreeError} from './tree-error.js';

export class ConflictAbortError extends TreeError {
  public constructor(path: string, cause: unknown = {}) {
    super(`replication aborted at ${path}`, path, cause);
  }
}
