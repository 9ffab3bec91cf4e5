// SPDX-License-Identifier: Apache-2.0

import {TreeError} from './tree-error.js';

export class NotFoundError extends TreeError {
  public constructor(path: string, cause: unknown = {}) {
    super(`ZNode ${path} does not exist`, path, cause);
  }
}
