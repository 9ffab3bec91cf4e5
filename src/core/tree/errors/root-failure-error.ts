// SPDX-License-Identifier: Apache-2.0

import {TreeError} from './tree-error.js';

/** The destination root itself could not be written, so nothing beneath it can be. */
export class RootFailureError extends TreeError {
  public constructor(path: string, cause: unknown = {}) {
    super(`failed to write destination root ${path}`, path, cause);
  }
}
