// SPDX-License-Identifier: Apache-2.0

import {TreeError} from './tree-error.js';

/** A node listed by its parent was deleted before it could be read. */
export class NodeVanishedError extends TreeError {
  public constructor(path: string, cause: unknown = {}) {
    super(`ZNode ${path} was removed while it was being read`, path, cause);
  }
}
