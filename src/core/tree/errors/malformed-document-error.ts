// SPDX-License-Identifier: Apache-2.0

import {TreeError} from './tree-error.js';

export class MalformedDocumentError extends TreeError {
  public constructor(message: string, path: string = '', cause: unknown = {}) {
    super(message, path, cause);
  }
}
