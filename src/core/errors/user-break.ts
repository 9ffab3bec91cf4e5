// SPDX-License-Identifier: Apache-2.0

import {ZTreeError} from './ztree-error.js';

export class UserBreak extends ZTreeError {
  /**
   * Create a custom error for user break scenarios
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
