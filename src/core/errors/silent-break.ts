// SPDX-License-Identifier: Apache-2.0

import {ZTreeError} from './ztree-error.js';

export class SilentBreak extends ZTreeError {
  /**
   * A silent break does not display a message to the user
   *
   * @param message - break message
   */
  public constructor(message: string) {
    super(message);
  }
}
