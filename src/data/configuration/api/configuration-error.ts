// SPDX-License-Identifier: Apache-2.0

import {ZTreeError} from '../../../core/errors/ztree-error.js';

/**
 * General purpose error for configuration failures.
 */
export class ConfigurationError extends ZTreeError {
  public constructor(message: string, cause: unknown = {}, meta: Record<string, unknown> = {}) {
    super(message, cause, meta);
  }
}
