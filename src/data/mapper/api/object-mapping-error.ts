// SPDX-License-Identifier: Apache-2.0

import {ZTreeError} from '../../../core/errors/ztree-error.js';

/**
 * Thrown by an object mapper when an object is not in the expected shape or a type conversion fails.
 */
export class ObjectMappingError extends ZTreeError {
  public constructor(message: string, cause: unknown = {}, meta: Record<string, unknown> = {}) {
    super(message, cause, meta);
  }
}
