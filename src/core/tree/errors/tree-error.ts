// SPDX-License-Identifier: Apache-2.0

import {ZTreeError} from '../../errors/ztree-error.js';

/**
 * Base class of errors raised while reading, transforming or writing a tree. Carries the path the error concerns.
 */
export class TreeError extends ZTreeError {
  public constructor(
    message: string,
    public readonly path: string,
    cause: unknown = {},
    meta: Record<string, unknown> = {},
  ) {
    super(message, cause, {path, ...meta});
  }
}
