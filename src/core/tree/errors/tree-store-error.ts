// SPDX-License-Identifier: Apache-2.0

import {ZTreeError} from '../../errors/ztree-error.js';

export enum TreeStoreErrorCode {
  NO_NODE = 'NoNode',
  NODE_EXISTS = 'NodeExists',
  NO_AUTH = 'NoAuth',
  CONNECTION_LOSS = 'ConnectionLoss',
  OPERATION_TIMEOUT = 'OperationTimeout',
  SESSION_EXPIRED = 'SessionExpired',
  UNKNOWN = 'Unknown',
}

const TRANSIENT_CODES: ReadonlySet<TreeStoreErrorCode> = new Set([
  TreeStoreErrorCode.CONNECTION_LOSS,
  TreeStoreErrorCode.OPERATION_TIMEOUT,
  TreeStoreErrorCode.SESSION_EXPIRED,
]);

/**
 * Raised by a {@link TreeStore} when a single store operation fails.
 */
export class TreeStoreError extends ZTreeError {
  public constructor(
    message: string,
    public readonly code: TreeStoreErrorCode,
    public readonly path: string,
    cause: unknown = {},
  ) {
    super(message, cause, {code, path});
  }

  /** whether repeating the same operation may succeed */
  public get transient(): boolean {
    return TRANSIENT_CODES.has(this.code);
  }

  public static isCode(error: unknown, code: TreeStoreErrorCode): error is TreeStoreError {
    return error instanceof TreeStoreError && error.code === code;
  }
}
