// SPDX-License-Identifier: Apache-2.0

import {StorageBackendError} from './storage-backend-error.js';

export class UnsupportedStorageOperationError extends StorageBackendError {
  public constructor(message: string, cause: unknown = {}, meta: Record<string, unknown> = {}) {
    super(message, cause, meta);
  }
}
