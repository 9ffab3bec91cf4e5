// SPDX-License-Identifier: Apache-2.0

import {type StorageBackend} from '../api/storage-backend.js';
import {StorageOperation} from '../api/storage-operation.js';
import {UnsupportedStorageOperationError} from '../api/unsupported-storage-operation-error.js';
import {StorageBackendError} from '../api/storage-backend-error.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {Prefix} from '../../key/prefix.js';
import {EnvironmentKeyFormatter} from '../../key/environment-key-formatter.js';

/**
 * Read-only view of the process environment. Keys are listed and read without the prefix.
 *
 * Given prefix `ZTREE`, the variable `ZTREE_RETRY_MAX_ATTEMPTS=5` is listed as `RETRY_MAX_ATTEMPTS`.
 */
export class EnvironmentStorageBackend implements StorageBackend {
  public constructor(
    public readonly prefix?: string,
    private readonly environment: NodeJS.ProcessEnv = process.env,
  ) {}

  public isSupported(op: StorageOperation): boolean {
    switch (op) {
      case StorageOperation.List:
      case StorageOperation.ReadBytes: {
        return true;
      }
      default: {
        return false;
      }
    }
  }

  public async list(): Promise<string[]> {
    const formatter = EnvironmentKeyFormatter.instance();
    return Object.keys(this.environment)
      .filter(value => Prefix.matcher(value, this.prefix, formatter))
      .map(value => Prefix.strip(value, this.prefix, formatter));
  }

  public async readBytes(key: string): Promise<Uint8Array> {
    if (!key || key.trim().length === 0) {
      throw new IllegalArgumentError('key must not be null, undefined, or empty', key);
    }

    const normalizedKey = Prefix.add(key, this.prefix, EnvironmentKeyFormatter.instance());
    const value = this.environment[normalizedKey];
    if (value === undefined) {
      throw new StorageBackendError(`key not found: ${key}`);
    }

    return new TextEncoder().encode(value);
  }

  public async writeBytes(key: string): Promise<void> {
    throw new UnsupportedStorageOperationError(`writeBytes is not supported by the environment storage backend: ${key}`);
  }
}
