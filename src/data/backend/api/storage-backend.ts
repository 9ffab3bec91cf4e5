// SPDX-License-Identifier: Apache-2.0

import {type StorageOperation} from './storage-operation.js';

/**
 * Reads and writes raw bytes to a storage medium: a directory of files or the process environment. Backends do not
 * interpret the data; object backends layer a text format on top.
 */
export interface StorageBackend {
  /**
   * List all keys in the storage backend.
   */
  list(): Promise<string[]>;

  /**
   * @param key - a file name relative to the base path, or an environment variable name without the prefix
   * @throws StorageBackendError if the key cannot be read
   */
  readBytes(key: string): Promise<Uint8Array>;

  writeBytes(key: string, data: Uint8Array): Promise<void>;

  isSupported(op: StorageOperation): boolean;
}
