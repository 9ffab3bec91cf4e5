// SPDX-License-Identifier: Apache-2.0

import {type StorageBackend} from './storage-backend.js';

export interface ObjectStorageBackend extends StorageBackend {
  /**
   * Reads the persisted data and parses it into a plain javascript object.
   */
  readObject(key: string): Promise<object>;

  /**
   * Serializes the plain javascript object with its keys sorted and persists it.
   */
  writeObject(key: string, data: object): Promise<void>;
}
