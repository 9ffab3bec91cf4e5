// SPDX-License-Identifier: Apache-2.0

import {type ObjectStorageBackend} from '../api/object-storage-backend.js';
import {FileStorageBackend} from './file-storage-backend.js';
import {StorageBackendError} from '../api/storage-backend-error.js';
import {StorageOperation} from '../api/storage-operation.js';

export class JsonFileStorageBackend extends FileStorageBackend implements ObjectStorageBackend {
  public constructor(basePath: string) {
    super(basePath);
  }

  public override isSupported(op: StorageOperation): boolean {
    return op === StorageOperation.ReadObject || op === StorageOperation.WriteObject || super.isSupported(op);
  }

  public async readObject(key: string): Promise<object> {
    const data: Uint8Array = await this.readBytes(key);
    const filePath: string = this.pathOf(key);

    if (data.length === 0) {
      throw new StorageBackendError(`file is empty: ${filePath}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(new TextDecoder().decode(data));
    } catch (error) {
      throw new StorageBackendError(`error parsing json file: ${filePath}`, error);
    }

    if (typeof parsed !== 'object' || parsed === null) {
      throw new StorageBackendError(`json file does not contain an object: ${filePath}`);
    }
    return parsed;
  }

  public async writeObject(key: string, data: object): Promise<void> {
    const json = JSON.stringify(data, JsonFileStorageBackend.sortedKeys, 2) + '\n';
    await this.writeBytes(key, new TextEncoder().encode(json));
  }

  private static sortedKeys(this: void, _key: string, value: unknown): unknown {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return value;
    }
    const sorted: Record<string, unknown> = {};
    for (const [entryKey, entryValue] of Object.entries(value).sort(([left], [right]) => (left < right ? -1 : 1))) {
      sorted[entryKey] = entryValue;
    }
    return sorted;
  }
}
