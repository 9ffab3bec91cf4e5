// SPDX-License-Identifier: Apache-2.0

import {type ObjectStorageBackend} from '../api/object-storage-backend.js';
import {FileStorageBackend} from './file-storage-backend.js';
import {StorageBackendError} from '../api/storage-backend-error.js';
import {StorageOperation} from '../api/storage-operation.js';
import yaml from 'yaml';

export class YamlFileStorageBackend extends FileStorageBackend implements ObjectStorageBackend {
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
      parsed = yaml.parse(new TextDecoder().decode(data));
    } catch (error) {
      throw new StorageBackendError(`error parsing yaml file: ${filePath}`, error);
    }

    if (typeof parsed !== 'object' || parsed === null) {
      throw new StorageBackendError(`yaml file does not contain a mapping: ${filePath}`);
    }
    return parsed;
  }

  public async writeObject(key: string, data: object): Promise<void> {
    const filePath: string = this.pathOf(key);
    let yamlData: string;
    try {
      yamlData = yaml.stringify(data, {sortMapEntries: true});
    } catch (error) {
      throw new StorageBackendError(`error writing yaml file: ${filePath}`, error);
    }
    await this.writeBytes(key, new TextEncoder().encode(yamlData));
  }
}
