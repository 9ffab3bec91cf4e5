// SPDX-License-Identifier: Apache-2.0

import {type StorageBackend} from '../api/storage-backend.js';
import {StorageOperation} from '../api/storage-operation.js';
import {type Stats, lstatSync, readdirSync, readFileSync, statSync, writeFileSync} from 'node:fs';
import {StorageBackendError} from '../api/storage-backend-error.js';
import {IllegalArgumentError} from '../../../core/errors/illegal-argument-error.js';
import {PathEx} from '../../../business/utils/path-ex.js';

/**
 * A file storage backend that operates on the files directly within a base directory. Subdirectories are ignored.
 */
export class FileStorageBackend implements StorageBackend {
  /**
   * @param basePath - The base path to use for all file operations.
   * @throws IllegalArgumentError if the base path is empty.
   * @throws StorageBackendError if the base path does not exist or is not a directory.
   */
  public constructor(public readonly basePath: string) {
    if (!basePath || basePath.trim().length === 0) {
      throw new IllegalArgumentError('basePath must not be null, undefined or empty', basePath);
    }

    let stats: Stats;
    try {
      stats = lstatSync(basePath);
    } catch (error) {
      throw new StorageBackendError(`basePath must exist and be valid: ${basePath}`, error);
    }

    if (!stats.isDirectory()) {
      throw new StorageBackendError(`basePath must be a valid directory: ${basePath}`);
    }
  }

  public isSupported(op: StorageOperation): boolean {
    switch (op) {
      case StorageOperation.List:
      case StorageOperation.ReadBytes:
      case StorageOperation.WriteBytes: {
        return true;
      }
      default: {
        return false;
      }
    }
  }

  public async list(): Promise<string[]> {
    try {
      const entries: string[] = readdirSync(this.basePath, {encoding: 'utf8'});
      return entries.filter(item => statSync(PathEx.join(this.basePath, item)).isFile());
    } catch (error) {
      throw new StorageBackendError(`error listing files in base path: ${this.basePath}`, error);
    }
  }

  public async readBytes(key: string): Promise<Uint8Array> {
    const filePath: string = this.pathOf(key);
    try {
      return new Uint8Array(readFileSync(filePath));
    } catch (error) {
      throw new StorageBackendError(`error reading file: ${filePath}`, error);
    }
  }

  public async writeBytes(key: string, data: Uint8Array): Promise<void> {
    const filePath: string = this.pathOf(key);
    try {
      writeFileSync(filePath, data, {flag: 'w'});
    } catch (error) {
      throw new StorageBackendError(`error writing file: ${filePath}`, error);
    }
  }

  protected pathOf(key: string): string {
    if (!key || key.trim().length === 0) {
      throw new IllegalArgumentError('key must not be null, undefined or empty', key);
    }
    return PathEx.join(this.basePath, key);
  }
}
