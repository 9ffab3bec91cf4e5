// SPDX-License-Identifier: Apache-2.0

import {LayeredConfigSource} from './layered-config-source.js';
import {EnvironmentStorageBackend} from '../../backend/impl/environment-storage-backend.js';
import {type Refreshable} from '../spi/refreshable.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {EnvironmentKeyFormatter} from '../../key/environment-key-formatter.js';

/**
 * Reads prefixed environment variables: with prefix `ZTREE`, `retry.maxAttempts` is read from
 * `ZTREE_RETRY_MAX_ATTEMPTS` and `ensembles.prod` from `ZTREE_ENSEMBLES_PROD`.
 */
export class EnvironmentConfigSource extends LayeredConfigSource implements Refreshable {
  private readonly backend: EnvironmentStorageBackend;

  public constructor(prefix?: string, environment: NodeJS.ProcessEnv = process.env) {
    super(EnvironmentKeyFormatter.instance(), prefix);
    this.backend = new EnvironmentStorageBackend(prefix, environment);
  }

  public get name(): string {
    return 'EnvironmentConfigSource';
  }

  public get ordinal(): number {
    return 100;
  }

  public async refresh(): Promise<void> {
    await this.load();
  }

  public async load(): Promise<void> {
    this.data.clear();
    const decoder = new TextDecoder();

    const variables: string[] = await this.backend.list();
    for (const k of variables) {
      try {
        this.data.set(k, decoder.decode(await this.backend.readBytes(k)));
      } catch (error) {
        throw new ConfigurationError(`Failed to read environment variable: ${k}`, error);
      }
    }
  }

  protected override subKey(storedKey: string): string {
    return storedKey.toLowerCase();
  }
}
