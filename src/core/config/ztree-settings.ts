// SPDX-License-Identifier: Apache-2.0

import {type ConfigAccessor} from '../../data/configuration/spi/config-accessor.js';
import {ConfigurationError} from '../../data/configuration/api/configuration-error.js';
import {type RetryOptions} from '../tree/retry.js';
import {type SessionOptions} from '../tree/tree-store-factory.js';
import {type TreePrinterOptions} from '../tree/tree-printer.js';
import {Duration} from '../time/duration.js';

export const ConfigKeys = {
  RETRY_MAX_ATTEMPTS: 'retry.maxAttempts',
  RETRY_BACKOFF_MILLIS: 'retry.backoffMillis',
  SESSION_TIMEOUT_MILLIS: 'session.timeoutMillis',
  SESSION_CONNECT_TIMEOUT_MILLIS: 'session.connectTimeoutMillis',
  PRINT_MAX_DATA_LENGTH: 'print.maxDataLength',
  ENSEMBLES: 'ensembles',
} as const;

/**
 * The effective settings of a run, resolved from the layered config.
 */
export class ZTreeSettings {
  private constructor(
    public readonly retry: RetryOptions,
    public readonly session: SessionOptions,
    public readonly print: TreePrinterOptions,
    public readonly ensembles: ReadonlyMap<string, string>,
  ) {}

  /**
   * @throws ConfigurationError when a value is missing or out of range
   */
  public static from(config: ConfigAccessor): ZTreeSettings {
    return new ZTreeSettings(
      {
        maxAttempts: ZTreeSettings.integer(config, ConfigKeys.RETRY_MAX_ATTEMPTS, 1),
        backoff: Duration.ofMillis(ZTreeSettings.integer(config, ConfigKeys.RETRY_BACKOFF_MILLIS, 0)),
      },
      {
        timeoutMillis: ZTreeSettings.integer(config, ConfigKeys.SESSION_TIMEOUT_MILLIS, 1),
        connectTimeoutMillis: ZTreeSettings.integer(config, ConfigKeys.SESSION_CONNECT_TIMEOUT_MILLIS, 1),
      },
      {maxDataLength: ZTreeSettings.integer(config, ConfigKeys.PRINT_MAX_DATA_LENGTH, 0)},
      config.asStringMap(ConfigKeys.ENSEMBLES) ?? new Map<string, string>(),
    );
  }

  private static integer(config: ConfigAccessor, key: string, minimum: number): number {
    const value = config.asNumber(key);
    if (value === null) {
      throw new ConfigurationError(`missing configuration value '${key}'`);
    }
    if (!Number.isSafeInteger(value) || value < minimum) {
      throw new ConfigurationError(`configuration value '${key}' must be an integer of at least ${minimum}: ${value}`);
    }
    return value;
  }
}
