// SPDX-License-Identifier: Apache-2.0

/**
 * Read access to configuration values by dotted key, such as `retry.maxAttempts`.
 */
export interface ConfigAccessor {
  /**
   * @returns the value, or null when the key is not set
   */
  asString(key: string): string | null;

  /**
   * @returns the value, or null when the key is not set
   * @throws ConfigurationError if the value is not a number
   */
  asNumber(key: string): number | null;

  /**
   * Collects every key directly below `key` into a map; `ensembles.prod` is returned as `prod`.
   *
   * @returns the entries, or null when no key below `key` is set
   */
  asStringMap(key: string): Map<string, string> | null;
}
