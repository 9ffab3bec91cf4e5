// SPDX-License-Identifier: Apache-2.0

/**
 * Converts configuration keys such as `retry.maxAttempts` to and from the form a particular source stores them in.
 */
export interface KeyFormatter {
  readonly separator: string;

  normalize(key: string): string;

  split(key: string): string[];

  join(...parts: string[]): string;
}
