// SPDX-License-Identifier: Apache-2.0

import {type KeyFormatter} from './key-formatter.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';

/**
 * Upper snake case keys, as environment variables are named. `retry.maxAttempts` becomes `RETRY_MAX_ATTEMPTS`.
 */
export class EnvironmentKeyFormatter implements KeyFormatter {
  private static _instance: EnvironmentKeyFormatter | undefined;

  public readonly separator: string = '_';

  private constructor() {}

  public normalize(key: string): string {
    return key
      .trim()
      .replaceAll(/([\da-z])([A-Z])/g, `$1${this.separator}$2`)
      .replaceAll('.', this.separator)
      .toUpperCase();
  }

  public split(key: string): string[] {
    if (!key || key.trim().length === 0) {
      throw new IllegalArgumentError('key must not be empty', key);
    }

    return this.normalize(key).split(this.separator);
  }

  public join(...parts: string[]): string {
    return parts
      .filter(part => part.length > 0)
      .map(part => this.normalize(part))
      .join(this.separator);
  }

  public static instance(): KeyFormatter {
    if (!EnvironmentKeyFormatter._instance) {
      EnvironmentKeyFormatter._instance = new EnvironmentKeyFormatter();
    }

    return EnvironmentKeyFormatter._instance;
  }
}
