// SPDX-License-Identifier: Apache-2.0

import {type KeyFormatter} from './key-formatter.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';

/** Dot separated, case preserving keys: `session.timeoutMillis`. */
export class ConfigKeyFormatter implements KeyFormatter {
  private static _instance: ConfigKeyFormatter | undefined;

  public readonly separator: string = '.';

  private constructor() {}

  public normalize(key: string): string {
    return key.trim();
  }

  public split(key: string): string[] {
    if (!key || key.trim().length === 0) {
      throw new IllegalArgumentError('key must not be empty', key);
    }

    return this.normalize(key).split(this.separator);
  }

  public join(...parts: string[]): string {
    return parts.filter(part => part.length > 0).join(this.separator);
  }

  public static instance(): KeyFormatter {
    if (!ConfigKeyFormatter._instance) {
      ConfigKeyFormatter._instance = new ConfigKeyFormatter();
    }

    return ConfigKeyFormatter._instance;
  }
}
