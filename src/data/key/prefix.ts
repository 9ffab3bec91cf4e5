// SPDX-License-Identifier: Apache-2.0

import {type KeyFormatter} from './key-formatter.js';
import {ConfigKeyFormatter} from './config-key-formatter.js';

export class Prefix {
  private constructor() {}

  public static add(key: string, prefix?: string, formatter: KeyFormatter = ConfigKeyFormatter.instance()): string {
    const normalizedKey: string = formatter.normalize(key);
    const finalPrefix = Prefix.withSeparator(prefix, formatter);
    return finalPrefix && !normalizedKey.startsWith(finalPrefix) ? `${finalPrefix}${normalizedKey}` : normalizedKey;
  }

  public static strip(key: string, prefix?: string, formatter: KeyFormatter = ConfigKeyFormatter.instance()): string {
    const normalizedKey: string = formatter.normalize(key);
    const finalPrefix = Prefix.withSeparator(prefix, formatter);
    return finalPrefix && normalizedKey.startsWith(finalPrefix) ? normalizedKey.slice(finalPrefix.length) : normalizedKey;
  }

  public static matcher(
    key: string,
    prefix?: string,
    formatter: KeyFormatter = ConfigKeyFormatter.instance(),
  ): boolean {
    if (!key) {
      return false;
    }

    const prefixFilter = Prefix.withSeparator(prefix, formatter);
    return prefixFilter ? formatter.normalize(key).startsWith(prefixFilter) : true;
  }

  private static withSeparator(prefix: string | undefined, formatter: KeyFormatter): string | undefined {
    if (!prefix) {
      return undefined;
    }
    const normalized = formatter.normalize(prefix);
    return normalized.endsWith(formatter.separator) ? normalized : `${normalized}${formatter.separator}`;
  }
}
