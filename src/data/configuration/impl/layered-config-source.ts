// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {type KeyFormatter} from '../../key/key-formatter.js';
import {ConfigurationError} from '../api/configuration-error.js';

/**
 * Base for sources that load their values into a flat map. Keys are stored in the source's own form; lookups
 * translate the requested key with the source's {@link KeyFormatter}.
 */
export abstract class LayeredConfigSource implements ConfigSource {
  protected readonly data: Map<string, string> = new Map<string, string>();

  protected constructor(
    protected readonly formatter: KeyFormatter,
    public readonly prefix?: string,
  ) {}

  public abstract get name(): string;
  public abstract get ordinal(): number;
  public abstract load(): Promise<void>;

  public asString(key: string): string | null {
    return this.data.get(this.formatter.normalize(key)) ?? null;
  }

  public asNumber(key: string): number | null {
    const stringValue = this.asString(key);
    if (stringValue === null || stringValue.trim().length === 0) {
      return null;
    }

    const value = Number(stringValue);
    if (Number.isNaN(value)) {
      throw new ConfigurationError(`value of '${key}' in ${this.name} is not a number: ${stringValue}`);
    }
    return value;
  }

  public asStringMap(key: string): Map<string, string> | null {
    const keyPrefix = `${this.formatter.normalize(key)}${this.formatter.separator}`;
    const result = new Map<string, string>();
    for (const [storedKey, value] of this.data.entries()) {
      if (storedKey.startsWith(keyPrefix) && storedKey.length > keyPrefix.length) {
        result.set(this.subKey(storedKey.slice(keyPrefix.length)), value);
      }
    }
    return result.size > 0 ? result : null;
  }

  /** Converts the stored remainder of a map key back to the name a user wrote. */
  protected subKey(storedKey: string): string {
    return storedKey;
  }
}
