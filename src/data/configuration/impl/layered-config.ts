// SPDX-License-Identifier: Apache-2.0

import {type Config} from '../api/config.js';
import {type ConfigSource} from '../spi/config-source.js';
import {Comparators} from '../../../business/utils/comparators.js';

/**
 * Answers each lookup from the source with the highest ordinal that has the key set. Maps are merged entry by
 * entry in the same order.
 */
export class LayeredConfig implements Config {
  public readonly sources: ConfigSource[];

  public constructor(sources: ConfigSource[]) {
    this.sources = [...sources].sort(Comparators.configSource);
  }

  public asString(key: string): string | null {
    return this.lastValue(source => source.asString(key));
  }

  public asNumber(key: string): number | null {
    return this.lastValue(source => source.asNumber(key));
  }

  public asStringMap(key: string): Map<string, string> | null {
    let merged: Map<string, string> | null = null;
    for (const source of this.sources) {
      const entries = source.asStringMap(key);
      if (entries !== null) {
        merged = new Map([...(merged ?? []), ...entries]);
      }
    }
    return merged;
  }

  public async refresh(): Promise<void> {
    for (const source of this.sources) {
      await source.load();
    }
  }

  private lastValue<T>(read: (source: ConfigSource) => T | null): T | null {
    let value: T | null = null;
    for (const source of this.sources) {
      const currentValue = read(source);
      if (currentValue !== null) {
        value = currentValue;
      }
    }
    return value;
  }
}
