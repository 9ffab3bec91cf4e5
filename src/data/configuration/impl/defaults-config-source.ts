// SPDX-License-Identifier: Apache-2.0

import {LayeredConfigSource} from './layered-config-source.js';
import {ConfigKeyFormatter} from '../../key/config-key-formatter.js';

/**
 * Built-in values, overridden by every other source.
 */
export class DefaultsConfigSource extends LayeredConfigSource {
  public constructor(private readonly defaults: Readonly<Record<string, string | number>>) {
    super(ConfigKeyFormatter.instance());
  }

  public get name(): string {
    return 'DefaultsConfigSource';
  }

  public get ordinal(): number {
    return 0;
  }

  public async load(): Promise<void> {
    this.data.clear();
    for (const [key, value] of Object.entries(this.defaults)) {
      this.data.set(this.formatter.normalize(key), String(value));
    }
  }
}
