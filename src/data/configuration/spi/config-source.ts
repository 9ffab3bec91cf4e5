// SPDX-License-Identifier: Apache-2.0

import {type ConfigAccessor} from './config-accessor.js';

/**
 * One layer of configuration: the process environment, the local config file or the built-in defaults. A source
 * with a higher ordinal overrides those with a lower one.
 */
export interface ConfigSource extends ConfigAccessor {
  readonly name: string;

  readonly ordinal: number;

  /**
   * Prefix filtering the keys read from the underlying storage.
   */
  readonly prefix?: string;

  /**
   * Loads the configuration data from the configuration source.
   */
  load(): Promise<void>;
}
