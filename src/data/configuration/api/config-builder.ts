// SPDX-License-Identifier: Apache-2.0

import {type ConfigSource} from '../spi/config-source.js';
import {type Config} from './config.js';

/**
 * Fluent builder for creating a Config instance.
 */
export interface ConfigBuilder {
  /**
   * Adds the environment and the built-in defaults.
   */
  withDefaultSources(): ConfigBuilder;

  withSources(...sources: ConfigSource[]): ConfigBuilder;

  build(): Config;
}
