// SPDX-License-Identifier: Apache-2.0

import {type ConfigBuilder} from './config-builder.js';
import {type Config} from './config.js';

/**
 * Builds, registers, and hands out the application wide {@link Config}.
 */
export interface ConfigProvider {
  /**
   * @throws ConfigurationError if no configuration has been registered.
   */
  config(): Config;

  isRegistered(): boolean;

  /**
   * @throws ConfigurationError if a configuration has already been registered.
   */
  register(config: Config): void;

  /**
   * Releases the registered configuration, if any.
   */
  release(): void;

  /**
   * Creates a builder. The configuration it builds is not registered until {@link ConfigProvider#register} is
   * called with it.
   */
  builder(): ConfigBuilder;
}
