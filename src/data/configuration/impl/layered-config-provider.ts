// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {type ConfigProvider} from '../api/config-provider.js';
import {type ConfigBuilder} from '../api/config-builder.js';
import {type Config} from '../api/config.js';
import {LayeredConfigBuilder} from './layered-config-builder.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../core/dependency-injection/container-helper.js';
import {ConfigurationError} from '../api/configuration-error.js';
import {CONFIG_DEFAULTS} from '../../../core/constants.js';

@injectable()
export class LayeredConfigProvider implements ConfigProvider {
  private _config: Config | undefined;
  private readonly prefix: string;

  public constructor(@inject(InjectTokens.EnvironmentPrefix) prefix?: string) {
    this.prefix = patchInject(prefix, InjectTokens.EnvironmentPrefix, LayeredConfigProvider.name);
  }

  public builder(): ConfigBuilder {
    return new LayeredConfigBuilder(CONFIG_DEFAULTS, this.prefix);
  }

  public config(): Config {
    if (!this._config) {
      throw new ConfigurationError('config not registered');
    }

    return this._config;
  }

  public isRegistered(): boolean {
    return this._config !== undefined;
  }

  public register(config: Config): void {
    if (this._config) {
      throw new ConfigurationError('config already registered');
    }

    this._config = config;
  }

  public release(): void {
    this._config = undefined;
  }
}
