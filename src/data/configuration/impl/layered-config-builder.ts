// SPDX-License-Identifier: Apache-2.0

import {type ConfigBuilder} from '../api/config-builder.js';
import {type ConfigSource} from '../spi/config-source.js';
import {type Config} from '../api/config.js';
import {EnvironmentConfigSource} from './environment-config-source.js';
import {DefaultsConfigSource} from './defaults-config-source.js';
import {LayeredConfig} from './layered-config.js';

export class LayeredConfigBuilder implements ConfigBuilder {
  private readonly sources: ConfigSource[] = [];

  public constructor(
    private readonly defaults: Readonly<Record<string, string | number>>,
    private readonly prefix?: string,
    private readonly environment: NodeJS.ProcessEnv = process.env,
  ) {}

  public withDefaultSources(): ConfigBuilder {
    this.sources.push(
      new EnvironmentConfigSource(this.prefix, this.environment),
      new DefaultsConfigSource(this.defaults),
    );
    return this;
  }

  public withSources(...sources: ConfigSource[]): ConfigBuilder {
    this.sources.push(...sources);
    return this;
  }

  public build(): Config {
    return new LayeredConfig(this.sources);
  }
}
