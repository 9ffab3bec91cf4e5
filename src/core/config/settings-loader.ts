// SPDX-License-Identifier: Apache-2.0

import {existsSync} from 'node:fs';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type ConfigProvider} from '../../data/configuration/api/config-provider.js';
import {type ObjectMapper} from '../../data/mapper/api/object-mapper.js';
import {type Schema} from '../../data/schema/migration/api/schema.js';
import {type LocalConfig} from '../../data/schema/model/local/local-config.js';
import {LocalConfigSource} from '../../data/configuration/impl/local-config-source.js';
import {YamlFileStorageBackend} from '../../data/backend/impl/yaml-file-storage-backend.js';
import {type ZTreeLogger} from '../logging/ztree-logger.js';
import {ZTreeSettings} from './ztree-settings.js';

/**
 * Builds the layered config (environment over local config file over defaults) on first use and registers it with
 * the config provider.
 */
@injectable()
export class SettingsLoader {
  private readonly logger: ZTreeLogger;
  private readonly provider: ConfigProvider;
  private readonly mapper: ObjectMapper;
  private readonly schema: Schema<LocalConfig>;
  private readonly homeDirectory: string;
  private readonly localConfigFileName: string;

  public constructor(
    @inject(InjectTokens.ZTreeLogger) logger?: ZTreeLogger,
    @inject(InjectTokens.ConfigProvider) provider?: ConfigProvider,
    @inject(InjectTokens.ObjectMapper) mapper?: ObjectMapper,
    @inject(InjectTokens.LocalConfigSchema) schema?: Schema<LocalConfig>,
    @inject(InjectTokens.HomeDirectory) homeDirectory?: string,
    @inject(InjectTokens.LocalConfigFileName) localConfigFileName?: string,
  ) {
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
    this.provider = patchInject(provider, InjectTokens.ConfigProvider, this.constructor.name);
    this.mapper = patchInject(mapper, InjectTokens.ObjectMapper, this.constructor.name);
    this.schema = patchInject(schema, InjectTokens.LocalConfigSchema, this.constructor.name);
    this.homeDirectory = patchInject(homeDirectory, InjectTokens.HomeDirectory, this.constructor.name);
    this.localConfigFileName = patchInject(
      localConfigFileName,
      InjectTokens.LocalConfigFileName,
      this.constructor.name,
    );
  }

  public async load(): Promise<ZTreeSettings> {
    if (!this.provider.isRegistered()) {
      const backend = existsSync(this.homeDirectory) ? new YamlFileStorageBackend(this.homeDirectory) : undefined;
      const config = this.provider
        .builder()
        .withDefaultSources()
        .withSources(new LocalConfigSource(this.localConfigFileName, this.schema, this.mapper, backend))
        .build();
      await config.refresh();
      this.provider.register(config);
      this.logger.debug(`Loaded configuration from ${config.sources.map(source => source.name).join(', ')}`);
    }

    return ZTreeSettings.from(this.provider.config());
  }
}
