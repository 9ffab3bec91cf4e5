// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {IsInt, IsOptional, ValidateNested} from 'class-validator';
import {Version} from '../../../../business/utils/version.js';
import {IsEnsembleAliases} from '../../../../core/validator-decorators.js';
import {RetrySettings} from './retry-settings.js';
import {SessionSettings} from './session-settings.js';
import {PrintSettings} from './print-settings.js';

/**
 * User settings read from `~/.ztree/local-config.yaml`.
 *
 * ```yaml
 * schemaVersion: 1
 * ensembles:
 *   prod: zk1:2181,zk2:2181
 * retry:
 *   maxAttempts: 5
 * ```
 */
@Exclude()
export class LocalConfig {
  public static readonly SCHEMA_VERSION: Version = new Version(1);

  @Expose()
  @IsInt()
  public schemaVersion: number = LocalConfig.SCHEMA_VERSION.value;

  @Expose()
  @IsEnsembleAliases({message: 'ensembles must map alias names to connect strings'})
  public ensembles: Record<string, string> = {};

  @Expose()
  @IsOptional()
  @ValidateNested()
  @Type(() => RetrySettings)
  public retry?: RetrySettings;

  @Expose()
  @IsOptional()
  @ValidateNested()
  @Type(() => SessionSettings)
  public session?: SessionSettings;

  @Expose()
  @IsOptional()
  @ValidateNested()
  @Type(() => PrintSettings)
  public print?: PrintSettings;
}
