// SPDX-License-Identifier: Apache-2.0

import {type ValidationError, validateSync} from 'class-validator';
import {LayeredConfigSource} from './layered-config-source.js';
import {type LocalConfig} from '../../schema/model/local/local-config.js';
import {type Schema} from '../../schema/migration/api/schema.js';
import {type ObjectMapper} from '../../mapper/api/object-mapper.js';
import {type Refreshable} from '../spi/refreshable.js';
import {type ObjectStorageBackend} from '../../backend/api/object-storage-backend.js';
import {ConfigKeyFormatter} from '../../key/config-key-formatter.js';
import {ConfigurationError} from '../api/configuration-error.js';

/**
 * The user's YAML settings file. A missing file contributes no values.
 */
export class LocalConfigSource extends LayeredConfigSource implements Refreshable {
  private _model: LocalConfig | undefined;

  public constructor(
    private readonly fileName: string,
    private readonly schema: Schema<LocalConfig>,
    private readonly mapper: ObjectMapper,
    private readonly backend: ObjectStorageBackend | undefined,
  ) {
    super(ConfigKeyFormatter.instance());
  }

  public get name(): string {
    return this.constructor.name;
  }

  public get ordinal(): number {
    return 50;
  }

  public get model(): LocalConfig | undefined {
    return this._model;
  }

  public async refresh(): Promise<void> {
    await this.load();
  }

  public async load(): Promise<void> {
    this.data.clear();
    this._model = undefined;

    if (!this.backend || !(await this.backend.list()).includes(this.fileName)) {
      return;
    }

    let model: LocalConfig;
    try {
      model = await this.schema.transform(await this.backend.readObject(this.fileName));
    } catch (error) {
      throw new ConfigurationError(`Failed to read local config file: ${this.fileName}`, error);
    }

    const errors = validateSync(model);
    if (errors.length > 0) {
      const messages = LocalConfigSource.constraintsOf(errors);
      throw new ConfigurationError(`Invalid local config file ${this.fileName}: ${messages.join('; ')}`);
    }

    this._model = model;
    for (const [key, value] of this.mapper.toFlatKeyMap(this.mapper.toObject(model))) {
      this.data.set(key, value);
    }
  }

  private static constraintsOf(errors: ValidationError[], parent: string = ''): string[] {
    return errors.flatMap(error => {
      const property = parent ? `${parent}.${error.property}` : error.property;
      return [
        ...Object.values(error.constraints ?? {}).map(constraint => `${property}: ${constraint}`),
        ...LocalConfigSource.constraintsOf(error.children ?? [], property),
      ];
    });
  }
}
