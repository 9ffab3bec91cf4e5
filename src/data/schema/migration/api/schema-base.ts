// SPDX-License-Identifier: Apache-2.0

import {type Schema} from './schema.js';
import {type SchemaMigration} from './schema-migration.js';
import {Version} from '../../../../business/utils/version.js';
import {type ClassConstructor} from '../../../../business/utils/class-constructor.type.js';
import {type ObjectMapper} from '../../../mapper/api/object-mapper.js';
import {InvalidSchemaVersionError} from './invalid-schema-version-error.js';

export abstract class SchemaBase<T> implements Schema<T> {
  public abstract get classCtor(): ClassConstructor<T>;
  public abstract get migrations(): SchemaMigration[];
  public abstract get name(): string;
  public abstract get version(): Version;

  protected constructor(protected readonly mapper: ObjectMapper) {}

  public async transform(data: object, sourceVersion?: Version): Promise<T> {
    const clone: object = structuredClone(data);
    const dataVersion: Version = sourceVersion ?? SchemaBase.versionOf(clone);

    if (dataVersion.compare(this.version) > 0) {
      throw new InvalidSchemaVersionError(dataVersion.value, this.version.value);
    }

    const migrated = await this.applyMigrations(clone, dataVersion);
    return this.mapper.fromObject(this.classCtor, migrated);
  }

  protected async applyMigrations(data: object, dataVersion: Version): Promise<object> {
    let migrations: SchemaMigration[] = this.findMigrations(dataVersion);

    while (migrations.length > 0) {
      const migration = migrations[0];
      data = await migration.migrate(data);
      dataVersion = migration.version;
      migrations = this.findMigrations(dataVersion);
    }

    return data;
  }

  protected findMigrations(dataVersion: Version): SchemaMigration[] {
    const eligibleMigrations: SchemaMigration[] = this.migrations.filter(value => value.range.contains(dataVersion));

    if (eligibleMigrations.length > 0) {
      eligibleMigrations.sort((l, r) => l.version.compare(r.version));
    }

    return eligibleMigrations;
  }

  private static versionOf(data: object): Version {
    if (!('schemaVersion' in data) || data.schemaVersion === undefined || data.schemaVersion === null) {
      return new Version(0);
    }
    const value = data.schemaVersion;
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
      throw new InvalidSchemaVersionError(value);
    }
    return new Version(value);
  }
}
