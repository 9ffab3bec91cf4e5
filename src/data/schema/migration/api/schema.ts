// SPDX-License-Identifier: Apache-2.0

import {type ClassConstructor} from '../../../../business/utils/class-constructor.type.js';
import {type SchemaMigration} from './schema-migration.js';
import {type Version} from '../../../../business/utils/version.js';

/**
 * Converts input data of any supported schema version into a model instance.
 */
export interface Schema<T> {
  /**
   * Unique name of the schema, related to the model it represents.
   */
  readonly name: string;

  /**
   * The current version of the schema. Input data of an older version is migrated before it is mapped.
   */
  readonly version: Version;

  readonly classCtor: ClassConstructor<T>;

  /**
   * Migrations, applied in order to bring input data up to the current schema version.
   */
  readonly migrations: SchemaMigration[];

  /**
   * Migrates the plain javascript object to the current version and maps it to the model class.
   *
   * @param data - The plain javascript object to be transformed.
   * @param sourceVersion - The version of the input data. If not provided, it is read from the `schemaVersion`
   *                        property, and a missing property means version 0.
   * @throws InvalidSchemaVersionError if the data is newer than this schema
   */
  transform(data: object, sourceVersion?: Version): Promise<T>;
}
