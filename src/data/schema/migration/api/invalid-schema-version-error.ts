// SPDX-License-Identifier: Apache-2.0

import {SchemaMigrationError} from './schema-migration-error.js';

export class InvalidSchemaVersionError extends SchemaMigrationError {
  public constructor(version: unknown, expected?: number) {
    super(
      expected === undefined
        ? `Invalid schema version '${String(version)}'`
        : `Invalid schema version '${String(version)}'; expected version '${expected}'`,
      {},
      {version, expected},
    );
  }
}
