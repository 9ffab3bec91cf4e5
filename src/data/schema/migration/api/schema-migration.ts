// SPDX-License-Identifier: Apache-2.0

import {type VersionRange} from '../../../../business/utils/version-range.js';
import {type Version} from '../../../../business/utils/version.js';

/**
 * Brings a source object from any version within `range` up to `version`.
 */
export interface SchemaMigration {
  /**
   * The resulting schema version after the migration.
   */
  readonly version: Version;

  /**
   * The range of schema versions which can be migrated by this SchemaMigration instance.
   */
  readonly range: VersionRange;

  /**
   * @param source - a copy of the source object, which the migration may modify
   */
  migrate(source: object): Promise<object>;
}
