// SPDX-License-Identifier: Apache-2.0

import {type SchemaMigration} from '../../api/schema-migration.js';
import {VersionRange} from '../../../../../business/utils/version-range.js';
import {Version} from '../../../../../business/utils/version.js';

/**
 * Hand-written files often omit `schemaVersion`; they are otherwise already in the version 1 layout.
 */
export class LocalConfigV1Migration implements SchemaMigration {
  public get range(): VersionRange {
    return VersionRange.fromIntegerVersion(0);
  }

  public get version(): Version {
    return new Version(1);
  }

  public async migrate(source: object): Promise<object> {
    return {...source, schemaVersion: this.version.value};
  }
}
