// SPDX-License-Identifier: Apache-2.0

import {Version} from './version.js';

/**
 * A half-open range of versions: `[begin, end)`.
 */
export class VersionRange {
  public constructor(
    public readonly begin: Version,
    public readonly end: Version,
  ) {
    if (this.begin.compare(this.end) >= 0) {
      throw new RangeError('Invalid version range');
    }
  }

  public static fromIntegerVersion(version: number): VersionRange {
    return new VersionRange(new Version(version), new Version(version + 1));
  }

  public contains(version: Version): boolean {
    return this.begin.compare(version) <= 0 && this.end.compare(version) > 0;
  }

  public toString(): string {
    return `[${this.begin}, ${this.end})`;
  }
}
