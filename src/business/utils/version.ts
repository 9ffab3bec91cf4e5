// SPDX-License-Identifier: Apache-2.0

/**
 * An integer schema version.
 */
export class Version {
  public constructor(public readonly value: number) {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError('Invalid version');
    }
  }

  public compare(other: Version): number {
    if (this.value < other.value) {
      return -1;
    } else if (this.value > other.value) {
      return 1;
    }
    return 0;
  }

  public toString(): string {
    return this.value.toString();
  }
}
