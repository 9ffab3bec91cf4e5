// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

const MILLIS_PER_SECOND = 1000;
const NANOS_PER_MILLI = 1_000_000;
const NANOS_PER_SECOND = 1_000_000_000;

/**
 * An amount of time stored as whole seconds plus a nanosecond-of-second adjustment.
 *
 * Instances are immutable.
 */
export class Duration {
  public static readonly ZERO = new Duration(0, 0);

  private constructor(
    public readonly seconds: number,
    public readonly nanos: number,
  ) {
    Duration.checkValidNanos(nanos);
  }

  /**
   * Returns a copy of this duration multiplied by the scalar.
   */
  public multipliedBy(multiplicand: number): Duration {
    if (!Number.isSafeInteger(multiplicand)) {
      throw new IllegalArgumentError('multiplicand must be a safe integer', multiplicand);
    }

    if (multiplicand === 0) {
      return Duration.ZERO;
    }

    if (multiplicand === 1) {
      return this;
    }

    return Duration.ofNanos(this.toNanos() * multiplicand);
  }

  public toMillis(): number {
    return this.seconds * MILLIS_PER_SECOND + Math.trunc(this.nanos / NANOS_PER_MILLI);
  }

  public toNanos(): number {
    return this.seconds * NANOS_PER_SECOND + this.nanos;
  }

  public toString(): string {
    return `${this.toMillis()}ms`;
  }

  public static ofMillis(millis: number): Duration {
    let secs = Math.trunc(millis / MILLIS_PER_SECOND);
    let mos = millis % MILLIS_PER_SECOND;

    if (mos < 0) {
      mos += MILLIS_PER_SECOND;
      secs--;
    }

    return Duration.create(secs, mos * NANOS_PER_MILLI);
  }

  public static ofNanos(nanos: number): Duration {
    let secs = Math.trunc(nanos / NANOS_PER_SECOND);
    let nos = nanos % NANOS_PER_SECOND;

    if (nos < 0) {
      nos += NANOS_PER_SECOND;
      secs--;
    }

    return Duration.create(secs, nos);
  }

  private static create(seconds: number, nanos: number): Duration {
    if ((seconds | nanos) === 0) {
      return Duration.ZERO;
    }

    return new Duration(seconds, nanos);
  }

  private static checkValidNanos(nanos: number): void {
    if (nanos < 0 || nanos >= NANOS_PER_SECOND) {
      throw new IllegalArgumentError('nanos must be between 0 and 999,999,999', nanos);
    }
  }
}
