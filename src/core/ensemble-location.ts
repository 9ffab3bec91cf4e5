// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {ZNodePath} from './tree/znode-path.js';

/**
 * A node inside an ensemble, written `host:port[,host:port...]/path` or `alias/path` where the alias names a
 * connect string in the local config.
 */
export class EnsembleLocation {
  private constructor(
    public readonly connectString: string,
    public readonly path: string,
  ) {}

  /**
   * Splits `value` at its first slash.
   *
   * @throws IllegalArgumentError when the value has no path, no connect string, an unknown alias or an invalid path
   */
  public static parse(value: string, aliases: ReadonlyMap<string, string> = new Map()): EnsembleLocation {
    const index = value.indexOf('/');
    if (index < 0) {
      throw new IllegalArgumentError(`location '${value}' has no path; expected host:port/path`, value);
    }

    const target = value.slice(0, index).trim();
    if (target.length === 0) {
      throw new IllegalArgumentError(`location '${value}' has no connect string; expected host:port/path`, value);
    }

    const path = ZNodePath.normalize(value.slice(index));
    if (!ZNodePath.isValid(path)) {
      throw new IllegalArgumentError(`location '${value}' has an invalid path '${path}'`, value);
    }

    if (target.includes(':')) {
      return new EnsembleLocation(target, path);
    }

    const connectString = aliases.get(target);
    if (connectString === undefined) {
      throw new IllegalArgumentError(
        `unknown ensemble alias '${target}'; define it under 'ensembles' in the local config`,
        value,
      );
    }
    return new EnsembleLocation(connectString, path);
  }

  public toString(): string {
    return `${this.connectString}${this.path}`;
  }
}
