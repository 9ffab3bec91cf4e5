// SPDX-License-Identifier: Apache-2.0

import {type KeyFormatter} from '../../key/key-formatter.js';
import {ConfigKeyFormatter} from '../../key/config-key-formatter.js';
import {ObjectMappingError} from '../api/object-mapping-error.js';

export class FlatKeyMapper {
  public constructor(private readonly formatter: KeyFormatter = ConfigKeyFormatter.instance()) {}

  public flatten(data: object): Map<string, string> {
    const fkm: Map<string, string> = new Map();

    for (const [key, value] of Object.entries(data)) {
      this.flattenKVPair(fkm, key, value);
    }

    return fkm;
  }

  private flattenKVPair(fkm: Map<string, string>, key: string, value: unknown): void {
    // absent values contribute no key
    if (value === null || value === undefined) {
      return;
    }

    switch (typeof value) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'bigint': {
        fkm.set(this.formatter.normalize(key), value.toString());
        break;
      }
      case 'object': {
        if (Array.isArray(value)) {
          for (const [index, item] of value.entries()) {
            this.flattenKVPair(fkm, this.formatter.join(key, index.toString()), item);
          }
        } else if (value instanceof Map) {
          for (const [subKey, subValue] of value.entries()) {
            this.flattenKVPair(fkm, this.formatter.join(key, String(subKey)), subValue);
          }
        } else {
          for (const [subKey, subValue] of Object.entries(value)) {
            this.flattenKVPair(fkm, this.formatter.join(key, subKey), subValue);
          }
        }
        break;
      }
      default: {
        throw new ObjectMappingError(`Unsupported value type [ key = '${key}', type = '${typeof value}' ]`);
      }
    }
  }
}
