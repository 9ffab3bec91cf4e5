// SPDX-License-Identifier: Apache-2.0

import {type ClassConstructor} from '../../../business/utils/class-constructor.type.js';

/**
 * Converts between plain javascript objects and model class instances, keeping the data layer independent of the
 * mapping library.
 */
export interface ObjectMapper {
  /**
   * @throws ObjectMappingError if the mapping or a type conversion fails.
   */
  fromObject<T>(cls: ClassConstructor<T>, object: object): T;

  /**
   * @throws ObjectMappingError if the mapping or a type conversion fails.
   */
  toObject<T extends object>(data: T): object;

  /**
   * Flattens a plain object into dotted keys: `{retry: {maxAttempts: 3}}` becomes `retry.maxAttempts = 3`.
   */
  toFlatKeyMap(data: object): Map<string, string>;
}
