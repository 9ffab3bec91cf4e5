// SPDX-License-Identifier: Apache-2.0

import {registerDecorator, type ValidationOptions} from 'class-validator';

const ALIAS_PATTERN = /^[\w-]+$/;

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * A map of ensemble alias to connect string. Aliases are word characters and dashes; connect strings are non-empty
 * and carry no path.
 */
export const IsEnsembleAliases = (validationOptions?: ValidationOptions) => {
  return function (object: object, propertyName: string): void {
    registerDecorator({
      name: 'IsEnsembleAliases',
      target: object.constructor,
      propertyName: propertyName,
      constraints: [],
      options: {
        ...validationOptions,
      },
      validator: {
        validate(value: unknown): boolean {
          if (!isObject(value)) {
            return false;
          }
          return Object.entries(value).every(
            ([alias, connectString]) =>
              ALIAS_PATTERN.test(alias) &&
              typeof connectString === 'string' &&
              connectString.trim().length > 0 &&
              !connectString.includes('/'),
          );
        },
      },
    });
  };
};
