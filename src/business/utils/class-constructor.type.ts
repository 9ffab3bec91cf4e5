// SPDX-License-Identifier: Apache-2.0

/** A model class that class-transformer can instantiate without arguments. */
export type ClassConstructor<T> = {
  new (): T;
};
