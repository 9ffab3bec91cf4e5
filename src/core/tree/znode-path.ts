// SPDX-License-Identifier: Apache-2.0

import {IllegalArgumentError} from '../errors/illegal-argument-error.js';
import {ROOT_PATH} from '../constants.js';

/**
 * Helpers for absolute, slash-delimited ZNode paths. The root is `/`; no other path ends with a slash.
 */
export class ZNodePath {
  private constructor() {}

  public static isValid(path: string): boolean {
    if (path === ROOT_PATH) {
      return true;
    }
    if (!path.startsWith(ROOT_PATH) || path.endsWith(ROOT_PATH)) {
      return false;
    }
    return path
      .slice(1)
      .split('/')
      .every(segment => ZNodePath.isValidName(segment));
  }

  public static validate(path: string): string {
    if (!ZNodePath.isValid(path)) {
      throw new IllegalArgumentError(`invalid znode path: '${path}'`, path);
    }
    return path;
  }

  /** A single path segment: non-empty, no slash, not `.` or `..`. */
  public static isValidName(name: string): boolean {
    return name.length > 0 && !name.includes('/') && name !== '.' && name !== '..';
  }

  /**
   * Strips a trailing slash and collapses repeated slashes, so `/app//config/` becomes `/app/config`.
   */
  public static normalize(path: string): string {
    const segments = path.split('/').filter(segment => segment.length > 0);
    return ROOT_PATH + segments.join('/');
  }

  /**
   * Appends relative parts to a base path. Leading and trailing slashes of each relative part are trimmed, as is
   * the trailing slash of the base; empty parts are ignored.
   */
  public static join(basePath: string, ...relativePaths: string[]): string {
    let result = basePath.replace(/\/+$/, '');
    for (const relativePath of relativePaths) {
      const trimmed = relativePath.replace(/^\/+|\/+$/g, '');
      if (trimmed.length > 0) {
        result = `${result}/${trimmed}`;
      }
    }
    return result.length === 0 ? ROOT_PATH : result;
  }

  /** Parent of `path`, or undefined for the root. */
  public static parent(path: string): string | undefined {
    if (path === ROOT_PATH) {
      return undefined;
    }
    const index = path.lastIndexOf('/');
    return index <= 0 ? ROOT_PATH : path.slice(0, index);
  }

  public static basename(path: string): string {
    return path.slice(path.lastIndexOf('/') + 1);
  }

  /** Number of segments: `/` is 0, `/a` is 1, `/a/b` is 2. */
  public static depth(path: string): number {
    return path === ROOT_PATH ? 0 : path.split('/').length - 1;
  }

  public static isSameOrDescendant(path: string, ancestor: string): boolean {
    if (path === ancestor || ancestor === ROOT_PATH) {
      return path.startsWith(ROOT_PATH);
    }
    return path.startsWith(`${ancestor}/`);
  }

  /**
   * Maps `path` from under `fromRoot` to the same relative position under `toRoot`.
   */
  public static rebase(path: string, fromRoot: string, toRoot: string): string {
    if (!ZNodePath.isSameOrDescendant(path, fromRoot)) {
      throw new IllegalArgumentError(`path '${path}' is not under '${fromRoot}'`, path);
    }
    const relative = path === fromRoot ? '' : path.slice(fromRoot === ROOT_PATH ? 1 : fromRoot.length + 1);
    return ZNodePath.join(toRoot, relative);
  }
}

/** Lexicographic order by UTF-16 code unit, the order children are visited in. */
export function compareNames(left: string, right: string): number {
  if (left < right) {
    return -1;
  }
  return left > right ? 1 : 0;
}
