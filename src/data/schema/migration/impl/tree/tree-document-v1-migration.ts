// SPDX-License-Identifier: Apache-2.0

import {type SchemaMigration} from '../../api/schema-migration.js';
import {VersionRange} from '../../../../../business/utils/version-range.js';
import {Version} from '../../../../../business/utils/version.js';
import {Base64} from 'js-base64';
import {ZNodePath, compareNames} from '../../../../../core/tree/znode-path.js';
import {MalformedDocumentError} from '../../../../../core/tree/errors/malformed-document-error.js';

/** Field order of the stat arrays in legacy exports. */
const LEGACY_STAT_FIELDS = [
  'czxid',
  'mzxid',
  'ctime',
  'mtime',
  'version',
  'cversion',
  'aversion',
  'ephemeralOwner',
  'dataLength',
  'numChildren',
  'pzxid',
] as const;

const ID_FIELDS: ReadonlySet<string> = new Set(['czxid', 'mzxid', 'pzxid', 'ephemeralOwner']);

interface NestedEntry {
  name: string;
  data: string;
  stat?: Record<string, string | number | boolean>;
  children: NestedEntry[];
}

/**
 * Converts the legacy flat export, a map of absolute path to `{data, stat}` with text data, into the nested
 * version 1 document. The shortest path becomes the root; every other path must lie beneath it and have its parent
 * present in the map.
 */
export class TreeDocumentV1Migration implements SchemaMigration {
  public get range(): VersionRange {
    return VersionRange.fromIntegerVersion(0);
  }

  public get version(): Version {
    return new Version(1);
  }

  public async migrate(source: object): Promise<object> {
    const paths = Object.keys(source);
    if (paths.length === 0) {
      throw new MalformedDocumentError('legacy export contains no nodes');
    }
    for (const path of paths) {
      if (!ZNodePath.isValid(path)) {
        throw new MalformedDocumentError(`legacy export contains an invalid path '${path}'`, path);
      }
    }

    paths.sort((left, right) => ZNodePath.depth(left) - ZNodePath.depth(right) || compareNames(left, right));
    const rootPath = paths[0];

    const entries = new Map<string, NestedEntry>();
    for (const path of paths) {
      const entry = this.toEntry(path, Reflect.get(source, path));
      entries.set(path, entry);
      if (path === rootPath) {
        continue;
      }

      if (!ZNodePath.isSameOrDescendant(path, rootPath)) {
        throw new MalformedDocumentError(`legacy export path '${path}' is not under '${rootPath}'`, path);
      }
      const parentPath = ZNodePath.parent(path);
      const parent = parentPath === undefined ? undefined : entries.get(parentPath);
      if (!parent) {
        throw new MalformedDocumentError(`legacy export is missing the parent of '${path}'`, path);
      }
      parent.children.push(entry);
    }

    for (const entry of entries.values()) {
      entry.children.sort((left, right) => compareNames(left.name, right.name));
    }

    return {
      schemaVersion: this.version.value,
      rootPath,
      root: entries.get(rootPath),
    };
  }

  private toEntry(path: string, value: unknown): NestedEntry {
    if (typeof value !== 'object' || value === null) {
      throw new MalformedDocumentError(`legacy export entry for '${path}' is not an object`, path);
    }

    const data: unknown = Reflect.get(value, 'data');
    if (data !== undefined && data !== null && typeof data !== 'string') {
      throw new MalformedDocumentError(`legacy export data for '${path}' is not text`, path);
    }

    return {
      name: ZNodePath.basename(path),
      data: Base64.encode(data ?? ''),
      stat: this.toStat(path, Reflect.get(value, 'stat')),
      children: [],
    };
  }

  private toStat(path: string, value: unknown): Record<string, string | number | boolean> | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    if (!Array.isArray(value) || value.length !== LEGACY_STAT_FIELDS.length) {
      throw new MalformedDocumentError(
        `legacy export stat for '${path}' must be a list of ${LEGACY_STAT_FIELDS.length} numbers`,
        path,
      );
    }

    const stat: Record<string, string | number | boolean> = {};
    for (const [index, field] of LEGACY_STAT_FIELDS.entries()) {
      const fieldValue: unknown = value[index];
      if (typeof fieldValue !== 'number' || !Number.isInteger(fieldValue)) {
        throw new MalformedDocumentError(`legacy export stat field '${field}' for '${path}' is not an integer`, path);
      }
      stat[field] = ID_FIELDS.has(field) ? BigInt(fieldValue).toString() : fieldValue;
    }
    stat.ephemeral = stat.ephemeralOwner !== '0';
    return stat;
  }
}
