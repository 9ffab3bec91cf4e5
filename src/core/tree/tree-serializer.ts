// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {Base64} from 'js-base64';
import {type ValidationError, validateSync} from 'class-validator';
import {TreeDocument} from '../../data/schema/model/tree/tree-document.js';
import {TreeEntry} from '../../data/schema/model/tree/tree-entry.js';
import {TreeEntryStat} from '../../data/schema/model/tree/tree-entry-stat.js';
import {NodeRecord} from './node-record.js';
import {NodeStats} from './node-stat.js';
import {type SkippedItem, type WalkSource} from './walk-item.js';
import {ZNodePath} from './znode-path.js';
import {MalformedSequenceError} from './errors/malformed-sequence-error.js';
import {MalformedDocumentError} from './errors/malformed-document-error.js';

const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

export interface ToDocumentOptions {
  /** called for each node the walk could not read; such nodes are left out of the document */
  onSkipped?: (item: SkippedItem) => void;
  exportedAt?: Date;
}

/**
 * Converts between a pre-order sequence of records and the nested {@link TreeDocument}.
 */
@injectable()
export class TreeSerializer {
  /**
   * Nests a pre-order sequence. A stack holds the most recent entry at each depth below the first record, so each
   * record attaches to the entry one level above it.
   *
   * @throws MalformedSequenceError when the sequence is empty or is not the pre-order of the first record's subtree
   */
  public async toDocument(items: WalkSource, options: ToDocumentOptions = {}): Promise<TreeDocument> {
    let rootPath: string | undefined;
    let rootDepth = 0;
    const stack: {path: string; entry: TreeEntry; childNames: Set<string>}[] = [];

    for await (const item of items) {
      if (item.kind !== 'node') {
        options.onSkipped?.(item);
        continue;
      }

      const record = item.record;
      const entry = TreeEntry.of(
        record.name,
        Base64.fromUint8Array(record.data),
        TreeEntryStat.of(record.metadata),
      );

      if (rootPath === undefined) {
        rootPath = record.path;
        rootDepth = record.depth;
        stack.push({path: record.path, entry, childNames: new Set()});
        continue;
      }

      if (record.path === rootPath || !ZNodePath.isSameOrDescendant(record.path, rootPath)) {
        throw new MalformedSequenceError(`record ${record.path} is not under ${rootPath}`, record.path);
      }

      const relativeDepth = record.depth - rootDepth;
      const parent = stack[relativeDepth - 1];
      if (parent === undefined || parent.path !== ZNodePath.parent(record.path)) {
        throw new MalformedSequenceError(`record ${record.path} does not follow its parent`, record.path);
      }
      if (parent.childNames.has(entry.name)) {
        throw new MalformedSequenceError(`record ${record.path} appears more than once`, record.path);
      }

      parent.entry.children.push(entry);
      parent.childNames.add(entry.name);
      stack.length = relativeDepth;
      stack.push({path: record.path, entry, childNames: new Set()});
    }

    if (rootPath === undefined) {
      throw new MalformedSequenceError('cannot serialize an empty sequence', '');
    }

    return TreeDocument.of(rootPath, stack[0].entry, options.exportedAt);
  }

  /**
   * Yields the records of `document` in pre-order with paths rebased onto `rootPath`. The whole document is
   * validated before the first record is yielded.
   *
   * @throws MalformedDocumentError when a field is missing, a name is invalid or duplicated, or data is not base64
   */
  public *fromDocument(document: TreeDocument, rootPath: string): Generator<NodeRecord> {
    ZNodePath.validate(rootPath);
    const decoded = this.validate(document);

    const stack: {path: string; entry: TreeEntry}[] = [{path: rootPath, entry: document.root}];
    let next: {path: string; entry: TreeEntry} | undefined;
    while ((next = stack.pop()) !== undefined) {
      const {path, entry} = next;
      const data = decoded.get(entry) ?? new Uint8Array();
      yield new NodeRecord(
        path,
        data,
        entry.stat ?? NodeStats.unknown(data.length, entry.children.length),
        entry.children.map(child => child.name),
      );

      for (let index = entry.children.length - 1; index >= 0; index--) {
        const child = entry.children[index];
        stack.push({path: ZNodePath.join(path, child.name), entry: child});
      }
    }
  }

  /**
   * Checks the whole document and decodes the data of every entry.
   */
  private validate(document: TreeDocument): Map<TreeEntry, Uint8Array> {
    const errors = validateSync(document);
    if (errors.length > 0) {
      throw new MalformedDocumentError(`invalid tree document: ${TreeSerializer.describe(errors)}`);
    }

    const decoded = new Map<TreeEntry, Uint8Array>();
    const pending: {path: string; entry: TreeEntry}[] = [{path: '', entry: document.root}];
    let next: {path: string; entry: TreeEntry} | undefined;
    while ((next = pending.pop()) !== undefined) {
      const {path, entry} = next;
      const location = path || '(root)';
      decoded.set(entry, TreeSerializer.decode(entry.data, location));

      const names = new Set<string>();
      for (const child of entry.children) {
        const childPath = `${path}/${child.name}`;
        if (!ZNodePath.isValidName(child.name)) {
          throw new MalformedDocumentError(`invalid entry name '${child.name}' under ${location}`, childPath);
        }
        if (names.has(child.name)) {
          throw new MalformedDocumentError(`duplicate entry name '${child.name}' under ${location}`, childPath);
        }
        names.add(child.name);
        pending.push({path: childPath, entry: child});
      }
    }
    return decoded;
  }

  /**
   * @throws MalformedDocumentError unless `data` is padded standard base64
   */
  private static decode(data: string, location: string): Uint8Array {
    if (data.length % 4 !== 0 || !BASE64.test(data)) {
      throw new MalformedDocumentError(`data of entry ${location} is not valid base64`, location);
    }
    try {
      return Base64.toUint8Array(data);
    } catch (error) {
      throw new MalformedDocumentError(`data of entry ${location} is not valid base64`, location, error);
    }
  }

  private static describe(errors: ValidationError[], parent: string = ''): string {
    const messages: string[] = [];
    for (const error of errors) {
      const property = parent ? `${parent}.${error.property}` : error.property;
      if (error.constraints) {
        messages.push(`${property}: ${Object.values(error.constraints).join(', ')}`);
      }
      if (error.children && error.children.length > 0) {
        messages.push(TreeSerializer.describe(error.children, property));
      }
    }
    return messages.join('; ');
  }
}
