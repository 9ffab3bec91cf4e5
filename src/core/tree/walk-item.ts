// SPDX-License-Identifier: Apache-2.0

import {type NodeRecord} from './node-record.js';
import {type NodeVanishedError} from './errors/node-vanished-error.js';
import {type ReadFailureError} from './errors/read-failure-error.js';

export type WalkItem =
  | {readonly kind: 'node'; readonly record: NodeRecord}
  | {readonly kind: 'vanished'; readonly path: string; readonly error: NodeVanishedError}
  | {readonly kind: 'unreadable'; readonly path: string; readonly error: ReadFailureError};

/** A source node the walk could not read, together with the reason. */
export type SkippedItem = Exclude<WalkItem, {kind: 'node'}>;

/** A pre-order sequence of walk items, streamed from a store or produced in memory from a document. */
export type WalkSource = AsyncIterable<WalkItem> | Iterable<WalkItem>;

export function* nodeItems(records: Iterable<NodeRecord>): Generator<WalkItem> {
  for (const record of records) {
    yield {kind: 'node', record};
  }
}

export function pathOf(item: WalkItem): string {
  return item.kind === 'node' ? item.record.path : item.path;
}
