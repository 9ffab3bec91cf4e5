// SPDX-License-Identifier: Apache-2.0

import {type NodeStat} from './node-stat.js';

export interface NodeContent {
  readonly data: Uint8Array;
  readonly stat: NodeStat;
}

/**
 * Connected handle to one ensemble. Every failing operation rejects with a {@link TreeStoreError}; a missing node is
 * reported with the `NoNode` code.
 */
export interface TreeStore {
  /** connect string of the ensemble, for log lines */
  readonly description: string;

  exists(path: string): Promise<boolean>;

  getData(path: string): Promise<NodeContent>;

  /** names of the direct children, in no particular order */
  listChildren(path: string): Promise<string[]>;

  /** fails with `NodeExists` when the path exists and with `NoNode` when its parent does not */
  create(path: string, data: Uint8Array): Promise<void>;

  /** fails with `NoNode` when the path does not exist */
  setData(path: string, data: Uint8Array): Promise<void>;

  close(): Promise<void>;
}
