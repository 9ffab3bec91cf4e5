// SPDX-License-Identifier: Apache-2.0

import {type NodeStat} from './node-stat.js';
import {ZNodePath} from './znode-path.js';

/**
 * One node read from a tree: its path, payload, metadata and the names of its direct children in lexicographic
 * order. Records are transient values; nothing mutates them after construction.
 */
export class NodeRecord {
  public readonly children: readonly string[];

  public constructor(
    public readonly path: string,
    public readonly data: Uint8Array,
    public readonly metadata: NodeStat,
    children: readonly string[] = [],
  ) {
    this.children = Object.freeze([...children]);
  }

  public get name(): string {
    return ZNodePath.basename(this.path);
  }

  public get depth(): number {
    return ZNodePath.depth(this.path);
  }
}
