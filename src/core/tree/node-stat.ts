// SPDX-License-Identifier: Apache-2.0

/**
 * Server-assigned metadata of a ZNode. Captured for display and export only; it is never written back.
 *
 * The 64-bit identifiers (`czxid`, `mzxid`, `pzxid`, `ephemeralOwner`) are kept as decimal strings.
 */
export interface NodeStat {
  readonly czxid: string;
  readonly mzxid: string;
  readonly pzxid: string;
  /** creation time, milliseconds since the epoch */
  readonly ctime: number;
  /** modification time, milliseconds since the epoch */
  readonly mtime: number;
  readonly version: number;
  readonly cversion: number;
  readonly aversion: number;
  readonly ephemeralOwner: string;
  readonly dataLength: number;
  readonly numChildren: number;
  readonly ephemeral: boolean;
}

export class NodeStats {
  private constructor() {}

  public static of(stat: Omit<NodeStat, 'ephemeral'>): NodeStat {
    return {...stat, ephemeral: stat.ephemeralOwner !== '0'};
  }

  /** Metadata for a node whose server-side stat is unknown, such as one read from a legacy export. */
  public static unknown(dataLength: number = 0, numChildren: number = 0): NodeStat {
    return NodeStats.of({
      czxid: '0',
      mzxid: '0',
      pzxid: '0',
      ctime: 0,
      mtime: 0,
      version: 0,
      cversion: 0,
      aversion: 0,
      ephemeralOwner: '0',
      dataLength,
      numChildren,
    });
  }
}
