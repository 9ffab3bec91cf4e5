// SPDX-License-Identifier: Apache-2.0

import {type NodeStat, NodeStats} from '../../core/tree/node-stat.js';
import {TreeStoreError, TreeStoreErrorCode} from '../../core/tree/errors/tree-store-error.js';
import {ZooKeeperErrorCode} from './zookeeper-error-code.js';

/**
 * The fields read from a client `Stat`. The 64-bit fields arrive as 8-byte big-endian buffers.
 */
export interface ZooKeeperStat {
  readonly czxid: unknown;
  readonly mzxid: unknown;
  readonly ctime: unknown;
  readonly mtime: unknown;
  readonly version: number;
  readonly cversion: number;
  readonly aversion: number;
  readonly ephemeralOwner: unknown;
  readonly dataLength: number;
  readonly numChildren: number;
  readonly pzxid: unknown;
}

const STORE_ERROR_CODES: ReadonlyMap<number, TreeStoreErrorCode> = new Map([
  [ZooKeeperErrorCode.NO_NODE, TreeStoreErrorCode.NO_NODE],
  [ZooKeeperErrorCode.NODE_EXISTS, TreeStoreErrorCode.NODE_EXISTS],
  [ZooKeeperErrorCode.NO_AUTH, TreeStoreErrorCode.NO_AUTH],
  [ZooKeeperErrorCode.CONNECTION_LOSS, TreeStoreErrorCode.CONNECTION_LOSS],
  [ZooKeeperErrorCode.OPERATION_TIMEOUT, TreeStoreErrorCode.OPERATION_TIMEOUT],
  [ZooKeeperErrorCode.SESSION_EXPIRED, TreeStoreErrorCode.SESSION_EXPIRED],
]);

export function longValue(value: unknown): bigint {
  if (Buffer.isBuffer(value) && value.length === 8) {
    return value.readBigInt64BE(0);
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === 'bigint') {
    return value;
  }
  throw new TypeError(`not a 64-bit value: ${String(value)}`);
}

export function toNodeStat(stat: ZooKeeperStat): NodeStat {
  return NodeStats.of({
    czxid: longValue(stat.czxid).toString(),
    mzxid: longValue(stat.mzxid).toString(),
    pzxid: longValue(stat.pzxid).toString(),
    ctime: Number(longValue(stat.ctime)),
    mtime: Number(longValue(stat.mtime)),
    version: stat.version,
    cversion: stat.cversion,
    aversion: stat.aversion,
    ephemeralOwner: longValue(stat.ephemeralOwner).toString(),
    dataLength: stat.dataLength,
    numChildren: stat.numChildren,
  });
}

export function errorCodeOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('getCode' in error) || typeof error.getCode !== 'function') {
    return undefined;
  }
  const code: unknown = error.getCode();
  return typeof code === 'number' ? code : undefined;
}

export function toTreeStoreError(error: unknown, operation: string, path: string): TreeStoreError {
  if (error instanceof TreeStoreError) {
    return error;
  }
  const code = errorCodeOf(error);
  const storeCode = (code === undefined ? undefined : STORE_ERROR_CODES.get(code)) ?? TreeStoreErrorCode.UNKNOWN;
  return new TreeStoreError(`${operation} ${path} failed: ${String(error)}`, storeCode, path, error);
}
