// SPDX-License-Identifier: Apache-2.0

/** Server and client error codes reported by `Exception#getCode()`. */
export enum ZooKeeperErrorCode {
  CONNECTION_LOSS = -4,
  OPERATION_TIMEOUT = -7,
  NO_NODE = -101,
  NO_AUTH = -102,
  NODE_EXISTS = -110,
  NOT_EMPTY = -111,
  SESSION_EXPIRED = -112,
}
