// SPDX-License-Identifier: Apache-2.0

import {type TreeStore} from './tree-store.js';

export interface SessionOptions {
  timeoutMillis: number;
  connectTimeoutMillis: number;
}

/**
 * Opens connections to ensembles and tracks them so that every store opened during a command can be closed when it
 * ends, whichever way it ends.
 */
export interface TreeStoreFactory {
  connect(connectString: string, session: SessionOptions): Promise<TreeStore>;

  closeAll(): Promise<void>;
}
