// SPDX-License-Identifier: Apache-2.0

import {type ZTreeSettings} from '../../../core/config/ztree-settings.js';
import {type TreeStore} from '../../../core/tree/tree-store.js';
import {type ReplicationSummary} from '../../../core/tree/replication-summary.js';

export interface TreeCommandConfigClass {
  settings: ZTreeSettings;
}

/** Listr context shared by the tree commands; stores are set by the connect tasks. */
export interface TreeCommandContext<C extends TreeCommandConfigClass = TreeCommandConfigClass> {
  config: C;
  source?: TreeStore;
  destination?: TreeStore;
  summary?: ReplicationSummary;
}
