// SPDX-License-Identifier: Apache-2.0

import {ZTreeError} from '../../errors/ztree-error.js';
import {type ReplicationSummary} from '../replication-summary.js';

export class ReplicationIncompleteError extends ZTreeError {
  public constructor(
    public readonly summary: ReplicationSummary,
    action: string = 'replication',
  ) {
    super(`${action} finished with ${summary.failed} failed node(s)`, {}, {failures: summary.failures});
  }
}
