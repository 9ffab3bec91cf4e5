// SPDX-License-Identifier: Apache-2.0

import {type EnsembleLocation} from '../../../core/ensemble-location.js';
import {type ConflictPolicy} from '../../../core/tree/conflict-policy.js';
import {type TreeCommandConfigClass} from './tree-command-context.js';

export interface TreeCopyConfigClass extends TreeCommandConfigClass {
  source: EnsembleLocation;
  destination: EnsembleLocation;
  policy: ConflictPolicy;
}
