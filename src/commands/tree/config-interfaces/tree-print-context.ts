// SPDX-License-Identifier: Apache-2.0

import {type TreeCommandContext} from './tree-command-context.js';
import {type TreePrintConfigClass} from './tree-print-config-class.js';

export interface TreePrintContext extends TreeCommandContext<TreePrintConfigClass> {
  printed?: number;
}
