// SPDX-License-Identifier: Apache-2.0

import {type TreeCommandContext} from './tree-command-context.js';
import {type TreeExportConfigClass} from './tree-export-config-class.js';
import {type SkippedItem} from '../../../core/tree/walk-item.js';

export interface TreeExportContext extends TreeCommandContext<TreeExportConfigClass> {
  exported?: number;
  skipped?: SkippedItem[];
}
