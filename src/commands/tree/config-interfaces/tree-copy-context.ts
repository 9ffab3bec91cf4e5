// SPDX-License-Identifier: Apache-2.0

import {type TreeCommandContext} from './tree-command-context.js';
import {type TreeCopyConfigClass} from './tree-copy-config-class.js';

export type TreeCopyContext = TreeCommandContext<TreeCopyConfigClass>;
