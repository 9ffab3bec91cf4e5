// SPDX-License-Identifier: Apache-2.0

import {type TreeDocument} from '../../../data/schema/model/tree/tree-document.js';
import {type TreeCommandContext} from './tree-command-context.js';
import {type TreeImportConfigClass} from './tree-import-config-class.js';

export interface TreeImportContext extends TreeCommandContext<TreeImportConfigClass> {
  document?: TreeDocument;
}
