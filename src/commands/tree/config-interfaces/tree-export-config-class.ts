// SPDX-License-Identifier: Apache-2.0

import {type EnsembleLocation} from '../../../core/ensemble-location.js';
import {type TreeCommandConfigClass} from './tree-command-context.js';

export interface TreeExportConfigClass extends TreeCommandConfigClass {
  location: EnsembleLocation;
  /** absolute path of the document to write */
  file: string;
}
