// SPDX-License-Identifier: Apache-2.0

import {TreeCommand} from './tree/index.js';
import {type CommandDefinition} from '../types/index.js';

/**
 * Return a list of Yargs command builder to be exposed through CLI
 * @returns an array of Yargs command builder
 */
export function Initialize(): CommandDefinition[] {
  return [...new TreeCommand().getCommandDefinitions()];
}
