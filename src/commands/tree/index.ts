// SPDX-License-Identifier: Apache-2.0

import * as TreeFlags from './flags.js';
import {YargsCommand} from '../../core/yargs-command.js';
import {BaseCommand} from './../base.js';
import {type TreeCommandHandlers} from './handlers.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type CommandDefinition} from '../../types/index.js';

/**
 * Defines the print, copy, export and import commands
 */
export class TreeCommand extends BaseCommand {
  public readonly handlers: TreeCommandHandlers;

  public constructor(handlers?: TreeCommandHandlers) {
    super();

    this.handlers = patchInject(handlers, InjectTokens.TreeCommandHandlers, this.constructor.name);
  }

  public getCommandDefinitions(): CommandDefinition[] {
    return [
      new YargsCommand(
        {
          command: 'print',
          description: 'Print the ZNodes under a location with their data and metadata',
          logger: this.logger,
          handler: argv => this.handlers.print(argv),
          positionals: TreeFlags.PRINT_POSITIONALS,
        },
        TreeFlags.PRINT_FLAGS,
      ),
      new YargsCommand(
        {
          command: 'copy',
          description: 'Copy the ZNodes under a source location to a destination location',
          logger: this.logger,
          handler: argv => this.handlers.copy(argv),
          positionals: TreeFlags.COPY_POSITIONALS,
        },
        TreeFlags.COPY_FLAGS,
      ),
      new YargsCommand(
        {
          command: 'export',
          description: 'Write the ZNodes under a location to a tree document',
          logger: this.logger,
          handler: argv => this.handlers.export(argv),
          positionals: TreeFlags.EXPORT_POSITIONALS,
        },
        TreeFlags.EXPORT_FLAGS,
      ),
      new YargsCommand(
        {
          command: 'import',
          description: 'Write the ZNodes of a tree document under a location',
          logger: this.logger,
          handler: argv => this.handlers.import(argv),
          positionals: TreeFlags.IMPORT_POSITIONALS,
        },
        TreeFlags.IMPORT_FLAGS,
      ),
    ];
  }
}
