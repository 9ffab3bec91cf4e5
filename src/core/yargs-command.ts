// SPDX-License-Identifier: Apache-2.0

import {type CommandModule} from 'yargs';
import {Flags as commandFlags} from '../commands/flags.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {ZTreeError} from './errors/ztree-error.js';
import {type ZTreeLogger} from './logging/ztree-logger.js';
import {type CommandFlags, type PositionalArgument} from '../types/flag-types.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';

export type CommandHandlerMethod = (argv: ArgvStruct) => Promise<boolean>;

export interface YargsCommandOptions {
  command: string;
  description: string;
  logger: ZTreeLogger;
  handler: CommandHandlerMethod;
  positionals?: PositionalArgument[];
}

export class YargsCommand implements CommandModule {
  public readonly command: string;
  public readonly describe: string;

  private readonly name: string;
  private readonly logger: ZTreeLogger;
  private readonly handlerMethod: CommandHandlerMethod;
  private readonly positionals: PositionalArgument[];
  private readonly flags: CommandFlags;

  public constructor(options: YargsCommandOptions, flags: CommandFlags) {
    const {command, description, logger, handler, positionals = []} = options;

    if (!command) {
      throw new IllegalArgumentError("A string is required as the 'command' property", command);
    }
    if (!description) {
      throw new IllegalArgumentError("A string is required as the 'description' property", description);
    }

    this.name = command;
    this.command = [command, ...positionals.map(p => `<${p.name}>`)].join(' ');
    this.describe = description;
    this.logger = logger;
    this.handlerMethod = handler;
    this.positionals = positionals;
    this.flags = flags;
  }

  public builder = (y: AnyYargs): AnyYargs => {
    commandFlags.setPositionals(y, ...this.positionals);
    commandFlags.setRequiredCommandFlags(y, ...this.flags.required);
    commandFlags.setOptionalCommandFlags(y, ...this.flags.optional);
    return y;
  };

  public handler = async (argv: ArgvStruct): Promise<void> => {
    this.logger.info(`==== Running '${this.name}' ===`);
    this.logger.debug(`argv: ${JSON.stringify(argv)}`);

    let succeeded: boolean;
    try {
      succeeded = await this.handlerMethod(argv);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ZTreeError(`${this.name} failed: ${message}`, error);
    }

    this.logger.info(`==== Finished running '${this.name}' ====`);
    if (!succeeded) {
      throw new ZTreeError(`${this.name} failed, expected returned value to be true`);
    }
  };
}
