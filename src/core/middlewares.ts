// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../commands/flags.js';
import {type ConfigManager} from './config-manager.js';
import {type ZTreeLogger} from './logging/ztree-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type ArgvStruct} from '../types/aliases.js';

export type Middleware = (argv: ArgvStruct) => void;

@injectable()
export class Middlewares {
  private readonly configManager: ConfigManager;
  private readonly logger: ZTreeLogger;

  public constructor(
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
    @inject(InjectTokens.ZTreeLogger) logger?: ZTreeLogger,
  ) {
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
  }

  public setLoggerDevFlag(): Middleware {
    const logger = this.logger;

    /**
     * @param argv - listr Argv
     */
    return (argv: ArgvStruct): void => {
      if (argv[flags.devMode.name] === true) {
        logger.debug('Setting logger dev flag');
        logger.setDevMode(true);
      }
    };
  }

  /** `--verbose` writes the per-ZNode decisions to the log */
  public setLogLevel(): Middleware {
    const logger = this.logger;

    return (argv: ArgvStruct): void => {
      if (argv[flags.verbose.name] === true) {
        logger.setLevel('debug');
      }
    };
  }

  /**
   * Processes the Argv and display the command header
   *
   * @returns callback function to be executed from listr
   */
  public processArgumentsAndDisplayHeader(): Middleware {
    const configManager = this.configManager;
    const logger = this.logger;

    /**
     * @param argv - listr Argv
     */
    return (argv: ArgvStruct): void => {
      logger.debug('Processing arguments and displaying header');

      // apply precedence for flags
      configManager.applyPrecedence(argv);

      // update config manager
      configManager.update(argv);

      // Build data to be displayed
      const currentCommand: string = [...argv._.map(String), ...Middlewares.positionalsOf(argv)].join(' ');
      const commandArguments: string = flags.stringifyArgv(argv);
      const commandData: string = `${currentCommand} ${commandArguments}`.trim();

      // Display command header
      logger.showUser(
        chalk.cyan('\n******************************* ZTree ********************************************'),
      );
      logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(configManager.getVersion()));
      logger.showUser(chalk.cyan('Current Command\t\t:'), chalk.yellow(commandData));
      logger.showUser(chalk.cyan('**********************************************************************************'));
    };
  }

  private static positionalsOf(argv: ArgvStruct): string[] {
    return [flags.location, flags.source, flags.destination]
      .map(positional => argv[positional.name])
      .filter((value): value is string => typeof value === 'string');
  }
}
