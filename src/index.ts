// SPDX-License-Identifier: Apache-2.0

import chalk from 'chalk';
import yargs from 'yargs';
import {hideBin} from 'yargs/helpers';
import 'dotenv/config';
import 'reflect-metadata';
import {container} from 'tsyringe-neo';
import {ListrLogger} from 'listr2';

import {Flags as flags} from './commands/flags.js';
import * as commands from './commands/index.js';
import * as constants from './core/constants.js';
import * as helpers from './core/helpers.js';
import {CustomProcessOutput} from './core/process-output.js';
import {type ZTreeLogger} from './core/logging/ztree-logger.js';
import {Container, type ContainerOptions} from './core/dependency-injection/container-init.js';
import {InjectTokens} from './core/dependency-injection/inject-tokens.js';
import {type Middlewares} from './core/middlewares.js';
import {ZTreeError} from './core/errors/ztree-error.js';
import {UserBreak} from './core/errors/user-break.js';
import {IllegalArgumentError} from './core/errors/illegal-argument-error.js';

export interface MainContext {
  logger?: ZTreeLogger;
}

/**
 * Runs one ztree command.
 *
 * @param argv - the full process argv, including the node binary and the script
 * @param context - receives the logger so the caller can report errors after the run
 * @param containerOptions - overrides for the dependency container, used by tests
 */
export async function main(
  argv: string[],
  context?: MainContext,
  containerOptions: ContainerOptions = {},
): Promise<void> {
  try {
    Container.getInstance().init(containerOptions);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ZTreeError(`Error initializing container: ${message}`, error);
  }

  const logger = container.resolve<ZTreeLogger>(InjectTokens.ZTreeLogger);
  if (context) {
    // save the logger so that ztree.ts can report errors through it
    context.logger = logger;
  }

  logger.debug('Initializing ztree CLI');
  constants.LISTR_DEFAULT_RENDERER_OPTION.logger = new ListrLogger({processOutput: new CustomProcessOutput(logger)});
  if (argv.length >= 3 && ['-version', '--version'].includes(argv[2])) {
    logger.showUser(chalk.cyan('\n******************************* ZTree ********************************************'));
    logger.showUser(chalk.cyan('Version\t\t\t:'), chalk.yellow(helpers.getVersion()));
    logger.showUser(chalk.cyan('**********************************************************************************'));
    throw new UserBreak('displayed version information, exiting');
  }

  logger.debug('Initializing middlewares');
  const middlewares = container.resolve<Middlewares>(InjectTokens.Middlewares);

  logger.debug('Initializing commands');
  const rootCmd = yargs(hideBin(argv))
    .scriptName('ztree')
    .usage('Usage:\n  ztree <command> [options]')
    .alias('h', 'help')
    .version(false)
    .parserConfiguration({'boolean-negation': false});

  for (const definition of commands.Initialize()) {
    rootCmd.command(definition);
  }

  rootCmd
    .strict()
    .demandCommand(1, 'Select a command')
    .middleware(
      [
        middlewares.setLoggerDevFlag(),
        middlewares.setLogLevel(),
        middlewares.processArgumentsAndDisplayHeader(),
      ],
      false, // applyBeforeValidate is false as otherwise middleware is called twice
    );

  rootCmd.fail((message, error) => {
    if (error) {
      throw error;
    }
    logger.showUser(message);
    rootCmd.showHelp();
    throw new IllegalArgumentError(message);
  });

  logger.debug('Setting up flags');
  // set root level flags
  flags.setCommandFlags(rootCmd, flags.devMode, flags.verbose);

  logger.debug('Parsing root command (executing the commands)');
  await rootCmd.parseAsync();
}
