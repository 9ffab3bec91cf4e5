// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {MissingArgumentError} from './errors/missing-argument-error.js';
import {IllegalArgumentError} from './errors/illegal-argument-error.js';
import {type ZTreeLogger} from './logging/ztree-logger.js';
import {Flags as flags} from '../commands/flags.js';
import {type CommandFlag, type FlagValue} from '../types/flag-types.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type ArgvStruct} from '../types/aliases.js';
import {getZTreeVersion} from '../../version.js';

export interface ConfigState {
  flags: Map<string, FlagValue>;
  version: string;
  updatedAt: string;
  lastCommand: string[];
}

/**
 * ConfigManager caches the command flag values of the running invocation.
 */
@injectable()
export class ConfigManager {
  private config: ConfigState = ConfigManager.initialState();
  private readonly logger: ZTreeLogger;

  public constructor(@inject(InjectTokens.ZTreeLogger) logger?: ZTreeLogger) {
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
  }

  /** Reset config */
  public reset(): void {
    this.config = ConfigManager.initialState();
  }

  private static initialState(): ConfigState {
    return {
      flags: new Map(),
      version: getZTreeVersion(),
      updatedAt: new Date().toISOString(),
      lastCommand: [],
    };
  }

  /**
   * Apply the command flags precedence
   *
   * It uses the below precedence for command flag values:
   *  1. User input of the command flag
   *  2. Cached value of the flag
   *  3. Default value of the command flag
   */
  public applyPrecedence(argv: ArgvStruct): ArgvStruct {
    for (const flag of flags.allFlags) {
      if (argv[flag.name] !== undefined) {
        // argv takes precedence, nothing to do
      } else if (this.hasFlag(flag)) {
        argv[flag.name] = this.getFlag(flag);
      } else if (flag.definition.defaultValue !== undefined) {
        argv[flag.name] = flag.definition.defaultValue;
      }
    }

    return argv;
  }

  /** Update the config using the argv */
  public update(argv: ArgvStruct): void {
    if (Object.keys(argv).length === 0) {
      return;
    }

    for (const flag of flags.allFlags) {
      const value = argv[flag.name];
      if (value === undefined || value === null) {
        continue;
      }

      switch (flag.definition.type) {
        case 'string': {
          this.config.flags.set(flag.name, `${String(value)}`); // force convert to string
          break;
        }

        case 'number': {
          const number_ = typeof value === 'number' ? value : Number.parseFloat(String(value));
          if (Number.isNaN(number_)) {
            throw new IllegalArgumentError(`invalid number value '${String(value)}' for --${flag.name}`, value);
          }
          this.config.flags.set(flag.name, number_);
          break;
        }

        case 'boolean': {
          this.config.flags.set(flag.name, value === true || value === 'true'); // use comparison to enforce boolean value
          break;
        }
      }
    }

    // store last command that was run
    this.config.lastCommand = argv._.map(String);
    this.config.updatedAt = new Date().toISOString();

    const flagMessage = [...this.config.flags.entries()]
      .map(([key, value]) => {
        const dataMask = flags.allFlagsMap.get(key)?.definition.dataMask;
        return `${key}=${dataMask ?? String(value)}`;
      })
      .join(', ');

    if (flagMessage) {
      this.logger.debug(`Updated config with flags: ${flagMessage}`);
    }
  }

  /** Check if a flag value is set */
  public hasFlag(flag: CommandFlag): boolean {
    return this.config.flags.has(flag.name);
  }

  /**
   * Return the value of the given flag
   * @returns value of the flag or undefined if flag value is not available
   */
  public getFlag(flag: CommandFlag): FlagValue | undefined {
    return this.config.flags.get(flag.name);
  }

  public getStringFlag(flag: CommandFlag): string | undefined {
    const value = this.getFlag(flag);
    return value === undefined ? undefined : String(value);
  }

  public getBooleanFlag(flag: CommandFlag): boolean {
    return this.getFlag(flag) === true;
  }

  /** Set value for the flag */
  public setFlag(flag: CommandFlag, value: FlagValue): void {
    if (!flag.name) {
      throw new MissingArgumentError('flag must have a name');
    }
    this.config.flags.set(flag.name, value);
  }

  /** Get package version */
  public getVersion(): string {
    return this.config.version;
  }

  public getLastCommand(): readonly string[] {
    return this.config.lastCommand;
  }
}
