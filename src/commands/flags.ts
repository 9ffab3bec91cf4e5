// SPDX-License-Identifier: Apache-2.0

import {type CommandFlag, type PositionalArgument} from '../types/flag-types.js';
import {type AnyYargs, type ArgvStruct} from '../types/aliases.js';

export class Flags {
  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   *
   */
  public static setRequiredCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {...Flags.optionOf(flag), demandOption: true});
    }
  }

  /**
   * Set flag from the flag option
   * @param y instance of yargs
   * @param commandFlags a set of command flags
   *
   */
  public static setOptionalCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      const defaultValue = flag.definition.defaultValue === '' ? undefined : flag.definition.defaultValue;
      y.option(flag.name, {...Flags.optionOf(flag), default: defaultValue});
    }
  }

  /** Root level flags, accepted by every command */
  public static setCommandFlags(y: AnyYargs, ...commandFlags: CommandFlag[]): void {
    for (const flag of commandFlags) {
      y.option(flag.name, {...Flags.optionOf(flag), global: true});
    }
  }

  public static setPositionals(y: AnyYargs, ...positionals: PositionalArgument[]): void {
    for (const positional of positionals) {
      y.positional(positional.name, {describe: positional.describe, type: 'string'});
    }
  }

  private static optionOf(flag: CommandFlag): {describe: string; alias?: string; type: 'string' | 'boolean' | 'number'} {
    return {describe: flag.definition.describe, alias: flag.definition.alias, type: flag.definition.type};
  }

  public static readonly devMode: CommandFlag = {
    constName: 'devMode',
    name: 'dev',
    definition: {
      describe: 'Enable developer mode',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly verbose: CommandFlag = {
    constName: 'verbose',
    name: 'verbose',
    definition: {
      describe: 'Enable verbose (debug) output in the log file',
      defaultValue: false,
      alias: 'v',
      type: 'boolean',
    },
  };

  public static readonly noClobber: CommandFlag = {
    constName: 'noClobber',
    name: 'no-clobber',
    definition: {
      describe: 'Do not overwrite any existing ZNodes (default)',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly interactive: CommandFlag = {
    constName: 'interactive',
    name: 'interactive',
    definition: {
      describe: 'Prompt for each ZNode that already exists at the destination',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly overwrite: CommandFlag = {
    constName: 'overwrite',
    name: 'overwrite',
    definition: {
      describe: 'Overwrite existing ZNodes without prompting',
      defaultValue: false,
      type: 'boolean',
    },
  };

  public static readonly file: CommandFlag = {
    constName: 'file',
    name: 'file',
    definition: {
      describe: 'Tree document to write to or read from; .yaml and .yml files are YAML, anything else is JSON',
      alias: 'f',
      type: 'string',
    },
  };

  public static readonly location: PositionalArgument = {
    name: 'location',
    describe: 'Ensemble location as host:port[,host:port...]/path or alias/path',
  };

  public static readonly source: PositionalArgument = {
    name: 'source',
    describe: 'Location to copy from',
  };

  public static readonly destination: PositionalArgument = {
    name: 'destination',
    describe: 'Location to copy to',
  };

  public static readonly conflictFlags: CommandFlag[] = [Flags.noClobber, Flags.interactive, Flags.overwrite];

  public static readonly allFlags: CommandFlag[] = [
    Flags.devMode,
    Flags.verbose,
    Flags.noClobber,
    Flags.interactive,
    Flags.overwrite,
    Flags.file,
  ];

  public static readonly allFlagsMap = new Map(Flags.allFlags.map(f => [f.name, f]));

  /**
   * Processes the Argv arguments and returns them as string, all with full flag names.
   * - removes flags that match the default value.
   * - removes flags with undefined and null values.
   * - removes boolean flags that are false.
   * - masks all sensitive flags with their dataMask property.
   */
  public static stringifyArgv(argv: ArgvStruct): string {
    const processedFlags: string[] = [];

    for (const [name, value] of Object.entries(argv)) {
      // Remove non-flag data and boolean presence based flags that are false
      if (name === '_' || name === '$0' || value === '' || value === false || value === undefined || value === null) {
        continue;
      }

      // remove flags that use the default value
      const flag = Flags.allFlagsMap.get(name);
      if (!flag || (flag.definition.defaultValue && flag.definition.defaultValue === value)) {
        continue;
      }

      if (value === true) {
        processedFlags.push(`--${flag.name}`);
      } else if (flag.definition.dataMask) {
        processedFlags.push(`--${flag.name} ${flag.definition.dataMask}`);
      } else {
        processedFlags.push(`--${flag.name} ${String(value)}`);
      }
    }

    return processedFlags.join(' ');
  }
}
