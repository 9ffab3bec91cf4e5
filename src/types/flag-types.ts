// SPDX-License-Identifier: Apache-2.0

export interface CommandFlag {
  constName: string;
  name: string;
  definition: Definition;
}

export interface Definition {
  describe: string;
  defaultValue?: boolean | string | number;
  alias?: string;
  type: 'string' | 'boolean' | 'number';
  dataMask?: string;
}

export interface CommandFlags {
  required: CommandFlag[];
  optional: CommandFlag[];
}

/** A `<name>` argument given by position rather than by `--name`. */
export interface PositionalArgument {
  name: string;
  describe: string;
}

export type FlagValue = string | number | boolean;
