// SPDX-License-Identifier: Apache-2.0

import {Flags as flags} from '../flags.js';
import {type CommandFlags, type PositionalArgument} from '../../types/flag-types.js';

export const PRINT_FLAGS: CommandFlags = {
  required: [],
  optional: [],
};

export const COPY_FLAGS: CommandFlags = {
  required: [],
  optional: [...flags.conflictFlags],
};

export const EXPORT_FLAGS: CommandFlags = {
  required: [flags.file],
  optional: [],
};

export const IMPORT_FLAGS: CommandFlags = {
  required: [flags.file],
  optional: [...flags.conflictFlags],
};

export const PRINT_POSITIONALS: PositionalArgument[] = [flags.location];
export const COPY_POSITIONALS: PositionalArgument[] = [flags.source, flags.destination];
export const EXPORT_POSITIONALS: PositionalArgument[] = [flags.location];
export const IMPORT_POSITIONALS: PositionalArgument[] = [flags.location];
