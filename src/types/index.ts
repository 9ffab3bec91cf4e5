// SPDX-License-Identifier: Apache-2.0

import {type CommandModule} from 'yargs';
import {
  type ListrDefaultRenderer,
  type ListrSimpleRenderer,
  type ListrTask,
  type ListrTaskWrapper,
} from 'listr2';

// NOTE: DO NOT add any ztree imports in this file to avoid circular dependencies

export type ZTreeListrTask<T> = ListrTask<T, ListrDefaultRenderer, ListrSimpleRenderer>;

export type ZTreeListrTaskWrapper<T> = ListrTaskWrapper<T, ListrDefaultRenderer, ListrSimpleRenderer>;

export type CommandDefinition = CommandModule;
