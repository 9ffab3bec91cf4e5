// SPDX-License-Identifier: Apache-2.0

import {color, type ListrLogger, PRESET_TIMER} from 'listr2';
import {PathEx} from '../business/utils/path-ex.js';

// -------------------- ztree related constants ---------------------------------------------------------------------
export const ZTREE_HOME_DIR = process.env.ZTREE_HOME || PathEx.join(process.env.HOME ?? '.', '.ztree');
export const LOG_FILE_NAME = 'ztree.log';
export const DEFAULT_LOCAL_CONFIG_FILE = 'local-config.yaml';
export const ENVIRONMENT_PREFIX = 'ZTREE';

// -------------------- tree replication defaults ---------------------------------------------------------------------
export const ROOT_PATH = '/';
export const DEFAULT_RETRY_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BACKOFF_MILLIS = 250;
export const DEFAULT_SESSION_TIMEOUT_MILLIS = 30_000;
export const DEFAULT_CONNECT_TIMEOUT_MILLIS = 15_000;
export const DEFAULT_PRINT_MAX_DATA_LENGTH = 256;
export const TREE_DOCUMENT_YAML_EXTENSIONS = ['.yaml', '.yml'];

/** lowest layer of the layered config */
export const CONFIG_DEFAULTS: Readonly<Record<string, number>> = {
  'retry.maxAttempts': DEFAULT_RETRY_MAX_ATTEMPTS,
  'retry.backoffMillis': DEFAULT_RETRY_BACKOFF_MILLIS,
  'session.timeoutMillis': DEFAULT_SESSION_TIMEOUT_MILLIS,
  'session.connectTimeoutMillis': DEFAULT_CONNECT_TIMEOUT_MILLIS,
  'print.maxDataLength': DEFAULT_PRINT_MAX_DATA_LENGTH,
};

// -------------------- exit codes ---------------------------------------------------------------------
export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_FATAL = 1;
export const EXIT_CODE_INCOMPLETE = 2;

export const LISTR_DEFAULT_RENDERER_TIMER_OPTION = {
  ...PRESET_TIMER,
  condition: (duration: number) => duration > 100,
  format: (duration: number) => {
    if (duration > 10_000) {
      return color.red;
    }

    return color.green;
  },
};

export const LISTR_DEFAULT_RENDERER_OPTION: {
  collapseSubtasks: boolean;
  timer: typeof LISTR_DEFAULT_RENDERER_TIMER_OPTION;
  logger?: ListrLogger;
} = {
  collapseSubtasks: false,
  timer: LISTR_DEFAULT_RENDERER_TIMER_OPTION,
};
