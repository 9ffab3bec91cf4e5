// SPDX-License-Identifier: Apache-2.0

import fs from 'node:fs';
import os from 'node:os';
import {PathEx} from '../src/business/utils/path-ex.js';
import {type ZTreeLogger} from '../src/core/logging/ztree-logger.js';
import {ZTreeWinstonLogger} from '../src/core/logging/ztree-winston-logger.js';

export const BASE_TEST_DIR = PathEx.join('test', 'data', 'tmp');

export function getTestCacheDirectory(testName?: string): string {
  const d = testName ? PathEx.join(BASE_TEST_DIR, testName) : BASE_TEST_DIR;

  if (!fs.existsSync(d)) {
    fs.mkdirSync(d, {recursive: true});
  }
  return d;
}

/** A fresh, empty directory under the system temp directory. */
export function getTmpDir(): string {
  return fs.mkdtempSync(PathEx.join(os.tmpdir(), 'ztree-test-'));
}

export function getTestLogger(): ZTreeLogger {
  return new ZTreeWinstonLogger('debug', true, getTestCacheDirectory('logs'));
}
