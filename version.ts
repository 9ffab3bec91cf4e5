// SPDX-License-Identifier: Apache-2.0

import {fileURLToPath} from 'node:url';
import path from 'node:path';
import fs from 'node:fs';
import {PathEx} from './src/business/utils/path-ex.js';

/**
 * This file should only contain the function to get the ztree version.
 */
export function getZTreeVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }

  const __filename: string = fileURLToPath(import.meta.url);
  const __dirname: string = path.dirname(__filename);

  // the compiled entry point lives one level below the package root
  for (const candidate of ['./package.json', '../package.json']) {
    const packageJsonPath: string = PathEx.resolve(__dirname, candidate);
    if (!fs.existsSync(packageJsonPath)) {
      continue;
    }

    const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
    if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
      return String(packageJson.version);
    }
  }

  return '0.0.0';
}
