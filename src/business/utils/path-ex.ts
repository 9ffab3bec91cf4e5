// SPDX-License-Identifier: Apache-2.0

import path from 'node:path';
import fs from 'node:fs';

export class PathEx {
  public static joinWithRealPath(...paths: string[]): string {
    // nosemgrep
    return fs.realpathSync(path.join(...paths));
  }

  public static join(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.normalize(path.join(...paths));
  }

  public static resolve(...paths: string[]): string {
    // nosemgrep: path-join-resolve-traversal
    return path.resolve(...paths);
  }

  public static dirname(filePath: string): string {
    return path.dirname(filePath);
  }

  public static basename(filePath: string): string {
    return path.basename(filePath);
  }

  public static extname(filePath: string): string {
    return path.extname(filePath).toLowerCase();
  }
}
