// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type ZTreeLogger} from '../logging/ztree-logger.js';
import {type TreeStore} from './tree-store.js';
import {type WalkItem} from './walk-item.js';
import {NodeRecord} from './node-record.js';
import {compareNames, ZNodePath} from './znode-path.js';
import {NotFoundError} from './errors/not-found-error.js';
import {NodeVanishedError} from './errors/node-vanished-error.js';
import {TreeStoreError, TreeStoreErrorCode} from './errors/tree-store-error.js';
import {ReadFailureError} from './errors/read-failure-error.js';
import {isTransient, NO_RETRY, type RetryOptions, withRetry} from './retry.js';

/**
 * Reads a subtree depth-first in pre-order. Children are visited in lexicographic order and every node is fetched
 * only when it is about to be yielded.
 */
@injectable()
export class TreeWalker {
  private readonly logger: ZTreeLogger;

  public constructor(@inject(InjectTokens.ZTreeLogger) logger?: ZTreeLogger) {
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
  }

  /**
   * Transient read failures are retried with `retry`. Below the root, a node that cannot be read is yielded as a
   * `vanished` or `unreadable` item and its subtree is skipped.
   *
   * @throws NotFoundError when `rootPath` does not exist when the walk starts
   * @throws TreeStoreError when the root cannot be read for any other reason
   */
  public async *walk(source: TreeStore, rootPath: string, retry: RetryOptions = NO_RETRY): AsyncGenerator<WalkItem> {
    ZNodePath.validate(rootPath);

    const stack: string[] = [rootPath];
    let path: string | undefined;
    while ((path = stack.pop()) !== undefined) {
      let record: NodeRecord;
      try {
        record = await this.fetch(source, path, retry);
      } catch (error) {
        if (TreeStoreError.isCode(error, TreeStoreErrorCode.NO_NODE)) {
          if (path === rootPath) {
            throw new NotFoundError(path, error);
          }
          this.logger.warn(`ZNode ${path} vanished before it could be read, skipping its subtree`);
          yield {kind: 'vanished', path, error: new NodeVanishedError(path, error)};
          continue;
        }
        if (path === rootPath) {
          throw error;
        }
        const failure = new ReadFailureError(path, isTransient(error), error);
        this.logger.error(`${failure.message}, skipping its subtree`);
        yield {kind: 'unreadable', path, error: failure};
        continue;
      }

      this.logger.debug(`Read ZNode ${record.path} (${record.children.length} children)`);
      yield {kind: 'node', record};

      for (let index = record.children.length - 1; index >= 0; index--) {
        stack.push(ZNodePath.join(record.path, record.children[index]));
      }
    }
  }

  private async fetch(source: TreeStore, path: string, retry: RetryOptions): Promise<NodeRecord> {
    const {data, stat} = await withRetry(path, retry, this.logger, () => source.getData(path));
    const children = await withRetry(path, retry, this.logger, () => source.listChildren(path));
    return new NodeRecord(path, data, stat, [...children].sort(compareNames));
  }
}
