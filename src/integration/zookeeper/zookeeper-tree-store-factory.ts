// SPDX-License-Identifier: Apache-2.0

import {createClient} from 'node-zookeeper-client';
import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type ZTreeLogger} from '../../core/logging/ztree-logger.js';
import {type SessionOptions, type TreeStoreFactory} from '../../core/tree/tree-store-factory.js';
import {type TreeStore} from '../../core/tree/tree-store.js';
import {TreeStoreError, TreeStoreErrorCode} from '../../core/tree/errors/tree-store-error.js';
import {ZooKeeperTreeStore} from './zookeeper-tree-store.js';

@injectable()
export class ZooKeeperTreeStoreFactory implements TreeStoreFactory {
  private readonly logger: ZTreeLogger;
  private readonly stores: TreeStore[] = [];

  public constructor(@inject(InjectTokens.ZTreeLogger) logger?: ZTreeLogger) {
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
  }

  /**
   * @throws TreeStoreError with the `ConnectionLoss` code when no session is established within the connect timeout
   */
  public async connect(connectString: string, session: SessionOptions): Promise<TreeStore> {
    const client = createClient(connectString, {sessionTimeout: session.timeoutMillis});

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        client.close();
        reject(
          new TreeStoreError(
            `could not connect to ${connectString} within ${session.connectTimeoutMillis}ms`,
            TreeStoreErrorCode.CONNECTION_LOSS,
            '/',
          ),
        );
      }, session.connectTimeoutMillis);

      client.once('connected', () => {
        clearTimeout(timer);
        resolve();
      });
      client.connect();
    });

    this.logger.debug(`Connected to ZooKeeper ensemble ${connectString}`);
    const store = new ZooKeeperTreeStore(client, connectString, this.logger);
    this.stores.push(store);
    return store;
  }

  public async closeAll(): Promise<void> {
    const stores = this.stores.splice(0);
    for (const store of stores) {
      await store.close();
    }
  }
}
