// SPDX-License-Identifier: Apache-2.0

import {type Client} from 'node-zookeeper-client';
import {type NodeContent, type TreeStore} from '../../core/tree/tree-store.js';
import {type ZTreeLogger} from '../../core/logging/ztree-logger.js';
import {toNodeStat, toTreeStoreError} from './zookeeper-mappers.js';

/**
 * {@link TreeStore} over a connected node-zookeeper-client session. Nodes are created persistent with the open ACL.
 */
export class ZooKeeperTreeStore implements TreeStore {
  private closed = false;

  public constructor(
    private readonly client: Client,
    public readonly description: string,
    private readonly logger: ZTreeLogger,
  ) {}

  public exists(path: string): Promise<boolean> {
    return new Promise<boolean>((resolve, reject) => {
      this.client.exists(path, (error, stat) => {
        if (error) {
          reject(toTreeStoreError(error, 'exists', path));
        } else {
          resolve(Boolean(stat));
        }
      });
    });
  }

  public getData(path: string): Promise<NodeContent> {
    return new Promise<NodeContent>((resolve, reject) => {
      this.client.getData(path, (error, data, stat) => {
        if (error) {
          reject(toTreeStoreError(error, 'getData', path));
          return;
        }
        try {
          resolve({data: data ? new Uint8Array(data) : new Uint8Array(), stat: toNodeStat(stat)});
        } catch (mappingError) {
          reject(toTreeStoreError(mappingError, 'getData', path));
        }
      });
    });
  }

  public listChildren(path: string): Promise<string[]> {
    return new Promise<string[]>((resolve, reject) => {
      this.client.getChildren(path, (error, children) => {
        if (error) {
          reject(toTreeStoreError(error, 'getChildren', path));
        } else {
          resolve(children);
        }
      });
    });
  }

  public create(path: string, data: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.client.create(path, Buffer.from(data), error => {
        if (error) {
          reject(toTreeStoreError(error, 'create', path));
        } else {
          resolve();
        }
      });
    });
  }

  public setData(path: string, data: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.client.setData(path, Buffer.from(data), error => {
        if (error) {
          reject(toTreeStoreError(error, 'setData', path));
        } else {
          resolve();
        }
      });
    });
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.client.close();
    this.logger.debug(`Closed ZooKeeper session to ${this.description}`);
  }
}
