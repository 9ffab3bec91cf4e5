// SPDX-License-Identifier: Apache-2.0

import {type NodeContent, type TreeStore} from '../../src/core/tree/tree-store.js';
import {type TreeStoreFactory, type SessionOptions} from '../../src/core/tree/tree-store-factory.js';
import {NodeStats} from '../../src/core/tree/node-stat.js';
import {ZNodePath} from '../../src/core/tree/znode-path.js';
import {TreeStoreError, TreeStoreErrorCode} from '../../src/core/tree/errors/tree-store-error.js';

export type StoreOperation = 'exists' | 'getData' | 'listChildren' | 'create' | 'setData';

interface StoredNode {
  data: Uint8Array;
  version: number;
  czxid: number;
  mzxid: number;
  ctime: number;
  mtime: number;
}

interface InjectedFailure {
  code: TreeStoreErrorCode;
  remaining: number;
}

/** First modification time handed out; each write advances the clock by one second. */
export const EPOCH_MILLIS = Date.UTC(2024, 0, 1);

/**
 * A ZooKeeper ensemble held in a map, with hooks to fail operations or make nodes disappear mid-walk.
 */
export class InMemoryTreeStore implements TreeStore {
  public readonly calls: string[] = [];
  public closed = false;

  private readonly nodes = new Map<string, StoredNode>();
  private readonly failures = new Map<string, InjectedFailure>();
  private readonly vanishing = new Set<string>();
  private readonly lostReplies = new Map<string, number>();
  private zxid = 0;
  private clock = EPOCH_MILLIS;

  public constructor(public readonly description: string = 'memory:2181') {
    this.nodes.set('/', this.newNode(new Uint8Array()));
  }

  /** Creates the node and any missing ancestors with empty data. */
  public seed(path: string, data: string = ''): this {
    const parent = ZNodePath.parent(path);
    if (parent !== undefined && !this.nodes.has(parent)) {
      this.seed(parent);
    }
    this.nodes.set(path, this.newNode(new TextEncoder().encode(data)));
    return this;
  }

  public seedBytes(path: string, data: Uint8Array): this {
    this.seed(path);
    this.nodes.set(path, this.newNode(data));
    return this;
  }

  /** The next `times` calls of `operation` on `path` fail with `code`. */
  public failOn(operation: StoreOperation, path: string, code: TreeStoreErrorCode, times: number = Infinity): this {
    this.failures.set(`${operation} ${path}`, {code, remaining: times});
    return this;
  }

  /** The next `times` writes of `operation` on `path` are applied, then fail with `ConnectionLoss`. */
  public loseReplyOn(operation: 'create' | 'setData', path: string, times: number = 1): this {
    this.lostReplies.set(`${operation} ${path}`, times);
    return this;
  }

  /** The node stays listed by its parent but reading it fails with `NoNode`. */
  public vanishOnRead(path: string): this {
    this.vanishing.add(path);
    return this;
  }

  public has(path: string): boolean {
    return this.nodes.has(path);
  }

  public text(path: string): string | undefined {
    const node = this.nodes.get(path);
    return node === undefined ? undefined : new TextDecoder().decode(node.data);
  }

  public versionOf(path: string): number | undefined {
    return this.nodes.get(path)?.version;
  }

  /** Every path except the root, sorted. */
  public paths(): string[] {
    return [...this.nodes.keys()].filter(path => path !== '/').sort();
  }

  public async exists(path: string): Promise<boolean> {
    this.record('exists', path);
    return this.nodes.has(path);
  }

  public async getData(path: string): Promise<NodeContent> {
    this.record('getData', path);
    const node = this.nodes.get(path);
    if (node === undefined || this.vanishing.has(path)) {
      throw InMemoryTreeStore.noNode(path);
    }
    return {
      data: node.data,
      stat: NodeStats.of({
        czxid: String(node.czxid),
        mzxid: String(node.mzxid),
        pzxid: String(node.czxid),
        ctime: node.ctime,
        mtime: node.mtime,
        version: node.version,
        cversion: 0,
        aversion: 0,
        ephemeralOwner: '0',
        dataLength: node.data.length,
        numChildren: this.childrenOf(path).length,
      }),
    };
  }

  public async listChildren(path: string): Promise<string[]> {
    this.record('listChildren', path);
    if (!this.nodes.has(path) || this.vanishing.has(path)) {
      throw InMemoryTreeStore.noNode(path);
    }
    // reverse order, so callers cannot rely on the store sorting
    return this.childrenOf(path).reverse();
  }

  public async create(path: string, data: Uint8Array): Promise<void> {
    this.record('create', path);
    if (this.nodes.has(path)) {
      throw new TreeStoreError(`create ${path} failed: node exists`, TreeStoreErrorCode.NODE_EXISTS, path);
    }
    const parent = ZNodePath.parent(path);
    if (parent === undefined || !this.nodes.has(parent)) {
      throw InMemoryTreeStore.noNode(path);
    }
    this.nodes.set(path, this.newNode(data));
    this.replyTo('create', path);
  }

  public async setData(path: string, data: Uint8Array): Promise<void> {
    this.record('setData', path);
    const node = this.nodes.get(path);
    if (node === undefined) {
      throw InMemoryTreeStore.noNode(path);
    }
    this.clock += 1000;
    this.nodes.set(path, {...node, data, version: node.version + 1, mzxid: ++this.zxid, mtime: this.clock});
    this.replyTo('setData', path);
  }

  public async close(): Promise<void> {
    this.closed = true;
  }

  private childrenOf(path: string): string[] {
    return [...this.nodes.keys()]
      .filter(candidate => candidate !== '/' && ZNodePath.parent(candidate) === path)
      .map(candidate => ZNodePath.basename(candidate))
      .sort();
  }

  private record(operation: StoreOperation, path: string): void {
    this.calls.push(`${operation} ${path}`);
    const failure = this.failures.get(`${operation} ${path}`);
    if (failure && failure.remaining > 0) {
      failure.remaining--;
      throw new TreeStoreError(`${operation} ${path} failed: ${failure.code}`, failure.code, path);
    }
  }

  private replyTo(operation: StoreOperation, path: string): void {
    const key = `${operation} ${path}`;
    const remaining = this.lostReplies.get(key) ?? 0;
    if (remaining > 0) {
      this.lostReplies.set(key, remaining - 1);
      throw new TreeStoreError(`${key} failed: ConnectionLoss`, TreeStoreErrorCode.CONNECTION_LOSS, path);
    }
  }

  private newNode(data: Uint8Array): StoredNode {
    this.zxid++;
    this.clock += 1000;
    return {data, version: 0, czxid: this.zxid, mzxid: this.zxid, ctime: this.clock, mtime: this.clock};
  }

  private static noNode(path: string): TreeStoreError {
    return new TreeStoreError(`${path} does not exist`, TreeStoreErrorCode.NO_NODE, path);
  }
}

/**
 * Hands out in-memory stores by connect string.
 */
export class InMemoryTreeStoreFactory implements TreeStoreFactory {
  public readonly connected: string[] = [];
  public closeAllCalls = 0;

  public constructor(private readonly stores: Map<string, InMemoryTreeStore> = new Map()) {}

  public add(connectString: string, store: InMemoryTreeStore = new InMemoryTreeStore(connectString)): InMemoryTreeStore {
    this.stores.set(connectString, store);
    return store;
  }

  public async connect(connectString: string, _session: SessionOptions): Promise<TreeStore> {
    const store = this.stores.get(connectString);
    if (store === undefined) {
      throw new TreeStoreError(
        `could not connect to ${connectString}`,
        TreeStoreErrorCode.CONNECTION_LOSS,
        '/',
      );
    }
    this.connected.push(connectString);
    return store;
  }

  public async closeAll(): Promise<void> {
    this.closeAllCalls++;
    for (const store of this.stores.values()) {
      await store.close();
    }
  }
}
