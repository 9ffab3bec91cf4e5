// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {TreeWalker} from '../../../../src/core/tree/tree-walker.js';
import {pathOf, type WalkItem} from '../../../../src/core/tree/walk-item.js';
import {NotFoundError} from '../../../../src/core/tree/errors/not-found-error.js';
import {TreeStoreError, TreeStoreErrorCode} from '../../../../src/core/tree/errors/tree-store-error.js';
import {ReadFailureError} from '../../../../src/core/tree/errors/read-failure-error.js';
import {Duration} from '../../../../src/core/time/duration.js';
import {InMemoryTreeStore} from '../../../helpers/in-memory-tree-store.js';
import {RecordingLogger} from '../../../helpers/recording-logger.js';

async function collect(walk: AsyncIterable<WalkItem>): Promise<WalkItem[]> {
  const items: WalkItem[] = [];
  for await (const item of walk) {
    items.push(item);
  }
  return items;
}

describe('TreeWalker', () => {
  const logger = new RecordingLogger();
  const walker = new TreeWalker(logger);

  it('visits the subtree in pre-order with children sorted', async () => {
    const store = new InMemoryTreeStore().seed('/a/y', 'y').seed('/a/x/2').seed('/a/x/1').seed('/b');

    const items = await collect(walker.walk(store, '/a'));

    expect(items.map(pathOf)).to.deep.equal(['/a', '/a/x', '/a/x/1', '/a/x/2', '/a/y']);
  });

  it('records data, metadata and sorted child names', async () => {
    const store = new InMemoryTreeStore().seed('/a', 'hello').seed('/a/c').seed('/a/b');

    const [first] = await collect(walker.walk(store, '/a'));

    expect(first.kind).to.equal('node');
    if (first.kind === 'node') {
      expect(new TextDecoder().decode(first.record.data)).to.equal('hello');
      expect(first.record.children).to.deep.equal(['b', 'c']);
      expect(first.record.metadata.dataLength).to.equal(5);
      expect(first.record.metadata.numChildren).to.equal(2);
      expect(first.record.metadata.ephemeral).to.be.false;
    }
  });

  it('walks the whole tree from the root', async () => {
    const store = new InMemoryTreeStore().seed('/a').seed('/b');

    const items = await collect(walker.walk(store, '/'));

    expect(items.map(pathOf)).to.deep.equal(['/', '/a', '/b']);
  });

  it('fetches nodes lazily', async () => {
    const store = new InMemoryTreeStore().seed('/a/b/c');
    const iterator = walker.walk(store, '/a')[Symbol.asyncIterator]();

    await iterator.next();

    expect(store.calls).to.deep.equal(['getData /a', 'listChildren /a']);
    await iterator.return?.(undefined);
  });

  it('fails with NotFoundError when the root does not exist', async () => {
    const store = new InMemoryTreeStore();

    await expect(collect(walker.walk(store, '/missing'))).to.be.rejectedWith(
      NotFoundError,
      'ZNode /missing does not exist',
    );
  });

  it('reports a vanished node and skips its subtree', async () => {
    const store = new InMemoryTreeStore().seed('/a/b/deep').seed('/a/c').vanishOnRead('/a/b');

    const items = await collect(walker.walk(store, '/a'));

    expect(items.map(item => `${item.kind} ${pathOf(item)}`)).to.deep.equal(['node /a', 'vanished /a/b', 'node /a/c']);
    expect(logger.messages('warn')).to.include('ZNode /a/b vanished before it could be read, skipping its subtree');
  });

  it('reports a node that cannot be read and carries on with its siblings', async () => {
    const store = new InMemoryTreeStore()
      .seed('/a/b/deep')
      .seed('/a/c')
      .failOn('getData', '/a/b', TreeStoreErrorCode.NO_AUTH);

    const items = await collect(walker.walk(store, '/a'));

    expect(items.map(item => `${item.kind} ${pathOf(item)}`)).to.deep.equal([
      'node /a',
      'unreadable /a/b',
      'node /a/c',
    ]);
    const unreadable = items[1];
    expect(unreadable.kind === 'unreadable' && unreadable.error).to.be.instanceOf(ReadFailureError);
    expect(unreadable.kind === 'unreadable' && unreadable.error.retryable).to.be.false;
    expect(store.calls).to.not.include('getData /a/b/deep');
  });

  it('retries transient read failures', async () => {
    const store = new InMemoryTreeStore()
      .seed('/a/b')
      .failOn('getData', '/a/b', TreeStoreErrorCode.CONNECTION_LOSS, 1)
      .failOn('listChildren', '/a/b', TreeStoreErrorCode.OPERATION_TIMEOUT, 1);

    const items = await collect(walker.walk(store, '/a', {maxAttempts: 2, backoff: Duration.ofMillis(0)}));

    expect(items.map(item => `${item.kind} ${pathOf(item)}`)).to.deep.equal(['node /a', 'node /a/b']);
    expect(store.calls.filter(call => call.endsWith(' /a/b'))).to.deep.equal([
      'getData /a/b',
      'getData /a/b',
      'listChildren /a/b',
      'listChildren /a/b',
    ]);
  });

  it('reports a transient failure once the attempts are spent', async () => {
    const store = new InMemoryTreeStore().seed('/a/b').failOn('getData', '/a/b', TreeStoreErrorCode.SESSION_EXPIRED);

    const items = await collect(walker.walk(store, '/a', {maxAttempts: 2, backoff: Duration.ofMillis(0)}));

    const last = items[1];
    expect(last.kind).to.equal('unreadable');
    expect(last.kind === 'unreadable' && last.error.retryable).to.be.true;
    expect(store.calls.filter(call => call === 'getData /a/b')).to.have.lengthOf(2);
  });

  it('propagates errors reading the root', async () => {
    const store = new InMemoryTreeStore().seed('/a').failOn('getData', '/a', TreeStoreErrorCode.NO_AUTH);

    const error = await collect(walker.walk(store, '/a')).then(
      () => undefined,
      (reason: unknown) => reason,
    );

    expect(TreeStoreError.isCode(error, TreeStoreErrorCode.NO_AUTH)).to.be.true;
  });

  it('rejects an invalid root path', async () => {
    const store = new InMemoryTreeStore();

    await expect(collect(walker.walk(store, 'a'))).to.be.rejectedWith("invalid znode path: 'a'");
  });
});
