// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {beforeEach, describe, it} from 'mocha';

import {main, type MainContext} from '../../src/index.js';
import {type ContainerOptions} from '../../src/core/dependency-injection/container-init.js';
import {ErrorHandler} from '../../src/core/error-handler.js';
import {UserBreak} from '../../src/core/errors/user-break.js';
import {InMemoryTreeStore, InMemoryTreeStoreFactory} from '../helpers/in-memory-tree-store.js';
import {RecordingLogger} from '../helpers/recording-logger.js';
import {getTmpDir} from '../test-utility.js';
import {resetForTest} from '../test-container.js';

describe('main', () => {
  let logger: RecordingLogger;
  let destination: InMemoryTreeStore;
  let options: ContainerOptions;

  beforeEach(() => {
    logger = new RecordingLogger();
    const factory = new InMemoryTreeStoreFactory();
    factory.add('src:2181').seed('/a', 'A').seed('/a/b', 'B');
    destination = factory.add('dst:2181').seed('/z/b', 'old');
    options = {testLogger: logger, storeFactory: factory, homeDirectory: getTmpDir()};
    resetForTest(options);
  });

  it('runs a command with its flags', async () => {
    const context: MainContext = {};

    await main(['node', 'ztree', 'copy', 'src:2181/a', 'dst:2181/z', '--overwrite'], context, options);

    expect(context.logger).to.equal(logger);
    expect(destination.text('/z/b')).to.equal('B');
    expect(logger.lists.get('copy summary')).to.deep.equal(['written: 2', 'skipped: 0', 'failed: 0']);
    expect(logger.shown).to.include('Current Command\t\t: copy src:2181/a dst:2181/z --overwrite');
  });

  it('raises the log level with --verbose', async () => {
    logger.level = 'info';
    await main(['node', 'ztree', 'copy', 'src:2181/a', 'dst:2181/z', '--verbose'], {}, options);

    expect(logger.level).to.equal('debug');
    expect(logger.messages('debug')).to.include('ZNode at /z/b already exists. Skipping due to --no-clobber');
  });

  it('fails on conflicting policy flags', async () => {
    const error: unknown = await main(
      ['node', 'ztree', 'copy', 'src:2181/a', 'dst:2181/z', '--no-clobber', '--overwrite'],
      {},
      options,
    ).then(
      () => undefined,
      (thrown: unknown) => thrown,
    );

    expect(error).to.be.instanceOf(Error);
    expect(ErrorHandler.exitCodeOf(error)).to.equal(1);
    expect(String(error)).to.contain('only one conflict policy may be given, found --no-clobber and --overwrite');
  });

  it('shows the version and breaks', async () => {
    await expect(main(['node', 'ztree', '--version'], {}, options)).to.be.rejectedWith(
      UserBreak,
      'displayed version information, exiting',
    );
    expect(logger.shown[1]).to.match(/^Version\t\t\t: \d+\.\d+\.\d+/);
  });
});
