// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {EnvironmentConfigSource} from '../../../../../src/data/configuration/impl/environment-config-source.js';

describe('EnvironmentConfigSource', () => {
  it('has the highest ordinal', () => {
    const source: EnvironmentConfigSource = new EnvironmentConfigSource('ZTREE', {});
    expect(source.name).to.equal('EnvironmentConfigSource');
    expect(source.ordinal).to.equal(100);
    expect(source.prefix).to.equal('ZTREE');
  });

  it('reads camel case keys from upper snake case variables', async () => {
    const source: EnvironmentConfigSource = new EnvironmentConfigSource('ZTREE', {
      ZTREE_RETRY_MAX_ATTEMPTS: '7',
      ZTREE_SESSION_TIMEOUT_MILLIS: '5000',
    });
    await source.load();

    expect(source.asNumber('retry.maxAttempts')).to.equal(7);
    expect(source.asString('session.timeoutMillis')).to.equal('5000');
    expect(source.asString('print.maxDataLength')).to.be.null;
  });

  it('reads ensemble aliases as a lower case map', async () => {
    const source: EnvironmentConfigSource = new EnvironmentConfigSource('ZTREE', {
      ZTREE_ENSEMBLES_PROD: 'zk1:2181,zk2:2181',
      ZTREE_ENSEMBLES_STAGE: 'zk9:2181',
      ZTREE_ENSEMBLES_: 'ignored',
    });
    await source.load();

    expect(source.asStringMap('ensembles')).to.deep.equal(
      new Map([
        ['prod', 'zk1:2181,zk2:2181'],
        ['stage', 'zk9:2181'],
      ]),
    );
  });

  it('treats a blank number as unset', async () => {
    const source: EnvironmentConfigSource = new EnvironmentConfigSource('ZTREE', {ZTREE_RETRY_MAX_ATTEMPTS: ' '});
    await source.load();
    expect(source.asNumber('retry.maxAttempts')).to.be.null;
  });

  it('refresh picks up changed values', async () => {
    const environment: NodeJS.ProcessEnv = {ZTREE_RETRY_MAX_ATTEMPTS: '2'};
    const source: EnvironmentConfigSource = new EnvironmentConfigSource('ZTREE', environment);
    await source.load();
    environment.ZTREE_RETRY_MAX_ATTEMPTS = '4';
    await source.refresh();
    expect(source.asNumber('retry.maxAttempts')).to.equal(4);
  });
});
