// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {Flags as flags} from '../../../src/commands/flags.js';

describe('Flags', () => {
  describe('stringifyArgv', () => {
    it('keeps set flags under their full names', () => {
      expect(
        flags.stringifyArgv({
          _: ['copy'],
          $0: 'ztree',
          source: 'zk1:2181/a',
          overwrite: true,
          interactive: false,
          v: true,
          verbose: true,
          file: 'tree.yaml',
        }),
      ).to.equal('--overwrite --verbose --file tree.yaml');
    });

    it('drops empty and unknown values', () => {
      expect(flags.stringifyArgv({_: ['export'], file: '', noClobber: true, dev: undefined})).to.equal('');
    });
  });

  it('lists every conflict flag once', () => {
    expect(flags.conflictFlags.map(flag => flag.name)).to.deep.equal(['no-clobber', 'interactive', 'overwrite']);
    expect(flags.allFlagsMap.get('no-clobber')).to.equal(flags.noClobber);
    expect(flags.allFlags).to.have.lengthOf(flags.allFlagsMap.size);
  });
});
