// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {afterEach, describe, it} from 'mocha';

import {ErrorHandler} from '../../../src/core/error-handler.js';
import {ZTreeError} from '../../../src/core/errors/ztree-error.js';
import {UserBreak} from '../../../src/core/errors/user-break.js';
import {SilentBreak} from '../../../src/core/errors/silent-break.js';
import {IllegalArgumentError} from '../../../src/core/errors/illegal-argument-error.js';
import {ConflictAbortError} from '../../../src/core/tree/errors/conflict-abort-error.js';
import {ReplicationIncompleteError} from '../../../src/core/tree/errors/replication-incomplete-error.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';

describe('ErrorHandler', () => {
  const incomplete = new ReplicationIncompleteError({
    written: 2,
    skipped: 0,
    failed: 1,
    aborted: false,
    failures: [{path: '/z/b', reason: 'create /z/b failed: NoAuth'}],
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  describe('exitCodeOf', () => {
    it('returns 0 for a break', () => {
      expect(ErrorHandler.exitCodeOf(new UserBreak('done'))).to.equal(0);
      expect(ErrorHandler.exitCodeOf(new SilentBreak('done'))).to.equal(0);
    });

    it('returns 2 for an aborted or incomplete replication, also when wrapped', () => {
      expect(ErrorHandler.exitCodeOf(new ConflictAbortError('/z/b'))).to.equal(2);
      expect(ErrorHandler.exitCodeOf(incomplete)).to.equal(2);
      expect(ErrorHandler.exitCodeOf(new ZTreeError('copy failed', new ConflictAbortError('/z/b')))).to.equal(2);
    });

    it('returns 1 for anything else', () => {
      expect(ErrorHandler.exitCodeOf(new IllegalArgumentError('bad location'))).to.equal(1);
      expect(ErrorHandler.exitCodeOf(new Error('boom'))).to.equal(1);
      expect(ErrorHandler.exitCodeOf('not an error')).to.equal(1);
    });
  });

  describe('handle', () => {
    it('shows a user break and exits cleanly', () => {
      const logger = new RecordingLogger();
      new ErrorHandler(logger).handle(new UserBreak('displayed version information, exiting'));

      expect(logger.shown).to.deep.equal(['displayed version information, exiting']);
      expect(logger.errors).to.be.empty;
      expect(process.exitCode).to.equal(0);
    });

    it('logs a silent break without showing it', () => {
      const logger = new RecordingLogger();
      new ErrorHandler(logger).handle(new SilentBreak('nothing to do'));

      expect(logger.shown).to.be.empty;
      expect(logger.messages('info')).to.deep.equal(['nothing to do']);
      expect(process.exitCode).to.equal(0);
    });

    it('shows other errors and sets the exit code', () => {
      const logger = new RecordingLogger();
      new ErrorHandler(logger).handle(incomplete);

      expect(logger.errors).to.deep.equal([incomplete]);
      expect(process.exitCode).to.equal(2);
    });
  });
});

describe('ZTreeError', () => {
  it('keeps the cause and appends its stack', () => {
    const cause = new Error('socket closed');
    const error = new ZTreeError('connect failed', cause, {host: 'zk1'});

    expect(error.name).to.equal('ZTreeError');
    expect(error.cause).to.equal(cause);
    expect(error.meta).to.deep.equal({host: 'zk1'});
    expect(error.stack).to.contain('Caused by: Error: socket closed');
  });

  it('names subclasses after themselves', () => {
    const error = new IllegalArgumentError('bad flag', '--x');
    expect(error.name).to.equal('IllegalArgumentError');
    expect(error.meta).to.deep.equal({value: '--x'});
  });
});
