// SPDX-License-Identifier: Apache-2.0

import {type SinonSpy, type SinonStub} from 'sinon';
import sinon from 'sinon';
import {expect} from 'chai';
import {describe, it, afterEach, beforeEach} from 'mocha';
import winston from 'winston';

import {type ZTreeLogger} from '../../../src/core/logging/ztree-logger.js';
import {ZTreeWinstonLogger} from '../../../src/core/logging/ztree-winston-logger.js';
import {ZTreeError} from '../../../src/core/errors/ztree-error.js';
import {CustomProcessOutput} from '../../../src/core/process-output.js';
import {getTestCacheDirectory} from '../../test-utility.js';
import {RecordingLogger} from '../../helpers/recording-logger.js';

describe('Logging', () => {
  let logger: ZTreeLogger;
  let loggerSpy: SinonSpy;
  let consoleStub: SinonStub;

  beforeEach(() => {
    logger = new ZTreeWinstonLogger('debug', false, getTestCacheDirectory('logs'));
    loggerSpy = sinon.spy(winston.Logger.prototype, 'log');
    consoleStub = sinon.stub(console, 'log');
  });

  // Cleanup after each test
  afterEach(() => sinon.restore());

  it('should log at correct severity', () => {
    const meta = logger.prepMeta();

    logger.error('Error log');
    expect(loggerSpy).to.have.been.calledWith('error', 'Error log', meta);

    logger.warn('Warn log');
    expect(loggerSpy).to.have.been.calledWith('warn', 'Warn log', meta);

    logger.info('Info log');
    expect(loggerSpy).to.have.been.calledWith('info', 'Info log', meta);

    logger.debug('Debug log');
    expect(loggerSpy).to.have.been.calledWith('debug', 'Debug log', meta);
  });

  it('shows user messages on the console and logs them', () => {
    logger.showUser('written: %d', 3);

    expect(consoleStub).to.have.been.calledWith('written: 3');
    expect(loggerSpy).to.have.been.calledWith('info', 'written: 3');
  });

  it('changes the trace id', () => {
    const first = logger.prepMeta().traceId;
    logger.nextTraceId();
    expect(logger.prepMeta().traceId).to.be.a('string').and.not.equal(first);
  });

  it('shows only the message of an error outside dev mode', () => {
    logger.showUserError(new ZTreeError('copy failed', new Error('socket closed')));

    const lines = consoleStub.getCalls().map(call => String(call.args[0]));
    expect(lines).to.have.lengthOf(3);
    expect(lines[1]).to.equal('copy failed');
  });

  it('shows the cause chain in dev mode', () => {
    logger.setDevMode(true);
    logger.showUserError(new ZTreeError('copy failed', new Error('socket closed')));

    const lines = consoleStub.getCalls().map(call => String(call.args[0]));
    expect(lines).to.include('copy failed');
    expect(lines).to.include('  Caused by: socket closed');
  });
});

describe('CustomProcessOutput', () => {
  it('logs listr output through the logger', () => {
    const logger = new RecordingLogger();
    const output = new CustomProcessOutput(logger);

    sinon.stub(process.stdout, 'write').returns(true);
    sinon.stub(process.stderr, 'write').returns(true);
    try {
      output.toStdout('Copy ZNodes\nSummary');
      output.toStderr('Connect failed');
    } finally {
      sinon.restore();
    }

    expect(logger.logged).to.deep.equal([
      {level: 'debug', message: 'Copy ZNodes'},
      {level: 'debug', message: 'Summary'},
      {level: 'error', message: 'Connect failed'},
    ]);
  });
});
