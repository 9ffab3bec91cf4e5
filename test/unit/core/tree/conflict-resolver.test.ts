// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import sinon from 'sinon';

import {ConflictResolver} from '../../../../src/core/tree/conflict-resolver.js';
import {ConflictDecision, ConflictPolicy, type PromptAnswer} from '../../../../src/core/tree/conflict-policy.js';
import {MissingArgumentError} from '../../../../src/core/errors/missing-argument-error.js';

describe('ConflictResolver', () => {
  const resolver = new ConflictResolver();

  it('writes a node that does not exist under every policy without prompting', async () => {
    const prompt = sinon.stub<[string], Promise<PromptAnswer>>().resolves('abort');

    for (const policy of [ConflictPolicy.NO_CLOBBER, ConflictPolicy.OVERWRITE, ConflictPolicy.INTERACTIVE]) {
      expect(await resolver.decide('/a', false, policy, prompt)).to.equal(ConflictDecision.WRITE);
    }
    expect(prompt).to.not.have.been.called;
  });

  it('overwrites an existing node under --overwrite', async () => {
    expect(await resolver.decide('/a', true, ConflictPolicy.OVERWRITE)).to.equal(ConflictDecision.WRITE);
  });

  it('skips an existing node under --no-clobber', async () => {
    expect(await resolver.decide('/a', true, ConflictPolicy.NO_CLOBBER)).to.equal(ConflictDecision.SKIP);
  });

  it('asks the prompt about an existing node under --interactive', async () => {
    const prompt = sinon.stub<[string], Promise<PromptAnswer>>();
    prompt.onFirstCall().resolves('write').onSecondCall().resolves('skip').onThirdCall().resolves('abort');

    expect(await resolver.decide('/a', true, ConflictPolicy.INTERACTIVE, prompt)).to.equal(ConflictDecision.WRITE);
    expect(await resolver.decide('/b', true, ConflictPolicy.INTERACTIVE, prompt)).to.equal(ConflictDecision.SKIP);
    expect(await resolver.decide('/c', true, ConflictPolicy.INTERACTIVE, prompt)).to.equal(ConflictDecision.ABORT);
    expect(prompt.firstCall.args).to.deep.equal(['/a']);
  });

  it('requires a prompt for --interactive', async () => {
    await expect(resolver.decide('/a', true, ConflictPolicy.INTERACTIVE)).to.be.rejectedWith(
      MissingArgumentError,
      'the interactive conflict policy requires a prompt',
    );
  });
});
