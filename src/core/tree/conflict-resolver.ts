// SPDX-License-Identifier: Apache-2.0

import {injectable} from 'tsyringe-neo';
import {ConflictDecision, ConflictPolicy, type ConflictPrompt, type PromptAnswer} from './conflict-policy.js';
import {MissingArgumentError} from '../errors/missing-argument-error.js';

const DECISIONS: Record<PromptAnswer, ConflictDecision> = {
  write: ConflictDecision.WRITE,
  skip: ConflictDecision.SKIP,
  abort: ConflictDecision.ABORT,
};

/**
 * Decides whether a node is written to the destination. Holds no state; the interactive policy defers to the prompt
 * only when the node already exists.
 */
@injectable()
export class ConflictResolver {
  public async decide(
    path: string,
    existsAtDestination: boolean,
    policy: ConflictPolicy,
    prompt?: ConflictPrompt,
  ): Promise<ConflictDecision> {
    if (!existsAtDestination) {
      return ConflictDecision.WRITE;
    }

    switch (policy) {
      case ConflictPolicy.OVERWRITE: {
        return ConflictDecision.WRITE;
      }
      case ConflictPolicy.NO_CLOBBER: {
        return ConflictDecision.SKIP;
      }
      case ConflictPolicy.INTERACTIVE: {
        if (!prompt) {
          throw new MissingArgumentError('the interactive conflict policy requires a prompt');
        }
        return DECISIONS[await prompt(path)];
      }
    }
  }
}
