// SPDX-License-Identifier: Apache-2.0

import {select as selectPrompt} from '@inquirer/prompts';
import {ListrInquirerPromptAdapter} from '@listr2/prompt-adapter-inquirer';
import {type ConflictPrompt, type PromptAnswer} from './conflict-policy.js';
import {type ZTreeListrTaskWrapper} from '../../types/index.js';
import {IllegalArgumentError} from '../errors/illegal-argument-error.js';

export type StickyAnswer = PromptAnswer | 'write-all' | 'skip-all';

const STICKY_CHOICES: {name: string; value: StickyAnswer}[] = [
  {name: 'Overwrite', value: 'write'},
  {name: 'Skip', value: 'skip'},
  {name: 'Overwrite this and all remaining conflicts', value: 'write-all'},
  {name: 'Skip this and all remaining conflicts', value: 'skip-all'},
  {name: 'Abort', value: 'abort'},
];

const isStickyAnswer = (value: unknown): value is StickyAnswer =>
  STICKY_CHOICES.some(choice => choice.value === value);

/**
 * Wraps a prompt so that a "write-all" or "skip-all" answer is remembered and returned for every later conflict
 * without asking again.
 */
export function withStickyAnswers(ask: (path: string) => Promise<StickyAnswer>): ConflictPrompt {
  let remembered: PromptAnswer | undefined;
  return async (path: string): Promise<PromptAnswer> => {
    if (remembered !== undefined) {
      return remembered;
    }

    const answer = await ask(path);
    switch (answer) {
      case 'write-all': {
        remembered = 'write';
        return remembered;
      }
      case 'skip-all': {
        remembered = 'skip';
        return remembered;
      }
      default: {
        return answer;
      }
    }
  };
}

/**
 * Prompt rendered by listr2 above the running task list.
 */
export function listrConflictPrompt<T>(task: ZTreeListrTaskWrapper<T>): ConflictPrompt {
  return withStickyAnswers(async (path: string): Promise<StickyAnswer> => {
    const answer: unknown = await task.prompt(ListrInquirerPromptAdapter).run(selectPrompt, {
      message: `ZNode at ${path} already exists at destination. Overwrite?`,
      choices: STICKY_CHOICES,
    });
    if (!isStickyAnswer(answer)) {
      throw new IllegalArgumentError(`unexpected answer to the conflict prompt: ${String(answer)}`, answer);
    }
    return answer;
  });
}

export interface TerminalStream {
  readonly isTTY?: boolean;
}

/**
 * @throws IllegalArgumentError when either stream is not attached to a terminal
 */
export function assertTerminal(input: TerminalStream, output: TerminalStream): void {
  if (!input.isTTY || !output.isTTY) {
    throw new IllegalArgumentError(
      '--interactive needs a terminal to prompt on; use --no-clobber or --overwrite in scripts and pipes',
    );
  }
}
