// SPDX-License-Identifier: Apache-2.0

export enum ConflictPolicy {
  NO_CLOBBER = 'no-clobber',
  INTERACTIVE = 'interactive',
  OVERWRITE = 'overwrite',
}

export enum ConflictDecision {
  WRITE = 'write',
  SKIP = 'skip',
  ABORT = 'abort',
}

export type PromptAnswer = 'write' | 'skip' | 'abort';

/** Asks the user what to do with a destination node that already exists. */
export type ConflictPrompt = (path: string) => Promise<PromptAnswer>;
