// SPDX-License-Identifier: Apache-2.0

import {TreeError} from './tree-error.js';

/** A record sequence handed to the serializer is not a pre-order traversal of a single tree. */
export class MalformedSequenceError extends TreeError {
  public constructor(message: string, path: string) {
    super(message, path);
  }
}
