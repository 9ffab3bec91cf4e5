// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {type ZTreeLogger} from './logging/ztree-logger.js';
import {UserBreak} from './errors/user-break.js';
import {SilentBreak} from './errors/silent-break.js';
import {ConflictAbortError} from './tree/errors/conflict-abort-error.js';
import {ReplicationIncompleteError} from './tree/errors/replication-incomplete-error.js';
import {EXIT_CODE_FATAL, EXIT_CODE_INCOMPLETE, EXIT_CODE_SUCCESS} from './constants.js';

@injectable()
export class ErrorHandler {
  private readonly logger: ZTreeLogger;

  public constructor(@inject(InjectTokens.ZTreeLogger) logger?: ZTreeLogger) {
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
  }

  /**
   * Reports the error and sets the process exit code: 0 for a break, 2 for an aborted or partially failed
   * replication, 1 for anything else.
   */
  public handle(error: unknown): void {
    const breakError = ErrorHandler.find(error, (e): e is UserBreak | SilentBreak => {
      return e instanceof UserBreak || e instanceof SilentBreak;
    });
    if (breakError instanceof UserBreak) {
      this.logger.showUser(breakError.message);
    } else if (breakError instanceof SilentBreak) {
      this.logger.info(breakError.message);
    } else {
      this.logger.showUserError(error);
    }

    process.exitCode = ErrorHandler.exitCodeOf(error);
  }

  public static exitCodeOf(error: unknown): number {
    if (ErrorHandler.find(error, (e): e is UserBreak | SilentBreak => e instanceof UserBreak || e instanceof SilentBreak)) {
      return EXIT_CODE_SUCCESS;
    }
    if (
      ErrorHandler.find(
        error,
        (e): e is ConflictAbortError | ReplicationIncompleteError =>
          e instanceof ConflictAbortError || e instanceof ReplicationIncompleteError,
      )
    ) {
      return EXIT_CODE_INCOMPLETE;
    }
    return EXIT_CODE_FATAL;
  }

  /**
   * Walks the cause chain and returns the first error matching `predicate`.
   */
  private static find<T extends Error>(error: unknown, predicate: (error: Error) => error is T): T | undefined {
    let current: unknown = error;
    for (let depth = 0; current instanceof Error && depth < 10; depth++) {
      if (predicate(current)) {
        return current;
      }
      current = current.cause;
    }
    return undefined;
  }
}
