// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../dependency-injection/inject-tokens.js';
import {patchInject} from '../dependency-injection/container-helper.js';
import {type ZTreeLogger} from '../logging/ztree-logger.js';
import {type ConflictResolver} from './conflict-resolver.js';
import {ConflictDecision, ConflictPolicy, type ConflictPrompt} from './conflict-policy.js';
import {type TreeStore} from './tree-store.js';
import {type WalkSource} from './walk-item.js';
import {type NodeRecord} from './node-record.js';
import {ZNodePath} from './znode-path.js';
import {emptySummary, type ReplicationSummary} from './replication-summary.js';
import {TreeStoreError, TreeStoreErrorCode} from './errors/tree-store-error.js';
import {WriteFailureError} from './errors/write-failure-error.js';
import {RootFailureError} from './errors/root-failure-error.js';
import {isTransient, reasonOf, type RetryOptions, withRetry} from './retry.js';

export interface ReplicationOptions {
  policy: ConflictPolicy;
  prompt?: ConflictPrompt;
  retry: RetryOptions;
}

/**
 * Writes a pre-order sequence of records beneath a destination root. Copying is additive: existing nodes are
 * overwritten or skipped, and nodes that only exist at the destination are left alone.
 */
@injectable()
export class Replicator {
  private readonly logger: ZTreeLogger;
  private readonly resolver: ConflictResolver;

  public constructor(
    @inject(InjectTokens.ZTreeLogger) logger?: ZTreeLogger,
    @inject(InjectTokens.ConflictResolver) resolver?: ConflictResolver,
  ) {
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
    this.resolver = patchInject(resolver, InjectTokens.ConflictResolver, this.constructor.name);
  }

  /**
   * The parent of `destinationRoot` must already exist.
   *
   * @throws RootFailureError when the destination root cannot be written
   */
  public async replicate(
    items: WalkSource,
    destination: TreeStore,
    destinationRoot: string,
    options: ReplicationOptions,
  ): Promise<ReplicationSummary> {
    ZNodePath.validate(destinationRoot);
    const summary = emptySummary();
    let sourceRoot: string | undefined;

    for await (const item of items) {
      if (item.kind !== 'node') {
        const path = sourceRoot === undefined ? item.path : ZNodePath.rebase(item.path, sourceRoot, destinationRoot);
        summary.failed++;
        summary.failures.push({path, reason: item.error.message});
        continue;
      }

      const record = item.record;
      sourceRoot ??= record.path;
      const targetPath = ZNodePath.rebase(record.path, sourceRoot, destinationRoot);
      const isRoot = targetPath === destinationRoot;

      try {
        const decision = await this.replicateNode(record, destination, targetPath, options);
        if (decision === ConflictDecision.ABORT) {
          summary.aborted = true;
          summary.abortedAt = targetPath;
          this.logger.info(`Aborting replication at ${targetPath}`);
          return summary;
        }
        if (decision === ConflictDecision.WRITE) {
          summary.written++;
        } else {
          summary.skipped++;
        }
      } catch (error) {
        if (!(error instanceof WriteFailureError)) {
          throw error;
        }
        if (isRoot) {
          throw new RootFailureError(targetPath, error);
        }
        this.logger.error(error.message);
        summary.failed++;
        summary.failures.push({path: targetPath, reason: reasonOf(error.cause)});
      }
    }

    return summary;
  }

  private async replicateNode(
    record: NodeRecord,
    destination: TreeStore,
    targetPath: string,
    options: ReplicationOptions,
  ): Promise<ConflictDecision> {
    const exists = await this.attempt(targetPath, options.retry, () => destination.exists(targetPath));
    const decision = await this.resolver.decide(targetPath, exists, options.policy, options.prompt);

    if (!exists) {
      this.logger.debug(`Writing new ZNode at ${targetPath}`);
      await this.attempt(targetPath, options.retry, async attempt => {
        try {
          await destination.create(targetPath, record.data);
        } catch (error) {
          // an earlier attempt may have been applied before its reply was lost
          if (attempt > 1 && TreeStoreError.isCode(error, TreeStoreErrorCode.NODE_EXISTS)) {
            this.logger.debug(`ZNode at ${targetPath} was created by an earlier attempt`);
            return;
          }
          throw error;
        }
      });
      return decision;
    }

    switch (decision) {
      case ConflictDecision.WRITE: {
        this.logger.debug(
          options.policy === ConflictPolicy.OVERWRITE
            ? `ZNode at ${targetPath} already exists. Overwriting data due to --overwrite`
            : `Overwriting ZNode data at ${targetPath}`,
        );
        await this.attempt(targetPath, options.retry, () => destination.setData(targetPath, record.data));
        break;
      }
      case ConflictDecision.SKIP: {
        this.logger.debug(
          options.policy === ConflictPolicy.NO_CLOBBER
            ? `ZNode at ${targetPath} already exists. Skipping due to --no-clobber`
            : `Skipping ZNode at ${targetPath}`,
        );
        break;
      }
      case ConflictDecision.ABORT: {
        break;
      }
    }
    return decision;
  }

  /**
   * @throws WriteFailureError once the operation fails for good
   */
  private async attempt<T>(
    path: string,
    retry: RetryOptions,
    operation: (attempt: number) => Promise<T>,
  ): Promise<T> {
    try {
      return await withRetry(path, retry, this.logger, operation);
    } catch (error) {
      throw new WriteFailureError(path, isTransient(error), error);
    }
  }
}
