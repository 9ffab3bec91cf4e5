// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type ZTreeLogger} from '../../core/logging/ztree-logger.js';
import {type TreeStoreFactory} from '../../core/tree/tree-store-factory.js';
import {type TreeStore} from '../../core/tree/tree-store.js';
import {type TreeWalker} from '../../core/tree/tree-walker.js';
import {type TreeSerializer} from '../../core/tree/tree-serializer.js';
import {type ReplicationOptions, type Replicator} from '../../core/tree/replicator.js';
import {reasonOf, type RetryOptions} from '../../core/tree/retry.js';
import {type TreeDocumentFile} from '../../core/tree/tree-document-file.js';
import {TreePrinter} from '../../core/tree/tree-printer.js';
import {ConflictPolicy} from '../../core/tree/conflict-policy.js';
import {listrConflictPrompt} from '../../core/tree/conflict-prompts.js';
import {type ReplicationSummary, summaryLines} from '../../core/tree/replication-summary.js';
import {nodeItems, type SkippedItem, type WalkItem, type WalkSource} from '../../core/tree/walk-item.js';
import {ConflictAbortError} from '../../core/tree/errors/conflict-abort-error.js';
import {ReplicationIncompleteError} from '../../core/tree/errors/replication-incomplete-error.js';
import {MissingArgumentError} from '../../core/errors/missing-argument-error.js';
import {type EnsembleLocation} from '../../core/ensemble-location.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type ZTreeListrTask, type ZTreeListrTaskWrapper} from '../../types/index.js';
import {type TreeCommandConfigClass, type TreeCommandContext} from './config-interfaces/tree-command-context.js';
import {type TreePrintContext} from './config-interfaces/tree-print-context.js';
import {type TreeCopyContext} from './config-interfaces/tree-copy-context.js';
import {type TreeExportContext} from './config-interfaces/tree-export-context.js';
import {type TreeImportContext} from './config-interfaces/tree-import-context.js';

export type ConfigBuilder<T extends TreeCommandContext, C extends TreeCommandConfigClass> = (
  argv: ArgvStruct,
  context_: T,
  task: ZTreeListrTaskWrapper<T>,
) => Promise<C>;

@injectable()
export class TreeCommandTasks {
  private readonly logger: ZTreeLogger;
  private readonly storeFactory: TreeStoreFactory;
  private readonly walker: TreeWalker;
  private readonly serializer: TreeSerializer;
  private readonly replicator: Replicator;
  private readonly documentFile: TreeDocumentFile;

  public constructor(
    @inject(InjectTokens.ZTreeLogger) logger?: ZTreeLogger,
    @inject(InjectTokens.TreeStoreFactory) storeFactory?: TreeStoreFactory,
    @inject(InjectTokens.TreeWalker) walker?: TreeWalker,
    @inject(InjectTokens.TreeSerializer) serializer?: TreeSerializer,
    @inject(InjectTokens.Replicator) replicator?: Replicator,
    @inject(InjectTokens.TreeDocumentFile) documentFile?: TreeDocumentFile,
  ) {
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
    this.storeFactory = patchInject(storeFactory, InjectTokens.TreeStoreFactory, this.constructor.name);
    this.walker = patchInject(walker, InjectTokens.TreeWalker, this.constructor.name);
    this.serializer = patchInject(serializer, InjectTokens.TreeSerializer, this.constructor.name);
    this.replicator = patchInject(replicator, InjectTokens.Replicator, this.constructor.name);
    this.documentFile = patchInject(documentFile, InjectTokens.TreeDocumentFile, this.constructor.name);
  }

  public initialize<T extends TreeCommandContext, C extends TreeCommandConfigClass>(
    argv: ArgvStruct,
    configInit: ConfigBuilder<T, C>,
  ): ZTreeListrTask<T> {
    return {
      title: 'Initialize',
      task: async (context_, task) => {
        await configInit(argv, context_, task);
      },
    };
  }

  public connectSource<T extends TreeCommandContext>(
    locationOf: (config: T['config']) => EnsembleLocation,
  ): ZTreeListrTask<T> {
    return {
      title: 'Connect to source ensemble',
      task: async (context_, task) => {
        const location = locationOf(context_.config);
        task.title = `Connect to source ensemble ${location.connectString}`;
        const target: TreeCommandContext = context_;
        target.source = await this.storeFactory.connect(location.connectString, context_.config.settings.session);
      },
    };
  }

  public connectDestination<T extends TreeCommandContext>(
    locationOf: (config: T['config']) => EnsembleLocation,
  ): ZTreeListrTask<T> {
    return {
      title: 'Connect to destination ensemble',
      task: async (context_, task) => {
        const location = locationOf(context_.config);
        task.title = `Connect to destination ensemble ${location.connectString}`;
        const target: TreeCommandContext = context_;
        target.destination = await this.storeFactory.connect(location.connectString, context_.config.settings.session);
      },
    };
  }

  public printTree(): ZTreeListrTask<TreePrintContext> {
    return {
      title: 'Print ZNodes',
      task: async context_ => {
        const {location, settings} = context_.config;
        const printer = new TreePrinter(settings.print);
        const walk = this.walker.walk(
          TreeCommandTasks.connected(context_.source, 'source'),
          location.path,
          settings.retry,
        );
        let printed = 0;
        for await (const block of printer.blocks(walk)) {
          this.logger.showUser(block);
          printed++;
        }
        context_.printed = printed;
        this.logger.debug(`Printed ${printed} ZNode(s) under ${location.toString()}`);
      },
    };
  }

  public exportTree(): ZTreeListrTask<TreeExportContext> {
    return {
      title: 'Export ZNodes',
      task: async (context_, task) => {
        const {location, file, settings} = context_.config;
        const counter = {exported: 0};
        const skipped: SkippedItem[] = [];
        const walk = this.walker.walk(
          TreeCommandTasks.connected(context_.source, 'source'),
          location.path,
          settings.retry,
        );

        const document = await this.serializer.toDocument(TreeCommandTasks.counted(walk, counter), {
          onSkipped: item => skipped.push(item),
          exportedAt: new Date(),
        });
        await this.documentFile.write(file, document);

        context_.exported = counter.exported;
        context_.skipped = skipped;
        task.title = `Exported ${counter.exported} ZNode(s) to ${file}`;
      },
    };
  }

  public readDocument(): ZTreeListrTask<TreeImportContext> {
    return {
      title: 'Read tree document',
      task: async (context_, task) => {
        context_.document = await this.documentFile.read(context_.config.file);
        task.title = `Read tree document ${context_.config.file} (exported from ${context_.document.rootPath})`;
      },
    };
  }

  public copyTree(): ZTreeListrTask<TreeCopyContext> {
    return {
      title: 'Copy ZNodes',
      task: async (context_, task) => {
        const {source, destination, policy, settings} = context_.config;
        const walk = this.walker.walk(
          TreeCommandTasks.connected(context_.source, 'source'),
          source.path,
          settings.retry,
        );
        context_.summary = await this.replicator.replicate(
          walk,
          TreeCommandTasks.connected(context_.destination, 'destination'),
          destination.path,
          TreeCommandTasks.replicationOptions(policy, settings.retry, task),
        );
      },
    };
  }

  public importTree(): ZTreeListrTask<TreeImportContext> {
    return {
      title: 'Import ZNodes',
      task: async (context_, task) => {
        const {location, policy, settings} = context_.config;
        if (!context_.document) {
          throw new MissingArgumentError('no tree document was read');
        }
        const records = this.serializer.fromDocument(context_.document, location.path);
        context_.summary = await this.replicator.replicate(
          nodeItems(records),
          TreeCommandTasks.connected(context_.destination, 'destination'),
          location.path,
          TreeCommandTasks.replicationOptions(policy, settings.retry, task),
        );
      },
    };
  }

  /**
   * Shows the counts and then fails the run when it was aborted or when any ZNode failed.
   */
  public showSummary<T extends TreeCommandContext>(action: string): ZTreeListrTask<T> {
    return {
      title: 'Summary',
      task: async context_ => {
        const summary: ReplicationSummary | undefined = context_.summary;
        if (!summary) {
          throw new MissingArgumentError(`${action} produced no summary`);
        }

        this.logger.showList(`${action} summary`, summaryLines(summary));
        if (summary.aborted) {
          throw new ConflictAbortError(summary.abortedAt ?? '');
        }
        if (summary.failed > 0) {
          throw new ReplicationIncompleteError(summary);
        }
      },
    };
  }

  public showExportSummary(): ZTreeListrTask<TreeExportContext> {
    return {
      title: 'Summary',
      task: async context_ => {
        const skipped = context_.skipped ?? [];
        const vanished = skipped.filter(item => item.kind === 'vanished');
        const unreadable = skipped.filter(item => item.kind === 'unreadable');
        this.logger.showList('export summary', [
          `exported: ${context_.exported ?? 0}`,
          `vanished: ${vanished.length}`,
          `unreadable: ${unreadable.length}`,
          ...skipped.map(item =>
            item.kind === 'vanished'
              ? `${item.path}: removed while it was being read`
              : `${item.path}: ${reasonOf(item.error.cause)}`,
          ),
        ]);

        if (unreadable.length > 0) {
          throw new ReplicationIncompleteError(
            {
              written: context_.exported ?? 0,
              skipped: 0,
              failed: unreadable.length,
              aborted: false,
              failures: unreadable.map(item => ({path: item.path, reason: reasonOf(item.error.cause)})),
            },
            'export',
          );
        }
      },
    };
  }

  private static replicationOptions<T>(
    policy: ConflictPolicy,
    retry: RetryOptions,
    task: ZTreeListrTaskWrapper<T>,
  ): ReplicationOptions {
    return {policy, retry, prompt: policy === ConflictPolicy.INTERACTIVE ? listrConflictPrompt(task) : undefined};
  }

  private static connected(store: TreeStore | undefined, role: string): TreeStore {
    if (!store) {
      throw new MissingArgumentError(`not connected to the ${role} ensemble`);
    }
    return store;
  }

  private static async *counted(items: WalkSource, counter: {exported: number}): AsyncGenerator<WalkItem> {
    for await (const item of items) {
      if (item.kind === 'node') {
        counter.exported++;
      }
      yield item;
    }
  }
}
