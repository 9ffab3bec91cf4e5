// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Listr, type ListrBaseClassOptions} from 'listr2';
import {type ZTreeLogger} from './logging/ztree-logger.js';
import {patchInject} from './dependency-injection/container-helper.js';
import {ZTreeError} from './errors/ztree-error.js';
import {InjectTokens} from './dependency-injection/inject-tokens.js';
import {type TreeStoreFactory} from './tree/tree-store-factory.js';
import {type ZTreeListrTask} from '../types/index.js';
import {type ArgvStruct} from '../types/aliases.js';

@injectable()
export class CommandHandler {
  protected readonly logger: ZTreeLogger;
  private readonly storeFactory: TreeStoreFactory;

  public constructor(
    @inject(InjectTokens.ZTreeLogger) logger?: ZTreeLogger,
    @inject(InjectTokens.TreeStoreFactory) storeFactory?: TreeStoreFactory,
  ) {
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
    this.storeFactory = patchInject(storeFactory, InjectTokens.TreeStoreFactory, this.constructor.name);
  }

  /**
   * Runs the task list and closes every ensemble session it opened, whether the tasks succeeded or not.
   *
   * @returns the task list context after the last task
   */
  public async commandAction<T extends object>(
    argv: ArgvStruct,
    actionTasks: ZTreeListrTask<T>[],
    options: ListrBaseClassOptions<T>,
    errorString: string,
  ): Promise<T> {
    this.logger.debug(`${errorString}: running ${actionTasks.length} task(s) for ${argv._.join(' ')}`);
    const tasks = new Listr<T>([...actionTasks], options);
    try {
      return await tasks.run();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ZTreeError(`${errorString}: ${message}`, error);
    } finally {
      await this.storeFactory.closeAll();
    }
  }
}
