// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import * as constants from '../../core/constants.js';
import {CommandHandler} from '../../core/command-handler.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {type TreeCommandTasks} from './tasks.js';
import {type TreeCommandConfigs} from './configs.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type TreePrintContext} from './config-interfaces/tree-print-context.js';
import {type TreeCopyContext} from './config-interfaces/tree-copy-context.js';
import {type TreeExportContext} from './config-interfaces/tree-export-context.js';
import {type TreeImportContext} from './config-interfaces/tree-import-context.js';

@injectable()
export class TreeCommandHandlers extends CommandHandler {
  private readonly tasks: TreeCommandTasks;
  private readonly configs: TreeCommandConfigs;

  public constructor(
    @inject(InjectTokens.TreeCommandTasks) tasks?: TreeCommandTasks,
    @inject(InjectTokens.TreeCommandConfigs) configs?: TreeCommandConfigs,
  ) {
    super();

    this.tasks = patchInject(tasks, InjectTokens.TreeCommandTasks, this.constructor.name);
    this.configs = patchInject(configs, InjectTokens.TreeCommandConfigs, this.constructor.name);
  }

  public async print(argv: ArgvStruct): Promise<boolean> {
    await this.commandAction<TreePrintContext>(
      argv,
      [
        this.tasks.initialize(argv, this.configs.printConfigBuilder.bind(this.configs)),
        this.tasks.connectSource<TreePrintContext>(config => config.location),
        this.tasks.printTree(),
      ],
      {
        concurrent: false,
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      },
      'tree print',
    );

    return true;
  }

  /**
   * - Connect to both ensembles.
   * - Stream the source walk into the destination, resolving conflicts by policy.
   * - Show the written, skipped and failed counts.
   */
  public async copy(argv: ArgvStruct): Promise<boolean> {
    await this.commandAction<TreeCopyContext>(
      argv,
      [
        this.tasks.initialize(argv, this.configs.copyConfigBuilder.bind(this.configs)),
        this.tasks.connectSource<TreeCopyContext>(config => config.source),
        this.tasks.connectDestination<TreeCopyContext>(config => config.destination),
        this.tasks.copyTree(),
        this.tasks.showSummary<TreeCopyContext>('copy'),
      ],
      {
        concurrent: false,
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      },
      'tree copy',
    );

    return true;
  }

  public async export(argv: ArgvStruct): Promise<boolean> {
    await this.commandAction<TreeExportContext>(
      argv,
      [
        this.tasks.initialize(argv, this.configs.exportConfigBuilder.bind(this.configs)),
        this.tasks.connectSource<TreeExportContext>(config => config.location),
        this.tasks.exportTree(),
        this.tasks.showExportSummary(),
      ],
      {
        concurrent: false,
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      },
      'tree export',
    );

    return true;
  }

  public async import(argv: ArgvStruct): Promise<boolean> {
    await this.commandAction<TreeImportContext>(
      argv,
      [
        this.tasks.initialize(argv, this.configs.importConfigBuilder.bind(this.configs)),
        this.tasks.readDocument(),
        this.tasks.connectDestination<TreeImportContext>(config => config.location),
        this.tasks.importTree(),
        this.tasks.showSummary<TreeImportContext>('import'),
      ],
      {
        concurrent: false,
        rendererOptions: constants.LISTR_DEFAULT_RENDERER_OPTION,
      },
      'tree import',
    );

    return true;
  }
}
