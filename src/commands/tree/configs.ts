// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {Flags as flags} from '../flags.js';
import {InjectTokens} from '../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../core/dependency-injection/container-helper.js';
import {type ConfigManager} from '../../core/config-manager.js';
import {type SettingsLoader} from '../../core/config/settings-loader.js';
import {type ZTreeLogger} from '../../core/logging/ztree-logger.js';
import {EnsembleLocation} from '../../core/ensemble-location.js';
import {ConflictPolicy} from '../../core/tree/conflict-policy.js';
import {assertTerminal} from '../../core/tree/conflict-prompts.js';
import {IllegalArgumentError} from '../../core/errors/illegal-argument-error.js';
import {MissingArgumentError} from '../../core/errors/missing-argument-error.js';
import {PathEx} from '../../business/utils/path-ex.js';
import {type ArgvStruct} from '../../types/aliases.js';
import {type CommandFlag} from '../../types/flag-types.js';
import {type TreePrintContext} from './config-interfaces/tree-print-context.js';
import {type TreePrintConfigClass} from './config-interfaces/tree-print-config-class.js';
import {type TreeCopyContext} from './config-interfaces/tree-copy-context.js';
import {type TreeCopyConfigClass} from './config-interfaces/tree-copy-config-class.js';
import {type TreeExportContext} from './config-interfaces/tree-export-context.js';
import {type TreeExportConfigClass} from './config-interfaces/tree-export-config-class.js';
import {type TreeImportContext} from './config-interfaces/tree-import-context.js';
import {type TreeImportConfigClass} from './config-interfaces/tree-import-config-class.js';

export interface TerminalStreams {
  input: {readonly isTTY?: boolean};
  output: {readonly isTTY?: boolean};
}

@injectable()
export class TreeCommandConfigs {
  private readonly configManager: ConfigManager;
  private readonly settingsLoader: SettingsLoader;
  private readonly logger: ZTreeLogger;

  /** streams an interactive run prompts on */
  public terminal: TerminalStreams = {input: process.stdin, output: process.stdout};

  public constructor(
    @inject(InjectTokens.ConfigManager) configManager?: ConfigManager,
    @inject(InjectTokens.SettingsLoader) settingsLoader?: SettingsLoader,
    @inject(InjectTokens.ZTreeLogger) logger?: ZTreeLogger,
  ) {
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
    this.settingsLoader = patchInject(settingsLoader, InjectTokens.SettingsLoader, this.constructor.name);
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
  }

  public async printConfigBuilder(argv: ArgvStruct, context_: TreePrintContext): Promise<TreePrintConfigClass> {
    this.rejectFlag(argv, flags.file, 'print');
    this.configManager.update(argv);

    const settings = await this.settingsLoader.load();
    context_.config = {
      settings,
      location: EnsembleLocation.parse(TreeCommandConfigs.positional(argv, flags.location.name), settings.ensembles),
    };
    return context_.config;
  }

  public async copyConfigBuilder(argv: ArgvStruct, context_: TreeCopyContext): Promise<TreeCopyConfigClass> {
    this.rejectFlag(argv, flags.file, 'copy');
    this.configManager.update(argv);

    const policy = this.policy();
    const settings = await this.settingsLoader.load();
    context_.config = {
      settings,
      source: EnsembleLocation.parse(TreeCommandConfigs.positional(argv, flags.source.name), settings.ensembles),
      destination: EnsembleLocation.parse(
        TreeCommandConfigs.positional(argv, flags.destination.name),
        settings.ensembles,
      ),
      policy,
    };
    return context_.config;
  }

  public async exportConfigBuilder(argv: ArgvStruct, context_: TreeExportContext): Promise<TreeExportConfigClass> {
    this.configManager.update(argv);

    const settings = await this.settingsLoader.load();
    context_.config = {
      settings,
      location: EnsembleLocation.parse(TreeCommandConfigs.positional(argv, flags.location.name), settings.ensembles),
      file: this.file('export'),
    };
    return context_.config;
  }

  public async importConfigBuilder(argv: ArgvStruct, context_: TreeImportContext): Promise<TreeImportConfigClass> {
    this.configManager.update(argv);

    const policy = this.policy();
    const settings = await this.settingsLoader.load();
    context_.config = {
      settings,
      location: EnsembleLocation.parse(TreeCommandConfigs.positional(argv, flags.location.name), settings.ensembles),
      file: this.file('import'),
      policy,
    };
    return context_.config;
  }

  /**
   * At most one conflict flag may be given; none means {@link ConflictPolicy.NO_CLOBBER}.
   *
   * @throws IllegalArgumentError when several conflict flags are given, or when `--interactive` is given without a
   * terminal
   */
  private policy(): ConflictPolicy {
    const given = flags.conflictFlags.filter(flag => this.configManager.getBooleanFlag(flag));
    if (given.length > 1) {
      throw new IllegalArgumentError(
        `only one conflict policy may be given, found ${given.map(flag => `--${flag.name}`).join(' and ')}`,
        given.map(flag => flag.name),
      );
    }

    const policy = TreeCommandConfigs.POLICIES.get(given[0]?.name ?? flags.noClobber.name) ?? ConflictPolicy.NO_CLOBBER;
    if (policy === ConflictPolicy.INTERACTIVE) {
      assertTerminal(this.terminal.input, this.terminal.output);
    }
    this.logger.debug(`Conflict policy: ${policy}`);
    return policy;
  }

  private file(action: string): string {
    const file = this.configManager.getStringFlag(flags.file);
    if (!file) {
      throw new MissingArgumentError(`--${flags.file.name} is required for ${action}`);
    }
    return PathEx.resolve(file);
  }

  private rejectFlag(argv: ArgvStruct, flag: CommandFlag, action: string): void {
    if (argv[flag.name] !== undefined) {
      throw new IllegalArgumentError(`--${flag.name} should not be used with ${action}`, argv[flag.name]);
    }
  }

  private static readonly POLICIES: ReadonlyMap<string, ConflictPolicy> = new Map([
    [flags.noClobber.name, ConflictPolicy.NO_CLOBBER],
    [flags.interactive.name, ConflictPolicy.INTERACTIVE],
    [flags.overwrite.name, ConflictPolicy.OVERWRITE],
  ]);

  private static positional(argv: ArgvStruct, name: string): string {
    const value = argv[name];
    if (typeof value !== 'string' || value.length === 0) {
      throw new MissingArgumentError(`<${name}> is required`);
    }
    return value;
  }
}
