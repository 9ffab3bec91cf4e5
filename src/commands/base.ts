// SPDX-License-Identifier: Apache-2.0

import {type ZTreeLogger} from '../core/logging/ztree-logger.js';
import {type ConfigManager} from '../core/config-manager.js';
import {patchInject} from '../core/dependency-injection/container-helper.js';
import {InjectTokens} from '../core/dependency-injection/inject-tokens.js';
import {type CommandDefinition} from '../types/index.js';

export abstract class BaseCommand {
  public readonly logger: ZTreeLogger;
  public readonly configManager: ConfigManager;

  protected constructor(logger?: ZTreeLogger, configManager?: ConfigManager) {
    this.logger = patchInject(logger, InjectTokens.ZTreeLogger, this.constructor.name);
    this.configManager = patchInject(configManager, InjectTokens.ConfigManager, this.constructor.name);
  }

  public abstract getCommandDefinitions(): CommandDefinition[];
}
