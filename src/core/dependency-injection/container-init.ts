// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {type ZTreeLogger} from '../logging/ztree-logger.js';
import {ZTreeWinstonLogger} from '../logging/ztree-winston-logger.js';
import {InjectTokens} from './inject-tokens.js';
import {ConfigManager} from '../config-manager.js';
import {ErrorHandler} from '../error-handler.js';
import {Middlewares} from '../middlewares.js';
import {SettingsLoader} from '../config/settings-loader.js';
import {LayeredConfigProvider} from '../../data/configuration/impl/layered-config-provider.js';
import {ClassToObjectMapper} from '../../data/mapper/impl/class-to-object-mapper.js';
import {ConfigKeyFormatter} from '../../data/key/config-key-formatter.js';
import {LocalConfigSchema} from '../../data/schema/migration/impl/local/local-config-schema.js';
import {TreeDocumentSchema} from '../../data/schema/migration/impl/tree/tree-document-schema.js';
import {TreeWalker} from '../tree/tree-walker.js';
import {TreeSerializer} from '../tree/tree-serializer.js';
import {ConflictResolver} from '../tree/conflict-resolver.js';
import {Replicator} from '../tree/replicator.js';
import {TreeDocumentFile} from '../tree/tree-document-file.js';
import {ZooKeeperTreeStoreFactory} from '../../integration/zookeeper/zookeeper-tree-store-factory.js';
import {type TreeStoreFactory} from '../tree/tree-store-factory.js';
import {TreeCommandHandlers} from '../../commands/tree/handlers.js';
import {TreeCommandTasks} from '../../commands/tree/tasks.js';
import {TreeCommandConfigs} from '../../commands/tree/configs.js';
import {PathEx} from '../../business/utils/path-ex.js';

export interface ContainerOptions {
  homeDirectory?: string;
  logLevel?: string;
  developmentMode?: boolean;
  testLogger?: ZTreeLogger;
  /** replaces the ZooKeeper client, for tests */
  storeFactory?: TreeStoreFactory;
}

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance: Container | undefined;
  private static isInitialized = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   */
  public init(options: ContainerOptions = {}): void {
    const {
      homeDirectory = constants.ZTREE_HOME_DIR,
      logLevel = 'info',
      developmentMode = false,
      testLogger,
      storeFactory,
    } = options;

    if (Container.isInitialized) {
      container.resolve<ZTreeLogger>(InjectTokens.ZTreeLogger).debug('Container already initialized');
      return;
    }

    // ZTreeLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    container.register(InjectTokens.HomeDirectory, {useValue: homeDirectory});
    container.register(InjectTokens.LogsDirectory, {useValue: PathEx.join(homeDirectory, 'logs')});
    if (testLogger) {
      container.registerInstance(InjectTokens.ZTreeLogger, testLogger);
      container.resolve<ZTreeLogger>(InjectTokens.ZTreeLogger).debug('Using test logger');
    } else {
      container.register(InjectTokens.ZTreeLogger, {useClass: ZTreeWinstonLogger}, {lifecycle: Lifecycle.Singleton});
      container.resolve<ZTreeLogger>(InjectTokens.ZTreeLogger).debug('Using default logger');
    }

    // Data Layer ObjectMapper
    container.register(InjectTokens.ObjectMapper, {useClass: ClassToObjectMapper}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.KeyFormatter, {useValue: ConfigKeyFormatter.instance()});

    // Data Layer Config
    container.register(InjectTokens.EnvironmentPrefix, {useValue: constants.ENVIRONMENT_PREFIX});
    container.register(InjectTokens.LocalConfigFileName, {useValue: constants.DEFAULT_LOCAL_CONFIG_FILE});
    container.register(
      InjectTokens.ConfigProvider,
      {useClass: LayeredConfigProvider},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.LocalConfigSchema, {useClass: LocalConfigSchema}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.TreeDocumentSchema,
      {useClass: TreeDocumentSchema},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.SettingsLoader, {useClass: SettingsLoader}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ConfigManager, {useClass: ConfigManager}, {lifecycle: Lifecycle.Singleton});

    // Tree engine
    if (storeFactory) {
      container.registerInstance(InjectTokens.TreeStoreFactory, storeFactory);
    } else {
      container.register(
        InjectTokens.TreeStoreFactory,
        {useClass: ZooKeeperTreeStoreFactory},
        {lifecycle: Lifecycle.Singleton},
      );
    }
    container.register(InjectTokens.TreeWalker, {useClass: TreeWalker}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.TreeSerializer, {useClass: TreeSerializer}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.ConflictResolver, {useClass: ConflictResolver}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.Replicator, {useClass: Replicator}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.TreeDocumentFile, {useClass: TreeDocumentFile}, {lifecycle: Lifecycle.Singleton});

    container.resolve<ZTreeLogger>(InjectTokens.ZTreeLogger).debug('Container initialized');
    Container.isInitialized = true;

    // Commands
    container.register(
      InjectTokens.TreeCommandHandlers,
      {useClass: TreeCommandHandlers},
      {lifecycle: Lifecycle.Singleton},
    );
    container.register(InjectTokens.TreeCommandTasks, {useClass: TreeCommandTasks}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.TreeCommandConfigs,
      {useClass: TreeCommandConfigs},
      {lifecycle: Lifecycle.Singleton},
    );

    container.register(InjectTokens.ErrorHandler, {useClass: ErrorHandler}, {lifecycle: Lifecycle.Singleton});
    container.register(InjectTokens.Middlewares, {useClass: Middlewares}, {lifecycle: Lifecycle.Singleton});
  }

  /**
   * clears the container registries and re-initializes the container
   */
  public reset(options: ContainerOptions = {}): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<ZTreeLogger>(InjectTokens.ZTreeLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(options);
  }

  /**
   * only call dispose when you are about to system exit
   */
  public async dispose(): Promise<void> {
    await container.dispose();
  }
}
