// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  HomeDirectory: Symbol.for('HomeDirectory'),
  LogsDirectory: Symbol.for('LogsDirectory'),
  LocalConfigFileName: Symbol.for('LocalConfigFileName'),
  EnvironmentPrefix: Symbol.for('EnvironmentPrefix'),
  ZTreeLogger: Symbol.for('ZTreeLogger'),
  ErrorHandler: Symbol.for('ErrorHandler'),
  Middlewares: Symbol.for('Middlewares'),
  ConfigManager: Symbol.for('ConfigManager'),
  ObjectMapper: Symbol.for('ObjectMapper'),
  KeyFormatter: Symbol.for('KeyFormatter'),
  ConfigProvider: Symbol.for('ConfigProvider'),
  SettingsLoader: Symbol.for('SettingsLoader'),
  LocalConfigSchema: Symbol.for('LocalConfigSchema'),
  TreeDocumentSchema: Symbol.for('TreeDocumentSchema'),
  TreeDocumentFile: Symbol.for('TreeDocumentFile'),
  TreeStoreFactory: Symbol.for('TreeStoreFactory'),
  TreeWalker: Symbol.for('TreeWalker'),
  TreeSerializer: Symbol.for('TreeSerializer'),
  ConflictResolver: Symbol.for('ConflictResolver'),
  Replicator: Symbol.for('Replicator'),
  TreeCommandHandlers: Symbol.for('TreeCommandHandlers'),
  TreeCommandTasks: Symbol.for('TreeCommandTasks'),
  TreeCommandConfigs: Symbol.for('TreeCommandConfigs'),
};
