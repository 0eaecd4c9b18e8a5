// Node adapters for @agentloom/agents

// Platform
export { FileSystemAdapter } from './platform/FileSystemAdapter.js';

// Logging
export { Logger, parseLogLevel } from './logging/Logger.js';
export type { LoggerOptions } from './logging/Logger.js';

// Configuration
export { ConfigLoader, merge as mergeConfigLayers, CONFIG_DIR, CONFIG_FILE } from './config/ConfigLoader.js';
export {
  RuntimeConfigSchema,
  ConfigLayerSchema,
  ContextConfigSchema,
  AgentsConfigSchema,
  ToolsConfigSchema,
  LoggingConfigSchema,
  StorageConfigSchema,
  formatIssues,
} from './config/schemas.js';
export type { ConfigLoaderOptions, ConfigLoadOptions } from './config/ConfigLoader.js';
export type {
  RuntimeConfig,
  ConfigLayer,
  ContextConfig,
  AgentsConfig,
  LoggingConfig,
} from './config/schemas.js';

// Storage
export { DatabaseManager } from './storage/Database.js';
export { SqlMemoryStore, escapeLike } from './storage/SqlMemoryStore.js';
export type { DatabaseConfig, RunResult, Row } from './storage/Database.js';

// Runtime
export { createRuntime, windowStrategy } from './runtime/createRuntime.js';
export type { AgentRuntime, RuntimeOptions } from './runtime/createRuntime.js';
