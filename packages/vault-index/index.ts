/**
 * Vault Index - coordinated semantic indexing of markdown vaults.
 *
 * @packageDocumentation
 */

// Configuration
export type {
  VaultIndexConfig,
  VaultConfig,
  DatabaseConfig,
  EmbeddingsConfig,
  CoordinationConfig,
  CoordinatorRole,
  WatcherConfig,
  WatchMode,
  IndexingConfig,
  SearchConfig,
  WorkerConfig,
  LoggingConfig,
  DeepPartial,
} from './src/config.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_DATABASE_CONFIG,
  DEFAULT_EMBEDDINGS_CONFIG,
  DEFAULT_COORDINATION_CONFIG,
  DEFAULT_WATCHER_CONFIG,
  DEFAULT_INDEXING_CONFIG,
  DEFAULT_SEARCH_CONFIG,
  DEFAULT_WORKER_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  createConfig,
  mergePartialConfigs,
  validateConfig,
} from './src/config.js';

export type { ResolveConfigOptions, UserConfigFile } from './src/config/user-config.js';
export {
  USER_CONFIG_FILENAME,
  configFromEnvironment,
  loadConfigFile,
  resolveConfig,
} from './src/config/user-config.js';

// Core
export { EventEmitter } from './src/core/EventEmitter.js';
export type { EventHandler } from './src/core/EventEmitter.js';
export {
  Logger,
  LogLevel,
  globalLogger,
  createModuleLogger,
  parseLogLevel,
} from './src/core/Logger.js';
export type { LogEntry, LoggerConfig } from './src/core/Logger.js';
export {
  VaultIndexError,
  VaultIndexErrorKind,
  LeaseConflictError,
  StaleRoleError,
  EmbeddingFailureError,
  StorageFailureError,
  ModelMismatchError,
  WatcherFailureError,
  WorkerUnavailableError,
  ConfigError,
} from './src/core/errors.js';

// Hashing
export { ContentHasher, hashContent } from './src/hashing/ContentHasher.js';

// Storage
export type {
  DocumentKey,
  DocumentState,
  DocumentUpsert,
  CommitBatch,
  CommitResult,
  IndexModelInfo,
  LeaseRecord,
  StorageAdapter,
  StorageStats,
  VectorHit,
} from './src/storage/types.js';
export { SQLiteStorage } from './src/storage/SQLiteStorage.js';

// Embedders
export type { Embedder } from './src/embedders/types.js';
export { HashingEmbedder } from './src/embedders/HashingEmbedder.js';
export { TransformersJsEmbedder } from './src/embedders/TransformersJsEmbedder.js';
export { createEmbedder } from './src/embedders/createEmbedder.js';
export { SUPPORTED_MODELS, findModel } from './src/embedders/models.js';

// Discovery and watching
export { VaultScanner } from './src/discovery/VaultScanner.js';
export type { ChangeWatcher, ChangeWatcherEvents } from './src/watcher/types.js';
export { PollingChangeWatcher } from './src/watcher/PollingChangeWatcher.js';
export { ChokidarChangeWatcher } from './src/watcher/ChokidarChangeWatcher.js';
export { createChangeWatcher } from './src/watcher/createChangeWatcher.js';

// Queue, coordination, indexing, search
export { MutationQueue } from './src/queue/MutationQueue.js';
export type { Mutation, MutationInput } from './src/queue/MutationQueue.js';
export { Coordinator } from './src/coordination/Coordinator.js';
export type {
  CoordinatorEvents,
  CoordinatorState,
  CoordinatorStatus,
} from './src/coordination/Coordinator.js';
export { Indexer } from './src/indexing/Indexer.js';
export type { IndexerEvents, IndexerStats, WriteGate } from './src/indexing/Indexer.js';
export { Searcher, toNoteUri, parseNoteUri } from './src/search/Searcher.js';
export type { SearchRequest, SearchResult, RecentNote } from './src/search/Searcher.js';

// Worker
export { WorkerHost } from './src/worker/WorkerHost.js';
export { ControllerFacade } from './src/worker/ControllerFacade.js';
export type { ControllerFacadeEvents } from './src/worker/ControllerFacade.js';
export type { WorkerStatus, WorkerReindexResult } from './src/worker/protocol.js';
export type { WorkerChannel, WorkerExit } from './src/worker/channels/types.js';
export { ChildProcessChannel } from './src/worker/channels/ChildProcessChannel.js';
export { InProcessChannel } from './src/worker/channels/InProcessChannel.js';

// MCP
export { createMcpServer, serveStdio } from './src/mcp/server.js';
export type { NotesBackend } from './src/mcp/handlers.js';
