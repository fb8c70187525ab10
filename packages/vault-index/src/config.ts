/**
 * Configuration types and defaults for the vault index.
 */

import { ConfigError } from './core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

/** Requested coordination role. `auto` competes for PRIMARY. */
export type CoordinatorRole = 'auto' | 'primary' | 'reader';

export type WatchMode = 'events' | 'polling';

export type EmbedderProvider = 'transformers' | 'hashing';

export interface VaultConfig {
  /** Unique vault name, used in URIs and as part of the document key */
  name: string;
  /** Root directory of the vault */
  path: string;
}

export interface DatabaseConfig {
  /** Path to the SQLite file. Default: .vault-index/index.db */
  path: string;
  /** Use an in-memory database (tests only; not shared between processes). Default: false */
  inMemory: boolean;
  /** SQLite busy timeout for lock waits (ms). Default: 5000 */
  busyTimeoutMs: number;
}

export interface EmbeddingsConfig {
  /** Embedding backend. Default: 'transformers' */
  provider: EmbedderProvider;
  /** Model identifier or registry alias. Default: 'Xenova/paraphrase-MiniLM-L6-v2' */
  model: string;
  /** Vector dimension (must match model). Default: 384 */
  dimensions: number;
  /** Prefix for query embeddings. Default: '' */
  queryPrefix: string;
  /** Prefix for document embeddings. Default: '' */
  documentPrefix: string;
  /** Device for ONNX inference. Default: 'cpu' */
  device: 'cpu' | 'cuda' | 'dml' | 'auto';
  /** Quantization for ONNX weights. Default: 'q8' */
  quantization: 'fp32' | 'fp16' | 'q8' | 'q4';
  /** Model cache directory. Default: library default */
  cacheDir?: string;
}

export interface CoordinationConfig {
  /** Requested role. Default: 'auto' */
  role: CoordinatorRole;
  /** Heartbeat (PRIMARY) and poll (READER) interval (ms). Default: 5000 */
  heartbeatIntervalMs: number;
  /** A lease older than this is considered abandoned (ms). Default: 15000 */
  leaseTimeoutMs: number;
  /** Retries after a failed renewal before the PRIMARY demotes itself. Default: 3 */
  renewalRetries: number;
  /** Base backoff between renewal retries (ms). Default: 500 */
  renewalBackoffMs: number;
  /**
   * Deadline for a single claim or renewal (ms). Also the SQLite busy
   * timeout of lease statements. Default: 5000
   */
  claimTimeoutMs: number;
}

export interface WatcherConfig {
  /** Watch vaults for changes after startup. Default: true */
  enabled: boolean;
  /** Event-driven (chokidar) or polling. Default: 'events' */
  mode: WatchMode;
  /** Poll interval for polling mode (ms). Default: 2000 */
  pollIntervalMs: number;
  /** Per-path debounce for event mode (ms). Default: 300 */
  debounceMs: number;
  /** Recognized document extensions. Default: ['.md'] */
  extensions: string[];
  /** Directory names never watched or indexed */
  ignorePaths: string[];
  /** Restart attempts after a watcher error. Default: 3 */
  maxRestartAttempts: number;
  /** Delay between restart attempts (ms). Default: 5000 */
  restartDelayMs: number;
}

export interface IndexingConfig {
  /** Max documents per embedding call. Default: 16 */
  batchSize: number;
  /** Max total bytes of document text per embedding call. Default: 1MB */
  maxBatchBytes: number;
  /** Attempts per document before it is skipped. Default: 3 */
  maxEmbeddingAttempts: number;
  /** Base backoff between embedding retries (ms). Default: 500 */
  embeddingBackoffMs: number;
  /** Attempts per commit before the failure is fatal. Default: 5 */
  maxStorageAttempts: number;
  /** Base backoff between commit retries (ms). Default: 200 */
  storageBackoffMs: number;
  /** Reconcile every vault when becoming PRIMARY. Default: true */
  reindexOnStart: boolean;
  /** Skip files larger than this (bytes). Default: 10MB */
  maxFileSize: number;
}

export interface SearchConfig {
  /** Default number of results. Default: 10 */
  defaultLimit: number;
  /** Upper bound on requested results. Default: 100 */
  maxLimit: number;
  /** Excerpt length in characters. Default: 500 */
  excerptLength: number;
  /** URI scheme for resources. Default: 'obsidian' */
  uriScheme: string;
  /** Number of recent notes listed as resources. Default: 20 */
  recentLimit: number;
}

export interface WorkerConfig {
  /** Where the worker runs. Default: 'child-process' */
  mode: 'child-process' | 'in-process';
  /** Deadline for a single request (ms). Default: 30000 */
  requestTimeoutMs: number;
  /** Deadline for the init handshake (ms). Default: 120000 */
  startupTimeoutMs: number;
  /** Grace period before a worker is killed on shutdown (ms). Default: 5000 */
  shutdownTimeoutMs: number;
}

export interface LoggingConfig {
  /** Minimum level name. Default: 'info' */
  level: string;
  /** Emit JSON lines instead of human-readable text. Default: false */
  json: boolean;
  /** Optional log file. */
  filePath?: string;
}

export interface VaultIndexConfig {
  vaults: VaultConfig[];
  database: DatabaseConfig;
  embeddings: EmbeddingsConfig;
  coordination: CoordinationConfig;
  watcher: WatcherConfig;
  indexing: IndexingConfig;
  search: SearchConfig;
  worker: WorkerConfig;
  logging: LoggingConfig;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_DATABASE_CONFIG: DatabaseConfig = {
  path: '.vault-index/index.db',
  inMemory: false,
  busyTimeoutMs: 5000,
};

export const DEFAULT_EMBEDDINGS_CONFIG: EmbeddingsConfig = {
  provider: 'transformers',
  model: 'Xenova/paraphrase-MiniLM-L6-v2',
  dimensions: 384,
  queryPrefix: '',
  documentPrefix: '',
  device: 'cpu',
  quantization: 'q8',
};

export const DEFAULT_COORDINATION_CONFIG: CoordinationConfig = {
  role: 'auto',
  heartbeatIntervalMs: 5000,
  leaseTimeoutMs: 15000,
  renewalRetries: 3,
  renewalBackoffMs: 500,
  claimTimeoutMs: 5000,
};

export const DEFAULT_WATCHER_CONFIG: WatcherConfig = {
  enabled: true,
  mode: 'events',
  pollIntervalMs: 2000,
  debounceMs: 300,
  extensions: ['.md'],
  ignorePaths: ['.obsidian', '.trash', '.git', 'node_modules'],
  maxRestartAttempts: 3,
  restartDelayMs: 5000,
};

export const DEFAULT_INDEXING_CONFIG: IndexingConfig = {
  batchSize: 16,
  maxBatchBytes: 1024 * 1024,
  maxEmbeddingAttempts: 3,
  embeddingBackoffMs: 500,
  maxStorageAttempts: 5,
  storageBackoffMs: 200,
  reindexOnStart: true,
  maxFileSize: 10 * 1024 * 1024,
};

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  defaultLimit: 10,
  maxLimit: 100,
  excerptLength: 500,
  uriScheme: 'obsidian',
  recentLimit: 20,
};

export const DEFAULT_WORKER_CONFIG: WorkerConfig = {
  mode: 'child-process',
  requestTimeoutMs: 30000,
  startupTimeoutMs: 120000,
  shutdownTimeoutMs: 5000,
};

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: 'info',
  json: false,
};

export const DEFAULT_CONFIG: VaultIndexConfig = {
  vaults: [],
  database: DEFAULT_DATABASE_CONFIG,
  embeddings: DEFAULT_EMBEDDINGS_CONFIG,
  coordination: DEFAULT_COORDINATION_CONFIG,
  watcher: DEFAULT_WATCHER_CONFIG,
  indexing: DEFAULT_INDEXING_CONFIG,
  search: DEFAULT_SEARCH_CONFIG,
  worker: DEFAULT_WORKER_CONFIG,
  logging: DEFAULT_LOGGING_CONFIG,
};

// ============================================================================
// Configuration Utilities
// ============================================================================

/**
 * Deep partial type for nested partial objects. Arrays are replaced whole.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends readonly unknown[]
    ? T[P]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

/**
 * Overlay defined values of `overrides` onto a copy of `defaults`.
 */
function mergeSection<T extends object>(
  defaults: T,
  overrides: Partial<T> | undefined,
): T {
  const result = { ...defaults };
  if (!overrides) return result;

  for (const key of Object.keys(overrides) as Array<keyof T>) {
    const value = overrides[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Create a complete configuration by merging partial config with defaults.
 */
export function createConfig(
  partial?: DeepPartial<VaultIndexConfig>,
): VaultIndexConfig {
  return {
    vaults: (partial?.vaults ?? DEFAULT_CONFIG.vaults).map((v) => ({ ...v })),
    database: mergeSection(DEFAULT_DATABASE_CONFIG, partial?.database),
    embeddings: mergeSection(DEFAULT_EMBEDDINGS_CONFIG, partial?.embeddings),
    coordination: mergeSection(
      DEFAULT_COORDINATION_CONFIG,
      partial?.coordination,
    ),
    watcher: mergeSection(DEFAULT_WATCHER_CONFIG, partial?.watcher),
    indexing: mergeSection(DEFAULT_INDEXING_CONFIG, partial?.indexing),
    search: mergeSection(DEFAULT_SEARCH_CONFIG, partial?.search),
    worker: mergeSection(DEFAULT_WORKER_CONFIG, partial?.worker),
    logging: mergeSection(DEFAULT_LOGGING_CONFIG, partial?.logging),
  };
}

/**
 * Merge two partial configs; `override` wins section by section, key by key.
 */
export function mergePartialConfigs(
  base: DeepPartial<VaultIndexConfig>,
  override: DeepPartial<VaultIndexConfig>,
): DeepPartial<VaultIndexConfig> {
  return {
    vaults: override.vaults ?? base.vaults,
    database: { ...base.database, ...override.database },
    embeddings: { ...base.embeddings, ...override.embeddings },
    coordination: { ...base.coordination, ...override.coordination },
    watcher: { ...base.watcher, ...override.watcher },
    indexing: { ...base.indexing, ...override.indexing },
    search: { ...base.search, ...override.search },
    worker: { ...base.worker, ...override.worker },
    logging: { ...base.logging, ...override.logging },
  };
}

function requirePositive(value: number, name: string): void {
  if (!(value > 0)) {
    throw new ConfigError(`${name} must be positive`, { [name]: value });
  }
}

function requireNonNegative(value: number, name: string): void {
  if (!(value >= 0)) {
    throw new ConfigError(`${name} cannot be negative`, { [name]: value });
  }
}

/**
 * Validate configuration values.
 * Throws a ConfigError if configuration is invalid.
 */
export function validateConfig(config: VaultIndexConfig): void {
  const names = new Set<string>();
  for (const vault of config.vaults) {
    if (!vault.name || vault.name.includes('/')) {
      throw new ConfigError('Vault name must be non-empty and contain no "/"', {
        name: vault.name,
      });
    }
    if (names.has(vault.name)) {
      throw new ConfigError(`Duplicate vault name: ${vault.name}`);
    }
    if (!vault.path) {
      throw new ConfigError(`Vault ${vault.name} has no path`);
    }
    names.add(vault.name);
  }

  if (!config.database.path && !config.database.inMemory) {
    throw new ConfigError(
      'Database path is required when not using in-memory mode',
    );
  }
  requireNonNegative(config.database.busyTimeoutMs, 'busyTimeoutMs');

  if (!config.embeddings.model) {
    throw new ConfigError('Embedding model is required');
  }
  requirePositive(config.embeddings.dimensions, 'dimensions');

  const coordination = config.coordination;
  requirePositive(coordination.heartbeatIntervalMs, 'heartbeatIntervalMs');
  requirePositive(coordination.leaseTimeoutMs, 'leaseTimeoutMs');
  requirePositive(coordination.claimTimeoutMs, 'claimTimeoutMs');
  requireNonNegative(coordination.renewalRetries, 'renewalRetries');
  requireNonNegative(coordination.renewalBackoffMs, 'renewalBackoffMs');
  if (coordination.leaseTimeoutMs <= coordination.heartbeatIntervalMs) {
    throw new ConfigError(
      'leaseTimeoutMs must be greater than heartbeatIntervalMs',
      {
        leaseTimeoutMs: coordination.leaseTimeoutMs,
        heartbeatIntervalMs: coordination.heartbeatIntervalMs,
      },
    );
  }

  requirePositive(config.watcher.pollIntervalMs, 'pollIntervalMs');
  requireNonNegative(config.watcher.debounceMs, 'debounceMs');
  requireNonNegative(config.watcher.maxRestartAttempts, 'maxRestartAttempts');
  if (config.watcher.extensions.length === 0) {
    throw new ConfigError('At least one document extension is required');
  }
  for (const ext of config.watcher.extensions) {
    if (!ext.startsWith('.')) {
      throw new ConfigError(`Extension must start with ".": ${ext}`);
    }
  }

  requirePositive(config.indexing.batchSize, 'batchSize');
  requirePositive(config.indexing.maxBatchBytes, 'maxBatchBytes');
  requirePositive(config.indexing.maxEmbeddingAttempts, 'maxEmbeddingAttempts');
  requirePositive(config.indexing.maxStorageAttempts, 'maxStorageAttempts');
  requirePositive(config.indexing.maxFileSize, 'maxFileSize');

  requirePositive(config.search.defaultLimit, 'defaultLimit');
  requirePositive(config.search.excerptLength, 'excerptLength');
  if (config.search.maxLimit < config.search.defaultLimit) {
    throw new ConfigError('maxLimit must be at least defaultLimit');
  }
  if (!/^[a-z][a-z0-9+.-]*$/.test(config.search.uriScheme)) {
    throw new ConfigError(`Invalid URI scheme: ${config.search.uriScheme}`);
  }

  requirePositive(config.worker.requestTimeoutMs, 'requestTimeoutMs');
  requirePositive(config.worker.startupTimeoutMs, 'startupTimeoutMs');
  requirePositive(config.worker.shutdownTimeoutMs, 'shutdownTimeoutMs');
}
