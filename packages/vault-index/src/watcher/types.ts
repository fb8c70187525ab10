/**
 * Types for vault change watchers.
 */

import type { WatchMode, WatcherConfig } from '../config.js';
import type { EventHandler } from '../core/EventEmitter.js';
import type { WatcherFailureError } from '../core/errors.js';
import type { VaultScanner } from '../discovery/VaultScanner.js';
import type { MutationInput } from '../queue/MutationQueue.js';

// ============================================================================
// Watcher Events
// ============================================================================

export type FileChangeType = 'add' | 'change' | 'unlink';

export interface ChangeWatcherEvents {
  /** Index signature for EventEmitter compatibility */
  [key: string]: unknown;
  mutation: MutationInput;
  error: WatcherFailureError;
  ready: { vaultName: string; mode: WatchMode };
}

// ============================================================================
// Watcher Interface
// ============================================================================

/**
 * Observes one vault and emits a mutation for every change to a
 * recognized document. Renames arrive as a delete plus an upsert.
 * Emissions may repeat.
 */
export interface ChangeWatcher {
  readonly vaultName: string;
  readonly mode: WatchMode;
  start(): Promise<void>;
  stop(): Promise<void>;
  isWatching(): boolean;
  on<K extends keyof ChangeWatcherEvents>(
    event: K,
    handler: EventHandler<ChangeWatcherEvents[K]>,
  ): () => void;
}

export interface ChangeWatcherOptions {
  scanner: VaultScanner;
  config: WatcherConfig;
}
