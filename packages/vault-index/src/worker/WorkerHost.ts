/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Coordinator } from '../coordination/Coordinator.js';
import type {
  CoordinatorEvents,
  CoordinatorOptions,
} from '../coordination/Coordinator.js';
import { EventEmitter } from '../core/EventEmitter.js';
import { createModuleLogger } from '../core/Logger.js';
import { StorageFailureError, errorMessage } from '../core/errors.js';
import type { VaultIndexConfig } from '../config.js';
import { VaultScanner } from '../discovery/VaultScanner.js';
import { createEmbedder } from '../embedders/createEmbedder.js';
import type { Embedder } from '../embedders/types.js';
import { Indexer } from '../indexing/Indexer.js';
import { MutationQueue } from '../queue/MutationQueue.js';
import { Searcher } from '../search/Searcher.js';
import type { RecentNote, SearchRequest, SearchResult } from '../search/Searcher.js';
import { SQLiteStorage } from '../storage/SQLiteStorage.js';
import type { DocumentKey, StorageAdapter } from '../storage/types.js';
import { createChangeWatcher } from '../watcher/createChangeWatcher.js';
import type { ChangeWatcher } from '../watcher/types.js';
import type { WorkerReindexResult, WorkerStatus } from './protocol.js';

const log = createModuleLogger('WorkerHost');

// ============================================================================
// Types
// ============================================================================

export interface WorkerHostEvents {
  [key: string]: unknown;
  'role:changed': CoordinatorEvents['role:changed'];
  /** The worker can no longer make progress and should exit */
  fatal: { message: string };
}

export interface WorkerHostOptions {
  config: VaultIndexConfig;
  /** Default: SQLiteStorage from config.database */
  storage?: StorageAdapter;
  /** Default: createEmbedder(config.embeddings) */
  embedder?: Embedder;
  /** Coordinator overrides for tests */
  coordinator?: Pick<CoordinatorOptions, 'holderId' | 'clock' | 'schedule'>;
}

// ============================================================================
// WorkerHost Class
// ============================================================================

/**
 * One unit of execution: coordinator, indexer, searcher and watchers over
 * a single storage connection. Watchers run only while PRIMARY; the
 * indexer discards anything queued while it may not write.
 */
export class WorkerHost extends EventEmitter<WorkerHostEvents> {
  readonly config: VaultIndexConfig;
  readonly storage: StorageAdapter;
  readonly embedder: Embedder;
  readonly coordinator: Coordinator;
  readonly queue = new MutationQueue();
  readonly indexer: Indexer;
  readonly searcher: Searcher;

  private readonly scanners = new Map<string, VaultScanner>();
  private watchers: ChangeWatcher[] = [];
  private started = false;
  private stopping = false;
  /** Serializes promotion and demotion work */
  private roleWork: Promise<void> = Promise.resolve();

  constructor(options: WorkerHostOptions) {
    super();
    const { config } = options;
    this.config = config;
    this.storage =
      options.storage ??
      new SQLiteStorage(config.database, {
        leaseBusyTimeoutMs: config.coordination.claimTimeoutMs,
      });
    this.embedder = options.embedder ?? createEmbedder(config.embeddings);

    for (const vault of config.vaults) {
      this.scanners.set(
        vault.name,
        new VaultScanner(vault, {
          extensions: config.watcher.extensions,
          ignorePaths: config.watcher.ignorePaths,
          maxFileSize: config.indexing.maxFileSize,
        }),
      );
    }

    this.coordinator = new Coordinator({
      storage: this.storage,
      config: config.coordination,
      ...options.coordinator,
    });
    this.indexer = new Indexer({
      storage: this.storage,
      embedder: this.embedder,
      gate: this.coordinator,
      queue: this.queue,
      scanners: this.scanners,
      config: config.indexing,
    });
    this.searcher = new Searcher({
      storage: this.storage,
      embedder: this.embedder,
      scanners: this.scanners,
      config: config.search,
      configuredModel: {
        modelId: config.embeddings.model,
        dimensions: config.embeddings.dimensions,
      },
    });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async start(): Promise<void> {
    if (this.started) return;
    log.info('start:begin', {
      vaults: [...this.scanners.keys()],
      role: this.config.coordination.role,
      model: this.embedder.modelId,
    });
    log.startTimer('start');

    await this.storage.initialize();
    await this.embedder.initialize();

    this.coordinator.on('role:changed', (change) => {
      void this.emit('role:changed', change);
      if (!this.started) return;
      if (change.to === 'primary') {
        this.scheduleRoleWork(() => this.onPromoted());
      } else if (change.from === 'primary') {
        this.scheduleRoleWork(() => this.onDemoted());
      }
    });
    this.indexer.on('indexer:fatal', ({ error }) => {
      void this.emit('fatal', { message: error.message });
    });

    const state = await this.coordinator.start();
    this.indexer.start();
    this.started = true;

    if (state === 'primary') {
      this.scheduleRoleWork(() => this.onPromoted());
    }
    await this.settleRoleWork();

    log.endTimer('start', 'start:complete', {
      state,
      holderId: this.coordinator.getHolderId(),
    });
  }

  /**
   * Stop watchers and the indexer, release the lease, close storage.
   */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    log.info('stop:begin');

    await this.settleRoleWork();
    await this.stopWatchers();
    this.queue.close();
    await this.indexer.stop();
    if (this.started) {
      await this.coordinator.stop();
    }
    await this.embedder.dispose();
    await this.storage.close();
    this.started = false;

    log.info('stop:complete', { stats: this.indexer.getStats() });
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  search(request: SearchRequest): Promise<SearchResult[]> {
    return this.searcher.search(request);
  }

  listRecent(limit?: number): Promise<RecentNote[]> {
    return this.searcher.listRecent(limit);
  }

  readNote(key: DocumentKey): Promise<string> {
    return this.searcher.readNote(key);
  }

  /**
   * Queue a reconciliation of one or all vaults. Requires PRIMARY.
   */
  async reindex(vault?: string, wait = false): Promise<WorkerReindexResult> {
    const queued = await this.indexer.reindex(vault);
    if (!wait) return queued;
    const stats = await this.indexer.drain();
    return { ...queued, stats };
  }

  async getStatus(): Promise<WorkerStatus> {
    const coordinator = this.coordinator.getStatus();
    return {
      pid: process.pid,
      holderId: coordinator.holderId,
      role: coordinator.role,
      state: coordinator.state,
      canWrite: coordinator.canWrite,
      lastRenewedMs: coordinator.lastRenewedMs,
      queueSize: this.queue.size,
      model: this.indexer.modelInfo,
      indexModel: await this.storage.getIndexModel(),
      vaults: [...this.scanners.keys()],
      watchers: this.watchers.map((watcher) => ({
        vaultName: watcher.vaultName,
        mode: watcher.mode,
        watching: watcher.isWatching(),
      })),
      indexer: this.indexer.getStats(),
      storage: await this.storage.getStats(),
    };
  }

  // -------------------------------------------------------------------------
  // Role Changes
  // -------------------------------------------------------------------------

  private scheduleRoleWork(work: () => Promise<void>): void {
    this.roleWork = this.roleWork.then(work).catch((error: unknown) => {
      log.error('role:work-failed', { error: errorMessage(error) });
    });
  }

  /** Wait until no role work is queued, including work queued meanwhile. */
  private async settleRoleWork(): Promise<void> {
    let current: Promise<void>;
    do {
      current = this.roleWork;
      await current;
    } while (current !== this.roleWork);
  }

  /**
   * Start watching, then align the index with the configured model and
   * reconcile the vaults. Watchers come first so a change made during the
   * scan is seen by one or the other; replays are hash-gated.
   * Never rejects; storage failures are fatal.
   */
  private async onPromoted(): Promise<void> {
    if (this.stopping || this.coordinator.getRole() !== 'primary') return;
    try {
      await this.startWatchers();
      const requeued = await this.indexer.syncModel();
      const queued = this.config.indexing.reindexOnStart
        ? await this.indexer.reindex()
        : null;
      log.info('promoted', { requeued, queued });
    } catch (error) {
      if (error instanceof StorageFailureError) {
        log.fatal('promoted:storage-failure', { error: error.message });
        await this.emit('fatal', { message: error.message });
        return;
      }
      // Usually lost the lease again while catching up
      log.warn('promoted:aborted', { error: errorMessage(error) });
    }
  }

  private async onDemoted(): Promise<void> {
    await this.stopWatchers();
    const dropped = this.queue.discardAll();
    log.info('demoted', { dropped });
  }

  private async startWatchers(): Promise<void> {
    if (!this.config.watcher.enabled || this.watchers.length > 0) return;

    for (const vault of this.config.vaults) {
      const watcher = createChangeWatcher({
        vault,
        config: this.config.watcher,
        maxFileSize: this.config.indexing.maxFileSize,
        scanner: this.scanners.get(vault.name),
      });
      watcher.on('mutation', (mutation) => {
        this.queue.enqueue(mutation);
      });
      watcher.on('error', (error) => {
        log.error('watcher:error', {
          vault: vault.name,
          error: error.message,
        });
      });
      this.watchers.push(watcher);
      await watcher.start();
    }
  }

  private async stopWatchers(): Promise<void> {
    const watchers = this.watchers;
    this.watchers = [];
    await Promise.all(watchers.map((watcher) => watcher.stop()));
  }
}
