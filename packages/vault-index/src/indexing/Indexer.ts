/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFile, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { EventEmitter } from '../core/EventEmitter.js';
import { createModuleLogger } from '../core/Logger.js';
import {
  ConfigError,
  EmbeddingFailureError,
  LeaseConflictError,
  StaleRoleError,
  StorageFailureError,
  errorMessage,
} from '../core/errors.js';
import { withRetry, sleep } from '../core/retry.js';
import { ContentHasher } from '../hashing/ContentHasher.js';
import type { IndexingConfig } from '../config.js';
import type { Embedder } from '../embedders/types.js';
import type { VaultScanner } from '../discovery/VaultScanner.js';
import type {
  Mutation,
  MutationInput,
  MutationQueue,
  UpsertMutationInput,
} from '../queue/MutationQueue.js';
import type {
  CommitResult,
  DocumentKey,
  DocumentState,
  DocumentUpsert,
  IndexModelInfo,
  StorageAdapter,
} from '../storage/types.js';
import { documentKeyString } from '../storage/types.js';

const log = createModuleLogger('Indexer');

// ============================================================================
// Types
// ============================================================================

/** The part of the coordinator the indexer consults before writing. */
export interface WriteGate {
  canWrite(): boolean;
  /** Throws LeaseConflictError or StaleRoleError when writing is not allowed */
  assertWritable(): void;
}

export type SkipReason = 'unchanged' | 'too-large' | 'unknown-vault';

export interface IndexerEvents {
  [key: string]: unknown;
  'batch:committed': {
    upserted: number;
    deleted: number;
    skipped: number;
    failed: number;
    durationMs: number;
  };
  'document:failed': {
    vaultName: string;
    relativePath: string;
    attempts: number;
    error: string;
  };
  'document:skipped': {
    vaultName: string;
    relativePath: string;
    reason: SkipReason;
  };
  'indexer:fatal': { error: StorageFailureError };
}

export interface IndexerStats {
  embedded: number;
  skipped: number;
  deleted: number;
  failed: number;
  batches: number;
  discarded: number;
}

export interface ReindexResult {
  vaults: string[];
  upserts: number;
  deletes: number;
}

export interface IndexerOptions {
  storage: StorageAdapter;
  embedder: Embedder;
  gate: WriteGate;
  queue: MutationQueue;
  /** Scanners keyed by vault name */
  scanners: Map<string, VaultScanner>;
  config: IndexingConfig;
  hasher?: ContentHasher;
  /** Backoff sleep. Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
}

/** An upsert whose content has been read and hashed. */
interface PreparedDocument extends DocumentKey {
  content: string;
  contentHash: string;
  mtimeMs: number;
  bytes: number;
}

interface PreparedBatch {
  documents: PreparedDocument[];
  deletes: DocumentKey[];
  skipped: number;
  failed: number;
}

// ============================================================================
// Indexer Class
// ============================================================================

/**
 * The single writer of document rows. Pulls mutations from the queue,
 * skips unchanged content, embeds the rest and commits each batch in one
 * transaction.
 */
export class Indexer extends EventEmitter<IndexerEvents> {
  private readonly storage: StorageAdapter;
  private readonly embedder: Embedder;
  private readonly gate: WriteGate;
  private readonly queue: MutationQueue;
  private readonly scanners: Map<string, VaultScanner>;
  private readonly config: IndexingConfig;
  private readonly hasher: ContentHasher;
  private readonly sleep: (ms: number) => Promise<void>;

  private stats: IndexerStats = {
    embedded: 0,
    skipped: 0,
    deleted: 0,
    failed: 0,
    batches: 0,
    discarded: 0,
  };
  private exclusive: Promise<void> = Promise.resolve();
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;
  private fatalError: StorageFailureError | null = null;

  constructor(options: IndexerOptions) {
    super();
    this.storage = options.storage;
    this.embedder = options.embedder;
    this.gate = options.gate;
    this.queue = options.queue;
    this.scanners = options.scanners;
    this.config = options.config;
    this.hasher = options.hasher ?? new ContentHasher();
    this.sleep = options.sleep ?? sleep;
  }

  getStats(): IndexerStats {
    return { ...this.stats };
  }

  getFatalError(): StorageFailureError | null {
    return this.fatalError;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  get modelInfo(): IndexModelInfo {
    return {
      modelId: this.embedder.modelId,
      dimensions: this.embedder.dimensions,
    };
  }

  // -------------------------------------------------------------------------
  // Consumer Loop
  // -------------------------------------------------------------------------

  /**
   * Start consuming the queue in the background.
   */
  start(): void {
    if (this.loop) return;
    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.runLoop(abort.signal).finally(() => {
      this.loop = null;
      this.abort = null;
    });
  }

  /**
   * Stop the consumer after the batch in flight, if any, commits.
   */
  async stop(): Promise<void> {
    this.abort?.abort();
    if (this.loop) {
      await this.loop;
    }
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    log.info('loop:start');
    while (!signal.aborted) {
      await this.queue.waitForWork(signal);
      if (signal.aborted) break;
      if (this.queue.size === 0) {
        if (this.queue.isClosed()) break;
        continue;
      }

      try {
        await this.runExclusive(() => this.processNext());
      } catch (error) {
        if (error instanceof StorageFailureError) {
          this.fatalError = error;
          log.fatal('loop:storage-failure', { error: error.message });
          await this.emit('indexer:fatal', { error });
          break;
        }
        log.error('loop:batch-failed', { error: errorMessage(error) });
      }
    }
    log.info('loop:stopped', { stats: this.stats });
  }

  /**
   * Process until the queue is empty. Rejects with StorageFailureError when
   * a commit keeps failing.
   */
  async drain(): Promise<IndexerStats> {
    while (this.queue.size > 0) {
      await this.runExclusive(() => this.processNext());
    }
    // Wait for a batch the background loop may still be committing
    await this.runExclusive(async () => undefined);
    return this.getStats();
  }

  /**
   * Serialize batch processing between the loop and drain().
   */
  private runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.exclusive.then(fn);
    this.exclusive = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  // -------------------------------------------------------------------------
  // Batch Processing
  // -------------------------------------------------------------------------

  private async processNext(): Promise<void> {
    if (!this.gate.canWrite()) {
      const dropped = this.queue.discardAll();
      if (dropped > 0) {
        this.stats.discarded += dropped;
        log.debug('batch:discarded', { dropped });
      }
      return;
    }

    const mutations = this.queue.take(this.config.batchSize);
    if (mutations.length === 0) return;
    await this.processBatch(mutations);
  }

  private async processBatch(mutations: Mutation[]): Promise<void> {
    const startTime = Date.now();
    const prepared = await this.prepare(mutations);
    const upserts: DocumentUpsert[] = [];
    let failed = prepared.failed;

    for (const group of this.group(prepared.documents)) {
      const outcome = await this.embedGroup(group);
      upserts.push(...outcome.upserts);
      failed += outcome.failed;
    }

    if (upserts.length === 0 && prepared.deletes.length === 0) {
      this.stats.skipped += prepared.skipped;
      this.stats.failed += failed;
      return;
    }

    const result = await this.commit(upserts, prepared.deletes);
    if (!result) {
      // Lost the lease mid-batch; the new PRIMARY reconciles on claim
      this.stats.discarded += mutations.length;
      return;
    }

    this.stats.embedded += result.upserted;
    this.stats.deleted += prepared.deletes.length;
    this.stats.skipped += prepared.skipped;
    this.stats.failed += failed;
    this.stats.batches++;

    const durationMs = Date.now() - startTime;
    log.debug('batch:committed', {
      upserted: result.upserted,
      deleted: result.deleted,
      durationMs,
    });
    await this.emit('batch:committed', {
      upserted: result.upserted,
      deleted: result.deleted,
      skipped: prepared.skipped,
      failed,
      durationMs,
    });
  }

  /**
   * Read and hash upserts, then drop the ones whose stored row already
   * matches content and model.
   */
  private async prepare(mutations: Mutation[]): Promise<PreparedBatch> {
    const batch: PreparedBatch = { documents: [], deletes: [], skipped: 0, failed: 0 };
    const candidates: PreparedDocument[] = [];

    for (const mutation of mutations) {
      const key = { vaultName: mutation.vaultName, relativePath: mutation.relativePath };
      if (mutation.kind === 'delete') {
        batch.deletes.push(key);
        continue;
      }

      const scanner = this.scanners.get(mutation.vaultName);
      if (!scanner && mutation.content === undefined) {
        log.warn('prepare:unknown-vault', key);
        batch.skipped++;
        await this.emit('document:skipped', { ...key, reason: 'unknown-vault' });
        continue;
      }

      try {
        const loaded = await this.load(mutation, scanner);
        if (loaded === 'missing') {
          // Vanished between the event and now: same as a delete
          batch.deletes.push(key);
        } else if (loaded === 'too-large') {
          batch.skipped++;
          await this.emit('document:skipped', { ...key, reason: 'too-large' });
        } else {
          candidates.push(loaded);
        }
      } catch (error) {
        batch.failed++;
        log.warn('prepare:read-failed', { ...key, error: errorMessage(error) });
        await this.emit('document:failed', {
          ...key,
          attempts: 1,
          error: errorMessage(error),
        });
      }
    }

    const states = await this.storage.getDocumentStates(candidates);
    for (const document of candidates) {
      const state = states.get(documentKeyString(document));
      if (state && this.isCurrent(state, document.contentHash)) {
        batch.skipped++;
        await this.emit('document:skipped', {
          vaultName: document.vaultName,
          relativePath: document.relativePath,
          reason: 'unchanged',
        });
      } else {
        batch.documents.push(document);
      }
    }

    return batch;
  }

  private async load(
    mutation: UpsertMutationInput,
    scanner: VaultScanner | undefined,
  ): Promise<PreparedDocument | 'missing' | 'too-large'> {
    let content = mutation.content;
    let mtimeMs = mutation.mtimeMs;

    if (content === undefined) {
      if (!scanner) return 'missing';
      const absolutePath = scanner.toAbsolute(mutation.relativePath);
      let fileStats: Stats;
      try {
        fileStats = await stat(absolutePath);
      } catch (error) {
        if (isNotFound(error)) return 'missing';
        throw error;
      }
      if (!fileStats.isFile()) return 'missing';
      if (fileStats.size > this.config.maxFileSize) return 'too-large';
      content = await readFile(absolutePath, 'utf-8');
      mtimeMs ??= fileStats.mtimeMs;
    }

    const bytes = Buffer.byteLength(content, 'utf-8');
    if (bytes > this.config.maxFileSize) return 'too-large';

    return {
      vaultName: mutation.vaultName,
      relativePath: mutation.relativePath,
      content,
      contentHash: this.hasher.hash(content),
      mtimeMs: mtimeMs ?? Date.now(),
      bytes,
    };
  }

  private isCurrent(state: DocumentState, contentHash: string): boolean {
    return (
      state.hasEmbedding &&
      state.contentHash === contentHash &&
      state.embeddingModelId === this.embedder.modelId &&
      state.dimension === this.embedder.dimensions
    );
  }

  /**
   * Split into embedding calls bounded by count and total bytes. A single
   * document larger than the byte bound gets a call of its own.
   */
  private group(documents: PreparedDocument[]): PreparedDocument[][] {
    const groups: PreparedDocument[][] = [];
    let current: PreparedDocument[] = [];
    let currentBytes = 0;

    for (const document of documents) {
      const full =
        current.length >= this.config.batchSize ||
        (current.length > 0 &&
          currentBytes + document.bytes > this.config.maxBatchBytes);
      if (full) {
        groups.push(current);
        current = [];
        currentBytes = 0;
      }
      current.push(document);
      currentBytes += document.bytes;
    }
    if (current.length > 0) groups.push(current);
    return groups;
  }

  // -------------------------------------------------------------------------
  // Embedding
  // -------------------------------------------------------------------------

  private async embedGroup(
    group: PreparedDocument[],
  ): Promise<{ upserts: DocumentUpsert[]; failed: number }> {
    try {
      const vectors = await this.embedTexts(group.map((d) => d.content));
      return { upserts: group.map((d, i) => this.toUpsert(d, vectors[i])), failed: 0 };
    } catch (error) {
      log.warn('embed:batch-failed', {
        documents: group.length,
        error: errorMessage(error),
      });
    }

    // Retry one by one so a single bad document does not sink the batch
    const upserts: DocumentUpsert[] = [];
    let failed = 0;
    for (const document of group) {
      try {
        const [vector] = await withRetry(() => this.embedTexts([document.content]), {
          attempts: this.config.maxEmbeddingAttempts,
          backoffMs: this.config.embeddingBackoffMs,
          sleep: this.sleep,
        });
        upserts.push(this.toUpsert(document, vector));
      } catch (error) {
        failed++;
        log.error('embed:document-failed', {
          vaultName: document.vaultName,
          relativePath: document.relativePath,
          attempts: this.config.maxEmbeddingAttempts,
          error: errorMessage(error),
        });
        await this.emit('document:failed', {
          vaultName: document.vaultName,
          relativePath: document.relativePath,
          attempts: this.config.maxEmbeddingAttempts,
          error: errorMessage(error),
        });
      }
    }
    return { upserts, failed };
  }

  private async embedTexts(texts: string[]): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await this.embedder.embedDocuments(texts);
    } catch (error) {
      if (error instanceof EmbeddingFailureError) throw error;
      throw new EmbeddingFailureError(
        `Embedding failed: ${errorMessage(error)}`,
        { model: this.embedder.modelId, documents: texts.length },
        { cause: error },
      );
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingFailureError('Embedder returned the wrong number of vectors', {
        expected: texts.length,
        actual: vectors.length,
      });
    }
    for (const vector of vectors) {
      if (vector.length !== this.embedder.dimensions) {
        throw new EmbeddingFailureError('Embedding has the wrong dimension', {
          model: this.embedder.modelId,
          expected: this.embedder.dimensions,
          actual: vector.length,
        });
      }
    }
    return vectors;
  }

  private toUpsert(document: PreparedDocument, embedding: number[]): DocumentUpsert {
    return {
      vaultName: document.vaultName,
      relativePath: document.relativePath,
      contentHash: document.contentHash,
      embedding,
      embeddingModelId: this.embedder.modelId,
      mtimeMs: document.mtimeMs,
    };
  }

  // -------------------------------------------------------------------------
  // Commit
  // -------------------------------------------------------------------------

  /**
   * Commit one batch. Returns null when the lease was lost before the
   * write; throws StorageFailureError once the attempt budget is spent.
   */
  private async commit(
    upserts: DocumentUpsert[],
    deletes: DocumentKey[],
  ): Promise<CommitResult | null> {
    try {
      return await withRetry(
        async () => {
          this.gate.assertWritable();
          return this.storage.commitBatch({ upserts, deletes });
        },
        {
          attempts: this.config.maxStorageAttempts,
          backoffMs: this.config.storageBackoffMs,
          sleep: this.sleep,
          shouldRetry: (error) => !isRoleError(error),
          onRetry: (attempt, error) => {
            log.warn('commit:retry', { attempt, error: errorMessage(error) });
          },
        },
      );
    } catch (error) {
      if (isRoleError(error)) {
        log.warn('commit:lease-lost', {
          upserts: upserts.length,
          deletes: deletes.length,
          error: errorMessage(error),
        });
        return null;
      }
      if (error instanceof StorageFailureError) throw error;
      throw new StorageFailureError(
        `Commit failed after ${this.config.maxStorageAttempts} attempts: ${errorMessage(error)}`,
        { upserts: upserts.length, deletes: deletes.length },
        { cause: error },
      );
    }
  }

  // -------------------------------------------------------------------------
  // Reindex & Model Changes
  // -------------------------------------------------------------------------

  /**
   * Enqueue every live document of the given vault (or all vaults), plus
   * deletes for stored paths that no longer exist.
   */
  async reindex(vaultName?: string): Promise<ReindexResult> {
    this.gate.assertWritable();

    const vaults = vaultName ? [vaultName] : [...this.scanners.keys()];
    const result: ReindexResult = { vaults, upserts: 0, deletes: 0 };

    for (const name of vaults) {
      const scanner = this.scanners.get(name);
      if (!scanner) {
        throw new ConfigError(`Unknown vault: ${name}`);
      }

      log.startTimer(`reindex:${name}`);
      const live = await scanner.scan();
      const livePaths = new Set(live.map((d) => d.relativePath));
      const stored = await this.storage.listDocumentPaths(name);

      const mutations: MutationInput[] = [];
      for (const relativePath of stored) {
        if (!livePaths.has(relativePath)) {
          mutations.push({ kind: 'delete', vaultName: name, relativePath, source: 'reconcile' });
        }
      }
      const deletes = mutations.length;
      for (const document of live) {
        mutations.push({
          kind: 'upsert',
          vaultName: name,
          relativePath: document.relativePath,
          mtimeMs: document.mtimeMs,
          source: 'scan',
        });
      }

      this.queue.enqueueAll(mutations);
      result.upserts += live.length;
      result.deletes += deletes;
      log.endTimer(`reindex:${name}`, 'reindex:queued', {
        vault: name,
        upserts: live.length,
        deletes,
      });
    }

    // Rows of vaults that left the configuration
    if (!vaultName) {
      for (const storedVault of await this.storage.listVaultNames()) {
        if (this.scanners.has(storedVault)) continue;
        const paths = await this.storage.listDocumentPaths(storedVault);
        this.queue.enqueueAll(
          paths.map((relativePath) => ({
            kind: 'delete' as const,
            vaultName: storedVault,
            relativePath,
            source: 'reconcile' as const,
          })),
        );
        result.deletes += paths.length;
        log.info('reindex:removed-vault', { vault: storedVault, deletes: paths.length });
      }
    }

    return result;
  }

  /**
   * Bring stored embeddings in line with the configured model. Rows from
   * another model or dimension lose their embedding (hash kept) and are
   * re-queued together with rows left pending by an earlier run.
   * @returns Number of re-queued documents
   */
  async syncModel(): Promise<number> {
    this.gate.assertWritable();
    const model = this.modelInfo;
    const previous = await this.storage.getIndexModel();

    const invalidated = await this.storage.invalidateEmbeddings(model);
    if (
      !previous ||
      previous.modelId !== model.modelId ||
      previous.dimensions !== model.dimensions
    ) {
      await this.storage.setIndexModel(model);
      log.info('model:changed', {
        from: previous?.modelId ?? null,
        to: model.modelId,
        dimensions: model.dimensions,
        invalidated: invalidated.length,
      });
    }

    const pending = await this.storage.listPendingDocuments(model);
    this.queue.enqueueAll(
      pending.map((key) => ({
        kind: 'upsert' as const,
        vaultName: key.vaultName,
        relativePath: key.relativePath,
        source: 'model-change' as const,
      })),
    );
    return pending.length;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function isRoleError(error: unknown): boolean {
  return error instanceof LeaseConflictError || error instanceof StaleRoleError;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
