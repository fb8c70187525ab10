/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type {
  StorageAdapter,
  DocumentKey,
  DocumentState,
  CommitBatch,
  CommitResult,
  RecentDocument,
  VectorQuery,
  VectorHit,
  LeaseClaim,
  LeaseRecord,
  IndexModelInfo,
  StorageStats,
} from './types.js';
import { documentKeyString } from './types.js';
import { SCHEMA_SQL, SCHEMA_VERSION, METADATA_KEYS } from './schema.js';
import type { DatabaseConfig } from '../config.js';
import { StorageFailureError, errorMessage } from '../core/errors.js';
import { createModuleLogger } from '../core/Logger.js';

const log = createModuleLogger('SQLiteStorage');

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Convert a number array to a little-endian Float32 blob.
 */
export function vectorToBlob(embedding: readonly number[]): Buffer {
  const buffer = Buffer.alloc(embedding.length * 4);
  for (let i = 0; i < embedding.length; i++) {
    buffer.writeFloatLE(embedding[i], i * 4);
  }
  return buffer;
}

export function blobToVector(blob: Buffer): number[] {
  const result: number[] = [];
  for (let i = 0; i + 4 <= blob.length; i += 4) {
    result.push(blob.readFloatLE(i));
  }
  return result;
}

/**
 * Cosine similarity of two Float32 blobs. NULL when either side is missing
 * or the lengths differ.
 */
export function cosineSimilarityBlob(a: unknown, b: unknown): number | null {
  if (!Buffer.isBuffer(a) || !Buffer.isBuffer(b)) return null;
  if (a.length !== b.length || a.length === 0) return null;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 4) {
    const va = a.readFloatLE(i);
    const vb = b.readFloatLE(i);
    dot += va * vb;
    normA += va * va;
    normB += vb * vb;
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  if (denominator === 0) return 0;
  return dot / denominator;
}

// ============================================================================
// Row Types (database representation)
// ============================================================================

interface DocumentStateRow {
  vault_name: string;
  relative_path: string;
  content_hash: string;
  embedding_model_id: string | null;
  dimension: number | null;
  has_embedding: number;
  mtime_ms: number;
}

interface DocumentKeyRow {
  vault_name: string;
  relative_path: string;
}

interface RecentRow extends DocumentKeyRow {
  mtime_ms: number;
}

interface HitRow extends RecentRow {
  score: number | null;
}

interface LeaseRow {
  role_slot: string;
  holder_id: string;
  lease_token: string;
  last_heartbeat_ms: number;
  acquired_at_ms: number;
}

interface MetadataRow {
  key: string;
  value: string;
}

interface CountRow {
  total: number;
  embedded: number | null;
}

interface VaultCountRow {
  vault_name: string;
  count: number;
}

function rowToKey(row: DocumentKeyRow): DocumentKey {
  return { vaultName: row.vault_name, relativePath: row.relative_path };
}

// ============================================================================
// SQLite Storage Adapter
// ============================================================================

/**
 * better-sqlite3 storage in WAL mode. Several processes may open the same
 * file; writers serialize on SQLite's write lock (bounded by busy_timeout)
 * and lease claims are single conditional upserts.
 */
export interface SQLiteStorageOptions {
  /** busy_timeout for lease statements (ms). Default: `busyTimeoutMs` */
  leaseBusyTimeoutMs?: number;
}

export class SQLiteStorage implements StorageAdapter {
  private db: Database.Database | null = null;
  private readonly config: DatabaseConfig;
  private readonly leaseBusyTimeoutMs: number;

  constructor(config: DatabaseConfig, options: SQLiteStorageOptions = {}) {
    this.config = config;
    this.leaseBusyTimeoutMs = options.leaseBusyTimeoutMs ?? config.busyTimeoutMs;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async initialize(): Promise<void> {
    if (this.db) return;

    const filePath = this.config.inMemory ? ':memory:' : this.config.path;
    log.info('initialize:start', { path: filePath });

    let db: Database.Database | null = null;
    try {
      if (!this.config.inMemory) {
        mkdirSync(dirname(this.config.path), { recursive: true });
      }
      db = new Database(filePath, { timeout: this.config.busyTimeoutMs });
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.pragma(`busy_timeout = ${Math.floor(this.config.busyTimeoutMs)}`);

      db.function('cosine_similarity', { deterministic: true }, (a, b) =>
        cosineSimilarityBlob(a, b),
      );

      db.exec(SCHEMA_SQL);
      db.prepare<[string, string]>(
        'INSERT OR IGNORE INTO metadata (key, value) VALUES (?, ?)',
      ).run(METADATA_KEYS.schemaVersion, String(SCHEMA_VERSION));
    } catch (error) {
      db?.close();
      throw new StorageFailureError(
        `Failed to open database: ${errorMessage(error)}`,
        { path: filePath },
        { cause: error },
      );
    }

    this.db = db;
    log.info('initialize:complete', { path: filePath });
  }

  async close(): Promise<void> {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    log.debug('close:complete');
  }

  isReady(): boolean {
    return this.db !== null;
  }

  /**
   * Run a synchronous operation against the open database, mapping driver
   * errors to StorageFailureError.
   */
  private withDb<T>(operation: string, fn: (db: Database.Database) => T): T {
    if (!this.db) {
      throw new StorageFailureError('Storage not initialized', { operation });
    }
    try {
      return fn(this.db);
    } catch (error) {
      if (error instanceof StorageFailureError) throw error;
      throw new StorageFailureError(
        `${operation} failed: ${errorMessage(error)}`,
        { operation },
        { cause: error },
      );
    }
  }

  /**
   * Run a lease statement under its own lock wait, so claims and renewals
   * give up within the claim timeout instead of the general busy timeout.
   */
  private withLeaseDb<T>(operation: string, fn: (db: Database.Database) => T): T {
    return this.withDb(operation, (db) => {
      if (this.leaseBusyTimeoutMs === this.config.busyTimeoutMs) return fn(db);
      db.pragma(`busy_timeout = ${Math.floor(this.leaseBusyTimeoutMs)}`);
      try {
        return fn(db);
      } finally {
        db.pragma(`busy_timeout = ${Math.floor(this.config.busyTimeoutMs)}`);
      }
    });
  }

  // -------------------------------------------------------------------------
  // Documents
  // -------------------------------------------------------------------------

  async getDocumentStates(
    keys: DocumentKey[],
  ): Promise<Map<string, DocumentState>> {
    return this.withDb('getDocumentStates', (db) => {
      const stmt = db.prepare<[string, string], DocumentStateRow>(`
        SELECT vault_name, relative_path, content_hash, embedding_model_id,
               dimension, embedding IS NOT NULL AS has_embedding, mtime_ms
        FROM documents
        WHERE vault_name = ? AND relative_path = ?
      `);

      const states = new Map<string, DocumentState>();
      for (const key of keys) {
        const row = stmt.get(key.vaultName, key.relativePath);
        if (!row) continue;
        states.set(documentKeyString(key), {
          vaultName: row.vault_name,
          relativePath: row.relative_path,
          contentHash: row.content_hash,
          embeddingModelId: row.embedding_model_id,
          dimension: row.dimension,
          hasEmbedding: row.has_embedding === 1,
          mtimeMs: row.mtime_ms,
        });
      }
      return states;
    });
  }

  async listDocumentPaths(vaultName: string): Promise<string[]> {
    return this.withDb('listDocumentPaths', (db) =>
      db
        .prepare<[string], DocumentKeyRow>(
          'SELECT vault_name, relative_path FROM documents WHERE vault_name = ? ORDER BY relative_path',
        )
        .all(vaultName)
        .map((row) => row.relative_path),
    );
  }

  async listVaultNames(): Promise<string[]> {
    return this.withDb('listVaultNames', (db) =>
      db
        .prepare<[], { vault_name: string }>(
          'SELECT DISTINCT vault_name FROM documents ORDER BY vault_name',
        )
        .all()
        .map((row) => row.vault_name),
    );
  }

  async listRecentDocuments(
    vaults: string[],
    limit: number,
  ): Promise<RecentDocument[]> {
    if (vaults.length === 0 || limit <= 0) return [];

    return this.withDb('listRecentDocuments', (db) => {
      const placeholders = vaults.map(() => '?').join(', ');
      return db
        .prepare<Array<string | number>, RecentRow>(`
          SELECT vault_name, relative_path, mtime_ms
          FROM documents
          WHERE vault_name IN (${placeholders})
          ORDER BY mtime_ms DESC, relative_path ASC
          LIMIT ?
        `)
        .all(...vaults, limit)
        .map((row) => ({ ...rowToKey(row), mtimeMs: row.mtime_ms }));
    });
  }

  async commitBatch(batch: CommitBatch): Promise<CommitResult> {
    if (batch.upserts.length === 0 && batch.deletes.length === 0) {
      return { upserted: 0, deleted: 0 };
    }

    return this.withDb('commitBatch', (db) => {
      const del = db.prepare<[string, string]>(
        'DELETE FROM documents WHERE vault_name = ? AND relative_path = ?',
      );
      const insert = db.prepare<
        [string, string, string, Buffer, number, string, number, number]
      >(`
        INSERT INTO documents (
          vault_name, relative_path, content_hash, embedding, dimension,
          embedding_model_id, mtime_ms, indexed_at_ms
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `);

      // Upserts replace rows by delete-then-insert so the embedding blob is
      // never updated in place.
      const apply = db.transaction((input: CommitBatch): CommitResult => {
        const now = Date.now();
        let deleted = 0;
        for (const key of input.deletes) {
          deleted += del.run(key.vaultName, key.relativePath).changes;
        }
        for (const doc of input.upserts) {
          del.run(doc.vaultName, doc.relativePath);
          insert.run(
            doc.vaultName,
            doc.relativePath,
            doc.contentHash,
            vectorToBlob(doc.embedding),
            doc.embedding.length,
            doc.embeddingModelId,
            doc.mtimeMs,
            now,
          );
        }
        return { upserted: input.upserts.length, deleted };
      });

      return apply.immediate(batch);
    });
  }

  async invalidateEmbeddings(model: IndexModelInfo): Promise<DocumentKey[]> {
    return this.withDb('invalidateEmbeddings', (db) => {
      const params = { modelId: model.modelId, dimension: model.dimensions };
      const condition = `embedding IS NOT NULL
        AND (embedding_model_id IS NOT @modelId OR dimension IS NOT @dimension)`;

      const select = db.prepare<typeof params, DocumentKeyRow>(
        `SELECT vault_name, relative_path FROM documents WHERE ${condition}`,
      );
      const clear = db.prepare<typeof params>(`
        UPDATE documents
        SET embedding = NULL, embedding_model_id = NULL, dimension = NULL
        WHERE ${condition}
      `);

      const apply = db.transaction((): DocumentKey[] => {
        const keys = select.all(params).map(rowToKey);
        clear.run(params);
        return keys;
      });
      return apply.immediate();
    });
  }

  async listPendingDocuments(model: IndexModelInfo): Promise<DocumentKey[]> {
    return this.withDb('listPendingDocuments', (db) =>
      db
        .prepare<{ modelId: string; dimension: number }, DocumentKeyRow>(`
          SELECT vault_name, relative_path FROM documents
          WHERE embedding IS NULL
             OR embedding_model_id IS NOT @modelId
             OR dimension IS NOT @dimension
          ORDER BY vault_name, relative_path
        `)
        .all({ modelId: model.modelId, dimension: model.dimensions })
        .map(rowToKey),
    );
  }

  // -------------------------------------------------------------------------
  // Search
  // -------------------------------------------------------------------------

  async searchSimilar(query: VectorQuery): Promise<VectorHit[]> {
    if (query.limit <= 0) return [];

    return this.withDb('searchSimilar', (db) => {
      const vaults = query.vaults ?? [];
      const vaultParams: Record<string, string> = {};
      vaults.forEach((name, i) => {
        vaultParams[`vault${i}`] = name;
      });
      const vaultFilter =
        vaults.length > 0
          ? `AND vault_name IN (${vaults.map((_, i) => `@vault${i}`).join(', ')})`
          : '';

      const rows = db
        .prepare<Record<string, string | number | Buffer>, HitRow>(`
          SELECT vault_name, relative_path, mtime_ms,
                 cosine_similarity(embedding, @vector) AS score
          FROM documents
          WHERE embedding IS NOT NULL
            AND embedding_model_id = @modelId
            AND dimension = @dimension
            ${vaultFilter}
          ORDER BY score DESC, mtime_ms DESC
          LIMIT @limit
        `)
        .all({
          ...vaultParams,
          vector: vectorToBlob(query.vector),
          modelId: query.modelId,
          dimension: query.dimension,
          limit: query.limit,
        });

      return rows.map((row) => ({
        ...rowToKey(row),
        mtimeMs: row.mtime_ms,
        score: row.score ?? 0,
      }));
    });
  }

  // -------------------------------------------------------------------------
  // Leases
  // -------------------------------------------------------------------------

  /**
   * Claim the slot if it is empty, its heartbeat has expired, or it is
   * already ours. One statement, so concurrent claimers are linearized
   * by SQLite and at most one sees a changed row.
   */
  async tryClaimLease(claim: LeaseClaim): Promise<boolean> {
    return this.withLeaseDb('tryClaimLease', (db) => {
      const result = db
        .prepare<LeaseClaim>(`
          INSERT INTO leases (role_slot, holder_id, lease_token, last_heartbeat_ms, acquired_at_ms)
          VALUES (@roleSlot, @holderId, @leaseToken, @nowMs, @nowMs)
          ON CONFLICT(role_slot) DO UPDATE SET
            holder_id = excluded.holder_id,
            lease_token = excluded.lease_token,
            last_heartbeat_ms = excluded.last_heartbeat_ms,
            acquired_at_ms = CASE
              WHEN leases.lease_token = excluded.lease_token THEN leases.acquired_at_ms
              ELSE excluded.acquired_at_ms
            END
          WHERE leases.last_heartbeat_ms < @nowMs - @leaseTimeoutMs
             OR leases.lease_token = excluded.lease_token
        `)
        .run(claim);
      return result.changes === 1;
    });
  }

  /**
   * Write the lease row unconditionally (explicit `primary` role).
   */
  async forceClaimLease(claim: LeaseClaim): Promise<void> {
    this.withLeaseDb('forceClaimLease', (db) => {
      db.prepare<Omit<LeaseClaim, 'leaseTimeoutMs'>>(`
        INSERT INTO leases (role_slot, holder_id, lease_token, last_heartbeat_ms, acquired_at_ms)
        VALUES (@roleSlot, @holderId, @leaseToken, @nowMs, @nowMs)
        ON CONFLICT(role_slot) DO UPDATE SET
          holder_id = excluded.holder_id,
          lease_token = excluded.lease_token,
          last_heartbeat_ms = excluded.last_heartbeat_ms
      `).run({
        roleSlot: claim.roleSlot,
        holderId: claim.holderId,
        leaseToken: claim.leaseToken,
        nowMs: claim.nowMs,
      });
    });
  }

  async renewLease(
    roleSlot: string,
    leaseToken: string,
    nowMs: number,
  ): Promise<boolean> {
    return this.withLeaseDb('renewLease', (db) => {
      const result = db
        .prepare<[number, string, string]>(
          'UPDATE leases SET last_heartbeat_ms = ? WHERE role_slot = ? AND lease_token = ?',
        )
        .run(nowMs, roleSlot, leaseToken);
      return result.changes > 0;
    });
  }

  async releaseLease(roleSlot: string, leaseToken: string): Promise<boolean> {
    return this.withLeaseDb('releaseLease', (db) => {
      const result = db
        .prepare<[string, string]>(
          'DELETE FROM leases WHERE role_slot = ? AND lease_token = ?',
        )
        .run(roleSlot, leaseToken);
      return result.changes > 0;
    });
  }

  async getLease(roleSlot: string): Promise<LeaseRecord | null> {
    return this.withDb('getLease', (db) => {
      const row = db
        .prepare<[string], LeaseRow>('SELECT * FROM leases WHERE role_slot = ?')
        .get(roleSlot);
      if (!row) return null;
      return {
        roleSlot: row.role_slot,
        holderId: row.holder_id,
        leaseToken: row.lease_token,
        lastHeartbeatMs: row.last_heartbeat_ms,
        acquiredAtMs: row.acquired_at_ms,
      };
    });
  }

  // -------------------------------------------------------------------------
  // Metadata & Stats
  // -------------------------------------------------------------------------

  async getIndexModel(): Promise<IndexModelInfo | null> {
    return this.withDb('getIndexModel', (db) => {
      const rows = db
        .prepare<[string, string], MetadataRow>(
          'SELECT key, value FROM metadata WHERE key IN (?, ?)',
        )
        .all(METADATA_KEYS.modelId, METADATA_KEYS.dimensions);
      const values = new Map(rows.map((row) => [row.key, row.value]));

      const modelId = values.get(METADATA_KEYS.modelId);
      const dimensions = Number(values.get(METADATA_KEYS.dimensions));
      if (!modelId || !Number.isInteger(dimensions)) return null;
      return { modelId, dimensions };
    });
  }

  async setIndexModel(model: IndexModelInfo): Promise<void> {
    this.withDb('setIndexModel', (db) => {
      const upsert = db.prepare<[string, string]>(
        'INSERT OR REPLACE INTO metadata (key, value) VALUES (?, ?)',
      );
      db.transaction(() => {
        upsert.run(METADATA_KEYS.modelId, model.modelId);
        upsert.run(METADATA_KEYS.dimensions, String(model.dimensions));
      }).immediate();
    });
  }

  async getStats(): Promise<StorageStats> {
    return this.withDb('getStats', (db) => {
      const counts = db
        .prepare<[], CountRow>(
          'SELECT COUNT(*) AS total, SUM(embedding IS NOT NULL) AS embedded FROM documents',
        )
        .get();
      const byVault = db
        .prepare<[], VaultCountRow>(
          'SELECT vault_name, COUNT(*) AS count FROM documents GROUP BY vault_name ORDER BY vault_name',
        )
        .all();

      const total = counts?.total ?? 0;
      const embedded = counts?.embedded ?? 0;
      return {
        totalDocuments: total,
        embeddedDocuments: embedded,
        pendingDocuments: total - embedded,
        documentsByVault: Object.fromEntries(
          byVault.map((row) => [row.vault_name, row.count]),
        ),
      };
    });
  }
}
