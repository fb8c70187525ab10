/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// ============================================================================
// SQLite Schema Definitions
// ============================================================================

export const SCHEMA_VERSION = 1;

/** Lease slot for the single writer. */
export const PRIMARY_SLOT = 'PRIMARY';

/**
 * Documents: one row per (vault, path). `embedding` is a little-endian
 * Float32 blob and is NULL while waiting for (re-)embedding.
 */
export const DOCUMENTS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS documents (
  vault_name TEXT NOT NULL,
  relative_path TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  embedding BLOB,
  dimension INTEGER,
  embedding_model_id TEXT,
  mtime_ms REAL NOT NULL,
  indexed_at_ms INTEGER NOT NULL,
  PRIMARY KEY (vault_name, relative_path)
);

CREATE INDEX IF NOT EXISTS idx_documents_recent ON documents(vault_name, mtime_ms DESC);
CREATE INDEX IF NOT EXISTS idx_documents_model ON documents(embedding_model_id, dimension);
`;

/**
 * Leases: at most one row per role slot. Liveness is judged by comparing
 * last_heartbeat_ms with the reader's clock.
 */
export const LEASES_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS leases (
  role_slot TEXT PRIMARY KEY,
  holder_id TEXT NOT NULL,
  lease_token TEXT NOT NULL,
  last_heartbeat_ms INTEGER NOT NULL,
  acquired_at_ms INTEGER NOT NULL
);
`;

export const METADATA_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS metadata (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;

export const SCHEMA_SQL = [
  DOCUMENTS_TABLE_SQL,
  LEASES_TABLE_SQL,
  METADATA_TABLE_SQL,
].join('\n');

export const METADATA_KEYS = {
  schemaVersion: 'schema_version',
  modelId: 'model_id',
  dimensions: 'dimensions',
} as const;
