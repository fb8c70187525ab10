/**
 * Storage adapter interface for the vault index.
 * Defines the contract for document, lease and metadata operations.
 */

// ============================================================================
// Document Operations
// ============================================================================

export interface DocumentKey {
  vaultName: string;
  relativePath: string;
}

/**
 * Stored fingerprint of a document, used to decide whether re-embedding
 * is needed.
 */
export interface DocumentState extends DocumentKey {
  contentHash: string;
  embeddingModelId: string | null;
  dimension: number | null;
  hasEmbedding: boolean;
  mtimeMs: number;
}

export interface DocumentUpsert extends DocumentKey {
  contentHash: string;
  embedding: number[];
  embeddingModelId: string;
  mtimeMs: number;
}

/**
 * One indexer batch. Applied atomically: either every upsert and delete
 * lands or none does.
 */
export interface CommitBatch {
  upserts: DocumentUpsert[];
  deletes: DocumentKey[];
}

export interface CommitResult {
  upserted: number;
  deleted: number;
}

export interface RecentDocument extends DocumentKey {
  mtimeMs: number;
}

// ============================================================================
// Vector Search
// ============================================================================

export interface VectorQuery {
  vector: number[];
  /** Only rows embedded with this model are candidates */
  modelId: string;
  dimension: number;
  /** Restrict to these vaults (all vaults when omitted or empty) */
  vaults?: string[];
  limit: number;
}

export interface VectorHit extends DocumentKey {
  score: number;
  mtimeMs: number;
}

// ============================================================================
// Leases
// ============================================================================

export interface LeaseRecord {
  roleSlot: string;
  holderId: string;
  leaseToken: string;
  lastHeartbeatMs: number;
  acquiredAtMs: number;
}

export interface LeaseClaim {
  roleSlot: string;
  holderId: string;
  leaseToken: string;
  nowMs: number;
  /** A row whose heartbeat is older than this may be taken over */
  leaseTimeoutMs: number;
}

// ============================================================================
// Metadata & Stats
// ============================================================================

export interface IndexModelInfo {
  modelId: string;
  dimensions: number;
}

export interface StorageStats {
  totalDocuments: number;
  embeddedDocuments: number;
  pendingDocuments: number;
  documentsByVault: Record<string, number>;
}

// ============================================================================
// Storage Adapter Interface
// ============================================================================

export interface StorageAdapter {
  // Lifecycle
  initialize(): Promise<void>;
  close(): Promise<void>;
  isReady(): boolean;

  // Documents
  getDocumentStates(keys: DocumentKey[]): Promise<Map<string, DocumentState>>;
  listDocumentPaths(vaultName: string): Promise<string[]>;
  listVaultNames(): Promise<string[]>;
  listRecentDocuments(vaults: string[], limit: number): Promise<RecentDocument[]>;
  commitBatch(batch: CommitBatch): Promise<CommitResult>;

  /**
   * Clear embeddings not produced by `model` (hashes are kept).
   * @returns Keys of the rows that now need re-embedding
   */
  invalidateEmbeddings(model: IndexModelInfo): Promise<DocumentKey[]>;

  /** Keys of rows with no embedding under `model`. */
  listPendingDocuments(model: IndexModelInfo): Promise<DocumentKey[]>;

  // Search
  searchSimilar(query: VectorQuery): Promise<VectorHit[]>;

  // Leases
  tryClaimLease(claim: LeaseClaim): Promise<boolean>;
  forceClaimLease(claim: LeaseClaim): Promise<void>;
  renewLease(roleSlot: string, leaseToken: string, nowMs: number): Promise<boolean>;
  releaseLease(roleSlot: string, leaseToken: string): Promise<boolean>;
  getLease(roleSlot: string): Promise<LeaseRecord | null>;

  // Metadata
  getIndexModel(): Promise<IndexModelInfo | null>;
  setIndexModel(model: IndexModelInfo): Promise<void>;
  getStats(): Promise<StorageStats>;
}

/**
 * Map key for a document. NUL cannot appear in vault names or paths.
 */
export function documentKeyString(key: DocumentKey): string {
  return `${key.vaultName}\u0000${key.relativePath}`;
}
