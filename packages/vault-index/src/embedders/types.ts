/**
 * Types for text embedders.
 * Embedders turn text into fixed-length vectors for similarity search.
 */

// ============================================================================
// Embedder Interface
// ============================================================================

export interface Embedder {
  /** Backend name, for logs and status */
  readonly name: string;
  /** Model identifier recorded with every stored vector */
  readonly modelId: string;
  /** Length of every vector this embedder returns */
  readonly dimensions: number;

  /**
   * Load the model. Safe to call more than once.
   */
  initialize(): Promise<void>;

  isReady(): boolean;

  /**
   * Embed documents in one call, document prefix applied.
   * Returns one vector per input, in input order.
   */
  embedDocuments(texts: string[]): Promise<number[][]>;

  /**
   * Embed a search query, query prefix applied.
   */
  embedQuery(query: string): Promise<number[]>;

  dispose(): Promise<void>;
}

// ============================================================================
// Embedder Configuration
// ============================================================================

export interface PrefixConfig {
  /** Prepended to queries (e.g. 'search_query: ') */
  queryPrefix?: string;
  /** Prepended to documents (e.g. 'search_document: ') */
  documentPrefix?: string;
}

/**
 * Configuration for the Transformers.js embedder.
 */
export interface TransformersJsEmbedderConfig extends PrefixConfig {
  /** Model ID on Hugging Face (e.g. 'Xenova/paraphrase-MiniLM-L6-v2') */
  modelId: string;
  /** Expected vector dimension */
  dimensions: number;
  quantization?: 'fp32' | 'fp16' | 'q8' | 'q4';
  device?: 'cpu' | 'cuda' | 'dml' | 'auto';
  /** Cache directory for downloaded models */
  cacheDir?: string;
}

export interface HashingEmbedderConfig extends PrefixConfig {
  /** Recorded model id. Different ids give unrelated vector spaces. */
  modelId?: string;
  dimensions?: number;
}
