/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Registry of embedding models known to work with the Transformers.js
 * backend. Unknown model ids are still accepted when the dimension is
 * configured explicitly.
 */

export interface EmbeddingModelSpec {
  /** Short alias accepted on the command line */
  alias: string;
  /** Hugging Face model id loaded by Transformers.js */
  modelId: string;
  dimensions: number;
  queryPrefix: string;
  documentPrefix: string;
  description: string;
}

export const DEFAULT_MODEL_ALIAS = 'paraphrase-MiniLM-L6-v2';

export const SUPPORTED_MODELS: readonly EmbeddingModelSpec[] = [
  {
    alias: 'paraphrase-MiniLM-L6-v2',
    modelId: 'Xenova/paraphrase-MiniLM-L6-v2',
    dimensions: 384,
    queryPrefix: '',
    documentPrefix: '',
    description: 'Fast paraphrase model, good default',
  },
  {
    alias: 'all-MiniLM-L6-v2',
    modelId: 'Xenova/all-MiniLM-L6-v2',
    dimensions: 384,
    queryPrefix: '',
    documentPrefix: '',
    description: 'General purpose sentence embeddings',
  },
  {
    alias: 'bge-small-en-v1.5',
    modelId: 'Xenova/bge-small-en-v1.5',
    dimensions: 384,
    queryPrefix: '',
    documentPrefix: '',
    description: 'BAAI general embedding, small English',
  },
  {
    alias: 'all-mpnet-base-v2',
    modelId: 'Xenova/all-mpnet-base-v2',
    dimensions: 768,
    queryPrefix: '',
    documentPrefix: '',
    description: 'Higher quality, slower',
  },
  {
    alias: 'nomic-embed-text-v1',
    modelId: 'nomic-ai/nomic-embed-text-v1',
    dimensions: 768,
    queryPrefix: 'search_query: ',
    documentPrefix: 'search_document: ',
    description: 'Long-context retrieval model with task prefixes',
  },
];

/**
 * Look up a model by alias or full model id.
 */
export function findModel(nameOrId: string): EmbeddingModelSpec | undefined {
  return SUPPORTED_MODELS.find(
    (m) => m.alias === nameOrId || m.modelId === nameOrId,
  );
}

export function supportedModelAliases(): string[] {
  return SUPPORTED_MODELS.map((m) => m.alias);
}
