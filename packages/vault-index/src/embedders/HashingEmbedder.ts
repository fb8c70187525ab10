/**
 * Deterministic offline embedder.
 *
 * Feature hashing of lowercase word tokens into a fixed-size vector,
 * L2-normalized. Texts sharing words get positive cosine similarity.
 * No model download, so tests and air-gapped setups can index and search.
 */

import type { Embedder, HashingEmbedderConfig } from './types.js';

export const HASHING_MODEL_ID = 'vault-index/hashing-v1';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(text: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

export class HashingEmbedder implements Embedder {
  readonly name = 'hashing';
  readonly modelId: string;
  readonly dimensions: number;
  private readonly queryPrefix: string;
  private readonly documentPrefix: string;
  private ready = false;

  constructor(config: HashingEmbedderConfig = {}) {
    this.modelId = config.modelId ?? HASHING_MODEL_ID;
    this.dimensions = config.dimensions ?? 384;
    this.queryPrefix = config.queryPrefix ?? '';
    this.documentPrefix = config.documentPrefix ?? '';
  }

  async initialize(): Promise<void> {
    this.ready = true;
  }

  isReady(): boolean {
    return this.ready;
  }

  async dispose(): Promise<void> {
    this.ready = false;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.embed(`${this.documentPrefix}${text}`));
  }

  async embedQuery(query: string): Promise<number[]> {
    return this.embed(`${this.queryPrefix}${query}`);
  }

  /**
   * Embed raw text without any prefix.
   */
  embed(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      const hash = fnv1a(`${this.modelId}\u0000${token}`);
      const sign = hash & 0x80000000 ? -1 : 1;
      vector[hash % this.dimensions] += sign;
    }

    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    if (norm === 0) return vector;
    return vector.map((v) => v / norm);
  }
}
