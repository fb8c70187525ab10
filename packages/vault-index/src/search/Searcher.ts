/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFile } from 'node:fs/promises';
import { createModuleLogger } from '../core/Logger.js';
import { ConfigError, ModelMismatchError, errorMessage } from '../core/errors.js';
import type { SearchConfig } from '../config.js';
import type { Embedder } from '../embedders/types.js';
import type { VaultScanner } from '../discovery/VaultScanner.js';
import type {
  DocumentKey,
  IndexModelInfo,
  StorageAdapter,
} from '../storage/types.js';
import { extractExcerpt, extractOutline, parseFrontmatter } from './markdown.js';

const log = createModuleLogger('Searcher');

// ============================================================================
// Types
// ============================================================================

export interface SearchRequest {
  query: string;
  /** Default: search.defaultLimit, capped at search.maxLimit */
  limit?: number;
  /** Restrict to these vaults. Default: all */
  vaults?: string[];
}

export interface SearchResult {
  uri: string;
  vaultName: string;
  relativePath: string;
  score: number;
  mtimeMs: number;
  frontmatter?: Record<string, unknown>;
  outline: string[];
  excerpt: string;
}

export interface RecentNote {
  uri: string;
  vaultName: string;
  relativePath: string;
  mtimeMs: number;
}

export interface SearcherOptions {
  storage: StorageAdapter;
  embedder: Embedder;
  /** Scanners keyed by vault name, used to resolve note paths */
  scanners: Map<string, VaultScanner>;
  config: SearchConfig;
  /** Model the configuration asks for; checked against the embedder */
  configuredModel?: IndexModelInfo;
}

// ============================================================================
// URIs
// ============================================================================

export function toNoteUri(scheme: string, key: DocumentKey): string {
  const path = key.relativePath.split('/').map(encodeURIComponent).join('/');
  return `${scheme}://${encodeURIComponent(key.vaultName)}/${path}`;
}

/**
 * Parse `<scheme>://<vault>/<path>`. Returns null for other schemes or
 * malformed URIs.
 */
export function parseNoteUri(scheme: string, uri: string): DocumentKey | null {
  let url: URL;
  try {
    url = new URL(uri);
  } catch {
    return null;
  }
  if (url.protocol !== `${scheme}:` || !url.hostname) return null;

  const relativePath = url.pathname.replace(/^\/+/, '');
  if (!relativePath) return null;
  try {
    return {
      vaultName: decodeURIComponent(url.hostname),
      relativePath: relativePath.split('/').map(decodeURIComponent).join('/'),
    };
  } catch {
    return null;
  }
}

// ============================================================================
// Searcher Class
// ============================================================================

/**
 * Read-only query side. Works the same under either role.
 */
export class Searcher {
  private readonly storage: StorageAdapter;
  private readonly embedder: Embedder;
  private readonly scanners: Map<string, VaultScanner>;
  private readonly config: SearchConfig;
  private readonly configuredModel: IndexModelInfo | undefined;

  constructor(options: SearcherOptions) {
    this.storage = options.storage;
    this.embedder = options.embedder;
    this.scanners = options.scanners;
    this.config = options.config;
    this.configuredModel = options.configuredModel;
  }

  async search(request: SearchRequest): Promise<SearchResult[]> {
    const limit = this.resolveLimit(request.limit);
    const query = request.query.trim();
    if (!query) return [];

    await this.checkModel();
    const vector = await this.embedder.embedQuery(query);
    if (vector.length !== this.embedder.dimensions) {
      throw new ModelMismatchError('Query embedding has the wrong dimension', {
        expected: this.embedder.dimensions,
        actual: vector.length,
      });
    }

    // Over-fetch so stale rows do not shrink the page
    const hits = await this.storage.searchSimilar({
      vector,
      modelId: this.embedder.modelId,
      dimension: this.embedder.dimensions,
      vaults: request.vaults,
      limit: limit * 2,
    });

    const results: SearchResult[] = [];
    for (const hit of hits) {
      if (results.length >= limit) break;

      const content = await this.readIfPresent(hit);
      if (content === null) continue;

      results.push({
        uri: toNoteUri(this.config.uriScheme, hit),
        vaultName: hit.vaultName,
        relativePath: hit.relativePath,
        score: hit.score,
        mtimeMs: hit.mtimeMs,
        frontmatter: parseFrontmatter(content),
        outline: extractOutline(content),
        excerpt: extractExcerpt(content, this.config.excerptLength),
      });
    }

    log.debug('search:complete', {
      query: query.slice(0, 80),
      candidates: hits.length,
      results: results.length,
    });
    return results;
  }

  /**
   * Most recently modified indexed notes across the given vaults.
   */
  async listRecent(limit = this.config.recentLimit, vaults?: string[]): Promise<RecentNote[]> {
    const names = vaults ?? [...this.scanners.keys()];
    const documents = await this.storage.listRecentDocuments(names, limit);
    return documents.map((document) => ({
      uri: toNoteUri(this.config.uriScheme, document),
      vaultName: document.vaultName,
      relativePath: document.relativePath,
      mtimeMs: document.mtimeMs,
    }));
  }

  /**
   * Full text of a note. Throws ConfigError for an unknown vault or a path
   * outside it.
   */
  async readNote(key: DocumentKey): Promise<string> {
    const scanner = this.scanners.get(key.vaultName);
    if (!scanner) {
      throw new ConfigError(`Unknown vault: ${key.vaultName}`);
    }
    let absolutePath: string;
    try {
      absolutePath = scanner.toAbsolute(key.relativePath);
    } catch (error) {
      throw new ConfigError(errorMessage(error), { ...key });
    }
    return readFile(absolutePath, 'utf-8');
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private resolveLimit(limit: number | undefined): number {
    if (limit === undefined) return this.config.defaultLimit;
    return Math.max(1, Math.min(Math.floor(limit), this.config.maxLimit));
  }

  /**
   * The query must be embedded by the model the configuration names and the
   * index was built with; otherwise scores would be meaningless.
   */
  private async checkModel(): Promise<void> {
    const actual = { modelId: this.embedder.modelId, dimensions: this.embedder.dimensions };

    if (this.configuredModel && !sameModel(this.configuredModel, actual)) {
      throw new ModelMismatchError('Embedder does not match the configured model', {
        configured: this.configuredModel,
        embedder: actual,
      });
    }

    const indexed = await this.storage.getIndexModel();
    if (indexed && !sameModel(indexed, actual)) {
      throw new ModelMismatchError(
        `Index was built with ${indexed.modelId} (${indexed.dimensions}d); ` +
          `queries use ${actual.modelId} (${actual.dimensions}d)`,
        { indexed, embedder: actual },
      );
    }
  }

  private async readIfPresent(key: DocumentKey): Promise<string | null> {
    try {
      return await this.readNote(key);
    } catch (error) {
      log.warn('search:stale-entry', { ...key, error: errorMessage(error) });
      return null;
    }
  }
}

function sameModel(a: IndexModelInfo, b: IndexModelInfo): boolean {
  return a.modelId === b.modelId && a.dimensions === b.dimensions;
}
