/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Text embedder using Transformers.js.
 * Runs sentence-transformer models locally on the ONNX runtime with mean
 * pooling and normalization.
 */

import { createModuleLogger } from '../core/Logger.js';
import { EmbeddingFailureError, errorMessage } from '../core/errors.js';
import {
  defaultTransformersLoader,
  hasToList,
  isFeatureExtractor,
  loadTransformers,
} from './transformers-loader.js';
import type { FeatureExtractor, TransformersLoader } from './transformers-loader.js';
import type { Embedder, TransformersJsEmbedderConfig } from './types.js';

const log = createModuleLogger('TransformersJsEmbedder');

function isVectorBatch(value: unknown): value is number[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (row) => Array.isArray(row) && row.every((v) => typeof v === 'number'),
    )
  );
}

export class TransformersJsEmbedder implements Embedder {
  readonly name = 'transformers-js';
  readonly modelId: string;
  readonly dimensions: number;

  private readonly config: TransformersJsEmbedderConfig;
  private readonly loader: TransformersLoader;
  private extractor: FeatureExtractor | null = null;
  private initializingPromise: Promise<void> | null = null;

  constructor(
    config: TransformersJsEmbedderConfig,
    loader: TransformersLoader = defaultTransformersLoader,
  ) {
    this.config = config;
    this.loader = loader;
    this.modelId = config.modelId;
    this.dimensions = config.dimensions;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async initialize(): Promise<void> {
    if (this.extractor) return;

    // Prevent concurrent initialization
    if (this.initializingPromise) {
      await this.initializingPromise;
      return;
    }

    this.initializingPromise = this.doInitialize();
    try {
      await this.initializingPromise;
    } finally {
      this.initializingPromise = null;
    }
  }

  private async doInitialize(): Promise<void> {
    const device = this.config.device ?? 'cpu';
    const dtype = this.config.quantization ?? 'q8';
    log.info('initialize:start', { model: this.modelId, device, dtype });
    log.startTimer('initialize');

    // Loaded on first use; the package is optional
    const transformers = await loadTransformers(this.loader);
    if (this.config.cacheDir) {
      transformers.env.cacheDir = this.config.cacheDir;
    }

    let extractor: unknown;
    try {
      extractor = await transformers.pipeline('feature-extraction', this.modelId, {
        device,
        dtype,
      });
    } catch (error) {
      throw new EmbeddingFailureError(
        `Failed to initialize TransformersJsEmbedder: ${errorMessage(error)}`,
        { model: this.modelId },
        { cause: error },
      );
    }
    if (!isFeatureExtractor(extractor)) {
      throw new EmbeddingFailureError('Pipeline is not callable', {
        model: this.modelId,
      });
    }
    this.extractor = extractor;

    log.endTimer('initialize', 'initialize:complete', { model: this.modelId });
  }

  isReady(): boolean {
    return this.extractor !== null;
  }

  async dispose(): Promise<void> {
    // Pipelines have no explicit dispose; drop the reference
    this.extractor = null;
  }

  // -------------------------------------------------------------------------
  // Embedding Methods
  // -------------------------------------------------------------------------

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const prefix = this.config.documentPrefix ?? '';
    return this.run(texts.map((text) => `${prefix}${text}`));
  }

  async embedQuery(query: string): Promise<number[]> {
    const [vector] = await this.run([`${this.config.queryPrefix ?? ''}${query}`]);
    return vector;
  }

  private async run(texts: string[]): Promise<number[][]> {
    const extractor = this.extractor;
    if (!extractor) {
      throw new EmbeddingFailureError(
        'TransformersJsEmbedder not initialized. Call initialize() first.',
        { model: this.modelId },
      );
    }

    const result = await extractor(texts, { pooling: 'mean', normalize: true });
    const vectors = hasToList(result) ? result.tolist() : null;
    if (!isVectorBatch(vectors) || vectors.length !== texts.length) {
      throw new EmbeddingFailureError('Unexpected pipeline output shape', {
        model: this.modelId,
        inputs: texts.length,
      });
    }
    return vectors;
  }
}
