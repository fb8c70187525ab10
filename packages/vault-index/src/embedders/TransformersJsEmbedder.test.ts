/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, vi } from 'vitest';
import { TransformersJsEmbedder } from './TransformersJsEmbedder.js';
import { loadTransformers } from './transformers-loader.js';
import { EmbeddingFailureError } from '../core/errors.js';

const CONFIG = {
  modelId: 'test/minilm',
  dimensions: 3,
  queryPrefix: 'query: ',
};

function moduleNotFound(): Error {
  return Object.assign(new Error("Cannot find package '@huggingface/transformers'"), {
    code: 'ERR_MODULE_NOT_FOUND',
  });
}

function fakeModule(rows: number[][]) {
  const extractor = vi.fn(async (texts: string[]) => ({
    tolist: () => texts.map((_, i) => rows[i % rows.length]),
  }));
  const pipeline = vi.fn(async () => extractor);
  const env: { cacheDir: string | null } = { cacheDir: null };
  return { module: { env, pipeline }, pipeline, extractor };
}

describe('loadTransformers', () => {
  it('should report a missing package as an embedding failure', async () => {
    const error = await loadTransformers(async () => {
      throw moduleNotFound();
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingFailureError);
    expect(error).toHaveProperty(
      'message',
      '@huggingface/transformers is not installed; install it or set embeddings.provider to "hashing"',
    );
  });

  it('should reject a module without a pipeline', async () => {
    await expect(loadTransformers(async () => ({ env: {} }))).rejects.toThrow(
      '@huggingface/transformers does not export a feature-extraction pipeline',
    );
  });
});

describe('TransformersJsEmbedder', () => {
  it('should fail initialize when the package is missing', async () => {
    const embedder = new TransformersJsEmbedder(CONFIG, async () => {
      throw moduleNotFound();
    });

    await expect(embedder.initialize()).rejects.toThrow(EmbeddingFailureError);
    expect(embedder.isReady()).toBe(false);
  });

  it('should build a mean-pooled pipeline and apply the query prefix', async () => {
    const fake = fakeModule([[0.1, 0.2, 0.3]]);
    const embedder = new TransformersJsEmbedder(
      { ...CONFIG, cacheDir: '/tmp/models' },
      async () => fake.module,
    );

    await embedder.initialize();
    const vector = await embedder.embedQuery('tomatoes');

    expect(vector).toEqual([0.1, 0.2, 0.3]);
    expect(fake.module.env.cacheDir).toBe('/tmp/models');
    expect(fake.pipeline).toHaveBeenCalledWith('feature-extraction', 'test/minilm', {
      device: 'cpu',
      dtype: 'q8',
    });
    expect(fake.extractor).toHaveBeenCalledWith(['query: tomatoes'], {
      pooling: 'mean',
      normalize: true,
    });
  });

  it('should reject pipeline output of the wrong shape', async () => {
    const embedder = new TransformersJsEmbedder(CONFIG, async () => ({
      env: {},
      pipeline: async () => async () => ({ tolist: () => 'nope' }),
    }));

    await embedder.initialize();
    await expect(embedder.embedDocuments(['a'])).rejects.toThrow(
      'Unexpected pipeline output shape',
    );
  });
});
