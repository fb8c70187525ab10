import type { EmbeddingsConfig } from '../config.js';
import { HashingEmbedder } from './HashingEmbedder.js';
import { TransformersJsEmbedder } from './TransformersJsEmbedder.js';
import type { Embedder } from './types.js';

/**
 * Create the embedder selected by `config.provider`.
 */
export function createEmbedder(config: EmbeddingsConfig): Embedder {
  switch (config.provider) {
    case 'hashing':
      return new HashingEmbedder({
        modelId: config.model,
        dimensions: config.dimensions,
        queryPrefix: config.queryPrefix,
        documentPrefix: config.documentPrefix,
      });
    case 'transformers':
      return new TransformersJsEmbedder({
        modelId: config.model,
        dimensions: config.dimensions,
        queryPrefix: config.queryPrefix,
        documentPrefix: config.documentPrefix,
        device: config.device,
        quantization: config.quantization,
        cacheDir: config.cacheDir,
      });
  }
}
