/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Loads @huggingface/transformers on demand.
 *
 * The package is an optional dependency: its ONNX runtime downloads native
 * binaries at install time, so it may be absent. The module is resolved at
 * run time and only the parts the embedder calls are checked.
 */

import { EmbeddingFailureError, errorMessage } from '../core/errors.js';

export const TRANSFORMERS_PACKAGE = '@huggingface/transformers';

/** The call shape of a feature-extraction pipeline. */
export type FeatureExtractor = (
  texts: string[],
  options: { pooling: 'mean'; normalize: boolean },
) => Promise<unknown>;

export interface PipelineOptions {
  device: string;
  dtype: string;
}

/** The subset of the package the embedder uses. */
export interface TransformersModule {
  env: { cacheDir?: string | null };
  pipeline(
    task: 'feature-extraction',
    model: string,
    options: PipelineOptions,
  ): Promise<unknown>;
}

export type TransformersLoader = () => Promise<unknown>;

export function isTransformersModule(value: unknown): value is TransformersModule {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pipeline' in value &&
    typeof value.pipeline === 'function' &&
    'env' in value &&
    typeof value.env === 'object' &&
    value.env !== null
  );
}

export function isFeatureExtractor(value: unknown): value is FeatureExtractor {
  return typeof value === 'function';
}

export function hasToList(value: unknown): value is { tolist(): unknown } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'tolist' in value &&
    typeof value.tolist === 'function'
  );
}

function isModuleNotFound(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ERR_MODULE_NOT_FOUND' || error.code === 'MODULE_NOT_FOUND')
  );
}

export const defaultTransformersLoader: TransformersLoader = () => {
  const specifier: string = TRANSFORMERS_PACKAGE;
  return import(specifier);
};

/**
 * Import the package and check its shape.
 * @throws EmbeddingFailureError when it is not installed or not usable
 */
export async function loadTransformers(
  loader: TransformersLoader = defaultTransformersLoader,
): Promise<TransformersModule> {
  let loaded: unknown;
  try {
    loaded = await loader();
  } catch (error) {
    if (isModuleNotFound(error)) {
      throw new EmbeddingFailureError(
        `${TRANSFORMERS_PACKAGE} is not installed; install it or set embeddings.provider to "hashing"`,
        { package: TRANSFORMERS_PACKAGE },
        { cause: error },
      );
    }
    throw new EmbeddingFailureError(
      `Failed to load ${TRANSFORMERS_PACKAGE}: ${errorMessage(error)}`,
      { package: TRANSFORMERS_PACKAGE },
      { cause: error },
    );
  }

  if (!isTransformersModule(loaded)) {
    throw new EmbeddingFailureError(
      `${TRANSFORMERS_PACKAGE} does not export a feature-extraction pipeline`,
      { package: TRANSFORMERS_PACKAGE },
    );
  }
  return loaded;
}
