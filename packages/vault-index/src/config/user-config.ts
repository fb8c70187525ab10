/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * User configuration loading.
 *
 * Layers, lowest priority first:
 *
 * 1. Code defaults (config.ts)
 * 2. vault-index.config.json (optional)
 * 3. VAULT_INDEX_* environment variables
 * 4. Command-line flags
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import {
  type VaultIndexConfig,
  type DeepPartial,
  type EmbeddingsConfig,
  createConfig,
  mergePartialConfigs,
  validateConfig,
} from '../config.js';
import { ConfigError } from '../core/errors.js';
import { findModel } from '../embedders/models.js';

// ============================================================================
// Constants
// ============================================================================

export const USER_CONFIG_FILENAME = 'vault-index.config.json';

export const ENV_MODEL = 'VAULT_INDEX_MODEL';
export const ENV_ROLE = 'VAULT_INDEX_ROLE';
export const ENV_POLLING = 'VAULT_INDEX_POLLING';
export const ENV_LOG_LEVEL = 'VAULT_INDEX_LOG_LEVEL';
export const ENV_DATABASE = 'VAULT_INDEX_DATABASE';

// ============================================================================
// File Schema
// ============================================================================

const roleSchema = z.enum(['auto', 'primary', 'reader']);

/**
 * Unknown keys (`$schema`, `_docs`, ...) are stripped by zod, so users can
 * annotate the file freely.
 */
export const userConfigSchema = z.object({
  $version: z.string().optional(),
  vaults: z
    .array(z.object({ name: z.string().min(1), path: z.string().min(1) }))
    .optional(),
  database: z
    .object({
      path: z.string(),
      inMemory: z.boolean(),
      busyTimeoutMs: z.number().int(),
    })
    .partial()
    .optional(),
  embeddings: z
    .object({
      provider: z.enum(['transformers', 'hashing']),
      model: z.string(),
      dimensions: z.number().int(),
      queryPrefix: z.string(),
      documentPrefix: z.string(),
      device: z.enum(['cpu', 'cuda', 'dml', 'auto']),
      quantization: z.enum(['fp32', 'fp16', 'q8', 'q4']),
      cacheDir: z.string(),
    })
    .partial()
    .optional(),
  coordination: z
    .object({
      role: roleSchema,
      heartbeatIntervalMs: z.number(),
      leaseTimeoutMs: z.number(),
      renewalRetries: z.number().int(),
      renewalBackoffMs: z.number(),
      claimTimeoutMs: z.number(),
    })
    .partial()
    .optional(),
  watcher: z
    .object({
      enabled: z.boolean(),
      mode: z.enum(['events', 'polling']),
      pollIntervalMs: z.number(),
      debounceMs: z.number(),
      extensions: z.array(z.string()),
      ignorePaths: z.array(z.string()),
      maxRestartAttempts: z.number().int(),
      restartDelayMs: z.number(),
    })
    .partial()
    .optional(),
  indexing: z
    .object({
      batchSize: z.number().int(),
      maxBatchBytes: z.number().int(),
      maxEmbeddingAttempts: z.number().int(),
      embeddingBackoffMs: z.number(),
      maxStorageAttempts: z.number().int(),
      storageBackoffMs: z.number(),
      reindexOnStart: z.boolean(),
      maxFileSize: z.number().int(),
    })
    .partial()
    .optional(),
  search: z
    .object({
      defaultLimit: z.number().int(),
      maxLimit: z.number().int(),
      excerptLength: z.number().int(),
      uriScheme: z.string(),
      recentLimit: z.number().int(),
    })
    .partial()
    .optional(),
  worker: z
    .object({
      mode: z.enum(['child-process', 'in-process']),
      requestTimeoutMs: z.number(),
      startupTimeoutMs: z.number(),
      shutdownTimeoutMs: z.number(),
    })
    .partial()
    .optional(),
  logging: z
    .object({
      level: z.string(),
      json: z.boolean(),
      filePath: z.string(),
    })
    .partial()
    .optional(),
});

export type UserConfigFile = z.infer<typeof userConfigSchema>;

// ============================================================================
// Layers
// ============================================================================

/**
 * Expand a model alias into id, dimension and prefixes. Explicit values
 * already present in `embeddings` win over registry values.
 */
export function withModelDefaults(
  embeddings: Partial<EmbeddingsConfig> | undefined,
): Partial<EmbeddingsConfig> | undefined {
  if (!embeddings?.model) return embeddings;
  const spec = findModel(embeddings.model);
  if (!spec) return embeddings;

  return {
    ...embeddings,
    model: spec.modelId,
    dimensions: embeddings.dimensions ?? spec.dimensions,
    queryPrefix: embeddings.queryPrefix ?? spec.queryPrefix,
    documentPrefix: embeddings.documentPrefix ?? spec.documentPrefix,
  };
}

/**
 * Load a config file. Relative vault and database paths resolve against
 * the file's directory.
 *
 * @returns Overrides, or null if the file doesn't exist
 */
export function loadConfigFile(
  configPath: string,
): DeepPartial<VaultIndexConfig> | null {
  if (!fs.existsSync(configPath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`, {
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = userConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file: ${configPath}`, {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
  }

  const { $version: _version, ...overrides } = parsed.data;
  const baseDir = path.dirname(path.resolve(configPath));

  return {
    ...overrides,
    vaults: overrides.vaults?.map((v) => ({
      name: v.name,
      path: path.resolve(baseDir, v.path),
    })),
    database: overrides.database?.path
      ? {
          ...overrides.database,
          path: path.resolve(baseDir, overrides.database.path),
        }
      : overrides.database,
    embeddings: withModelDefaults(overrides.embeddings),
  };
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

/**
 * Read VAULT_INDEX_* overrides from an environment.
 */
export function configFromEnvironment(
  env: NodeJS.ProcessEnv,
): DeepPartial<VaultIndexConfig> {
  const overrides: DeepPartial<VaultIndexConfig> = {};

  const model = env[ENV_MODEL];
  if (model) {
    overrides.embeddings = withModelDefaults({ model });
  }

  const role = roleSchema.safeParse(env[ENV_ROLE]);
  if (role.success) {
    overrides.coordination = { role: role.data };
  }

  if (isTruthy(env[ENV_POLLING])) {
    overrides.watcher = { mode: 'polling' };
  }

  const level = env[ENV_LOG_LEVEL];
  if (level) {
    overrides.logging = { level };
  }

  const database = env[ENV_DATABASE];
  if (database) {
    overrides.database = { path: database };
  }

  return overrides;
}

export interface ResolveConfigOptions {
  /** Explicit config file. Missing file is an error when given. */
  configPath?: string;
  /** Directory searched for vault-index.config.json when no path is given */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Highest-priority overrides, typically from CLI flags */
  overrides?: DeepPartial<VaultIndexConfig>;
}

/**
 * Merge all configuration layers and validate the result.
 */
export function resolveConfig(
  options: ResolveConfigOptions = {},
): VaultIndexConfig {
  let fileLayer: DeepPartial<VaultIndexConfig> = {};
  if (options.configPath) {
    const loaded = loadConfigFile(options.configPath);
    if (!loaded) {
      throw new ConfigError(`Config file not found: ${options.configPath}`);
    }
    fileLayer = loaded;
  } else {
    const candidate = path.join(options.cwd ?? process.cwd(), USER_CONFIG_FILENAME);
    fileLayer = loadConfigFile(candidate) ?? {};
  }

  const cliLayer = options.overrides ?? {};
  const merged = mergePartialConfigs(
    mergePartialConfigs(fileLayer, configFromEnvironment(options.env ?? {})),
    { ...cliLayer, embeddings: withModelDefaults(cliLayer.embeddings) },
  );

  const config = createConfig(merged);
  validateConfig(config);
  return config;
}
