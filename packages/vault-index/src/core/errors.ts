/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Error kinds for vault index operations.
 */
export enum VaultIndexErrorKind {
  LEASE_CONFLICT = 'LEASE_CONFLICT',
  STALE_ROLE = 'STALE_ROLE',
  EMBEDDING_FAILURE = 'EMBEDDING_FAILURE',
  STORAGE_FAILURE = 'STORAGE_FAILURE',
  MODEL_MISMATCH = 'MODEL_MISMATCH',
  WATCHER_FAILURE = 'WATCHER_FAILURE',
  WORKER_UNAVAILABLE = 'WORKER_UNAVAILABLE',
  CONFIG_INVALID = 'CONFIG_INVALID',
  INTERNAL = 'INTERNAL',
}

const ERROR_KINDS = new Set<string>(Object.values(VaultIndexErrorKind));

export function isVaultIndexErrorKind(
  value: unknown,
): value is VaultIndexErrorKind {
  return typeof value === 'string' && ERROR_KINDS.has(value);
}

/**
 * Base class for all vault index errors.
 */
export class VaultIndexError extends Error {
  constructor(
    message: string,
    public readonly kind: VaultIndexErrorKind,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'VaultIndexError';
  }
}

/** Another holder owns a live PRIMARY lease. Normal during a race. */
export class LeaseConflictError extends VaultIndexError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, VaultIndexErrorKind.LEASE_CONFLICT, context);
    this.name = 'LeaseConflictError';
  }
}

/** A PRIMARY discovered its lease token no longer matches the stored one. */
export class StaleRoleError extends VaultIndexError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, VaultIndexErrorKind.STALE_ROLE, context);
    this.name = 'StaleRoleError';
  }
}

export class EmbeddingFailureError extends VaultIndexError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, VaultIndexErrorKind.EMBEDDING_FAILURE, context, options);
    this.name = 'EmbeddingFailureError';
  }
}

export class StorageFailureError extends VaultIndexError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, VaultIndexErrorKind.STORAGE_FAILURE, context, options);
    this.name = 'StorageFailureError';
  }
}

/** The query embedder does not match the model the index was built with. */
export class ModelMismatchError extends VaultIndexError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, VaultIndexErrorKind.MODEL_MISMATCH, context);
    this.name = 'ModelMismatchError';
  }
}

export class WatcherFailureError extends VaultIndexError {
  constructor(
    message: string,
    context?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, VaultIndexErrorKind.WATCHER_FAILURE, context, options);
    this.name = 'WatcherFailureError';
  }
}

/** The worker timed out, exited, or never came up. */
export class WorkerUnavailableError extends VaultIndexError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, VaultIndexErrorKind.WORKER_UNAVAILABLE, context);
    this.name = 'WorkerUnavailableError';
  }
}

export class ConfigError extends VaultIndexError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, VaultIndexErrorKind.CONFIG_INVALID, context);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Serialization across the worker channel
// ============================================================================

export interface ErrorPayload {
  message: string;
  kind: VaultIndexErrorKind;
  context?: Record<string, unknown>;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorPayload(error: unknown): ErrorPayload {
  if (error instanceof VaultIndexError) {
    return { message: error.message, kind: error.kind, context: error.context };
  }
  return { message: errorMessage(error), kind: VaultIndexErrorKind.INTERNAL };
}

/**
 * Rebuild a typed error from its payload.
 */
export function fromErrorPayload(payload: ErrorPayload): VaultIndexError {
  const { message, context } = payload;
  switch (payload.kind) {
    case VaultIndexErrorKind.LEASE_CONFLICT:
      return new LeaseConflictError(message, context);
    case VaultIndexErrorKind.STALE_ROLE:
      return new StaleRoleError(message, context);
    case VaultIndexErrorKind.EMBEDDING_FAILURE:
      return new EmbeddingFailureError(message, context);
    case VaultIndexErrorKind.STORAGE_FAILURE:
      return new StorageFailureError(message, context);
    case VaultIndexErrorKind.MODEL_MISMATCH:
      return new ModelMismatchError(message, context);
    case VaultIndexErrorKind.WATCHER_FAILURE:
      return new WatcherFailureError(message, context);
    case VaultIndexErrorKind.WORKER_UNAVAILABLE:
      return new WorkerUnavailableError(message, context);
    case VaultIndexErrorKind.CONFIG_INVALID:
      return new ConfigError(message, context);
    case VaultIndexErrorKind.INTERNAL:
      return new VaultIndexError(message, VaultIndexErrorKind.INTERNAL, context);
  }
}
