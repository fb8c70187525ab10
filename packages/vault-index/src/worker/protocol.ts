/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Messages between the controller and the worker.
 *
 * Protocol: JSON lines. Requests go to the worker's stdin; results, errors,
 * events and the ready signal come back on its stdout. Worker logs are JSON
 * lines on stderr.
 */

import { z } from 'zod';
import { VaultIndexErrorKind } from '../core/errors.js';
import { userConfigSchema } from '../config/user-config.js';

// ============================================================================
// Controller -> Worker
// ============================================================================

const id = z.string().min(1);

export const workerRequestSchema = z.discriminatedUnion('type', [
  /** Handshake. Carries the resolved configuration. */
  z.object({ id, type: z.literal('init'), config: userConfigSchema }),
  z.object({
    id,
    type: z.literal('search'),
    query: z.string(),
    limit: z.number().int().optional(),
    vaults: z.array(z.string()).optional(),
  }),
  z.object({ id, type: z.literal('status') }),
  z.object({
    id,
    type: z.literal('reindex'),
    vault: z.string().optional(),
    /** Resolve only after the queue has been drained */
    wait: z.boolean().optional(),
  }),
  z.object({
    id,
    type: z.literal('list-recent'),
    limit: z.number().int().positive().optional(),
  }),
  z.object({
    id,
    type: z.literal('read-note'),
    vaultName: z.string(),
    relativePath: z.string(),
  }),
  z.object({ id, type: z.literal('shutdown') }),
]);

export type WorkerRequest = z.infer<typeof workerRequestSchema>;
export type WorkerRequestType = WorkerRequest['type'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/** A request before the facade assigns its correlation id. */
export type WorkerRequestPayload = DistributiveOmit<WorkerRequest, 'id'>;

// ============================================================================
// Worker -> Controller
// ============================================================================

export const errorPayloadSchema = z.object({
  message: z.string(),
  kind: z.nativeEnum(VaultIndexErrorKind),
  context: z.record(z.unknown()).optional(),
});

export const workerEventSchema = z.discriminatedUnion('event', [
  z.object({
    event: z.literal('role:changed'),
    data: z.object({ from: z.string(), to: z.string(), reason: z.string() }),
  }),
  z.object({
    event: z.literal('fatal'),
    data: z.object({ message: z.string() }),
  }),
]);

export type WorkerEvent = z.infer<typeof workerEventSchema>;

export const workerMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready'), pid: z.number() }),
  z.object({ type: z.literal('result'), id, result: z.unknown() }),
  z.object({ type: z.literal('error'), id, error: errorPayloadSchema }),
  z.object({ type: z.literal('event'), event: workerEventSchema }),
]);

export type WorkerMessage = z.infer<typeof workerMessageSchema>;

// ============================================================================
// Results
// ============================================================================

const modelInfoSchema = z.object({
  modelId: z.string(),
  dimensions: z.number(),
});

export const searchResultSchema = z.object({
  uri: z.string(),
  vaultName: z.string(),
  relativePath: z.string(),
  score: z.number(),
  mtimeMs: z.number(),
  frontmatter: z.record(z.unknown()).optional(),
  outline: z.array(z.string()),
  excerpt: z.string(),
});

export const recentNoteSchema = z.object({
  uri: z.string(),
  vaultName: z.string(),
  relativePath: z.string(),
  mtimeMs: z.number(),
});

export const indexerStatsSchema = z.object({
  embedded: z.number(),
  skipped: z.number(),
  deleted: z.number(),
  failed: z.number(),
  batches: z.number(),
  discarded: z.number(),
});

export const workerStatusSchema = z.object({
  pid: z.number(),
  holderId: z.string(),
  role: z.enum(['auto', 'primary', 'reader']),
  state: z.enum(['unclaimed', 'claiming', 'reader', 'primary']),
  canWrite: z.boolean(),
  lastRenewedMs: z.number().nullable(),
  queueSize: z.number(),
  model: modelInfoSchema,
  indexModel: modelInfoSchema.nullable(),
  vaults: z.array(z.string()),
  watchers: z.array(
    z.object({
      vaultName: z.string(),
      mode: z.enum(['events', 'polling']),
      watching: z.boolean(),
    }),
  ),
  indexer: indexerStatsSchema,
  storage: z.object({
    totalDocuments: z.number(),
    embeddedDocuments: z.number(),
    pendingDocuments: z.number(),
    documentsByVault: z.record(z.number()),
  }),
});

export type WorkerStatus = z.infer<typeof workerStatusSchema>;

export const reindexResultSchema = z.object({
  vaults: z.array(z.string()),
  upserts: z.number(),
  deletes: z.number(),
  /** Present when the request asked to wait for the drain */
  stats: indexerStatsSchema.optional(),
});

export type WorkerReindexResult = z.infer<typeof reindexResultSchema>;

export const resultSchemas = {
  init: workerStatusSchema,
  search: z.array(searchResultSchema),
  status: workerStatusSchema,
  reindex: reindexResultSchema,
  'list-recent': z.array(recentNoteSchema),
  'read-note': z.object({ text: z.string() }),
  shutdown: z.object({ stopped: z.boolean() }),
} satisfies Record<WorkerRequestType, z.ZodTypeAny>;

// ============================================================================
// Encoding
// ============================================================================

export function encodeLine(message: WorkerRequest | WorkerMessage): string {
  return `${JSON.stringify(message)}\n`;
}

/**
 * Parse one request line. Throws on invalid JSON or shape.
 */
export function decodeRequest(line: string): WorkerRequest {
  return workerRequestSchema.parse(JSON.parse(line));
}

/**
 * Parse one worker output line, or null when the line is not a protocol
 * message.
 */
export function decodeWorkerMessage(line: string): WorkerMessage | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = workerMessageSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Best-effort correlation id of a request line that failed validation.
 */
export function extractRequestId(line: string): string | null {
  try {
    const parsed = z.object({ id }).safeParse(JSON.parse(line));
    return parsed.success ? parsed.data.id : null;
  } catch {
    return null;
  }
}
