/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * ControllerFacade - the request side's only view of the worker.
 *
 * Every request carries a UUID correlation id, so any number of requests
 * can be in flight over one channel and answered in any order. A request
 * fails with WorkerUnavailableError when it times out or the worker exits;
 * once the worker is gone every new request fails immediately.
 */

import { randomUUID } from 'node:crypto';
import type { z } from 'zod';
import { EventEmitter } from '../core/EventEmitter.js';
import { createModuleLogger } from '../core/Logger.js';
import {
  WorkerUnavailableError,
  errorMessage,
  fromErrorPayload,
} from '../core/errors.js';
import type { VaultIndexConfig } from '../config.js';
import type { RecentNote, SearchRequest, SearchResult } from '../search/Searcher.js';
import type { DocumentKey } from '../storage/types.js';
import { resultSchemas } from './protocol.js';
import type {
  WorkerMessage,
  WorkerReindexResult,
  WorkerRequest,
  WorkerRequestPayload,
  WorkerStatus,
} from './protocol.js';
import type { WorkerChannel, WorkerExit } from './channels/types.js';

const log = createModuleLogger('ControllerFacade');

// ============================================================================
// Types
// ============================================================================

export interface ControllerFacadeEvents {
  [key: string]: unknown;
  'role:changed': { from: string; to: string; reason: string };
  /** The worker reported an unrecoverable failure and is exiting */
  'worker:fatal': { message: string };
  'worker:exit': WorkerExit & { expected: boolean };
}

export interface ControllerFacadeOptions {
  channel: WorkerChannel;
  /** Resolved configuration, sent to the worker in the handshake */
  config: VaultIndexConfig;
}

interface PendingRequest {
  type: WorkerRequest['type'];
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timeout: ReturnType<typeof setTimeout>;
}

// ============================================================================
// ControllerFacade Class
// ============================================================================

export class ControllerFacade extends EventEmitter<ControllerFacadeEvents> {
  private readonly channel: WorkerChannel;
  private readonly config: VaultIndexConfig;
  private readonly pending = new Map<string, PendingRequest>();
  private exit: WorkerExit | null = null;
  private started = false;
  private stopping = false;

  constructor(options: ControllerFacadeOptions) {
    super();
    this.channel = options.channel;
    this.config = options.config;

    this.channel.onMessage((message) => this.handleMessage(message));
    this.channel.onExit((exit) => this.handleExit(exit));
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Launch the worker and hand it the configuration.
   *
   * @returns The worker's status once it has claimed or declined the lease
   */
  async start(): Promise<WorkerStatus> {
    if (this.started) {
      return this.status();
    }
    const { startupTimeoutMs } = this.config.worker;
    log.info('start:begin', { mode: this.config.worker.mode });
    log.startTimer('start');

    await this.channel.start(startupTimeoutMs);
    this.started = true;
    const status = parseResult(
      resultSchemas.init,
      await this.call({ type: 'init', config: this.config }, startupTimeoutMs),
      'init',
    );

    log.endTimer('start', 'start:complete', {
      pid: status.pid,
      state: status.state,
    });
    return status;
  }

  /**
   * Ask the worker to shut down, then close the channel. The channel
   * forces the worker after `worker.shutdownTimeoutMs`.
   */
  async stop(): Promise<void> {
    if (this.stopping) return;
    this.stopping = true;
    const { shutdownTimeoutMs } = this.config.worker;

    if (this.started && !this.exit) {
      try {
        await this.call({ type: 'shutdown' }, shutdownTimeoutMs);
      } catch (error) {
        log.warn('stop:shutdown-failed', { error: errorMessage(error) });
      }
    }
    await this.channel.close(shutdownTimeoutMs);
    log.info('stop:complete');
  }

  isAvailable(): boolean {
    return this.started && !this.exit && this.channel.isAlive();
  }

  // -------------------------------------------------------------------------
  // Operations
  // -------------------------------------------------------------------------

  async search(request: SearchRequest): Promise<SearchResult[]> {
    const result = await this.call({
      type: 'search',
      query: request.query,
      limit: request.limit,
      vaults: request.vaults,
    });
    return parseResult(resultSchemas.search, result, 'search');
  }

  async status(): Promise<WorkerStatus> {
    return parseResult(
      resultSchemas.status,
      await this.call({ type: 'status' }),
      'status',
    );
  }

  /**
   * Queue a reconciliation of one vault or all of them. With `wait` the
   * call resolves after the queue has drained and is not bounded by the
   * request timeout.
   */
  async reindex(
    vault?: string,
    options: { wait?: boolean } = {},
  ): Promise<WorkerReindexResult> {
    const wait = options.wait ?? false;
    const result = await this.call(
      { type: 'reindex', vault, wait },
      wait ? null : undefined,
    );
    return parseResult(resultSchemas.reindex, result, 'reindex');
  }

  async listRecent(limit?: number): Promise<RecentNote[]> {
    return parseResult(
      resultSchemas['list-recent'],
      await this.call({ type: 'list-recent', limit }),
      'list-recent',
    );
  }

  async readNote(key: DocumentKey): Promise<string> {
    const result = await this.call({
      type: 'read-note',
      vaultName: key.vaultName,
      relativePath: key.relativePath,
    });
    return parseResult(resultSchemas['read-note'], result, 'read-note').text;
  }

  // -------------------------------------------------------------------------
  // Correlation
  // -------------------------------------------------------------------------

  /**
   * Send one request and wait for its reply.
   *
   * @param timeoutMs Default: worker.requestTimeoutMs. null waits without
   *   a deadline; worker exit still fails the request.
   */
  private call(
    payload: WorkerRequestPayload,
    timeoutMs: number | null = this.config.worker.requestTimeoutMs,
  ): Promise<unknown> {
    if (this.exit) {
      return Promise.reject(
        new WorkerUnavailableError('Worker has exited', { ...this.exit }),
      );
    }
    if (!this.started) {
      return Promise.reject(new WorkerUnavailableError('Worker is not started'));
    }

    const id = randomUUID();
    const request: WorkerRequest = { ...payload, id };

    return new Promise((resolve, reject) => {
      const timeout = setTimeout(
        () => {
          this.pending.delete(id);
          log.warn('request:timeout', { id, type: payload.type, timeoutMs });
          reject(
            new WorkerUnavailableError(
              `Request ${payload.type} timed out after ${timeoutMs}ms`,
              { id, type: payload.type },
            ),
          );
        },
        // Unbounded waits still need a handle to clear
        timeoutMs ?? 2 ** 31 - 1,
      );
      this.pending.set(id, { type: payload.type, resolve, reject, timeout });

      try {
        this.channel.send(request);
      } catch (error) {
        clearTimeout(timeout);
        this.pending.delete(id);
        reject(
          error instanceof WorkerUnavailableError
            ? error
            : new WorkerUnavailableError(errorMessage(error)),
        );
      }
    });
  }

  private handleMessage(message: WorkerMessage): void {
    switch (message.type) {
      case 'ready':
        log.debug('worker:ready', { pid: message.pid });
        return;
      case 'event':
        if (message.event.event === 'role:changed') {
          void this.emit('role:changed', message.event.data);
        } else {
          log.error('worker:fatal', { error: message.event.data.message });
          void this.emit('worker:fatal', message.event.data);
        }
        return;
      case 'result':
      case 'error': {
        const pending = this.pending.get(message.id);
        if (!pending) {
          // Reply to a request that already timed out
          log.warn('response:orphan', { id: message.id, type: message.type });
          return;
        }
        clearTimeout(pending.timeout);
        this.pending.delete(message.id);
        if (message.type === 'result') {
          pending.resolve(message.result);
        } else {
          pending.reject(fromErrorPayload(message.error));
        }
        return;
      }
    }
  }

  private handleExit(exit: WorkerExit): void {
    this.exit = exit;
    const expected = this.stopping;
    if (expected) {
      log.info('worker:exit', { ...exit, pending: this.pending.size });
    } else {
      log.error('worker:exit-unexpected', { ...exit, pending: this.pending.size });
    }

    for (const [id, pending] of this.pending) {
      clearTimeout(pending.timeout);
      pending.reject(
        new WorkerUnavailableError(`Worker exited during ${pending.type}`, {
          id,
          ...exit,
        }),
      );
    }
    this.pending.clear();
    void this.emit('worker:exit', { ...exit, expected });
  }
}

// ============================================================================
// Helpers
// ============================================================================

function parseResult<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  type: WorkerRequest['type'],
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new WorkerUnavailableError(`Malformed ${type} result from worker`, {
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`,
      ),
    });
  }
  return parsed.data;
}
