/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Interface } from 'node:readline';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { createModuleLogger, globalLogger, parseLogLevel } from '../core/Logger.js';
import {
  ConfigError,
  WorkerUnavailableError,
  errorMessage,
  toErrorPayload,
} from '../core/errors.js';
import { createConfig, validateConfig } from '../config.js';
import type { VaultIndexConfig } from '../config.js';
import { WorkerHost } from './WorkerHost.js';
import {
  decodeRequest,
  encodeLine,
  extractRequestId,
} from './protocol.js';
import type { WorkerMessage, WorkerRequest } from './protocol.js';

const log = createModuleLogger('WorkerRuntime');

// ============================================================================
// Types
// ============================================================================

export interface WorkerRuntimeOptions {
  /** Request lines */
  input: Readable;
  /** Protocol messages */
  output: Writable;
  /** Called once the runtime has shut down */
  exit: (code: number) => void;
  /** Apply the init config's logging section to the global logger */
  configureLogger?: boolean;
  /** Default: new WorkerHost({ config }) */
  createHost?: (config: VaultIndexConfig) => WorkerHost;
}

// ============================================================================
// WorkerRuntime Class
// ============================================================================

/**
 * Serves the worker protocol over a pair of streams. Requests are handled
 * concurrently; each reply carries the request's id.
 */
export class WorkerRuntime {
  private readonly options: WorkerRuntimeOptions;
  private readline: Interface | null = null;
  private host: WorkerHost | null = null;
  private initializing = false;
  private stopping: Promise<void> | null = null;

  constructor(options: WorkerRuntimeOptions) {
    this.options = options;
  }

  start(): void {
    this.readline = createInterface({
      input: this.options.input,
      crlfDelay: Infinity,
    });
    this.readline.on('line', (line) => {
      void this.handleLine(line);
    });
    this.readline.on('close', () => {
      if (this.stopping) return;
      log.info('input:closed');
      void this.shutdown(0);
    });

    this.send({ type: 'ready', pid: process.pid });
    log.info('ready', { pid: process.pid });
  }

  /**
   * Stop the host and report the exit code. Safe to call repeatedly.
   */
  shutdown(code: number): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.stop(code);
    }
    return this.stopping;
  }

  // -------------------------------------------------------------------------
  // Dispatch
  // -------------------------------------------------------------------------

  private async handleLine(line: string): Promise<void> {
    if (!line.trim() || this.stopping) return;

    let request: WorkerRequest;
    try {
      request = decodeRequest(line);
    } catch (error) {
      const id = extractRequestId(line);
      log.warn('request:invalid', {
        id,
        error: errorMessage(error),
        line: line.slice(0, 200),
      });
      if (id) {
        this.send({
          type: 'error',
          id,
          error: toErrorPayload(
            new ConfigError(`Invalid request: ${errorMessage(error)}`),
          ),
        });
      }
      return;
    }

    try {
      const result = await this.dispatch(request);
      this.send({ type: 'result', id: request.id, result });
    } catch (error) {
      log.debug('request:failed', {
        id: request.id,
        type: request.type,
        error: errorMessage(error),
      });
      this.send({ type: 'error', id: request.id, error: toErrorPayload(error) });
    }

    if (request.type === 'shutdown') {
      await this.shutdown(0);
    }
  }

  private async dispatch(request: WorkerRequest): Promise<unknown> {
    switch (request.type) {
      case 'init':
        return this.init(request.config);
      case 'shutdown':
        return { stopped: true };
      case 'search':
        return this.requireHost().search({
          query: request.query,
          limit: request.limit,
          vaults: request.vaults,
        });
      case 'status':
        return this.requireHost().getStatus();
      case 'reindex':
        return this.requireHost().reindex(request.vault, request.wait ?? false);
      case 'list-recent':
        return this.requireHost().listRecent(request.limit);
      case 'read-note': {
        const text = await this.requireHost().readNote({
          vaultName: request.vaultName,
          relativePath: request.relativePath,
        });
        return { text };
      }
    }
  }

  private async init(
    partial: Extract<WorkerRequest, { type: 'init' }>['config'],
  ): Promise<unknown> {
    if (this.host || this.initializing) {
      throw new ConfigError('Worker is already initialized');
    }
    this.initializing = true;

    try {
      const { $version: _version, ...overrides } = partial;
      const config = createConfig(overrides);
      validateConfig(config);

      if (this.options.configureLogger) {
        globalLogger.configure({
          level: parseLogLevel(config.logging.level),
          filePath: config.logging.filePath,
        });
      }

      const host =
        this.options.createHost?.(config) ?? new WorkerHost({ config });
      host.on('role:changed', (change) => {
        this.send({
          type: 'event',
          event: {
            event: 'role:changed',
            data: { from: change.from, to: change.to, reason: change.reason },
          },
        });
      });
      host.on('fatal', ({ message }) => {
        log.fatal('host:fatal', { error: message });
        this.send({ type: 'event', event: { event: 'fatal', data: { message } } });
        void this.shutdown(1);
      });

      this.host = host;
      try {
        await host.start();
      } catch (error) {
        this.host = null;
        log.error('init:failed', { error: errorMessage(error) });
        await host.stop().catch((stopError: unknown) => {
          log.warn('init:cleanup-failed', { error: errorMessage(stopError) });
        });
        throw error;
      }
      return await host.getStatus();
    } finally {
      this.initializing = false;
    }
  }

  private requireHost(): WorkerHost {
    if (!this.host || this.initializing) {
      throw new WorkerUnavailableError('Worker is not initialized');
    }
    return this.host;
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private send(message: WorkerMessage): void {
    this.options.output.write(encodeLine(message));
  }

  private async stop(code: number): Promise<void> {
    log.info('shutdown:begin', { code });
    this.readline?.close();
    this.readline = null;

    if (this.host) {
      try {
        await this.host.stop();
      } catch (error) {
        log.warn('shutdown:host-error', { error: errorMessage(error) });
      }
      this.host = null;
    }

    log.info('shutdown:complete', { code });
    this.options.exit(code);
  }
}
