/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { PassThrough } from 'node:stream';
import type { Interface } from 'node:readline';
import { createInterface } from 'node:readline';
import { createModuleLogger } from '../../core/Logger.js';
import { WorkerUnavailableError } from '../../core/errors.js';
import type { VaultIndexConfig } from '../../config.js';
import type { WorkerHost } from '../WorkerHost.js';
import { decodeWorkerMessage, encodeLine } from '../protocol.js';
import type { WorkerMessage, WorkerRequest } from '../protocol.js';
import { WorkerRuntime } from '../runtime.js';
import type { WorkerChannel, WorkerExit } from './types.js';

const log = createModuleLogger('InProcessChannel');

export interface InProcessChannelOptions {
  /** Passed to the runtime; tests use it to inject storage or clocks */
  createHost?: (config: VaultIndexConfig) => WorkerHost;
}

/**
 * Runs the worker runtime in this process over in-memory streams. The
 * wire format is the same JSON lines the child process uses.
 */
export class InProcessChannel implements WorkerChannel {
  private readonly options: InProcessChannelOptions;
  private input: PassThrough | null = null;
  private readline: Interface | null = null;
  private messageHandlers: Array<(message: WorkerMessage) => void> = [];
  private exitHandlers: Array<(exit: WorkerExit) => void> = [];
  private alive = false;
  private exited: Promise<void> = Promise.resolve();

  constructor(options: InProcessChannelOptions = {}) {
    this.options = options;
  }

  async start(timeoutMs: number): Promise<void> {
    if (this.input) return;

    const input = new PassThrough();
    const output = new PassThrough();
    this.input = input;
    this.alive = true;

    let markExited: () => void = () => {};
    this.exited = new Promise<void>((resolve) => {
      markExited = resolve;
    });

    this.readline = createInterface({ input: output, crlfDelay: Infinity });
    this.readline.on('line', (line) => {
      const message = decodeWorkerMessage(line);
      if (!message) return;
      for (const handler of this.messageHandlers) handler(message);
    });

    const ready = this.waitForReady(timeoutMs);
    const runtime = new WorkerRuntime({
      input,
      output,
      createHost: this.options.createHost,
      exit: (code) => {
        this.alive = false;
        output.end();
        log.info('runtime:exited', { code });
        for (const handler of this.exitHandlers) handler({ code, signal: null });
        markExited();
      },
    });
    runtime.start();
    await ready;
  }

  send(request: WorkerRequest): void {
    if (!this.alive || !this.input) {
      throw new WorkerUnavailableError('In-process worker is not running');
    }
    this.input.write(encodeLine(request));
  }

  onMessage(handler: (message: WorkerMessage) => void): void {
    this.messageHandlers.push(handler);
  }

  onExit(handler: (exit: WorkerExit) => void): void {
    this.exitHandlers.push(handler);
  }

  async close(timeoutMs: number): Promise<void> {
    if (!this.alive || !this.input) return;
    this.input.end();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), timeoutMs);
    });
    const forced = await Promise.race([this.exited.then(() => false), timedOut]);
    clearTimeout(timer);
    if (forced) {
      log.warn('close:timeout', { timeoutMs });
    }
  }

  isAlive(): boolean {
    return this.alive;
  }

  private waitForReady(timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        reject(
          new WorkerUnavailableError(`Worker startup timeout after ${timeoutMs}ms`),
        );
      }, timeoutMs);
      this.onMessage((message) => {
        if (message.type !== 'ready') return;
        clearTimeout(timeout);
        resolve();
      });
    });
  }
}
