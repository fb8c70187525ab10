/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ControllerFacade } from './ControllerFacade.js';
import type { ControllerFacadeEvents } from './ControllerFacade.js';
import type { WorkerChannel, WorkerExit } from './channels/types.js';
import type { WorkerMessage, WorkerRequest, WorkerStatus } from './protocol.js';
import { createConfig } from '../config.js';
import type { VaultIndexConfig } from '../config.js';
import {
  ModelMismatchError,
  VaultIndexErrorKind,
  WorkerUnavailableError,
} from '../core/errors.js';

const STATUS: WorkerStatus = {
  pid: 4242,
  holderId: 'holder-1',
  role: 'auto',
  state: 'primary',
  canWrite: true,
  lastRenewedMs: 1000,
  queueSize: 0,
  model: { modelId: 'test/a', dimensions: 64 },
  indexModel: { modelId: 'test/a', dimensions: 64 },
  vaults: ['notes'],
  watchers: [{ vaultName: 'notes', mode: 'polling', watching: true }],
  indexer: { embedded: 2, skipped: 0, deleted: 0, failed: 0, batches: 1, discarded: 0 },
  storage: {
    totalDocuments: 2,
    embeddedDocuments: 2,
    pendingDocuments: 0,
    documentsByVault: { notes: 2 },
  },
};

/** Channel double: records requests and lets the test answer them. */
class FakeChannel implements WorkerChannel {
  sent: WorkerRequest[] = [];
  closed = false;
  /** Automatic reply; return null to answer by hand */
  respond: (request: WorkerRequest) => WorkerMessage | null = (request) =>
    request.type === 'init' || request.type === 'status'
      ? { type: 'result', id: request.id, result: STATUS }
      : request.type === 'shutdown'
        ? { type: 'result', id: request.id, result: { stopped: true } }
        : null;

  private messageHandlers: Array<(message: WorkerMessage) => void> = [];
  private exitHandlers: Array<(exit: WorkerExit) => void> = [];
  private alive = false;

  async start(_timeoutMs: number): Promise<void> {
    this.alive = true;
  }

  send(request: WorkerRequest): void {
    if (!this.alive) throw new WorkerUnavailableError('not running');
    this.sent.push(request);
    const reply = this.respond(request);
    if (reply) queueMicrotask(() => this.deliver(reply));
  }

  onMessage(handler: (message: WorkerMessage) => void): void {
    this.messageHandlers.push(handler);
  }

  onExit(handler: (exit: WorkerExit) => void): void {
    this.exitHandlers.push(handler);
  }

  async close(_timeoutMs: number): Promise<void> {
    this.closed = true;
    if (this.alive) this.crash({ code: 0, signal: null });
  }

  isAlive(): boolean {
    return this.alive;
  }

  deliver(message: WorkerMessage): void {
    for (const handler of this.messageHandlers) handler(message);
  }

  crash(exit: WorkerExit): void {
    this.alive = false;
    for (const handler of this.exitHandlers) handler(exit);
  }

  lastRequest(): WorkerRequest {
    const request = this.sent.at(-1);
    if (!request) throw new Error('nothing sent');
    return request;
  }
}

function searchHit(relativePath: string) {
  return {
    uri: `obsidian://notes/${relativePath}`,
    vaultName: 'notes',
    relativePath,
    score: 0.5,
    mtimeMs: 1,
    outline: [],
    excerpt: relativePath,
  };
}

describe('ControllerFacade', () => {
  let channel: FakeChannel;
  let config: VaultIndexConfig;
  let facade: ControllerFacade;

  beforeEach(() => {
    channel = new FakeChannel();
    config = createConfig({
      vaults: [{ name: 'notes', path: '/tmp/notes' }],
      worker: { requestTimeoutMs: 50, shutdownTimeoutMs: 50 },
    });
    facade = new ControllerFacade({ channel, config });
  });

  it('should hand the configuration to the worker on start', async () => {
    const status = await facade.start();

    expect(status).toEqual(STATUS);
    expect(channel.sent).toHaveLength(1);
    expect(channel.sent[0]).toMatchObject({ type: 'init', config });
    expect(facade.isAvailable()).toBe(true);
  });

  it('should reject requests before start', async () => {
    await expect(facade.status()).rejects.toThrow('Worker is not started');
  });

  it('should match out-of-order replies by correlation id', async () => {
    await facade.start();
    channel.respond = () => null;

    const first = facade.search({ query: 'first' });
    const second = facade.search({ query: 'second', limit: 3 });
    const [, firstRequest, secondRequest] = channel.sent;

    expect(firstRequest.id).not.toBe(secondRequest.id);
    expect(secondRequest).toMatchObject({ type: 'search', query: 'second', limit: 3 });

    channel.deliver({ type: 'result', id: secondRequest.id, result: [searchHit('b.md')] });
    channel.deliver({ type: 'result', id: firstRequest.id, result: [searchHit('a.md')] });

    expect((await first).map((r) => r.relativePath)).toEqual(['a.md']);
    expect((await second).map((r) => r.relativePath)).toEqual(['b.md']);
  });

  it('should time out a request the worker never answers', async () => {
    await facade.start();
    channel.respond = () => null;

    const pending = facade.listRecent();
    await expect(pending).rejects.toThrow(WorkerUnavailableError);
    await expect(pending).rejects.toThrow('Request list-recent timed out after 50ms');

    // A late reply is dropped
    channel.deliver({ type: 'result', id: channel.lastRequest().id, result: [] });
    expect(facade.isAvailable()).toBe(true);
  });

  it('should fail pending and later requests once the worker exits', async () => {
    await facade.start();
    channel.respond = () => null;
    const exits: Array<ControllerFacadeEvents['worker:exit']> = [];
    facade.on('worker:exit', (exit) => {
      exits.push(exit);
    });

    const pending = facade.search({ query: 'tomatoes' });
    channel.crash({ code: 1, signal: null });

    await expect(pending).rejects.toThrow('Worker exited during search');
    await expect(facade.status()).rejects.toThrow('Worker has exited');
    expect(exits).toEqual([{ code: 1, signal: null, expected: false }]);
    expect(facade.isAvailable()).toBe(false);
  });

  it('should rebuild typed errors from the worker', async () => {
    await facade.start();
    channel.respond = (request) => ({
      type: 'error',
      id: request.id,
      error: {
        message: 'Index was built with test/b (32d)',
        kind: VaultIndexErrorKind.MODEL_MISMATCH,
        context: { indexed: 'test/b' },
      },
    });

    const failure = facade.search({ query: 'tomatoes' });
    await expect(failure).rejects.toThrow(ModelMismatchError);
    await expect(failure).rejects.toMatchObject({
      message: 'Index was built with test/b (32d)',
      context: { indexed: 'test/b' },
    });
  });

  it('should reject a result that does not match the request type', async () => {
    await facade.start();
    channel.respond = (request) => ({
      type: 'result',
      id: request.id,
      result: { unexpected: true },
    });

    await expect(facade.readNote({ vaultName: 'notes', relativePath: 'a.md' }))
      .rejects.toThrow('Malformed read-note result from worker');
  });

  it('should not bound a waiting reindex by the request timeout', async () => {
    await facade.start();
    channel.respond = (request) => {
      setTimeout(() => {
        channel.deliver({
          type: 'result',
          id: request.id,
          result: { vaults: ['notes'], upserts: 2, deletes: 0, stats: STATUS.indexer },
        });
      }, 120);
      return null;
    };

    const result = await facade.reindex(undefined, { wait: true });

    expect(channel.lastRequest()).toMatchObject({ type: 'reindex', wait: true });
    expect(result).toEqual({
      vaults: ['notes'],
      upserts: 2,
      deletes: 0,
      stats: STATUS.indexer,
    });
  });

  it('should forward worker events', async () => {
    await facade.start();
    const roles = vi.fn();
    const fatal = vi.fn();
    facade.on('role:changed', roles);
    facade.on('worker:fatal', fatal);

    channel.deliver({
      type: 'event',
      event: {
        event: 'role:changed',
        data: { from: 'primary', to: 'reader', reason: 'lease-lost' },
      },
    });
    channel.deliver({
      type: 'event',
      event: { event: 'fatal', data: { message: 'disk full' } },
    });

    expect(roles).toHaveBeenCalledWith({
      from: 'primary',
      to: 'reader',
      reason: 'lease-lost',
    });
    expect(fatal).toHaveBeenCalledWith({ message: 'disk full' });
  });

  it('should shut the worker down before closing the channel', async () => {
    await facade.start();
    const exits: Array<ControllerFacadeEvents['worker:exit']> = [];
    facade.on('worker:exit', (exit) => {
      exits.push(exit);
    });

    await facade.stop();

    expect(channel.lastRequest().type).toBe('shutdown');
    expect(channel.closed).toBe(true);
    expect(exits).toEqual([{ code: 0, signal: null, expected: true }]);
  });
});
