/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { InProcessChannel } from './InProcessChannel.js';
import { ControllerFacade } from '../ControllerFacade.js';
import { WorkerHost } from '../WorkerHost.js';
import { createConfig } from '../../config.js';
import type { VaultIndexConfig } from '../../config.js';
import { ConfigError, LeaseConflictError } from '../../core/errors.js';

describe('InProcessChannel', () => {
  let root: string;
  let config: VaultIndexConfig;
  let facades: ControllerFacade[];
  let hosts: WorkerHost[];

  /** Worker with manual heartbeats so the test drives failover. */
  function launch(): ControllerFacade {
    const channel = new InProcessChannel({
      createHost: (workerConfig) => {
        const host = new WorkerHost({
          config: workerConfig,
          coordinator: { schedule: false },
        });
        hosts.push(host);
        return host;
      },
    });
    const facade = new ControllerFacade({ channel, config });
    facades.push(facade);
    return facade;
  }

  beforeEach(async () => {
    root = join(tmpdir(), `vault-index-worker-${randomUUID()}`);
    const vault = join(root, 'notes');
    await mkdir(join(vault, 'garden'), { recursive: true });
    await writeFile(join(vault, 'garden', 'a.md'), '# Tomatoes\nalpha tomatoes in the greenhouse');
    await writeFile(join(vault, 'b.md'), 'bravo saxophone practice schedule');

    config = createConfig({
      vaults: [{ name: 'notes', path: vault }],
      database: { path: join(root, 'index.db') },
      embeddings: { provider: 'hashing', model: 'test/a', dimensions: 64 },
      watcher: { enabled: false },
      worker: { mode: 'in-process', requestTimeoutMs: 10000, shutdownTimeoutMs: 5000 },
    });
    facades = [];
    hosts = [];
  });

  afterEach(async () => {
    for (const facade of facades) {
      await facade.stop();
    }
    try {
      await rm(root, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  it('should index and search through the facade', async () => {
    const facade = launch();

    const status = await facade.start();
    expect(status).toMatchObject({
      role: 'auto',
      state: 'primary',
      canWrite: true,
      vaults: ['notes'],
      model: { modelId: 'test/a', dimensions: 64 },
      indexModel: { modelId: 'test/a', dimensions: 64 },
    });

    const reindexed = await facade.reindex(undefined, { wait: true });
    expect(reindexed).toMatchObject({ vaults: ['notes'], upserts: 2, deletes: 0 });
    expect(reindexed.stats?.embedded).toBe(2);

    const results = await facade.search({ query: 'tomatoes greenhouse', limit: 1 });
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({
      uri: 'obsidian://notes/garden/a.md',
      relativePath: 'garden/a.md',
      outline: ['# Tomatoes'],
    });

    const recent = await facade.listRecent();
    expect(recent.map((note) => note.relativePath).sort()).toEqual([
      'b.md',
      'garden/a.md',
    ]);

    expect(
      await facade.readNote({ vaultName: 'notes', relativePath: 'b.md' }),
    ).toBe('bravo saxophone practice schedule');
  });

  it('should carry typed errors across the channel', async () => {
    const facade = launch();
    await facade.start();

    await expect(
      facade.readNote({ vaultName: 'nowhere', relativePath: 'a.md' }),
    ).rejects.toThrow(ConfigError);
    await expect(facade.reindex('nowhere')).rejects.toThrow('Unknown vault: nowhere');
  });

  it('should share one index between a PRIMARY and a READER', async () => {
    const primary = launch();
    const reader = launch();

    expect((await primary.start()).state).toBe('primary');
    await primary.reindex(undefined, { wait: true });
    const readerStatus = await reader.start();

    expect(readerStatus).toMatchObject({ state: 'reader', canWrite: false });
    expect(readerStatus.storage.embeddedDocuments).toBe(2);
    await expect(reader.reindex()).rejects.toThrow(LeaseConflictError);

    const [hit] = await reader.search({ query: 'saxophone practice', limit: 1 });
    expect(hit.relativePath).toBe('b.md');
  });

  it('should promote the READER after the PRIMARY releases the lease', async () => {
    const primary = launch();
    const reader = launch();
    await primary.start();
    await reader.start();
    const roles = vi.fn();
    reader.on('role:changed', roles);

    await primary.stop();
    await hosts[1].coordinator.tick();

    await vi.waitFor(() => {
      expect(roles).toHaveBeenCalledWith(
        expect.objectContaining({ from: 'reader', to: 'primary' }),
      );
    });
    expect((await reader.status()).canWrite).toBe(true);
    await expect(reader.reindex()).resolves.toMatchObject({ vaults: ['notes'] });
  });

  it('should fail requests after the worker has stopped', async () => {
    const facade = launch();
    await facade.start();

    await facade.stop();

    await expect(facade.status()).rejects.toThrow('Worker has exited');
  });
});
