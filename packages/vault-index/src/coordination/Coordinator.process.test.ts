/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { fork } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { mkdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { PRIMARY_SLOT } from '../storage/schema.js';

const CLAIMER = fileURLToPath(new URL('./__fixtures__/claim-process.ts', import.meta.url));

interface ClaimReport {
  holderId: string;
  state: string;
}

function isClaimReport(value: unknown): value is ClaimReport {
  return (
    typeof value === 'object' &&
    value !== null &&
    'holderId' in value &&
    typeof value.holderId === 'string' &&
    'state' in value &&
    typeof value.state === 'string'
  );
}

function nextReport(child: ChildProcess): Promise<ClaimReport> {
  return new Promise((resolve, reject) => {
    const onMessage = (message: unknown): void => {
      if (!isClaimReport(message)) return;
      cleanup();
      resolve(message);
    };
    const onExit = (code: number | null): void => {
      cleanup();
      reject(new Error(`Claimer exited with code ${code}`));
    };
    const cleanup = (): void => {
      child.off('message', onMessage);
      child.off('exit', onExit);
    };
    child.on('message', onMessage);
    child.on('exit', onExit);
  });
}

/** Send `command` to every child at once and collect their reports. */
function broadcast(children: ChildProcess[], command: string): Promise<ClaimReport[]> {
  const reports = children.map(nextReport);
  for (const child of children) child.send(command);
  return Promise.all(reports);
}

describe('Coordinator across processes', () => {
  let dir: string;
  let databasePath: string;
  let children: ChildProcess[];

  beforeEach(async () => {
    dir = join(tmpdir(), `vault-index-claim-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
    databasePath = join(dir, 'index.db');
    children = [];

    // Create the schema once so the claimers race only on the lease
    const storage = new SQLiteStorage({ path: databasePath, inMemory: false, busyTimeoutMs: 5000 });
    await storage.initialize();
    await storage.close();
  });

  afterEach(async () => {
    await Promise.all(
      children.map(
        (child) =>
          new Promise<void>((resolve) => {
            if (child.exitCode !== null || child.signalCode !== null) {
              resolve();
              return;
            }
            child.once('exit', () => resolve());
            child.kill('SIGKILL');
          }),
      ),
    );
    try {
      await rm(dir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  async function launch(count: number): Promise<ChildProcess[]> {
    const launched = Array.from({ length: count }, (_, i) => {
      const child = fork(CLAIMER, [databasePath, `holder-${i}`], {
        execArgv: ['--import', 'tsx'],
        stdio: ['ignore', 'ignore', 'inherit', 'ipc'],
      });
      children.push(child);
      return child;
    });
    const loaded = await Promise.all(launched.map(nextReport));
    expect(loaded.map((r) => r.state)).toEqual(Array.from({ length: count }, () => 'loaded'));
    return launched;
  }

  async function storedHolder(): Promise<string | null> {
    const storage = new SQLiteStorage({ path: databasePath, inMemory: false, busyTimeoutMs: 5000 });
    await storage.initialize();
    try {
      return (await storage.getLease(PRIMARY_SLOT))?.holderId ?? null;
    } finally {
      await storage.close();
    }
  }

  it.each([2, 6])(
    'should elect exactly one PRIMARY among %i processes claiming at once',
    async (count) => {
      const claimers = await launch(count);

      const reports = await broadcast(claimers, 'claim');

      const primaries = reports.filter((r) => r.state === 'primary');
      expect(primaries).toHaveLength(1);
      expect(reports.filter((r) => r.state === 'reader')).toHaveLength(count - 1);
      expect(await storedHolder()).toBe(primaries[0].holderId);
    },
    60000,
  );

  it('should fail over to a READER process once the PRIMARY releases', async () => {
    const claimers = await launch(2);
    const reports = await broadcast(claimers, 'claim');
    const primaryIndex = reports.findIndex((r) => r.state === 'primary');
    const primary = claimers[primaryIndex];
    const reader = claimers[1 - primaryIndex];

    expect(await broadcast([primary], 'stop')).toEqual([
      { holderId: reports[primaryIndex].holderId, state: 'stopped' },
    ]);
    const [promoted] = await broadcast([reader], 'tick');

    expect(promoted).toEqual({ holderId: reports[1 - primaryIndex].holderId, state: 'primary' });
    expect(await storedHolder()).toBe(promoted.holderId);
  }, 60000);
});
