/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Coordinator } from './Coordinator.js';
import type { CoordinatorEvents } from './Coordinator.js';
import { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { PRIMARY_SLOT } from '../storage/schema.js';
import { createConfig } from '../config.js';
import type { CoordinationConfig } from '../config.js';
import { LeaseConflictError, StaleRoleError } from '../core/errors.js';

class FlakyRenewStorage extends SQLiteStorage {
  renewCalls = 0;
  failRenewals = true;

  override async renewLease(
    roleSlot: string,
    leaseToken: string,
    nowMs: number,
  ): Promise<boolean> {
    this.renewCalls++;
    if (this.failRenewals) {
      throw new Error('database is locked');
    }
    return super.renewLease(roleSlot, leaseToken, nowMs);
  }
}

describe('Coordinator', () => {
  let storage: SQLiteStorage;
  let now: number;
  let coordinators: Coordinator[];

  const clock = (): number => now;

  function coordination(
    overrides: Partial<CoordinationConfig> = {},
  ): CoordinationConfig {
    return createConfig({
      coordination: { renewalBackoffMs: 0, ...overrides },
    }).coordination;
  }

  function create(
    holderId: string,
    overrides: Partial<CoordinationConfig> = {},
    store: SQLiteStorage = storage,
  ): Coordinator {
    const coordinator = new Coordinator({
      storage: store,
      config: coordination(overrides),
      holderId,
      clock,
      schedule: false,
    });
    coordinators.push(coordinator);
    return coordinator;
  }

  beforeEach(async () => {
    now = 1_000_000;
    coordinators = [];
    storage = new SQLiteStorage({ path: '', inMemory: true, busyTimeoutMs: 1000 });
    await storage.initialize();
  });

  afterEach(async () => {
    for (const coordinator of coordinators) {
      await coordinator.stop();
    }
    await storage.close();
  });

  describe('auto role', () => {
    it('should elect one PRIMARY and one READER on an empty database', async () => {
      const a = create('a');
      const b = create('b');

      const roles = [await a.start(), await b.start()];

      expect(roles).toEqual(['primary', 'reader']);
      expect(a.canWrite()).toBe(true);
      expect(b.canWrite()).toBe(false);
      expect((await b.getLeaseInfo())?.holderId).toBe('a');
    });

    it('should emit role changes with a reason', async () => {
      const a = create('a');
      const changes: Array<CoordinatorEvents['role:changed']> = [];
      a.on('role:changed', (change) => {
        changes.push(change);
      });

      await a.start();
      await vi.waitFor(() => expect(changes).toHaveLength(2));

      expect(changes).toEqual([
        { from: 'unclaimed', to: 'claiming', reason: 'starting' },
        { from: 'claiming', to: 'primary', reason: 'claimed' },
      ]);
    });

    it('should renew the heartbeat on tick', async () => {
      const a = create('a');
      await a.start();

      now += 5000;
      await a.tick();

      expect((await a.getLeaseInfo())?.lastHeartbeatMs).toBe(now);
    });

    it('should stay READER while the PRIMARY lease is live', async () => {
      const a = create('a');
      const b = create('b');
      await a.start();
      await b.start();

      now += 15000;
      await b.tick();

      expect(b.getRole()).toBe('reader');
    });

    it('should fail over to a READER once the lease expires', async () => {
      const a = create('a');
      const b = create('b');
      await a.start();
      await b.start();

      now += 15001;
      await b.tick();

      expect(b.getRole()).toBe('primary');
      expect((await b.getLeaseInfo())?.holderId).toBe('b');
    });

    it('should promote exactly one of many READERs after expiry', async () => {
      const a = create('a');
      await a.start();
      const readers = ['b', 'c', 'd', 'e'].map((id) => create(id));
      for (const reader of readers) {
        await reader.start();
      }

      now += 20000;
      await Promise.all(readers.map((reader) => reader.tick()));

      expect(readers.filter((r) => r.getRole() === 'primary')).toHaveLength(1);
    });

    it('should demote a PRIMARY whose token was taken over', async () => {
      const a = create('a');
      const b = create('b');
      await a.start();
      await b.start();
      now += 15001;
      await b.tick();

      const changes: Array<CoordinatorEvents['role:changed']> = [];
      a.on('role:changed', (change) => {
        changes.push(change);
      });
      await a.tick();

      expect(a.getRole()).toBe('reader');
      await vi.waitFor(() =>
        expect(changes).toEqual([
          { from: 'primary', to: 'reader', reason: 'stale-token' },
        ]),
      );
      expect((await a.getLeaseInfo())?.holderId).toBe('b');
    });

    it('should stop writing once its own lease has gone unrenewed too long', async () => {
      const a = create('a');
      await a.start();

      now += 15000;

      expect(a.getRole()).toBe('primary');
      expect(a.canWrite()).toBe(false);
      expect(() => a.assertWritable()).toThrow(StaleRoleError);
    });

    it('should release the lease on stop so a READER can claim', async () => {
      const a = create('a');
      const b = create('b');
      await a.start();
      await b.start();

      await a.stop();
      expect(await b.getLeaseInfo()).toBeNull();

      await b.tick();
      expect(b.getRole()).toBe('primary');
      expect(a.getRole()).toBe('unclaimed');
    });
  });

  describe('renewal retry budget', () => {
    let flaky: FlakyRenewStorage;

    beforeEach(async () => {
      flaky = new FlakyRenewStorage({ path: '', inMemory: true, busyTimeoutMs: 1000 });
      await flaky.initialize();
    });

    afterEach(async () => {
      for (const coordinator of coordinators) {
        await coordinator.stop();
      }
      coordinators = [];
      await flaky.close();
    });

    it('should demote after the retry budget is spent', async () => {
      const a = create('a', { renewalRetries: 2 }, flaky);
      await a.start();

      now += 5000;
      const renewed = await a.renew();

      expect(renewed).toBe(false);
      expect(flaky.renewCalls).toBe(3);
      expect(a.getRole()).toBe('reader');
    });

    it('should stay PRIMARY when a retry succeeds', async () => {
      const a = create('a', { renewalRetries: 2 }, flaky);
      await a.start();
      a.on('lease:renewal-failed', () => {
        flaky.failRenewals = false;
      });

      now += 5000;
      const renewed = await a.renew();

      expect(renewed).toBe(true);
      expect(flaky.renewCalls).toBe(2);
      expect(a.getRole()).toBe('primary');
    });

    it('should demote on the first failure with a zero budget', async () => {
      const a = create('a', { renewalRetries: 0 }, flaky);
      await a.start();

      await a.renew();

      expect(flaky.renewCalls).toBe(1);
      expect(a.getRole()).toBe('reader');
    });
  });

  describe('explicit roles', () => {
    it('should never claim as reader', async () => {
      const r = create('r', { role: 'reader' });

      expect(await r.start()).toBe('reader');
      now += 60000;
      await r.tick();

      expect(r.getRole()).toBe('reader');
      expect(await r.getLeaseInfo()).toBeNull();
      expect(() => r.assertWritable()).toThrow(LeaseConflictError);
    });

    it('should take the lease unconditionally as primary', async () => {
      const a = create('a');
      const p = create('p', { role: 'primary' });
      await a.start();

      expect(await p.start()).toBe('primary');
      expect((await p.getLeaseInfo())?.holderId).toBe('p');

      await a.tick();
      expect(a.getRole()).toBe('reader');
    });

    it('should keep reporting PRIMARY as primary without renewals', async () => {
      const p = create('p', { role: 'primary' });
      await p.start();

      now += 60000;

      expect(p.canWrite()).toBe(true);
      expect(p.getStatus()).toEqual({
        role: 'primary',
        state: 'primary',
        holderId: 'p',
        canWrite: true,
        lastRenewedMs: 1_000_000,
      });
    });
  });

  describe('timers', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('should renew on the heartbeat interval', async () => {
      vi.useFakeTimers();
      const a = new Coordinator({
        storage,
        config: coordination({ heartbeatIntervalMs: 1000, leaseTimeoutMs: 3000 }),
        holderId: 'a',
      });
      coordinators.push(a);
      await a.start();
      const started = (await storage.getLease(PRIMARY_SLOT))?.lastHeartbeatMs ?? 0;

      await vi.advanceTimersByTimeAsync(1000);

      await vi.waitFor(async () => {
        const lease = await storage.getLease(PRIMARY_SLOT);
        expect(lease?.lastHeartbeatMs).toBeGreaterThan(started);
      });
      await a.stop();
    });
  });
});
