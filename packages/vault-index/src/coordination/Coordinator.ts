/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';
import { EventEmitter } from '../core/EventEmitter.js';
import { createModuleLogger } from '../core/Logger.js';
import {
  LeaseConflictError,
  StaleRoleError,
  StorageFailureError,
  errorMessage,
} from '../core/errors.js';
import { withRetry, withTimeout, sleep } from '../core/retry.js';
import { PRIMARY_SLOT } from '../storage/schema.js';
import type { StorageAdapter, LeaseRecord, LeaseClaim } from '../storage/types.js';
import type { CoordinationConfig, CoordinatorRole } from '../config.js';

const log = createModuleLogger('Coordinator');

// ============================================================================
// Types
// ============================================================================

export type CoordinatorState = 'unclaimed' | 'claiming' | 'reader' | 'primary';

export type RoleChangeReason =
  | 'starting'
  | 'claimed'
  | 'lease-held'
  | 'failover'
  | 'forced'
  | 'configured-reader'
  | 'stale-token'
  | 'renewal-failed'
  | 'stopped';

export interface CoordinatorEvents {
  [key: string]: unknown;
  'role:changed': {
    from: CoordinatorState;
    to: CoordinatorState;
    reason: RoleChangeReason;
  };
  'lease:renewed': { holderId: string; nowMs: number };
  'lease:renewal-failed': { attempt: number; error: string };
}

/** The lease operations the coordinator needs from storage. */
export type LeaseStore = Pick<
  StorageAdapter,
  'tryClaimLease' | 'forceClaimLease' | 'renewLease' | 'releaseLease' | 'getLease'
>;

export interface CoordinatorOptions {
  storage: LeaseStore;
  config: CoordinationConfig;
  /** Stable identity of this process. Default: host:pid:random */
  holderId?: string;
  /** Wall clock in ms. Injected for tests. */
  clock?: () => number;
  /** Backoff sleep. Injected for tests. */
  sleep?: (ms: number) => Promise<void>;
  /** Run heartbeat/poll timers. Tests drive `tick()` by hand. Default: true */
  schedule?: boolean;
}

export interface CoordinatorStatus {
  role: CoordinatorRole;
  state: CoordinatorState;
  holderId: string;
  canWrite: boolean;
  lastRenewedMs: number | null;
}

export function defaultHolderId(): string {
  return `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;
}

// ============================================================================
// Coordinator
// ============================================================================

/**
 * Owns this process's PRIMARY/READER lease.
 *
 * `auto`: claim on start; PRIMARY renews every heartbeat, READER polls and
 * claims once the stored heartbeat is older than the lease timeout.
 * `primary`: writes the lease unconditionally and never demotes.
 * `reader`: never touches the lease.
 */
export class Coordinator extends EventEmitter<CoordinatorEvents> {
  private readonly storage: LeaseStore;
  private readonly config: CoordinationConfig;
  private readonly holderId: string;
  private readonly clock: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly schedule: boolean;

  private state: CoordinatorState = 'unclaimed';
  private leaseToken: string | null = null;
  private lastRenewedMs: number | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;
  private tickInFlight: Promise<void> | null = null;
  private stopped = false;

  constructor(options: CoordinatorOptions) {
    super();
    this.storage = options.storage;
    this.config = options.config;
    this.holderId = options.holderId ?? defaultHolderId();
    this.clock = options.clock ?? (() => Date.now());
    this.sleep = options.sleep ?? sleep;
    this.schedule = options.schedule ?? true;
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  getRole(): CoordinatorState {
    return this.state;
  }

  getHolderId(): string {
    return this.holderId;
  }

  /**
   * True only while PRIMARY and the last successful renewal is younger
   * than the lease timeout. A PRIMARY that cannot renew stops writing
   * before anyone else may claim.
   */
  canWrite(): boolean {
    if (this.state !== 'primary') return false;
    if (this.config.role === 'primary') return true;
    if (this.lastRenewedMs === null) return false;
    return this.clock() - this.lastRenewedMs < this.config.leaseTimeoutMs;
  }

  /**
   * Throw unless this instance may write right now.
   */
  assertWritable(): void {
    if (this.canWrite()) return;
    if (this.state === 'primary') {
      throw new StaleRoleError('PRIMARY lease has not been renewed in time', {
        holderId: this.holderId,
        lastRenewedMs: this.lastRenewedMs,
      });
    }
    throw new LeaseConflictError('This instance does not hold the PRIMARY lease', {
      holderId: this.holderId,
      state: this.state,
    });
  }

  async getLeaseInfo(): Promise<LeaseRecord | null> {
    return this.storage.getLease(PRIMARY_SLOT);
  }

  getStatus(): CoordinatorStatus {
    return {
      role: this.config.role,
      state: this.state,
      holderId: this.holderId,
      canWrite: this.canWrite(),
      lastRenewedMs: this.lastRenewedMs,
    };
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async start(): Promise<CoordinatorState> {
    this.stopped = false;
    log.info('start', { holderId: this.holderId, role: this.config.role });

    switch (this.config.role) {
      case 'reader':
        this.transition('reader', 'configured-reader');
        return this.state;

      case 'primary':
        await this.forceClaim();
        break;

      case 'auto':
        this.transition('claiming', 'starting');
        await this.claim('claimed');
        break;
    }

    if (this.schedule) {
      this.timer = setInterval(() => {
        void this.tick();
      }, this.config.heartbeatIntervalMs);
    }
    return this.state;
  }

  /**
   * Stop timers and release the lease if held, so a READER can claim at
   * its next poll instead of waiting out the timeout.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.tickInFlight) {
      await this.tickInFlight;
    }

    const token = this.leaseToken;
    if (this.state === 'primary' && token) {
      try {
        const released = await withTimeout(
          this.storage.releaseLease(PRIMARY_SLOT, token),
          this.config.claimTimeoutMs,
          () => new StorageFailureError('Lease release timed out'),
        );
        log.info('release', { holderId: this.holderId, released });
      } catch (error) {
        log.warn('release:failed', { error: errorMessage(error) });
      }
    }

    this.leaseToken = null;
    this.lastRenewedMs = null;
    this.transition('unclaimed', 'stopped');
  }

  /**
   * One heartbeat: renew when PRIMARY, poll when an `auto` READER.
   * Overlapping ticks are skipped. Never rejects.
   */
  async tick(): Promise<void> {
    if (this.stopped || this.tickInFlight) return;

    this.tickInFlight = (async () => {
      try {
        if (this.state === 'primary') {
          await this.renew();
        } else if (this.state === 'reader' && this.config.role === 'auto') {
          await this.poll();
        }
      } catch (error) {
        log.error('tick:failed', { error: errorMessage(error) });
      }
    })();

    try {
      await this.tickInFlight;
    } finally {
      this.tickInFlight = null;
    }
  }

  // -------------------------------------------------------------------------
  // Lease protocol
  // -------------------------------------------------------------------------

  /**
   * Renew the held lease, retrying transient failures up to
   * `renewalRetries` times. A rejected token demotes at once; an exhausted
   * retry budget demotes too.
   */
  async renew(): Promise<boolean> {
    const token = this.leaseToken;
    if (this.state !== 'primary' || !token) return false;

    try {
      await withRetry(
        async () => {
          const nowMs = this.clock();
          if (this.config.role === 'primary') {
            await this.guard(
              this.storage.forceClaimLease(this.leaseClaim(token, nowMs)),
              'Lease renewal',
            );
          } else {
            const renewed = await this.guard(
              this.storage.renewLease(PRIMARY_SLOT, token, nowMs),
              'Lease renewal',
            );
            if (!renewed) {
              throw new StaleRoleError('Lease token no longer matches', {
                holderId: this.holderId,
              });
            }
          }
          this.lastRenewedMs = nowMs;
        },
        {
          attempts: this.config.renewalRetries + 1,
          backoffMs: this.config.renewalBackoffMs,
          sleep: this.sleep,
          shouldRetry: (error) => !(error instanceof StaleRoleError),
          onRetry: (attempt, error) => {
            log.warn('renew:retry', { attempt, error: errorMessage(error) });
            this.emitSync('lease:renewal-failed', {
              attempt,
              error: errorMessage(error),
            });
          },
        },
      );
    } catch (error) {
      if (this.config.role === 'primary') {
        log.error('renew:failed', { error: errorMessage(error) });
        return false;
      }
      const reason: RoleChangeReason =
        error instanceof StaleRoleError ? 'stale-token' : 'renewal-failed';
      log.warn('demote', { reason, error: errorMessage(error) });
      this.leaseToken = null;
      this.lastRenewedMs = null;
      this.transition('reader', reason);
      return false;
    }

    if (this.lastRenewedMs !== null) {
      this.emitSync('lease:renewed', {
        holderId: this.holderId,
        nowMs: this.lastRenewedMs,
      });
    }
    return true;
  }

  /**
   * READER check: claim when the stored lease is missing or expired.
   */
  async poll(): Promise<CoordinatorState> {
    if (this.state !== 'reader' || this.config.role !== 'auto') {
      return this.state;
    }

    try {
      const lease = await this.guard(
        this.storage.getLease(PRIMARY_SLOT),
        'Lease poll',
      );
      const nowMs = this.clock();
      if (lease && nowMs - lease.lastHeartbeatMs <= this.config.leaseTimeoutMs) {
        return this.state;
      }
      log.info('poll:lease-expired', {
        holderId: lease?.holderId ?? null,
        ageMs: lease ? nowMs - lease.lastHeartbeatMs : null,
      });
    } catch (error) {
      log.warn('poll:failed', { error: errorMessage(error) });
      return this.state;
    }

    await this.claim('failover');
    return this.state;
  }

  private async claim(reason: RoleChangeReason): Promise<void> {
    const token = randomUUID();
    const nowMs = this.clock();

    let claimed = false;
    try {
      claimed = await this.guard(
        this.storage.tryClaimLease(this.leaseClaim(token, nowMs)),
        'Lease claim',
      );
    } catch (error) {
      log.warn('claim:failed', { error: errorMessage(error) });
    }

    if (claimed) {
      this.leaseToken = token;
      this.lastRenewedMs = nowMs;
      this.transition('primary', reason);
    } else {
      log.debug('claim:lost', { holderId: this.holderId });
      this.transition('reader', 'lease-held');
    }
  }

  private async forceClaim(): Promise<void> {
    const token = randomUUID();
    const nowMs = this.clock();
    await this.guard(
      this.storage.forceClaimLease(this.leaseClaim(token, nowMs)),
      'Lease claim',
    );
    this.leaseToken = token;
    this.lastRenewedMs = nowMs;
    this.transition('primary', 'forced');
  }

  private leaseClaim(token: string, nowMs: number): LeaseClaim {
    return {
      roleSlot: PRIMARY_SLOT,
      holderId: this.holderId,
      leaseToken: token,
      nowMs,
      leaseTimeoutMs: this.config.leaseTimeoutMs,
    };
  }

  private guard<T>(operation: Promise<T>, label: string): Promise<T> {
    return withTimeout(
      operation,
      this.config.claimTimeoutMs,
      () =>
        new StorageFailureError(`${label} timed out`, {
          timeoutMs: this.config.claimTimeoutMs,
        }),
    );
  }

  private transition(to: CoordinatorState, reason: RoleChangeReason): void {
    const from = this.state;
    if (from === to) return;
    this.state = to;
    log.info('role:changed', { from, to, reason, holderId: this.holderId });
    this.emitSync('role:changed', { from, to, reason });
  }
}
