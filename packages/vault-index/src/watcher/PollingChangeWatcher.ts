/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from '../core/EventEmitter.js';
import { createModuleLogger } from '../core/Logger.js';
import { WatcherFailureError, errorMessage } from '../core/errors.js';
import type { VaultScanner } from '../discovery/VaultScanner.js';
import type { WatcherConfig } from '../config.js';
import type {
  ChangeWatcher,
  ChangeWatcherEvents,
  ChangeWatcherOptions,
} from './types.js';

const log = createModuleLogger('PollingChangeWatcher');

interface FileFingerprint {
  mtimeMs: number;
  size: number;
}

/**
 * Periodic full-tree stat scan, diffed against the previous scan.
 * Works on network and virtualized filesystems where OS notifications
 * are unreliable.
 */
export class PollingChangeWatcher
  extends EventEmitter<ChangeWatcherEvents>
  implements ChangeWatcher
{
  readonly mode = 'polling' as const;
  readonly vaultName: string;
  private readonly scanner: VaultScanner;
  private readonly config: WatcherConfig;

  private snapshot = new Map<string, FileFingerprint>();
  private timer: ReturnType<typeof setInterval> | null = null;
  private pollInFlight: Promise<void> | null = null;
  private watching = false;
  private consecutiveFailures = 0;

  constructor(options: ChangeWatcherOptions) {
    super();
    this.scanner = options.scanner;
    this.config = options.config;
    this.vaultName = options.scanner.vaultName;
  }

  /**
   * Take the baseline snapshot and begin polling. Files present at start
   * are not emitted; startup reconciliation covers them.
   */
  async start(): Promise<void> {
    if (this.watching) return;

    try {
      this.snapshot = await this.takeSnapshot();
    } catch (error) {
      throw new WatcherFailureError(
        `Initial scan of vault ${this.vaultName} failed`,
        { vault: this.vaultName },
        { cause: error },
      );
    }

    this.watching = true;
    this.timer = setInterval(() => {
      void this.poll();
    }, this.config.pollIntervalMs);

    log.info('start', {
      vault: this.vaultName,
      files: this.snapshot.size,
      intervalMs: this.config.pollIntervalMs,
    });
    this.emitSync('ready', { vaultName: this.vaultName, mode: this.mode });
  }

  async stop(): Promise<void> {
    this.watching = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    if (this.pollInFlight) {
      await this.pollInFlight;
    }
    this.snapshot.clear();
  }

  isWatching(): boolean {
    return this.watching;
  }

  /**
   * Scan once and emit the differences. Overlapping polls are skipped.
   * Never rejects; failures are emitted as `error`.
   */
  async poll(): Promise<void> {
    if (!this.watching || this.pollInFlight) return;

    this.pollInFlight = this.diff();
    try {
      await this.pollInFlight;
    } finally {
      this.pollInFlight = null;
    }
  }

  private async diff(): Promise<void> {
    let next: Map<string, FileFingerprint>;
    try {
      next = await this.takeSnapshot();
    } catch (error) {
      this.consecutiveFailures++;
      const failure = new WatcherFailureError(
        `Polling vault ${this.vaultName} failed: ${errorMessage(error)}`,
        { vault: this.vaultName, consecutiveFailures: this.consecutiveFailures },
        { cause: error },
      );
      log.warn('poll:failed', {
        vault: this.vaultName,
        error: failure.message,
        consecutiveFailures: this.consecutiveFailures,
      });
      this.emitSync('error', failure);
      return;
    }
    this.consecutiveFailures = 0;
    if (!this.watching) return;

    let changes = 0;
    for (const [relativePath, previous] of this.snapshot) {
      if (!next.has(relativePath)) {
        changes++;
        this.emitSync('mutation', {
          kind: 'delete',
          vaultName: this.vaultName,
          relativePath,
          source: 'watcher',
        });
      }
      const current = next.get(relativePath);
      if (
        current &&
        (current.mtimeMs !== previous.mtimeMs || current.size !== previous.size)
      ) {
        changes++;
        this.emitSync('mutation', {
          kind: 'upsert',
          vaultName: this.vaultName,
          relativePath,
          mtimeMs: current.mtimeMs,
          source: 'watcher',
        });
      }
    }
    for (const [relativePath, current] of next) {
      if (!this.snapshot.has(relativePath)) {
        changes++;
        this.emitSync('mutation', {
          kind: 'upsert',
          vaultName: this.vaultName,
          relativePath,
          mtimeMs: current.mtimeMs,
          source: 'watcher',
        });
      }
    }

    this.snapshot = next;
    if (changes > 0) {
      log.debug('poll:changes', { vault: this.vaultName, changes });
    }
  }

  private async takeSnapshot(): Promise<Map<string, FileFingerprint>> {
    const documents = await this.scanner.scan();
    return new Map(
      documents.map((doc) => [
        doc.relativePath,
        { mtimeMs: doc.mtimeMs, size: doc.size },
      ]),
    );
  }
}
