/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from '../core/EventEmitter.js';
import { createModuleLogger } from '../core/Logger.js';
import { WatcherFailureError, errorMessage } from '../core/errors.js';
import { sleep } from '../core/retry.js';
import type { VaultScanner } from '../discovery/VaultScanner.js';
import type { WatcherConfig } from '../config.js';
import type {
  ChangeWatcher,
  ChangeWatcherEvents,
  ChangeWatcherOptions,
  FileChangeType,
} from './types.js';

const log = createModuleLogger('ChokidarChangeWatcher');

interface PendingChange {
  type: FileChangeType;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Event-driven watcher on chokidar. Changes are debounced per path and
 * the watcher is reopened after errors, up to `maxRestartAttempts`.
 */
export class ChokidarChangeWatcher
  extends EventEmitter<ChangeWatcherEvents>
  implements ChangeWatcher
{
  readonly mode = 'events' as const;
  readonly vaultName: string;
  private readonly scanner: VaultScanner;
  private readonly config: WatcherConfig;

  private watcher: import('chokidar').FSWatcher | null = null;
  private pending = new Map<string, PendingChange>();
  private ready = false;
  private stopped = true;
  private restartAttempts = 0;

  constructor(options: ChangeWatcherOptions) {
    super();
    this.scanner = options.scanner;
    this.config = options.config;
    this.vaultName = options.scanner.vaultName;
  }

  async start(): Promise<void> {
    if (this.watcher) return;
    this.stopped = false;
    this.restartAttempts = 0;
    await this.open();
  }

  async stop(): Promise<void> {
    this.stopped = true;
    for (const change of this.pending.values()) {
      clearTimeout(change.timer);
    }
    this.pending.clear();
    await this.close();
  }

  isWatching(): boolean {
    return this.watcher !== null && this.ready;
  }

  // -------------------------------------------------------------------------
  // Watcher lifecycle
  // -------------------------------------------------------------------------

  private async open(): Promise<void> {
    let chokidar: typeof import('chokidar');
    try {
      chokidar = await import('chokidar');
    } catch (error) {
      throw new WatcherFailureError(
        'chokidar is not available; use polling mode',
        { vault: this.vaultName },
        { cause: error },
      );
    }

    const watcher = chokidar.watch(this.scanner.rootPath, {
      ignored: (path: string) => this.isIgnoredDirectory(path),
      persistent: true,
      ignoreInitial: true,
      followSymlinks: false,
      awaitWriteFinish: {
        stabilityThreshold: 200,
        pollInterval: 100,
      },
    });
    this.watcher = watcher;

    await new Promise<void>((resolve) => {
      watcher
        .on('add', (path: string) => this.handleChange('add', path))
        .on('change', (path: string) => this.handleChange('change', path))
        .on('unlink', (path: string) => this.handleChange('unlink', path))
        .on('error', (error: unknown) => {
          void this.handleError(error);
          resolve();
        })
        .on('ready', () => {
          this.ready = true;
          log.info('ready', { vault: this.vaultName, root: this.scanner.rootPath });
          this.emitSync('ready', { vaultName: this.vaultName, mode: this.mode });
          resolve();
        });
    });
  }

  private async close(): Promise<void> {
    const watcher = this.watcher;
    this.watcher = null;
    this.ready = false;
    if (watcher) {
      await watcher.close();
    }
  }

  /**
   * Report the failure, then reopen after `restartDelayMs` while the
   * restart budget lasts. Never rejects.
   */
  private async handleError(error: unknown): Promise<void> {
    const failure = new WatcherFailureError(
      `Watcher for vault ${this.vaultName} failed: ${errorMessage(error)}`,
      { vault: this.vaultName, restartAttempts: this.restartAttempts },
      { cause: error },
    );
    log.error('watch:error', { vault: this.vaultName, error: failure.message });
    this.emitSync('error', failure);

    if (this.stopped) return;
    if (this.restartAttempts >= this.config.maxRestartAttempts) {
      log.error('watch:giving-up', {
        vault: this.vaultName,
        attempts: this.restartAttempts,
      });
      await this.stop();
      return;
    }

    this.restartAttempts++;
    try {
      await this.close();
      await sleep(this.config.restartDelayMs);
      if (this.stopped) return;
      log.info('watch:restart', {
        vault: this.vaultName,
        attempt: this.restartAttempts,
      });
      await this.open();
    } catch (restartError) {
      log.error('watch:restart-failed', {
        vault: this.vaultName,
        error: errorMessage(restartError),
      });
      this.emitSync(
        'error',
        new WatcherFailureError(
          `Restarting watcher for vault ${this.vaultName} failed`,
          { vault: this.vaultName },
          { cause: restartError },
        ),
      );
    }
  }

  // -------------------------------------------------------------------------
  // Change handling
  // -------------------------------------------------------------------------

  /**
   * Directory filter for chokidar. File extensions are checked later so
   * directories are never excluded for lacking one.
   */
  private isIgnoredDirectory(path: string): boolean {
    const relativePath = this.scanner.toRelative(path);
    if (relativePath === null) return false;
    return relativePath
      .split('/')
      .some(
        (segment) =>
          segment.startsWith('.') || this.config.ignorePaths.includes(segment),
      );
  }

  private handleChange(type: FileChangeType, absolutePath: string): void {
    const relativePath = this.scanner.toRelative(absolutePath);
    if (relativePath === null || !this.scanner.isRecognized(relativePath)) {
      return;
    }

    const existing = this.pending.get(relativePath);
    if (existing) {
      clearTimeout(existing.timer);
    }

    const timer = setTimeout(() => {
      this.pending.delete(relativePath);
      this.flush(type, relativePath);
    }, this.config.debounceMs);
    this.pending.set(relativePath, { type, timer });
  }

  private flush(type: FileChangeType, relativePath: string): void {
    if (this.stopped) return;
    log.debug('change', { vault: this.vaultName, type, relativePath });

    if (type === 'unlink') {
      this.emitSync('mutation', {
        kind: 'delete',
        vaultName: this.vaultName,
        relativePath,
        source: 'watcher',
      });
    } else {
      this.emitSync('mutation', {
        kind: 'upsert',
        vaultName: this.vaultName,
        relativePath,
        source: 'watcher',
      });
    }
  }
}
