import type { VaultConfig, WatcherConfig } from '../config.js';
import { VaultScanner } from '../discovery/VaultScanner.js';
import { ChokidarChangeWatcher } from './ChokidarChangeWatcher.js';
import { PollingChangeWatcher } from './PollingChangeWatcher.js';
import type { ChangeWatcher } from './types.js';

export interface CreateChangeWatcherOptions {
  vault: VaultConfig;
  config: WatcherConfig;
  maxFileSize: number;
  /** Reuse an existing scanner for the vault */
  scanner?: VaultScanner;
}

/**
 * Build the watcher selected by `config.mode`.
 */
export function createChangeWatcher(
  options: CreateChangeWatcherOptions,
): ChangeWatcher {
  const scanner =
    options.scanner ??
    new VaultScanner(options.vault, {
      extensions: options.config.extensions,
      ignorePaths: options.config.ignorePaths,
      maxFileSize: options.maxFileSize,
    });

  switch (options.config.mode) {
    case 'polling':
      return new PollingChangeWatcher({ scanner, config: options.config });
    case 'events':
      return new ChokidarChangeWatcher({ scanner, config: options.config });
  }
}
