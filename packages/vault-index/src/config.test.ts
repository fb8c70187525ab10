/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect } from 'vitest';
import {
  createConfig,
  validateConfig,
  mergePartialConfigs,
  DEFAULT_CONFIG,
  DEFAULT_COORDINATION_CONFIG,
  DEFAULT_WATCHER_CONFIG,
} from './config.js';
import { ConfigError } from './core/errors.js';

describe('Configuration', () => {
  describe('DEFAULT_CONFIG', () => {
    it('should use a 5s heartbeat and a 15s lease timeout', () => {
      expect(DEFAULT_COORDINATION_CONFIG.heartbeatIntervalMs).toBe(5000);
      expect(DEFAULT_COORDINATION_CONFIG.leaseTimeoutMs).toBe(15000);
      expect(DEFAULT_COORDINATION_CONFIG.role).toBe('auto');
    });

    it('should only recognize markdown by default', () => {
      expect(DEFAULT_WATCHER_CONFIG.extensions).toEqual(['.md']);
      expect(DEFAULT_WATCHER_CONFIG.ignorePaths).toContain('.obsidian');
    });

    it('should be valid apart from having no vaults', () => {
      expect(() => validateConfig(createConfig())).not.toThrow();
    });
  });

  describe('createConfig', () => {
    it('should return defaults when called without arguments', () => {
      expect(createConfig()).toEqual(DEFAULT_CONFIG);
    });

    it('should merge section overrides with defaults', () => {
      const config = createConfig({
        coordination: { role: 'reader', renewalRetries: 7 },
        indexing: { batchSize: 4 },
      });

      expect(config.coordination.role).toBe('reader');
      expect(config.coordination.renewalRetries).toBe(7);
      expect(config.coordination.heartbeatIntervalMs).toBe(5000);
      expect(config.indexing.batchSize).toBe(4);
      expect(config.indexing.maxStorageAttempts).toBe(5);
    });

    it('should ignore explicitly undefined values', () => {
      const config = createConfig({ search: { defaultLimit: undefined } });
      expect(config.search.defaultLimit).toBe(10);
    });

    it('should not share vault objects with the input', () => {
      const vaults = [{ name: 'notes', path: '/tmp/notes' }];
      const config = createConfig({ vaults });
      config.vaults[0].name = 'changed';
      expect(vaults[0].name).toBe('notes');
    });
  });

  describe('mergePartialConfigs', () => {
    it('should let the override layer win key by key', () => {
      const merged = mergePartialConfigs(
        { watcher: { mode: 'events', debounceMs: 100 } },
        { watcher: { mode: 'polling' } },
      );
      expect(merged.watcher).toEqual({ mode: 'polling', debounceMs: 100 });
    });

    it('should replace vault lists whole', () => {
      const merged = mergePartialConfigs(
        { vaults: [{ name: 'a', path: '/a' }] },
        { vaults: [{ name: 'b', path: '/b' }] },
      );
      expect(merged.vaults).toEqual([{ name: 'b', path: '/b' }]);
    });
  });

  describe('validateConfig', () => {
    it('should reject duplicate vault names', () => {
      const config = createConfig({
        vaults: [
          { name: 'notes', path: '/a' },
          { name: 'notes', path: '/b' },
        ],
      });
      expect(() => validateConfig(config)).toThrow('Duplicate vault name: notes');
    });

    it('should reject vault names containing a slash', () => {
      const config = createConfig({ vaults: [{ name: 'a/b', path: '/a' }] });
      expect(() => validateConfig(config)).toThrow(ConfigError);
    });

    it('should require the lease timeout to exceed the heartbeat interval', () => {
      const config = createConfig({
        coordination: { heartbeatIntervalMs: 5000, leaseTimeoutMs: 5000 },
      });
      expect(() => validateConfig(config)).toThrow(
        'leaseTimeoutMs must be greater than heartbeatIntervalMs',
      );
    });

    it('should reject non-positive dimensions', () => {
      const config = createConfig({ embeddings: { dimensions: 0 } });
      expect(() => validateConfig(config)).toThrow('dimensions must be positive');
    });

    it('should reject a negative renewal budget', () => {
      const config = createConfig({ coordination: { renewalRetries: -1 } });
      expect(() => validateConfig(config)).toThrow(
        'renewalRetries cannot be negative',
      );
    });

    it('should reject extensions without a leading dot', () => {
      const config = createConfig({ watcher: { extensions: ['md'] } });
      expect(() => validateConfig(config)).toThrow('Extension must start with ".": md');
    });

    it('should accept an in-memory database without a path', () => {
      const config = createConfig({ database: { path: '', inMemory: true } });
      expect(() => validateConfig(config)).not.toThrow();
    });
  });
});
