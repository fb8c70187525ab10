/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  USER_CONFIG_FILENAME,
  configFromEnvironment,
  loadConfigFile,
  resolveConfig,
  withModelDefaults,
} from './user-config.js';
import { ConfigError } from '../core/errors.js';

describe('user-config', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `vault-index-config-${randomUUID()}`);
    await mkdir(dir, { recursive: true });
  });

  afterEach(async () => {
    try {
      await rm(dir, { recursive: true, force: true });
    } catch {
      // Ignore cleanup errors
    }
  });

  describe('withModelDefaults', () => {
    it('should expand a registry alias', () => {
      expect(withModelDefaults({ model: 'nomic-embed-text-v1' })).toEqual({
        model: 'nomic-ai/nomic-embed-text-v1',
        dimensions: 768,
        queryPrefix: 'search_query: ',
        documentPrefix: 'search_document: ',
      });
    });

    it('should keep explicit values over registry values', () => {
      expect(
        withModelDefaults({ model: 'all-mpnet-base-v2', dimensions: 512 })
          ?.dimensions,
      ).toBe(512);
    });

    it('should pass unknown models through', () => {
      expect(withModelDefaults({ model: 'custom/model' })).toEqual({
        model: 'custom/model',
      });
    });
  });

  describe('loadConfigFile', () => {
    it('should return null when the file is missing', () => {
      expect(loadConfigFile(join(dir, 'missing.json'))).toBeNull();
    });

    it('should resolve relative paths against the file directory', async () => {
      const file = join(dir, USER_CONFIG_FILENAME);
      await writeFile(
        file,
        JSON.stringify({
          $schema: './schema.json',
          _docs: 'ignored',
          vaults: [{ name: 'notes', path: 'notes' }],
          database: { path: 'db/index.db' },
        }),
      );

      const loaded = loadConfigFile(file);

      expect(loaded?.vaults).toEqual([{ name: 'notes', path: join(dir, 'notes') }]);
      expect(loaded?.database?.path).toBe(join(dir, 'db/index.db'));
    });

    it('should reject values of the wrong type', async () => {
      const file = join(dir, USER_CONFIG_FILENAME);
      await writeFile(file, JSON.stringify({ coordination: { role: 'leader' } }));

      expect(() => loadConfigFile(file)).toThrow(ConfigError);
    });

    it('should reject malformed JSON', async () => {
      const file = join(dir, USER_CONFIG_FILENAME);
      await writeFile(file, '{ not json');

      expect(() => loadConfigFile(file)).toThrow(`Invalid JSON in config file: ${file}`);
    });
  });

  describe('configFromEnvironment', () => {
    it('should read model, role, polling and log level', () => {
      const overrides = configFromEnvironment({
        VAULT_INDEX_MODEL: 'all-MiniLM-L6-v2',
        VAULT_INDEX_ROLE: 'reader',
        VAULT_INDEX_POLLING: '1',
        VAULT_INDEX_LOG_LEVEL: 'debug',
      });

      expect(overrides.embeddings?.model).toBe('Xenova/all-MiniLM-L6-v2');
      expect(overrides.coordination?.role).toBe('reader');
      expect(overrides.watcher?.mode).toBe('polling');
      expect(overrides.logging?.level).toBe('debug');
    });

    it('should ignore an unknown role', () => {
      expect(configFromEnvironment({ VAULT_INDEX_ROLE: 'leader' })).toEqual({});
    });

    it('should treat a falsy polling flag as unset', () => {
      expect(configFromEnvironment({ VAULT_INDEX_POLLING: '0' })).toEqual({});
    });
  });

  describe('resolveConfig', () => {
    it('should apply file, environment, then overrides', async () => {
      await writeFile(
        join(dir, USER_CONFIG_FILENAME),
        JSON.stringify({
          coordination: { role: 'primary', renewalRetries: 9 },
          watcher: { mode: 'events' },
        }),
      );

      const config = resolveConfig({
        cwd: dir,
        env: { VAULT_INDEX_ROLE: 'reader', VAULT_INDEX_POLLING: 'true' },
        overrides: { coordination: { role: 'auto' } },
      });

      expect(config.coordination.role).toBe('auto');
      expect(config.coordination.renewalRetries).toBe(9);
      expect(config.watcher.mode).toBe('polling');
    });

    it('should fail when an explicit config file is missing', () => {
      expect(() => resolveConfig({ configPath: join(dir, 'nope.json') })).toThrow(
        'Config file not found',
      );
    });

    it('should validate the merged result', () => {
      expect(() =>
        resolveConfig({ cwd: dir, overrides: { indexing: { batchSize: 0 } } }),
      ).toThrow('batchSize must be positive');
    });
  });
});
