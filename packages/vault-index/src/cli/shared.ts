/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import path from 'node:path';
import type { Argv } from 'yargs';
import { z } from 'zod';
import { globalLogger, parseLogLevel } from '../core/Logger.js';
import { ConfigError } from '../core/errors.js';
import { mergePartialConfigs } from '../config.js';
import type { DeepPartial, VaultConfig, VaultIndexConfig } from '../config.js';
import { resolveConfig } from '../config/user-config.js';
import { ControllerFacade } from '../worker/ControllerFacade.js';
import { ChildProcessChannel } from '../worker/channels/ChildProcessChannel.js';
import { InProcessChannel } from '../worker/channels/InProcessChannel.js';
import type { WorkerChannel } from '../worker/channels/types.js';

// ============================================================================
// Global Options
// ============================================================================

export function withGlobalOptions<T>(yargs: Argv<T>) {
  return yargs
    .option('config', {
      alias: 'c',
      type: 'string',
      describe: 'Path to vault-index.config.json',
    })
    .option('vault', {
      type: 'string',
      array: true,
      describe: 'Vault to index as name=path (repeatable)',
    })
    .option('database', {
      type: 'string',
      describe: 'SQLite database file',
    })
    .option('model', {
      type: 'string',
      describe: 'Embedding model id or alias',
    })
    .option('role', {
      type: 'string',
      choices: ['auto', 'primary', 'reader'],
      describe: 'Requested coordination role',
    })
    .option('polling', {
      type: 'boolean',
      describe: 'Watch vaults by polling instead of filesystem events',
    })
    .option('log-level', {
      type: 'string',
      describe: 'debug, info, warn, error or silent',
    })
    .option('in-process', {
      type: 'boolean',
      describe: 'Run the worker inside this process',
    });
}

/** The global options after yargs has parsed them. */
export const globalArgsSchema = z.object({
  config: z.string().optional(),
  vault: z.array(z.string()).optional(),
  database: z.string().optional(),
  model: z.string().optional(),
  role: z.enum(['auto', 'primary', 'reader']).optional(),
  polling: z.boolean().optional(),
  logLevel: z.string().optional(),
  inProcess: z.boolean().optional(),
});

export type GlobalArgs = z.infer<typeof globalArgsSchema>;

// ============================================================================
// Configuration
// ============================================================================

/**
 * Parse `name=path`, or a bare path named after its last segment.
 */
export function parseVaultArg(value: string, cwd = process.cwd()): VaultConfig {
  const separator = value.indexOf('=');
  const [name, location] =
    separator > 0
      ? [value.slice(0, separator), value.slice(separator + 1)]
      : [path.basename(path.resolve(cwd, value)), value];
  if (!name || !location) {
    throw new ConfigError(`Invalid vault argument: ${value}`);
  }
  return { name, path: path.resolve(cwd, location) };
}

export function overridesFromArgs(
  args: GlobalArgs,
  cwd = process.cwd(),
): DeepPartial<VaultIndexConfig> {
  const overrides: DeepPartial<VaultIndexConfig> = {};
  if (args.vault && args.vault.length > 0) {
    overrides.vaults = args.vault.map((value) => parseVaultArg(value, cwd));
  }
  if (args.database) {
    overrides.database = { path: path.resolve(cwd, args.database) };
  }
  if (args.model) {
    overrides.embeddings = { model: args.model };
  }
  if (args.role) {
    overrides.coordination = { role: args.role };
  }
  if (args.polling !== undefined) {
    overrides.watcher = { mode: args.polling ? 'polling' : 'events' };
  }
  if (args.logLevel) {
    overrides.logging = { level: args.logLevel };
  }
  if (args.inProcess) {
    overrides.worker = { mode: 'in-process' };
  }
  return overrides;
}

/**
 * Resolve every configuration layer and apply the logging section.
 */
export function loadCliConfig(
  args: GlobalArgs,
  extra: DeepPartial<VaultIndexConfig> = {},
): VaultIndexConfig {
  const config = resolveConfig({
    configPath: args.config,
    env: process.env,
    overrides: mergePartialConfigs(extra, overridesFromArgs(args)),
  });
  if (config.vaults.length === 0) {
    throw new ConfigError('No vaults configured; pass --vault or a config file');
  }

  globalLogger.configure({
    level: parseLogLevel(config.logging.level),
    json: config.logging.json,
    filePath: config.logging.filePath,
  });
  return config;
}

// ============================================================================
// Worker
// ============================================================================

export function createChannel(config: VaultIndexConfig): WorkerChannel {
  return config.worker.mode === 'in-process'
    ? new InProcessChannel()
    : new ChildProcessChannel();
}

/**
 * Start a worker, run `fn` against it and always stop it afterwards.
 */
export async function withFacade<T>(
  config: VaultIndexConfig,
  fn: (facade: ControllerFacade) => Promise<T>,
): Promise<T> {
  const facade = new ControllerFacade({ channel: createChannel(config), config });
  try {
    await facade.start();
    return await fn(facade);
  } finally {
    await facade.stop();
  }
}

export function printJson(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}
