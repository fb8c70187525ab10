/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { z } from 'zod';
import type { DeepPartial, VaultIndexConfig } from '../../config.js';
import { createModuleLogger } from '../../core/Logger.js';
import { errorMessage } from '../../core/errors.js';
import { createMcpServer, serveStdio } from '../../mcp/server.js';
import { ControllerFacade } from '../../worker/ControllerFacade.js';
import { VERSION } from '../../version.js';
import { createChannel, globalArgsSchema, loadCliConfig } from '../shared.js';

const log = createModuleLogger('McpCommand');

export const mcpArgsSchema = globalArgsSchema.extend({
  watch: z.boolean().optional(),
  reindex: z.boolean().optional(),
});

export type McpArgs = z.infer<typeof mcpArgsSchema>;

/** Map --watch and --reindex onto the watcher and indexing sections. */
export function mcpOverridesFromArgs(args: McpArgs): DeepPartial<VaultIndexConfig> {
  const overrides: DeepPartial<VaultIndexConfig> = {};
  if (args.watch !== undefined) {
    overrides.watcher = { enabled: args.watch };
  }
  if (args.reindex !== undefined) {
    overrides.indexing = { reindexOnStart: args.reindex };
  }
  return overrides;
}

/**
 * Serve MCP over stdio until the client disconnects or a signal arrives.
 * stdout belongs to the protocol; logs go to stderr.
 */
export async function handleMcp(rawArgs: unknown): Promise<void> {
  const args = mcpArgsSchema.parse(rawArgs);
  const config = loadCliConfig(args, mcpOverridesFromArgs(args));

  const facade = new ControllerFacade({ channel: createChannel(config), config });
  const server = createMcpServer({
    backend: facade,
    uriScheme: config.search.uriScheme,
    version: VERSION,
  });

  const closeServer = (): void => {
    server.close().catch((error: unknown) => {
      log.warn('close:failed', { error: errorMessage(error) });
    });
  };

  facade.on('role:changed', (change) => {
    log.info('worker:role', change);
  });
  facade.on('worker:exit', (exit) => {
    if (exit.expected) return;
    log.fatal('worker:lost', { code: exit.code, signal: exit.signal });
    process.exitCode = 1;
    closeServer();
  });
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      log.info('signal', { signal });
      closeServer();
    });
  }

  try {
    const status = await facade.start();
    log.info('worker:started', { pid: status.pid, state: status.state });
    await serveStdio(server);
  } finally {
    await facade.stop();
  }
}

export const mcpCommand: CommandModule = {
  command: 'mcp',
  describe: 'Serve the vaults over the Model Context Protocol (stdio)',
  builder: (yargs) =>
    yargs
      .option('watch', {
        type: 'boolean',
        describe: 'Watch vaults for changes while PRIMARY (--no-watch to disable)',
      })
      .option('reindex', {
        type: 'boolean',
        describe: 'Reconcile vaults on promotion (--no-reindex to skip)',
      }),
  handler: async (argv) => {
    await handleMcp(argv);
  },
};
