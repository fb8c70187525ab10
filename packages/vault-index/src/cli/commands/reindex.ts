/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { z } from 'zod';
import { createModuleLogger } from '../../core/Logger.js';
import { globalArgsSchema, loadCliConfig, printJson, withFacade } from '../shared.js';

const log = createModuleLogger('ReindexCommand');

const reindexArgsSchema = globalArgsSchema.extend({
  name: z.string().optional(),
  wait: z.boolean().default(true),
});

/**
 * One-shot index run: reconcile one vault or all of them and, unless
 * --no-wait is given, wait until every queued document is written.
 */
export async function handleReindex(rawArgs: unknown): Promise<void> {
  const args = reindexArgsSchema.parse(rawArgs);
  const config = loadCliConfig(args, {
    watcher: { enabled: false },
    // The explicit reindex below covers what a startup pass would
    indexing: { reindexOnStart: false },
  });

  const result = await withFacade(config, async (facade) => {
    log.info('reindex:begin', { vault: args.name ?? 'all', wait: args.wait });
    return facade.reindex(args.name, { wait: args.wait });
  });
  printJson(result);
}

export const reindexCommand: CommandModule = {
  command: 'reindex [name]',
  describe: 'Reconcile vaults with the index',
  builder: (yargs) =>
    yargs
      .positional('name', {
        type: 'string',
        describe: 'Vault to reindex (default: all)',
      })
      .option('wait', {
        type: 'boolean',
        default: true,
        describe: 'Wait until the queue has drained',
      }),
  handler: async (argv) => {
    await handleReindex(argv);
  },
};
