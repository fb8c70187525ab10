#!/usr/bin/env node
/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createModuleLogger, globalLogger } from '../core/Logger.js';
import { VaultIndexError, errorMessage } from '../core/errors.js';
import { VERSION } from '../version.js';
import { mcpCommand } from './commands/mcp.js';
import { reindexCommand } from './commands/reindex.js';
import { statusCommand } from './commands/status.js';
import { withGlobalOptions } from './shared.js';

const log = createModuleLogger('Cli');

async function main(): Promise<void> {
  await withGlobalOptions(yargs(hideBin(process.argv)))
    .scriptName('vault-index')
    .version(VERSION)
    .command(mcpCommand)
    .command(reindexCommand)
    .command(statusCommand)
    .demandCommand(1, 'Choose a command')
    .strict()
    .help()
    .parseAsync();
}

void main()
  .catch((error: unknown) => {
    log.error('command:failed', {
      kind: error instanceof VaultIndexError ? error.kind : undefined,
      error: errorMessage(error),
    });
    process.stderr.write(`vault-index: ${errorMessage(error)}\n`);
    process.exitCode = 1;
  })
  .finally(() => globalLogger.close());
