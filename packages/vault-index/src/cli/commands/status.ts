/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { CommandModule } from 'yargs';
import { globalArgsSchema, loadCliConfig, printJson, withFacade } from '../shared.js';

export async function handleStatus(rawArgs: unknown): Promise<void> {
  const args = globalArgsSchema.parse(rawArgs);
  // Observe without claiming the lease unless a role was asked for
  const config = loadCliConfig(args, {
    coordination: { role: 'reader' },
    watcher: { enabled: false },
  });
  const status = await withFacade(config, (facade) => facade.status());
  printJson(status);
}

export const statusCommand: CommandModule = {
  command: 'status',
  describe: 'Show index, lease and model status',
  builder: (yargs) => yargs,
  handler: async (argv) => {
    await handleStatus(argv);
  },
};
