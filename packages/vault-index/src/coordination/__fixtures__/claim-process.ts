/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * A process holding one Coordinator over a shared database file.
 * Driven over IPC: 'claim' starts it, 'tick' runs one heartbeat or poll,
 * 'stop' releases the lease. Every step reports `{holderId, state}`.
 */

import { Coordinator } from '../Coordinator.js';
import { SQLiteStorage } from '../../storage/SQLiteStorage.js';
import { DEFAULT_COORDINATION_CONFIG } from '../../config.js';
import { LogLevel, globalLogger } from '../../core/Logger.js';
import { errorMessage } from '../../core/errors.js';

const [databasePath = '', holderId = `claimer-${process.pid}`] = process.argv.slice(2);
globalLogger.configure({ level: LogLevel.SILENT });

const storage = new SQLiteStorage({ path: databasePath, inMemory: false, busyTimeoutMs: 5000 });
const coordinator = new Coordinator({
  storage,
  config: { ...DEFAULT_COORDINATION_CONFIG, role: 'auto' },
  holderId,
  schedule: false,
});

function report(state: string): void {
  process.send?.({ holderId, state });
}

async function handle(message: unknown): Promise<void> {
  switch (message) {
    case 'claim':
      report(await coordinator.start());
      break;
    case 'tick':
      await coordinator.tick();
      report(coordinator.getRole());
      break;
    case 'stop':
      await coordinator.stop();
      await storage.close();
      report('stopped');
      process.disconnect?.();
      break;
  }
}

function fail(error: unknown): void {
  process.stderr.write(`${errorMessage(error)}\n`);
  process.exit(1);
}

process.on('message', (message: unknown) => {
  handle(message).catch(fail);
});

storage
  .initialize()
  .then(() => report('loaded'))
  .catch(fail);
