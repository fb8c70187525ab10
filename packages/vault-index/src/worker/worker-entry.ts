/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Child process entry point.
 *
 * stdin carries JSON-line requests, stdout carries protocol messages and
 * stderr carries JSON log entries that the parent forwards to its logger.
 * The worker exits when stdin closes.
 */

import { globalLogger } from '../core/Logger.js';
import { WorkerRuntime } from './runtime.js';

globalLogger.configure({ json: true, console: true, colors: false });

const runtime = new WorkerRuntime({
  input: process.stdin,
  output: process.stdout,
  configureLogger: true,
  exit: (code) => {
    void globalLogger.close().then(() => process.exit(code));
  },
});

for (const signal of ['SIGTERM', 'SIGINT'] as const) {
  process.on(signal, () => {
    globalLogger.info('WorkerEntry', 'signal', { signal });
    void runtime.shutdown(0);
  });
}

runtime.start();
