/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { WorkerMessage, WorkerRequest } from '../protocol.js';

export interface WorkerExit {
  code: number | null;
  signal: string | null;
}

/**
 * Transport between the controller and one worker. Messages are already
 * decoded; anything on the wire that is not a protocol message is dropped.
 */
export interface WorkerChannel {
  /** Launch the worker and wait for its ready signal */
  start(timeoutMs: number): Promise<void>;
  send(request: WorkerRequest): void;
  onMessage(handler: (message: WorkerMessage) => void): void;
  /** Called once when the worker goes away, expected or not */
  onExit(handler: (exit: WorkerExit) => void): void;
  /** Ask the worker to stop, forcing it after `timeoutMs` */
  close(timeoutMs: number): Promise<void>;
  isAlive(): boolean;
}
