/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Runs the worker in a forked Node.js process.
 *
 * stdin/stdout carry JSON lines, stderr carries the worker's JSON logs,
 * which are replayed into this process's logger.
 */

import type { ChildProcess } from 'node:child_process';
import { fork } from 'node:child_process';
import type { Interface } from 'node:readline';
import { createInterface } from 'node:readline';
import { fileURLToPath } from 'node:url';
import { dirname, extname, join } from 'node:path';
import { createModuleLogger, globalLogger, isLogEntry } from '../../core/Logger.js';
import { WorkerUnavailableError } from '../../core/errors.js';
import { decodeWorkerMessage, encodeLine } from '../protocol.js';
import type { WorkerMessage, WorkerRequest } from '../protocol.js';
import type { WorkerChannel, WorkerExit } from './types.js';

const log = createModuleLogger('ChildProcessChannel');

export interface ChildProcessChannelOptions {
  /** Default: worker-entry next to this module */
  entryPath?: string;
  /** Extra Node.js flags for the child */
  execArgv?: string[];
  env?: NodeJS.ProcessEnv;
}

/**
 * Locate the worker entry beside the compiled or source module. Running
 * from sources needs the tsx loader in the child.
 */
function resolveEntry(): { entryPath: string; execArgv: string[] } {
  const modulePath = fileURLToPath(import.meta.url);
  const extension = extname(modulePath);
  return {
    entryPath: join(dirname(modulePath), '..', `worker-entry${extension}`),
    execArgv: extension === '.ts' ? ['--import', 'tsx'] : [],
  };
}

export class ChildProcessChannel implements WorkerChannel {
  private readonly options: ChildProcessChannelOptions;
  private child: ChildProcess | null = null;
  private readline: Interface | null = null;
  private stderrReader: Interface | null = null;
  private messageHandlers: Array<(message: WorkerMessage) => void> = [];
  private exitHandlers: Array<(exit: WorkerExit) => void> = [];
  private alive = false;

  constructor(options: ChildProcessChannelOptions = {}) {
    this.options = options;
  }

  async start(timeoutMs: number): Promise<void> {
    if (this.child) return;

    const defaults = resolveEntry();
    const entryPath = this.options.entryPath ?? defaults.entryPath;
    const execArgv = this.options.execArgv ?? defaults.execArgv;

    log.info('spawn:starting', { entryPath, execArgv });

    const child = fork(entryPath, [], {
      stdio: ['pipe', 'pipe', 'pipe', 'ipc'],
      execArgv,
      env: this.options.env ?? process.env,
    });
    const { stdout, stderr } = child;
    if (!stdout || !stderr || !child.stdin) {
      child.kill('SIGKILL');
      throw new WorkerUnavailableError('Worker stdio is not available');
    }
    this.child = child;
    this.alive = true;

    this.readline = createInterface({ input: stdout, crlfDelay: Infinity });
    this.readline.on('line', (line) => {
      const message = decodeWorkerMessage(line);
      if (!message) {
        if (line.trim()) log.debug('child:stdout', { raw: line.slice(0, 200) });
        return;
      }
      for (const handler of this.messageHandlers) handler(message);
    });

    this.stderrReader = createInterface({ input: stderr, crlfDelay: Infinity });
    this.stderrReader.on('line', (line) => this.forwardLog(line));

    child.on('close', (code, signal) => {
      this.alive = false;
      log.info('child:exited', { pid: child.pid, code, signal });
      this.cleanup();
      for (const handler of this.exitHandlers) handler({ code, signal });
    });
    child.on('error', (error) => {
      log.error('child:error', { error: error.message });
    });

    await this.waitForReady(timeoutMs);
    log.info('spawn:ready', { pid: child.pid });
  }

  send(request: WorkerRequest): void {
    const stdin = this.child?.stdin;
    if (!this.alive || !stdin || stdin.destroyed) {
      throw new WorkerUnavailableError('Worker process is not running');
    }
    stdin.write(encodeLine(request));
  }

  onMessage(handler: (message: WorkerMessage) => void): void {
    this.messageHandlers.push(handler);
  }

  onExit(handler: (exit: WorkerExit) => void): void {
    this.exitHandlers.push(handler);
  }

  async close(timeoutMs: number): Promise<void> {
    const child = this.child;
    if (!child || !this.alive) return;

    const exited = new Promise<void>((resolve) => {
      child.once('close', () => resolve());
    });
    // The worker shuts down when its stdin closes
    child.stdin?.end();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), timeoutMs);
    });
    const forced = await Promise.race([exited.then(() => false), timedOut]);
    clearTimeout(timer);

    if (forced && this.alive) {
      log.warn('close:forceKill', { pid: child.pid });
      child.kill('SIGKILL');
      await exited;
    }
  }

  isAlive(): boolean {
    return this.alive;
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private waitForReady(timeoutMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.child?.kill('SIGKILL');
        reject(
          new WorkerUnavailableError(`Worker startup timeout after ${timeoutMs}ms`),
        );
      }, timeoutMs);

      this.onMessage((message) => {
        if (message.type !== 'ready') return;
        clearTimeout(timeout);
        resolve();
      });
      this.onExit(({ code, signal }) => {
        clearTimeout(timeout);
        reject(
          new WorkerUnavailableError('Worker exited before it was ready', {
            code,
            signal,
          }),
        );
      });
    });
  }

  private forwardLog(line: string): void {
    if (!line.trim()) return;
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      log.debug('child:stderr', { raw: line });
      return;
    }
    if (isLogEntry(parsed)) {
      globalLogger.write(parsed);
    } else {
      log.debug('child:stderr', { raw: line });
    }
  }

  private cleanup(): void {
    this.readline?.close();
    this.readline = null;
    this.stderrReader?.close();
    this.stderrReader = null;
  }
}
