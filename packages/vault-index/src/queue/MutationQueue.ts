/**
 * @license
 * Copyright 2026 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { documentKeyString } from '../storage/types.js';

// ============================================================================
// Mutation Types
// ============================================================================

export type MutationSource = 'watcher' | 'scan' | 'reconcile' | 'model-change';

export interface UpsertMutationInput {
  kind: 'upsert';
  vaultName: string;
  relativePath: string;
  /** Document text, when the producer already read it */
  content?: string;
  mtimeMs?: number;
  source?: MutationSource;
}

export interface DeleteMutationInput {
  kind: 'delete';
  vaultName: string;
  relativePath: string;
  source?: MutationSource;
}

export type MutationInput = UpsertMutationInput | DeleteMutationInput;

/** A queued mutation. `seq` increases monotonically per queue. */
export type Mutation = MutationInput & { seq: number };

// ============================================================================
// Mutation Queue
// ============================================================================

/**
 * Ordered in-memory channel from producers (watchers, scans) to the single
 * consumer (the indexer). Same-path order follows `seq`.
 */
export class MutationQueue {
  private items: Mutation[] = [];
  private nextSeq = 1;
  private closed = false;
  private waiters = new Set<() => void>();

  get size(): number {
    return this.items.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Append a mutation. Ignored (returns null) once the queue is closed.
   */
  enqueue(input: MutationInput): Mutation | null {
    if (this.closed) return null;
    const mutation: Mutation = { ...input, seq: this.nextSeq++ };
    this.items.push(mutation);
    this.notify();
    return mutation;
  }

  enqueueAll(inputs: MutationInput[]): Mutation[] {
    const queued: Mutation[] = [];
    for (const input of inputs) {
      const mutation = this.enqueue(input);
      if (mutation) queued.push(mutation);
    }
    return queued;
  }

  /**
   * Remove up to `max` mutations from the head. Mutations for the same path
   * within the taken slice collapse to the one with the highest seq.
   */
  take(max: number): Mutation[] {
    const slice = this.items.splice(0, Math.max(0, max));
    const latest = new Map<string, Mutation>();
    for (const mutation of slice) {
      latest.set(documentKeyString(mutation), mutation);
    }
    return [...latest.values()].sort((a, b) => a.seq - b.seq);
  }

  /**
   * Resolve once work is available, the queue is closed, or the signal
   * aborts.
   */
  waitForWork(signal?: AbortSignal): Promise<void> {
    if (this.items.length > 0 || this.closed || signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      const done = (): void => {
        this.waiters.delete(done);
        signal?.removeEventListener('abort', done);
        resolve();
      };
      this.waiters.add(done);
      signal?.addEventListener('abort', done, { once: true });
    });
  }

  /**
   * Drop everything pending.
   * @returns Number of discarded mutations
   */
  discardAll(): number {
    const count = this.items.length;
    this.items = [];
    return count;
  }

  close(): void {
    this.closed = true;
    this.notify();
  }

  private notify(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }
}
