/**
 * Snapshot Stream
 *
 * Bounded async iterator fed by a session loop. push() never blocks:
 * when the buffer is full the oldest unread snapshot is dropped.
 */

import type { StateSnapshot } from '../types.js';

interface Waiter {
  resolve: (result: IteratorResult<StateSnapshot>) => void;
  reject: (error: Error) => void;
}

const DONE: IteratorResult<StateSnapshot> = { done: true, value: undefined };

export class SnapshotStream implements AsyncIterableIterator<StateSnapshot> {
  readonly capacity: number;
  private buffer: StateSnapshot[] = [];
  private waiters: Waiter[] = [];
  private finished = false;
  private failure: Error | null = null;
  private droppedCount = 0;
  private onDetach: ((stream: SnapshotStream) => void) | null;

  constructor(capacity: number, onDetach?: (stream: SnapshotStream) => void) {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.onDetach = onDetach ?? null;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get buffered(): number {
    return this.buffer.length;
  }

  get closed(): boolean {
    return this.finished;
  }

  // ===========================================================================
  // Producer side
  // ===========================================================================

  push(snapshot: StateSnapshot): void {
    if (this.finished) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ done: false, value: snapshot });
      return;
    }

    if (this.buffer.length >= this.capacity) {
      this.buffer.shift();
      this.droppedCount++;
    }
    this.buffer.push(snapshot);
  }

  /**
   * Finish normally; buffered snapshots remain readable.
   */
  end(): void {
    if (this.finished) return;
    this.finished = true;
    this.detach();
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(DONE);
    }
  }

  /**
   * Finish with an error, raised once the buffer has been read.
   */
  fail(error: Error): void {
    if (this.finished) return;
    this.finished = true;
    this.detach();

    const waiters = this.waiters.splice(0);
    if (waiters.length === 0) {
      this.failure = error;
      return;
    }
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  // ===========================================================================
  // Consumer side
  // ===========================================================================

  next(): Promise<IteratorResult<StateSnapshot>> {
    const snapshot = this.buffer.shift();
    if (snapshot !== undefined) {
      return Promise.resolve({ done: false, value: snapshot });
    }

    if (this.failure) {
      const error = this.failure;
      this.failure = null;
      return Promise.reject(error);
    }

    if (this.finished) return Promise.resolve(DONE);

    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  return(): Promise<IteratorResult<StateSnapshot>> {
    this.buffer = [];
    this.failure = null;
    this.end();
    return Promise.resolve(DONE);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<StateSnapshot> {
    return this;
  }

  private detach(): void {
    const onDetach = this.onDetach;
    this.onDetach = null;
    onDetach?.(this);
  }
}
