/**
 * Admission Gate
 *
 * Counting semaphore bounding simultaneous outbound backend requests across every
 * in-flight query. One instance per process, injected into the backend adapter.
 * Permits are scoped to a single call: acquired before it, released in `finally`.
 */

import { RetrievalCancelledError } from "./types";

export interface AdmissionSnapshot {
  limit: number;
  active: number;
  queued: number;
}

interface Waiter {
  grant: () => void;
}

export class AdmissionGate {
  private active = 0;
  private readonly queue: Waiter[] = [];
  private readonly limit: number;

  constructor(limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Admission limit must be a positive integer, got ${limit}`);
    }
    this.limit = limit;
  }

  snapshot(): AdmissionSnapshot {
    return {
      limit: this.limit,
      active: this.active,
      queued: this.queue.length,
    };
  }

  /**
   * Run a task while holding one permit
   *
   * If the signal aborts while waiting, the waiter leaves the queue and the call
   * rejects with RetrievalCancelledError without ever taking a permit.
   */
  async use<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new RetrievalCancelledError());
    }

    if (this.active < this.limit) {
      this.active += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.queue.indexOf(waiter);
        if (index !== -1) {
          this.queue.splice(index, 1);
        }
        reject(new RetrievalCancelledError());
      };

      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener("abort", onAbort);
          this.active += 1;
          resolve();
        },
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  private release(): void {
    this.active = Math.max(0, this.active - 1);
    this.drain();
  }

  private drain(): void {
    while (this.active < this.limit) {
      const next = this.queue.shift();
      if (!next) {
        return;
      }
      next.grant();
    }
  }
}
