// Runs async tasks one at a time, in submission order.

import { createDeferred } from "./deferred.js";

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** Number of tasks submitted and not yet settled (including the running one). */
  get size(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    const previous = this.tail;
    const done = createDeferred<void>();
    this.tail = done.promise;
    this.pending++;

    return (async () => {
      try {
        await previous;
        return await task();
      } finally {
        this.pending--;
        done.resolve();
      }
    })();
  }
}
