interface Waiter {
  resolve: (id: number | null) => void;
  timer: ReturnType<typeof setTimeout>;
  signal?: AbortSignal;
  onAbort: () => void;
}

/**
 * Unbounded FIFO of ping identifiers awaiting a reply.
 *
 * The inbound path enqueues without ever blocking; the outbound path takes
 * items with a bounded wait so it can go back and check for shutdown while
 * the stream is idle.
 */
export class LivenessRelay {
  private readonly items: number[] = [];
  private readonly waiters: Waiter[] = [];

  get size(): number {
    return this.items.length;
  }

  enqueue(id: number) {
    const waiter = this.waiters.shift();
    if (waiter) {
      this.settle(waiter, id);
      return;
    }
    this.items.push(id);
  }

  /**
   * Take the oldest identifier, waiting up to `timeoutMs` for one to arrive.
   * Resolves `null` on timeout, or at once if `signal` is or becomes aborted.
   */
  dequeue(timeoutMs: number, signal?: AbortSignal): Promise<number | null> {
    const next = this.items.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (signal?.aborted) return Promise.resolve(null);

    return new Promise((resolve) => {
      const waiter: Waiter = {
        resolve,
        signal,
        timer: setTimeout(() => this.settle(waiter, null), timeoutMs),
        onAbort: () => this.settle(waiter, null),
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  private settle(waiter: Waiter, id: number | null) {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) this.waiters.splice(index, 1);
    clearTimeout(waiter.timer);
    waiter.signal?.removeEventListener('abort', waiter.onAbort);
    waiter.resolve(id);
  }
}
