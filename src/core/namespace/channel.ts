// src/core/namespace/channel.ts
// Unbounded FIFO channel with timed receive

type Waiter<T> = {
  resolve: (v: T | undefined) => void;
  cleanup: () => void;
};

/**
 * Multi-producer / multi-consumer queue. Each message is handed to exactly
 * one receiver, in send order. There is no capacity limit: a slow consumer
 * lets the buffer grow.
 */
export class MessageChannel<T> {
  private buffer: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;

  send(msg: T): void {
    if (this.closed) throw new Error("channel closed");
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(msg);
      return;
    }
    this.buffer.push(msg);
  }

  /**
   * Receive the next message. Resolves `undefined` once `timeoutMs` elapses,
   * the signal aborts, or the channel closes; none of these consume anything.
   * Without a timeout the call waits indefinitely.
   */
  recv(timeoutMs?: number, signal?: AbortSignal): Promise<T | undefined> {
    if (this.buffer.length > 0) return Promise.resolve(this.buffer.shift());
    if (this.closed || signal?.aborted) return Promise.resolve(undefined);

    return new Promise<T | undefined>(resolve => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = () => settle(undefined);

      const waiter: Waiter<T> = {
        resolve,
        cleanup: () => {
          if (timer !== undefined) clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
        },
      };

      const settle = (v: T | undefined) => {
        const idx = this.waiters.indexOf(waiter);
        if (idx < 0) return;
        this.waiters.splice(idx, 1);
        waiter.cleanup();
        resolve(v);
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => settle(undefined), Math.max(0, timeoutMs));
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  size(): number {
    return this.buffer.length;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Wake every pending receiver with `undefined` and refuse further sends. */
  close(): void {
    this.closed = true;
    const pending = this.waiters;
    this.waiters = [];
    for (const w of pending) {
      w.cleanup();
      w.resolve(undefined);
    }
  }
}
