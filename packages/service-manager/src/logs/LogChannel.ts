/**
 * Unbounded multi-producer, single-consumer queue. Producers never wait;
 * the one consumer awaits the next item with a timeout.
 */
export class LogChannel<T> {
  private buffer: T[] = [];
  private waiter: ((item: T | undefined) => void) | null = null;
  private closed = false;

  send(item: T): boolean {
    if (this.closed) {
      return false;
    }

    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(item);
    } else {
      this.buffer.push(item);
    }
    return true;
  }

  /**
   * Resolves with the next item, or `undefined` once `timeoutMs` passes,
   * the channel is closed and drained, or `signal` aborts.
   */
  receive(timeoutMs: number, signal?: AbortSignal): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift());
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve(undefined);
    }
    if (this.waiter) {
      return Promise.reject(new Error('LogChannel supports a single consumer'));
    }

    return new Promise(resolve => {
      const finish = (item: T | undefined) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this.waiter === finish) {
          this.waiter = null;
        }
        resolve(item);
      };
      const onAbort = () => finish(undefined);
      const timer = setTimeout(() => finish(undefined), timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiter = finish;
    });
  }

  close(): void {
    this.closed = true;
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(undefined);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }
}
