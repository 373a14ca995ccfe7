/**
 * Event Channel
 *
 * Single-producer, single-consumer async queue. The producer push()es
 * events and close()s (or fail()s) the channel; the consumer pulls with
 * for-await. Leaving the loop early (break, return, throw) cancels the
 * channel: `signal` aborts, buffered events are dropped and later pushes
 * are ignored.
 *
 * @example
 * ```typescript
 * const channel = new EventChannel<AgentEvent>();
 * void produce(channel.push.bind(channel), channel.signal).finally(() => channel.close());
 * for await (const event of channel) { ... }
 * ```
 */

type Waiter<T> = {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
};

export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private readonly controller = new AbortController();
  private waiter: Waiter<T> | null = null;
  private closed = false;
  private failure: { error: unknown } | null = null;

  /** Aborts when the consumer cancels */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Deliver an event. Returns false once the channel is closed or cancelled.
   */
  push(event: T): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = null;
      resolve({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
    return true;
  }

  /** End the stream after the buffered events */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.settleWaiter();
  }

  /** End the stream; the consumer's next pull rejects with `error` */
  fail(error: unknown): void {
    if (this.closed) {
      return;
    }
    this.failure = { error };
    this.close();
  }

  /** Stop delivery and abort the producer */
  cancel(reason?: unknown): void {
    this.buffer.length = 0;
    this.failure = null;
    this.close();
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.cancel();
        return { value: undefined, done: true };
      },
    };
  }

  private next(): Promise<IteratorResult<T, undefined>> {
    const event = this.buffer.shift();
    if (event !== undefined) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed) {
      if (this.failure) {
        const { error } = this.failure;
        this.failure = null;
        return Promise.reject(error);
      }
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve, reject) => {
      this.waiter = { resolve, reject };
    });
  }

  private settleWaiter(): void {
    const waiter = this.waiter;
    if (!waiter) {
      return;
    }
    this.waiter = null;
    if (this.failure) {
      const { error } = this.failure;
      this.failure = null;
      waiter.reject(error);
    } else {
      waiter.resolve({ value: undefined, done: true });
    }
  }
}
