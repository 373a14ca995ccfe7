/**
 * Keyed Serializer
 *
 * Runs tasks one at a time per key while different keys proceed
 * concurrently. Backed by one p-queue (concurrency 1) per active key;
 * a key's queue is dropped once it drains.
 */

import PQueue from 'p-queue';

export class KeyedSerializer {
  private readonly queues = new Map<string, PQueue>();

  /**
   * Enqueue a task behind every earlier task for the same key.
   * The returned promise settles with the task's own result or error.
   */
  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    return this.queueFor(key).add(() => task(), { throwOnTimeout: true });
  }

  /**
   * Resolve once every task queued for `key` (including ones queued while
   * waiting) has settled.
   */
  async whenIdle(key: string): Promise<void> {
    let queue = this.queues.get(key);
    while (queue) {
      await queue.onIdle();
      const next = this.queues.get(key);
      queue = next === queue ? undefined : next;
    }
  }

  /** Resolve once no key has a task queued or running */
  async whenAllIdle(): Promise<void> {
    while (this.queues.size > 0) {
      await Promise.all([...this.queues.keys()].map((key) => this.whenIdle(key)));
    }
  }

  /** Number of tasks queued or running for `key` */
  pending(key: string): number {
    const queue = this.queues.get(key);
    return queue ? queue.size + queue.pending : 0;
  }

  /** Number of keys with live queues */
  get activeKeys(): number {
    return this.queues.size;
  }

  private queueFor(key: string): PQueue {
    const existing = this.queues.get(key);
    if (existing) {
      return existing;
    }

    const queue = new PQueue({ concurrency: 1 });
    queue.on('idle', () => {
      if (this.queues.get(key) === queue && queue.size === 0 && queue.pending === 0) {
        this.queues.delete(key);
      }
    });
    this.queues.set(key, queue);
    return queue;
  }
}
