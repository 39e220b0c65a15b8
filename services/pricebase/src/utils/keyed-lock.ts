import PQueue from 'p-queue';

/**
 * Mutual exclusion per key. Tasks under the same key run one at a time in
 * submission order; tasks under different keys never wait on each other.
 * The lock is released when the task settles, whether it resolved or threw.
 */
export class KeyedLock {
  private readonly queues = new Map<string, PQueue>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let q = this.queues.get(key);
    if (!q) {
      q = new PQueue({ concurrency: 1 });
      this.queues.set(key, q);
    }
    const queue = q;
    try {
      return await queue.add(task, { throwOnTimeout: true });
    } finally {
      if (queue.size === 0 && queue.pending === 0 && this.queues.get(key) === queue) {
        this.queues.delete(key);
      }
    }
  }

  /** Keys with queued or running work. */
  activeKeys(): string[] {
    return [...this.queues.keys()];
  }
}
