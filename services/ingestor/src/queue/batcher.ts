// src/queue/batcher.ts
import { ingestBatches, ingestBatchSize } from '../metrics/metrics.js';

export type BatcherOptions<T, R> = {
  max: number;        // flush as soon as this many items are buffered
  flushMs: number;    // otherwise flush this long after the first buffered item
  capacity: number;   // buffered + in-flight items before add() waits
  handler: (items: T[]) => Promise<R[]>;
};

type Waiter<R> = {
  offset: number;
  count: number;
  resolve: (out: R[]) => void;
  reject: (err: unknown) => void;
};

/**
 * Coalesces items from many callers into one handler call. Each caller gets
 * back the outcomes for its own items, in order; when the handler fails, every
 * caller in that batch is rejected with the same error. Flushes run one at a time.
 */
export class Batcher<T, R> {
  private items: T[] = [];
  private waiters: Waiter<R>[] = [];
  private timer: NodeJS.Timeout | null = null;
  private chain: Promise<void> = Promise.resolve();
  private inFlight = 0;

  constructor(private readonly opts: BatcherOptions<T, R>) {
    if (opts.max < 1 || opts.capacity < opts.max) {
      throw new RangeError(`batcher needs 1 <= max <= capacity (got max=${opts.max}, capacity=${opts.capacity})`);
    }
  }

  async add(items: readonly T[]): Promise<R[]> {
    if (!items.length) return [];
    while (this.items.length + this.inFlight >= this.opts.capacity) {
      await (this.inFlight > 0 ? this.chain : this.flush());
    }
    return new Promise<R[]>((resolve, reject) => {
      this.waiters.push({ offset: this.items.length, count: items.length, resolve, reject });
      this.items.push(...items);
      if (this.items.length >= this.opts.max) void this.flush();
      else this.armTimer();
    });
  }

  /** Hands everything buffered to the handler; resolves when that flush has settled. */
  flush(): Promise<void> {
    if (this.timer) { clearTimeout(this.timer); this.timer = null; }
    const items = this.items;
    const waiters = this.waiters;
    this.items = [];
    this.waiters = [];
    if (!items.length) return this.chain;

    this.inFlight += items.length;
    this.chain = this.chain.then(() => this.run(items, waiters));
    return this.chain;
  }

  pending(): number {
    return this.items.length + this.inFlight;
  }

  private async run(items: T[], waiters: Waiter<R>[]): Promise<void> {
    ingestBatchSize.set(items.length);
    try {
      const out = await this.opts.handler(items);
      if (out.length !== items.length) {
        throw new Error(`batch handler returned ${out.length} outcomes for ${items.length} items`);
      }
      for (const w of waiters) w.resolve(out.slice(w.offset, w.offset + w.count));
      ingestBatches.inc({ result: 'ok' });
    } catch (err) {
      for (const w of waiters) w.reject(err);
      ingestBatches.inc({ result: 'failed' });
    } finally {
      this.inFlight -= items.length;
    }
  }

  private armTimer() {
    if (this.timer) return;
    this.timer = setTimeout(() => { void this.flush(); }, this.opts.flushMs).unref();
  }
}
