import type { Logger } from 'pino';
import {
  CancelledError,
  ConflictError,
  InvalidArgumentError,
  NotFoundError,
  isRetryable,
} from '../errors.js';
import { barsFinalized, lateTicks } from '../metrics/metrics.js';
import type { IngestResult, MarketId, OhlcvBar, PriceTick } from '../types/domain.js';
import type { Decimal } from '../utils/decimal.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { bucketStart, intervalSec, isValidInterval } from '../utils/time.js';
import { type BarSink, collect } from './price-series.service.js';

export type LateTickPolicy = 'reject' | 'drop';

export type AggregationOptions = {
  graceMs?: number;
  lateTickPolicy?: LateTickPolicy;
  finalizedHorizonSec?: number;
  now?: () => number; // epoch milliseconds
  onFinalized?: (bar: OhlcvBar, result: IngestResult) => void;
};

/** What the engine needs from the store: a bar sink plus the two range readers. */
export interface AggregationStore extends BarSink {
  queryTicks(marketId: MarketId, fromTs: number, toTs: number): Promise<PriceTick[]>;
  queryRange(marketId: MarketId, intervalMinutes: number, fromTs: number, toTs: number): AsyncIterable<OhlcvBar>;
}

export type FinalizedBar = { bar: OhlcvBar; result: IngestResult };

export type BucketOutcome =
  | { periodStart: number; ok: true; result: IngestResult }
  | { periodStart: number; ok: false; error: unknown };

export type SweepSummary = { finalized: number; failed: number };

export type RecoverySummary = { reopened: number; written: number; failed: number };

export type OpenBucket = { marketId: MarketId; periodStart: number; tickCount: number };

type Acc = {
  marketId: MarketId;
  periodStart: number;
  open: Decimal;
  openAt: number;
  high: Decimal;
  low: Decimal;
  close: Decimal;
  closeAt: number;
  volume: Decimal;
};

type Bucket = { marketId: MarketId; periodStart: number; ticks: PriceTick[] };

function seal(acc: Acc, intervalMinutes: number): OhlcvBar {
  return Object.freeze({
    marketId: acc.marketId,
    intervalMinutes,
    periodStart: acc.periodStart,
    open: acc.open,
    high: acc.high,
    low: acc.low,
    close: acc.close,
    volume: acc.volume,
  });
}

function byMarketThenStart(a: OhlcvBar, b: OhlcvBar): number {
  if (a.marketId !== b.marketId) return a.marketId < b.marketId ? -1 : 1;
  return a.periodStart - b.periodStart;
}

/**
 * Buckets ticks into OHLCV bars. Open is the earliest tick (first arrival on a
 * tie), close the latest (last arrival on a tie). Empty buckets yield nothing.
 */
export function aggregateTicks(ticks: readonly PriceTick[], intervalMinutes: number): OhlcvBar[] {
  if (!isValidInterval(intervalMinutes)) throw new InvalidArgumentError(`invalid interval ${intervalMinutes}`);
  const byKey = new Map<string, Acc>();

  for (const t of ticks) {
    const periodStart = bucketStart(t.ts, intervalMinutes);
    const k = `${t.marketId}|${periodStart}`;
    const cur = byKey.get(k);
    if (!cur) {
      byKey.set(k, {
        marketId: t.marketId,
        periodStart,
        open: t.price,
        openAt: t.ts,
        high: t.price,
        low: t.price,
        close: t.price,
        closeAt: t.ts,
        volume: t.volume,
      });
      continue;
    }
    if (t.ts < cur.openAt) {
      cur.open = t.price;
      cur.openAt = t.ts;
    }
    if (t.ts >= cur.closeAt) {
      cur.close = t.price;
      cur.closeAt = t.ts;
    }
    if (t.price.greaterThan(cur.high)) cur.high = t.price;
    if (t.price.lessThan(cur.low)) cur.low = t.price;
    cur.volume = cur.volume.plus(t.volume);
  }

  return [...byKey.values()].map((acc) => seal(acc, intervalMinutes)).sort(byMarketThenStart);
}

/** Merges finer bars into `toIntervalMinutes` buckets using the same OHLCV rules. */
export function rollupBars(bars: readonly OhlcvBar[], toIntervalMinutes: number): OhlcvBar[] {
  if (!isValidInterval(toIntervalMinutes)) throw new InvalidArgumentError(`invalid interval ${toIntervalMinutes}`);
  const byKey = new Map<string, Acc>();

  for (const b of bars) {
    if (b.intervalMinutes > toIntervalMinutes || toIntervalMinutes % b.intervalMinutes !== 0) {
      throw new InvalidArgumentError(`cannot roll ${b.intervalMinutes}m bars up into ${toIntervalMinutes}m`);
    }
    const periodStart = bucketStart(b.periodStart, toIntervalMinutes);
    const k = `${b.marketId}|${periodStart}`;
    const cur = byKey.get(k);
    if (!cur) {
      byKey.set(k, {
        marketId: b.marketId,
        periodStart,
        open: b.open,
        openAt: b.periodStart,
        high: b.high,
        low: b.low,
        close: b.close,
        closeAt: b.periodStart,
        volume: b.volume,
      });
      continue;
    }
    if (b.periodStart < cur.openAt) {
      cur.open = b.open;
      cur.openAt = b.periodStart;
    }
    if (b.periodStart >= cur.closeAt) {
      cur.close = b.close;
      cur.closeAt = b.periodStart;
    }
    if (b.high.greaterThan(cur.high)) cur.high = b.high;
    if (b.low.lessThan(cur.low)) cur.low = b.low;
    cur.volume = cur.volume.plus(b.volume);
  }

  return [...byKey.values()].map((acc) => seal(acc, toIntervalMinutes)).sort(byMarketThenStart);
}

// One engine per interval. Ticks accumulate in open buckets until the bucket's
// end plus the grace period, then the bar is written through the sink. Finalized
// keys are remembered for `finalizedHorizonSec` so late ticks can be recognised.
export class AggregationEngine {
  readonly intervalMinutes: number;
  private readonly step: number;
  private readonly graceMs: number;
  private readonly lateTickPolicy: LateTickPolicy;
  private readonly finalizedHorizonSec: number;
  private readonly now: () => number;
  private readonly onFinalized?: (bar: OhlcvBar, result: IngestResult) => void;
  private readonly log: Logger;

  private readonly buckets = new Map<string, Bucket>();
  private readonly finalized = new Map<string, number>(); // key -> periodStart
  // buckets whose bar is being written; ticks that arrive meanwhile wait here
  private readonly writing = new Map<string, PriceTick[]>();
  private sweepTimer?: NodeJS.Timeout;
  private sweeping = false;

  constructor(
    intervalMinutes: number,
    private readonly store: AggregationStore,
    opts: AggregationOptions = {},
  ) {
    if (!isValidInterval(intervalMinutes)) throw new InvalidArgumentError(`invalid interval ${intervalMinutes}`);
    this.intervalMinutes = intervalMinutes;
    this.step = intervalSec(intervalMinutes);
    this.graceMs = opts.graceMs ?? 5000;
    this.lateTickPolicy = opts.lateTickPolicy ?? 'drop';
    this.finalizedHorizonSec = opts.finalizedHorizonSec ?? 86_400;
    this.now = opts.now ?? Date.now;
    this.onFinalized = opts.onFinalized;
    if (this.graceMs < 0) throw new InvalidArgumentError(`graceMs must be >= 0 (got ${this.graceMs})`);
    this.log = logger.child({ component: 'aggregator', intervalMinutes });
  }

  push(tick: PriceTick): 'accepted' | 'dropped' {
    const periodStart = bucketStart(tick.ts, this.intervalMinutes);
    const k = this.key(tick.marketId, periodStart);

    if (this.finalized.has(k)) {
      lateTicks.inc({ policy: this.lateTickPolicy });
      if (this.lateTickPolicy === 'reject') {
        throw new ConflictError(
          `tick at ${tick.ts} for ${tick.marketId} falls in finalized ${this.intervalMinutes}m bucket ${periodStart}`,
        );
      }
      this.log.warn({ marketId: tick.marketId, ts: tick.ts, periodStart }, 'late tick dropped');
      return 'dropped';
    }

    const pending = this.writing.get(k);
    if (pending) {
      pending.push(tick);
      return 'accepted';
    }

    const bucket = this.buckets.get(k);
    if (bucket) bucket.ticks.push(tick);
    else this.buckets.set(k, { marketId: tick.marketId, periodStart, ticks: [tick] });
    return 'accepted';
  }

  /**
   * Writes the bucket's bar. With `wait`, sleeps until the bucket's end plus the
   * grace period first; aborting that sleep leaves the bucket open.
   * Resolves null when another caller already finalized the bucket.
   */
  async finalize(
    marketId: MarketId,
    periodStart: number,
    opts: { wait?: boolean; signal?: AbortSignal } = {},
  ): Promise<FinalizedBar | null> {
    const k = this.key(marketId, periodStart);
    if (!this.buckets.has(k) && !this.finalized.has(k) && !this.writing.has(k)) {
      throw new NotFoundError(`no ${this.intervalMinutes}m bucket ${periodStart} for ${marketId}`);
    }

    if (opts.wait) {
      try {
        await sleep(this.dueAt(periodStart) - this.now(), opts.signal);
      } catch (err) {
        throw new CancelledError(`finalize of ${marketId} ${periodStart} cancelled`, err);
      }
    }

    const bucket = this.buckets.get(k);
    if (!bucket || this.finalized.has(k) || this.writing.has(k)) return null;
    this.buckets.delete(k);
    const arrived: PriceTick[] = [];
    this.writing.set(k, arrived);

    const [bar] = aggregateTicks(bucket.ticks, this.intervalMinutes);
    let result: IngestResult;
    try {
      result = await this.store.ingestBar(bar);
    } catch (err) {
      this.writing.delete(k);
      if (isRetryable(err)) {
        bucket.ticks.push(...arrived);
        this.buckets.set(k, bucket);
      } else {
        this.markFinalized(k, bucket, arrived);
      }
      throw err;
    }
    this.writing.delete(k);
    this.markFinalized(k, bucket, arrived);

    barsFinalized.inc({ interval: String(this.intervalMinutes) });
    this.log.debug({ marketId, periodStart, result, ticks: bucket.ticks.length }, 'bucket finalized');
    this.notify(bar, result);
    return { bar, result };
  }

  /** Finalizes every bucket that is past its end plus grace. */
  async sweep(): Promise<SweepSummary> {
    const summary: SweepSummary = { finalized: 0, failed: 0 };
    if (this.sweeping) return summary;
    this.sweeping = true;
    try {
      const now = this.now();
      const due = [...this.buckets.values()].filter((b) => this.dueAt(b.periodStart) <= now);
      for (const b of due) {
        try {
          const done = await this.finalize(b.marketId, b.periodStart);
          if (done) summary.finalized++;
        } catch (err) {
          summary.failed++;
          this.log.error(
            { err, marketId: b.marketId, periodStart: b.periodStart, retryable: isRetryable(err) },
            'bucket finalization failed',
          );
        }
      }
      this.forgetFinalized(now);
    } finally {
      this.sweeping = false;
    }
    return summary;
  }

  start(intervalMs: number): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => {
      this.sweep().catch((err) => this.log.error({ err }, 'sweep failed'));
    }, intervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
  }

  openBuckets(): OpenBucket[] {
    return [...this.buckets.values()]
      .map((b) => ({ marketId: b.marketId, periodStart: b.periodStart, tickCount: b.ticks.length }))
      .sort((a, b) => (a.marketId === b.marketId ? a.periodStart - b.periodStart : a.marketId < b.marketId ? -1 : 1));
  }

  /** Rebuilds bars for completed buckets from stored ticks. */
  async backfillFromTicks(marketId: MarketId, fromTs: number, toTs: number): Promise<BucketOutcome[]> {
    const [start, end] = this.bucketRange(fromTs, toTs);
    const ticks = await this.store.queryTicks(marketId, start, end);
    const inRange = ticks.filter((t) => t.ts < end);
    return this.ingestCompleted(aggregateTicks(inRange, this.intervalMinutes));
  }

  /**
   * Rebuilds this engine's state for one market from ticks stored since `fromTs`,
   * for use after a restart and before new ticks are pushed. Buckets that are
   * already due get their bar written (an identical stored bar is unchanged);
   * the rest are reopened so later ticks join the stored ones.
   */
  async recover(marketId: MarketId, fromTs: number): Promise<RecoverySummary> {
    const nowMs = this.now();
    const [start, end] = this.bucketRange(fromTs, Math.floor(nowMs / 1000));
    const ticks = await this.store.queryTicks(marketId, start, end);

    const byStart = new Map<number, PriceTick[]>();
    for (const t of ticks) {
      if (t.ts >= end) continue;
      const periodStart = bucketStart(t.ts, this.intervalMinutes);
      const list = byStart.get(periodStart);
      if (list) list.push(t);
      else byStart.set(periodStart, [t]);
    }

    const summary: RecoverySummary = { reopened: 0, written: 0, failed: 0 };
    for (const [periodStart, list] of byStart) {
      const k = this.key(marketId, periodStart);
      if (this.buckets.has(k) || this.finalized.has(k) || this.writing.has(k)) continue;
      const bucket: Bucket = { marketId, periodStart, ticks: list };
      if (this.dueAt(periodStart) > nowMs) {
        this.buckets.set(k, bucket);
        summary.reopened++;
        continue;
      }

      const [bar] = aggregateTicks(list, this.intervalMinutes);
      try {
        const result = await this.store.ingestBar(bar);
        this.markFinalized(k, bucket, []);
        this.notify(bar, result);
        summary.written++;
      } catch (err) {
        summary.failed++;
        this.log.warn({ err, marketId, periodStart }, 'recovered bucket not written');
      }
    }
    this.log.info({ marketId, fromTs, ...summary }, 'buckets recovered from stored ticks');
    return summary;
  }

  /** Rolls a finer stored interval up into this engine's interval. */
  async rollup(marketId: MarketId, fromIntervalMinutes: number, fromTs: number, toTs: number): Promise<BucketOutcome[]> {
    if (
      !isValidInterval(fromIntervalMinutes) ||
      fromIntervalMinutes >= this.intervalMinutes ||
      this.intervalMinutes % fromIntervalMinutes !== 0
    ) {
      throw new InvalidArgumentError(`cannot roll ${fromIntervalMinutes}m bars up into ${this.intervalMinutes}m`);
    }
    const [start, end] = this.bucketRange(fromTs, toTs);
    const bars = await collect(this.store.queryRange(marketId, fromIntervalMinutes, start, end - 1));
    return this.ingestCompleted(rollupBars(bars, this.intervalMinutes));
  }

  private async ingestCompleted(bars: OhlcvBar[]): Promise<BucketOutcome[]> {
    const now = this.now();
    const out: BucketOutcome[] = [];
    for (const bar of bars) {
      if (this.dueAt(bar.periodStart) > now) continue;
      try {
        const result = await this.store.ingestBar(bar);
        out.push({ periodStart: bar.periodStart, ok: true, result });
        this.notify(bar, result);
      } catch (error) {
        out.push({ periodStart: bar.periodStart, ok: false, error });
      }
    }
    return out;
  }

  private bucketRange(fromTs: number, toTs: number): [number, number] {
    if (!Number.isFinite(fromTs) || !Number.isFinite(toTs) || fromTs > toTs) {
      throw new InvalidArgumentError(`invalid range [${fromTs}, ${toTs}]`);
    }
    return [bucketStart(fromTs, this.intervalMinutes), bucketStart(toTs, this.intervalMinutes) + this.step];
  }

  private notify(bar: OhlcvBar, result: IngestResult): void {
    if (!this.onFinalized) return;
    try {
      this.onFinalized(bar, result);
    } catch (err) {
      this.log.error({ err, marketId: bar.marketId, periodStart: bar.periodStart }, 'onFinalized listener threw');
    }
  }

  private markFinalized(k: string, bucket: Bucket, arrived: PriceTick[]): void {
    this.finalized.set(k, bucket.periodStart);
    if (!arrived.length) return;
    // these were accepted while the bar was being written and are not in it
    lateTicks.inc({ policy: this.lateTickPolicy }, arrived.length);
    this.log.warn(
      { marketId: bucket.marketId, periodStart: bucket.periodStart, ticks: arrived.length },
      'ticks arrived while the bar was being written',
    );
  }

  private forgetFinalized(nowMs: number): void {
    const cutoff = Math.floor(nowMs / 1000) - this.finalizedHorizonSec;
    for (const [k, periodStart] of this.finalized) {
      if (periodStart + this.step < cutoff) this.finalized.delete(k);
    }
  }

  private dueAt(periodStart: number): number {
    return (periodStart + this.step) * 1000 + this.graceMs;
  }

  private key(marketId: MarketId, periodStart: number): string {
    return `${marketId}|${periodStart}`;
  }
}
