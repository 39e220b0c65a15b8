import {
  ConflictError,
  InvalidArgumentError,
  InvalidBarError,
  NotFoundError,
  StorageUnavailableError,
} from '../errors.js';
import { barConflicts, barsIngested, ticksIngested, ticksPruned } from '../metrics/metrics.js';
import type { PriceStorage, TickAppend } from '../repositories/storage.js';
import type {
  BarInput,
  IngestResult,
  MarketId,
  OhlcvBar,
  PriceTick,
  TickInput,
} from '../types/domain.js';
import { BAR_FIELDS, sameBar } from '../types/domain.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { logger } from '../utils/logger.js';
import { marketIdOf } from '../utils/market.js';
import { barPartition, partitionKey, tickPartition } from '../utils/partition.js';
import { isValidInterval, nowSec, toEpochSec } from '../utils/time.js';
import { validateBar, validateTick } from '../utils/validators.js';
import type { MarketLookup } from './market-registry.service.js';

export type PriceSeriesOptions = {
  now?: () => number;   // epoch seconds
  pageSize?: number;    // rows per range-scan round trip
};

export type BarOutcome = { ok: true; result: IngestResult } | { ok: false; error: unknown };

export type CsvImportReport = {
  inserted: number;
  unchanged: number;
  failed: Array<{ line: number; error: unknown }>;
};

/** Read side used by the indicator engine and backtests. */
export interface PriceSeriesReader {
  queryRange(marketId: MarketId, intervalMinutes: number, fromTs: number, toTs: number): AsyncIterable<OhlcvBar>;
  latestBefore(marketId: MarketId, intervalMinutes: number, ts: number): Promise<OhlcvBar>;
  getBar(marketId: MarketId, intervalMinutes: number, periodStart: number): Promise<OhlcvBar | null>;
}

/** Write side used by the aggregation engine. */
export interface BarSink {
  ingestBar(input: BarInput): Promise<IngestResult>;
}

const log = logger.child({ component: 'price-series' });

function describeDiff(stored: OhlcvBar, incoming: OhlcvBar): string {
  return BAR_FIELDS.filter((f) => !stored[f].equals(incoming[f]))
    .map((f) => `${f} ${stored[f].toString()} -> ${incoming[f].toString()}`)
    .join(', ');
}

export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of source) out.push(item);
  return out;
}

// Partitioned OHLCV/tick store. Writes to one partition are serialized through a
// keyed lock so the primary-key conflict rule is evaluated against a stable row;
// different partitions and all reads proceed in parallel.
export class PriceSeriesStore implements PriceSeriesReader, BarSink {
  private readonly locks = new KeyedLock();
  private readonly now: () => number;
  private readonly pageSize: number;

  constructor(
    private readonly storage: PriceStorage,
    private readonly markets: MarketLookup,
    opts: PriceSeriesOptions = {},
  ) {
    this.now = opts.now ?? nowSec;
    this.pageSize = opts.pageSize ?? 500;
    if (!Number.isInteger(this.pageSize) || this.pageSize < 1) {
      throw new InvalidArgumentError(`pageSize must be a positive integer (got ${this.pageSize})`);
    }
  }

  /** Discovers partitions that already exist in storage. */
  async init(): Promise<number> {
    const found = await this.storage.listPartitions();
    log.info({ partitions: found.length }, 'price partitions discovered');
    return found.length;
  }

  async ingestBar(input: BarInput): Promise<IngestResult> {
    const bar = validateBar(input, this.now());
    const market = await this.markets.lookup(bar.marketId);
    const p = barPartition(market, bar.intervalMinutes);

    return this.locks.run(partitionKey(p), async () => {
      await this.storage.ensurePartition(p);
      const existing = await this.storage.findBar(p, bar.periodStart);
      if (existing) return this.settle(existing, bar);

      const inserted = await this.storage.insertBar(p, bar);
      if (inserted === 'inserted') {
        barsIngested.inc({ result: 'inserted' });
        return 'inserted';
      }
      // another process won the insert between our read and write
      const raced = await this.storage.findBar(p, bar.periodStart);
      if (!raced) throw new StorageUnavailableError(`${p.table}: row at ${bar.periodStart} reported but not readable`);
      return this.settle(raced, bar);
    });
  }

  async ingestBars(inputs: readonly BarInput[]): Promise<BarOutcome[]> {
    const out: BarOutcome[] = [];
    for (const input of inputs) {
      try {
        out.push({ ok: true, result: await this.ingestBar(input) });
      } catch (error) {
        out.push({ ok: false, error });
      }
    }
    return out;
  }

  /**
   * Imports `timestamp<sep>open<sep>high<sep>low<sep>close<sep>volume` lines.
   * Existing rows are never overwritten; differing rows are reported as conflicts.
   */
  async importBarsCsv(
    marketId: MarketId,
    intervalMinutes: number,
    text: string,
    opts: { separator?: string } = {},
  ): Promise<CsvImportReport> {
    const sep = opts.separator ?? ',';
    const report: CsvImportReport = { inserted: 0, unchanged: 0, failed: [] };
    const lines = text.split(/\r?\n/);

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (!line || /^timestamp\b/i.test(line)) continue;
      const cells = line.split(sep).map((c) => c.trim());
      if (cells.length !== 6) {
        report.failed.push({ line: i + 1, error: new InvalidBarError(`line ${i + 1}: expected 6 fields, got ${cells.length}`) });
        continue;
      }
      const [ts, open, high, low, close, volume] = cells;
      try {
        const result = await this.ingestBar({
          marketId, intervalMinutes, periodStart: toEpochSec(ts), open, high, low, close, volume,
        });
        if (result === 'inserted') report.inserted++;
        else report.unchanged++;
      } catch (error) {
        report.failed.push({ line: i + 1, error });
      }
    }
    log.info({ marketId, intervalMinutes, ...report, failed: report.failed.length }, 'csv import finished');
    return report;
  }

  async ingestTick(input: TickInput): Promise<PriceTick> {
    const [tick] = await this.ingestTicks([input]);
    return tick;
  }

  /** Validates every tick, then appends all partitions in one storage transaction. */
  async ingestTicks(inputs: readonly TickInput[]): Promise<PriceTick[]> {
    const now = this.now();
    const ticks = inputs.map((t) => validateTick(t, now));
    if (!ticks.length) return ticks;

    const byMarket = new Map<MarketId, PriceTick[]>();
    for (const t of ticks) {
      const list = byMarket.get(t.marketId);
      if (list) list.push(t);
      else byMarket.set(t.marketId, [t]);
    }

    const batches: TickAppend[] = [];
    for (const [marketId, list] of byMarket) {
      const market = await this.markets.lookup(marketId);
      const partition = tickPartition(market);
      await this.storage.ensurePartition(partition);
      batches.push({ partition, ticks: list });
    }
    const written = await this.storage.appendTicks(batches);
    ticksIngested.inc(written);
    return ticks;
  }

  queryRange(marketId: MarketId, intervalMinutes: number, fromTs: number, toTs: number): AsyncIterable<OhlcvBar> {
    if (!isValidInterval(intervalMinutes)) throw new InvalidArgumentError(`invalid interval ${intervalMinutes}`);
    if (!Number.isFinite(fromTs) || !Number.isFinite(toTs) || fromTs > toTs) {
      throw new InvalidArgumentError(`invalid range [${fromTs}, ${toTs}]`);
    }
    // each iteration opens a fresh scan
    return { [Symbol.asyncIterator]: () => this.scan(marketId, intervalMinutes, fromTs, toTs) };
  }

  async latestBefore(marketId: MarketId, intervalMinutes: number, ts: number): Promise<OhlcvBar> {
    if (!isValidInterval(intervalMinutes)) throw new InvalidArgumentError(`invalid interval ${intervalMinutes}`);
    const market = await this.markets.lookup(marketId);
    const bar = await this.storage.latestBarAtOrBefore(barPartition(market, intervalMinutes), ts);
    if (!bar) throw new NotFoundError(`no ${intervalMinutes}m bar for ${marketId} at or before ${ts}`);
    return bar;
  }

  async getBar(marketId: MarketId, intervalMinutes: number, periodStart: number): Promise<OhlcvBar | null> {
    if (!isValidInterval(intervalMinutes)) throw new InvalidArgumentError(`invalid interval ${intervalMinutes}`);
    const market = await this.markets.lookup(marketId);
    return this.storage.findBar(barPartition(market, intervalMinutes), periodStart);
  }

  async queryTicks(marketId: MarketId, fromTs: number, toTs: number): Promise<PriceTick[]> {
    if (fromTs > toTs) throw new InvalidArgumentError(`invalid range [${fromTs}, ${toTs}]`);
    const market = await this.markets.lookup(marketId);
    return this.storage.scanTicks(tickPartition(market), fromTs, toTs);
  }

  async pruneTicks(marketId: MarketId, beforeTs: number): Promise<number> {
    const market = await this.markets.lookup(marketId);
    const removed = await this.storage.deleteTicksBefore(tickPartition(market), beforeTs);
    if (removed) {
      ticksPruned.inc(removed);
      log.debug({ marketId, beforeTs, removed }, 'ticks pruned');
    }
    return removed;
  }

  /** Markets that currently have a tick partition. */
  async tickPartitions(): Promise<MarketId[]> {
    const parts = await this.storage.listPartitions();
    return parts.filter((p) => p.kind === 'ticks').map((p) => marketIdOf(p));
  }

  private settle(existing: OhlcvBar, incoming: OhlcvBar): IngestResult {
    if (sameBar(existing, incoming)) {
      barsIngested.inc({ result: 'unchanged' });
      return 'unchanged';
    }
    barConflicts.inc();
    log.warn(
      { marketId: incoming.marketId, intervalMinutes: incoming.intervalMinutes, periodStart: incoming.periodStart },
      'bar conflicts with stored history',
    );
    throw new ConflictError(
      `${incoming.marketId} ${incoming.intervalMinutes}m bar at ${incoming.periodStart} differs from stored bar: ${describeDiff(existing, incoming)}`,
    );
  }

  private async *scan(marketId: MarketId, intervalMinutes: number, fromTs: number, toTs: number): AsyncGenerator<OhlcvBar> {
    const market = await this.markets.lookup(marketId);
    const p = barPartition(market, intervalMinutes);
    let afterTs: number | undefined;
    for (;;) {
      const page = await this.storage.scanBars(p, { fromTs, toTs, afterTs, limit: this.pageSize });
      yield* page;
      if (page.length < this.pageSize) return;
      afterTs = page[page.length - 1].periodStart;
    }
  }
}
