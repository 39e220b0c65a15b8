import { describe, it, expect, vi } from 'vitest';
import {
  AggregationEngine,
  type FeedItem,
  MarketRegistry,
  MemoryMarketStorage,
  MemoryPriceStorage,
  PriceSeriesStore,
  formatFixed,
} from '@pricebase/core';
import { createIngestPipeline } from '../../src/services/ingest.service.js';
import { recoverOpenBuckets } from '../../src/services/recovery.service.js';

// 2024-01-01T00:00:00Z
const NOW = 1_704_067_200;
const HOUR = 3600;
const BTC = 'bitstamp:BTC/USD';

const tick = (ts: number, price: number): FeedItem => ({
  kind: 'tick',
  exchange: 'bitstamp',
  base: 'BTC',
  quote: 'USD',
  ts,
  price,
  volume: 1,
});

describe('recoverOpenBuckets', () => {
  it('carries an open bucket across a restart', async () => {
    const registry = new MarketRegistry(new MemoryMarketStorage());
    const store = new PriceSeriesStore(new MemoryPriceStorage(), registry, { now: () => NOW });
    let clockMs = NOW * 1000 + 1000;
    const engineOpts = { graceMs: 5000, now: () => clockMs };

    const before = new AggregationEngine(60, store, engineOpts);
    await createIngestPipeline({ registry, store, engines: [before], now: () => NOW })([tick(NOW, 100)]);

    // process restarts: the first engine and its open bucket are gone
    const after = new AggregationEngine(60, store, engineOpts);
    await expect(recoverOpenBuckets(store, [after], { lookbackSec: HOUR, now: NOW + 1 })).resolves.toEqual({
      markets: 1,
      reopened: 1,
      written: 0,
      failed: 0,
    });
    await createIngestPipeline({ registry, store, engines: [after], now: () => NOW })([tick(NOW, 200)]);

    clockMs = (NOW + HOUR) * 1000 + 5000;
    await after.sweep();

    const bar = await store.getBar(BTC, 60, NOW);
    expect(bar && [bar.open, bar.close, bar.volume].map(formatFixed)).toEqual([
      '100.00000000',
      '200.00000000',
      '2.00000000',
    ]);
  });

  it('looks back at least two periods of each engine', async () => {
    const summary = { reopened: 1, written: 2, failed: 0 };
    const hourly = { intervalMinutes: 60, recover: vi.fn(async () => summary) };
    const minutely = { intervalMinutes: 1, recover: vi.fn(async () => summary) };
    const store = { tickPartitions: vi.fn(async () => ['bitstamp:BTC/USD', 'kraken:ETH/EUR']) };

    const totals = await recoverOpenBuckets(store, [hourly, minutely], { lookbackSec: 600, now: NOW });

    expect(hourly.recover.mock.calls).toEqual([
      ['bitstamp:BTC/USD', NOW - 2 * HOUR],
      ['kraken:ETH/EUR', NOW - 2 * HOUR],
    ]);
    expect(minutely.recover).toHaveBeenCalledWith('bitstamp:BTC/USD', NOW - 600);
    expect(totals).toEqual({ markets: 2, reopened: 4, written: 8, failed: 0 });
  });
});
