import { describe, it, expect, vi, afterEach } from 'vitest';
import { MarketRegistry, MemoryMarketStorage, MemoryPriceStorage, PriceSeriesStore } from '@pricebase/core';
import { pruneExpiredTicks, startRetentionSweep } from '../../src/services/retention.service.js';

const NOW = 1_704_067_200;
const DAY = 86_400;

async function seeded() {
  const registry = new MarketRegistry(new MemoryMarketStorage());
  const store = new PriceSeriesStore(new MemoryPriceStorage(), registry, { now: () => NOW });
  const btc = await registry.resolve('BTC', 'USD', 'bitstamp');
  const eth = await registry.resolve('ETH', 'USD', 'kraken');
  await store.ingestTicks([
    { marketId: btc.id, ts: NOW - 3 * DAY, price: 1, volume: 1 },
    { marketId: btc.id, ts: NOW - 60, price: 1, volume: 1 },
    { marketId: eth.id, ts: NOW - 2 * DAY, price: 1, volume: 1 },
  ]);
  return { store, btc, eth };
}

describe('tick retention', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('removes ticks older than the retention window from every market', async () => {
    const { store, btc, eth } = await seeded();

    await expect(pruneExpiredTicks(store, DAY, NOW)).resolves.toBe(2);

    expect((await store.queryTicks(btc.id, 0, NOW)).map((t) => t.ts)).toEqual([NOW - 60]);
    expect(await store.queryTicks(eth.id, 0, NOW)).toEqual([]);
  });

  it('keeps everything when retention is 0', async () => {
    const { store } = await seeded();

    await expect(pruneExpiredTicks(store, 0, NOW)).resolves.toBe(0);
  });

  it('keeps pruning other markets when one fails', async () => {
    const pruneTicks = vi.fn().mockRejectedValueOnce(new Error('locked')).mockResolvedValue(4);
    const store = { tickPartitions: vi.fn(async () => ['a:X/Y', 'b:X/Y']), pruneTicks };

    await expect(pruneExpiredTicks(store, DAY, NOW)).resolves.toBe(4);
    expect(pruneTicks).toHaveBeenCalledWith('b:X/Y', NOW - DAY);
  });

  it('sweeps on a timer until stopped', async () => {
    vi.useFakeTimers();
    const store = { tickPartitions: vi.fn(async () => []), pruneTicks: vi.fn() };

    const stop = startRetentionSweep(store, { retentionSec: DAY, everyMs: 1000 });
    await vi.advanceTimersByTimeAsync(2500);
    expect(store.tickPartitions).toHaveBeenCalledTimes(2);

    stop();
    await vi.advanceTimersByTimeAsync(5000);
    expect(store.tickPartitions).toHaveBeenCalledTimes(2);
  });

  it('does not schedule anything when retention is disabled', () => {
    vi.useFakeTimers();
    const store = { tickPartitions: vi.fn(async () => []), pruneTicks: vi.fn() };

    startRetentionSweep(store, { retentionSec: 0, everyMs: 1000 });

    expect(vi.getTimerCount()).toBe(0);
  });
});
