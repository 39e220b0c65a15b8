import { MemoryMarketStorage } from '../../src/repositories/memory-markets.repo.js';
import { MemoryPriceStorage } from '../../src/repositories/memory-price.repo.js';
import { MarketRegistry } from '../../src/services/market-registry.service.js';
import { PriceSeriesStore } from '../../src/services/price-series.service.js';
import type { BarInput, MarketId } from '../../src/types/domain.js';

// 2024-01-01T00:00:00Z, aligned to every interval up to a day
export const NOW = 1_704_067_200;
export const HOUR = 3600;

export async function setup(opts: { pageSize?: number } = {}) {
  const marketStorage = new MemoryMarketStorage();
  const registry = new MarketRegistry(marketStorage);
  const storage = new MemoryPriceStorage();
  const store = new PriceSeriesStore(storage, registry, { now: () => NOW, pageSize: opts.pageSize ?? 2 });
  const btc = await registry.resolve('btc', 'usd', 'Bitstamp');
  return { marketStorage, registry, storage, store, btc };
}

export function hourBar(marketId: MarketId, periodStart: number, close: number, volume = 1): BarInput {
  return {
    marketId,
    intervalMinutes: 60,
    periodStart,
    open: close,
    high: close,
    low: close,
    close,
    volume,
  };
}
