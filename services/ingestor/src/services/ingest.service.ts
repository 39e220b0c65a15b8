import {
  type AggregationEngine,
  type BarItem,
  type FeedItem,
  type Market,
  type MarketRegistry,
  type PriceSeriesStore,
  type PriceTick,
  type TickInput,
  type TickItem,
  PricebaseError,
  errorCode,
  nowSec,
  validateTick,
} from '@pricebase/core';
import { itemOutcomes } from '../metrics/metrics.js';
import { logger } from '../utils/logger.js';

export type ItemOutcome =
  | { status: 'stored' | 'unchanged' | 'dropped' }
  | { status: 'rejected'; code: string; message: string };

export type IngestDeps = {
  registry: Pick<MarketRegistry, 'resolve'>;
  store: Pick<PriceSeriesStore, 'ingestBar' | 'ingestTicks'>;
  engines: ReadonlyArray<Pick<AggregationEngine, 'push'>>;
  now?: () => number;
};

const log = logger.child({ component: 'ingest' });

// Engine errors that will fail the same way on every attempt become per-item
// rejections. Retryable and unexpected errors abort the whole batch.
function rejection(err: unknown): ItemOutcome {
  if (err instanceof PricebaseError && !err.retryable) {
    return { status: 'rejected', code: errorCode(err), message: err.message };
  }
  throw err;
}

/**
 * Builds the batch handler: bars first (idempotent), then every tick in one
 * storage transaction, then the stored ticks go to each aggregation engine.
 * Replaying a batch leaves its bars unchanged, but ticks carry no key: a replay
 * appends them again and feeds them to the engines again.
 */
export function createIngestPipeline(deps: IngestDeps) {
  const now = deps.now ?? nowSec;

  function pushToEngines(tick: PriceTick): ItemOutcome {
    let outcome: ItemOutcome = { status: 'stored' };
    for (const engine of deps.engines) {
      try {
        if (engine.push(tick) === 'dropped' && outcome.status === 'stored') outcome = { status: 'dropped' };
      } catch (err) {
        outcome = rejection(err);
      }
    }
    return outcome;
  }

  return async function ingestBatch(items: FeedItem[]): Promise<ItemOutcome[]> {
    const out: Array<ItemOutcome | undefined> = new Array(items.length);
    const markets: Array<Market | undefined> = new Array(items.length);

    for (let i = 0; i < items.length; i++) {
      const it = items[i];
      try {
        markets[i] = await deps.registry.resolve(it.base, it.quote, it.exchange);
      } catch (err) {
        out[i] = rejection(err);
      }
    }

    // bars
    for (let i = 0; i < items.length; i++) {
      const it = items[i];
      const market = markets[i];
      if (it.kind !== 'bar' || !market) continue;
      try {
        const r = await deps.store.ingestBar(barInput(market, it));
        out[i] = { status: r === 'inserted' ? 'stored' : 'unchanged' };
      } catch (err) {
        out[i] = rejection(err);
      }
    }

    // ticks: reject the invalid ones individually, write the rest together
    const at = now();
    const tickSlots: number[] = [];
    const ticks: TickInput[] = [];
    for (let i = 0; i < items.length; i++) {
      const it = items[i];
      const market = markets[i];
      if (it.kind !== 'tick' || !market) continue;
      const input = tickInput(market, it);
      try {
        validateTick(input, at);
        tickSlots.push(i);
        ticks.push(input);
      } catch (err) {
        out[i] = rejection(err);
      }
    }

    if (ticks.length) {
      let stored: PriceTick[] = [];
      try {
        stored = await deps.store.ingestTicks(ticks);
      } catch (err) {
        const failed = rejection(err);
        for (const slot of tickSlots) out[slot] = failed;
      }
      stored.forEach((tick, j) => {
        out[tickSlots[j]] = pushToEngines(tick);
      });
    }

    const outcomes = out.map((o, i): ItemOutcome =>
      o ?? { status: 'rejected', code: 'INTERNAL_ERROR', message: `item ${i} produced no outcome` },
    );
    for (const o of outcomes) itemOutcomes.inc({ status: o.status });
    log.debug({ items: items.length, ticks: ticks.length }, 'batch ingested');
    return outcomes;
  };
}

function barInput(market: Market, it: BarItem) {
  return {
    marketId: market.id,
    intervalMinutes: it.intervalMinutes,
    periodStart: it.ts,
    open: it.open,
    high: it.high,
    low: it.low,
    close: it.close,
    volume: it.volume,
  };
}

function tickInput(market: Market, it: TickItem): TickInput {
  return { marketId: market.id, ts: it.ts, price: it.price, volume: it.volume };
}
