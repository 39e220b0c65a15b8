import { type AggregationEngine, type PriceSeriesStore, intervalSec, nowSec } from '@pricebase/core';
import { logger } from '../utils/logger.js';

type Engine = Pick<AggregationEngine, 'intervalMinutes' | 'recover'>;

export type RecoveryTotals = { markets: number; reopened: number; written: number; failed: number };

const log = logger.child({ component: 'recovery' });

/**
 * Replays stored ticks into every engine so buckets that were open at the last
 * shutdown keep the ticks they already had. Each engine looks back at least two
 * of its own periods. Must run before the worker starts pushing ticks.
 */
export async function recoverOpenBuckets(
  store: Pick<PriceSeriesStore, 'tickPartitions'>,
  engines: readonly Engine[],
  opts: { lookbackSec: number; now?: number },
): Promise<RecoveryTotals> {
  const now = opts.now ?? nowSec();
  const markets = await store.tickPartitions();
  const totals: RecoveryTotals = { markets: markets.length, reopened: 0, written: 0, failed: 0 };

  for (const engine of engines) {
    const fromTs = now - Math.max(opts.lookbackSec, 2 * intervalSec(engine.intervalMinutes));
    for (const marketId of markets) {
      const r = await engine.recover(marketId, fromTs);
      totals.reopened += r.reopened;
      totals.written += r.written;
      totals.failed += r.failed;
    }
  }

  log.info(totals, 'aggregation state recovered');
  return totals;
}
