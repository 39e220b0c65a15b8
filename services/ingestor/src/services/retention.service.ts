import { type PriceSeriesStore, nowSec } from '@pricebase/core';
import { logger } from '../utils/logger.js';

type TickStore = Pick<PriceSeriesStore, 'tickPartitions' | 'pruneTicks'>;

const log = logger.child({ component: 'retention' });

/** Deletes ticks older than `retentionSec` from every tick partition. Returns rows removed. */
export async function pruneExpiredTicks(store: TickStore, retentionSec: number, now = nowSec()): Promise<number> {
  if (retentionSec <= 0) return 0;
  const cutoff = now - retentionSec;
  let removed = 0;
  for (const marketId of await store.tickPartitions()) {
    try {
      removed += await store.pruneTicks(marketId, cutoff);
    } catch (err) {
      log.error({ err, marketId, cutoff }, 'tick pruning failed');
    }
  }
  if (removed) log.info({ removed, cutoff }, 'expired ticks pruned');
  return removed;
}

export function startRetentionSweep(store: TickStore, opts: { retentionSec: number; everyMs: number }): () => void {
  if (opts.retentionSec <= 0) {
    log.info('tick retention disabled');
    return () => undefined;
  }
  const timer = setInterval(() => {
    pruneExpiredTicks(store, opts.retentionSec).catch((err) => log.error({ err }, 'retention sweep failed'));
  }, opts.everyMs).unref();
  return () => clearInterval(timer);
}
