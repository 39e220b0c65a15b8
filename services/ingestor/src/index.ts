import {
  AggregationEngine,
  type FeedItem,
  MarketRegistry,
  PgMarketStorage,
  PgPriceStorage,
  PriceSeriesStore,
} from '@pricebase/core';
import { cfg } from './config/index.js';
import { pool } from './db/pool.js';
import { Batcher } from './queue/batcher.js';
import { startWorker } from './queue/worker.js';
import { getRedis, shutdownRedis } from './redis/index.js';
import { publishFinalizedBar } from './redis/pub.js';
import { startOpsServer } from './server/http.js';
import { type ItemOutcome, createIngestPipeline } from './services/ingest.service.js';
import { recoverOpenBuckets } from './services/recovery.service.js';
import { startRetentionSweep } from './services/retention.service.js';
import { logger } from './utils/logger.js';
import { retryWithBackoff } from './utils/retry.js';

const registry = new MarketRegistry(new PgMarketStorage(pool));
const store = new PriceSeriesStore(new PgPriceStorage(pool), registry, { pageSize: cfg.storePageSize });
const engines = cfg.agg.intervals.map(
  (minutes) =>
    new AggregationEngine(minutes, store, {
      graceMs: cfg.agg.graceMs,
      lateTickPolicy: cfg.agg.lateTickPolicy,
      onFinalized: (bar, result) => {
        if (result !== 'inserted') return;
        publishFinalizedBar(bar).catch((err) =>
          logger.warn({ err, marketId: bar.marketId, ts: bar.periodStart }, 'bar fan-out failed'),
        );
      },
    }),
);
const batcher = new Batcher<FeedItem, ItemOutcome>({
  ...cfg.batch,
  handler: createIngestPipeline({ registry, store, engines }),
});

async function main() {
  await retryWithBackoff(
    async () => {
      await registry.init();
      await store.init();
    },
    {
      retries: cfg.boot.retries,
      baseMs: cfg.boot.retryBaseMs,
      onRetry: (err, attempt, delayMs) => logger.warn({ err, attempt, delayMs }, 'storage not ready, retrying'),
    },
  );

  await recoverOpenBuckets(store, engines, { lookbackSec: cfg.agg.recoverSec });
  for (const engine of engines) engine.start(cfg.agg.sweepMs);
  const stopRetention = startRetentionSweep(store, {
    retentionSec: cfg.retention.tickSec,
    everyMs: cfg.retention.sweepMs,
  });
  const worker = startWorker(batcher);
  const opsServer = cfg.opsPort ? startOpsServer(cfg.opsPort) : null;

  logger.info(
    {
      env: cfg.env,
      queue: cfg.ingestQueue,
      prefix: cfg.queuePrefix,
      intervals: cfg.agg.intervals,
      opsPort: cfg.opsPort || undefined,
    },
    'ingestor started'
  );

  async function shutdown(sig: string) {
    logger.warn({ sig }, 'ingestor shutting down');
    try {
      await batcher.flush();
      await worker.close(); // stop fetching new jobs
    } catch (err) {
      logger.error({ err }, 'error closing worker');
    }

    stopRetention();
    for (const engine of engines) {
      engine.stop();
      try {
        await engine.sweep();
      } catch (err) {
        logger.error({ err, intervalMinutes: engine.intervalMinutes }, 'final sweep failed');
      }
    }

    if (opsServer) {
      await new Promise<void>((res) => opsServer.close(() => res()));
    }

    // Close Redis & PG
    try {
      await shutdownRedis();
    } catch (err) {
      logger.error({ err }, 'error shutting down redis');
    }
    try {
      await pool.end();
    } catch (err) {
      logger.error({ err }, 'error closing pg pool');
    }

    logger.info('bye');
    process.exit(0);
  }

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  // early readiness warmup
  getRedis().ping().catch((err) => logger.warn({ err }, 'redis ping on boot failed'));
}

main().catch((err) => {
  logger.fatal({ err }, 'ingestor failed to start');
  process.exit(1);
});
