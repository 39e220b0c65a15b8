// src/config/index.ts
import { z } from 'zod';
import { isValidInterval } from '@pricebase/core';

const Intervals = z
  .string()
  .default('1,5,60')
  .transform((raw, ctx) => {
    const xs = raw.split(',').map((x) => x.trim()).filter(Boolean).map(Number);
    if (!xs.length || xs.some((x) => !isValidInterval(x))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `AGG_INTERVALS must be a csv of minutes (got "${raw}")` });
      return z.NEVER;
    }
    return [...new Set(xs)].sort((a, b) => a - b);
  });

const Env = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),

  DATABASE_URL: z.string(),
  REDIS_URL: z.string().default('redis://127.0.0.1:6379'),
  PG_POOL_MAX: z.coerce.number().int().positive().default(10),
  PG_STATEMENT_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(15_000),

  QUEUE_PREFIX: z.string().default('pricebase'),
  INGEST_QUEUE: z.string().regex(/^[^:]+$/, 'queue names cannot contain ":"').default('ingest'),
  PUBSUB_CHANNEL: z.string().default('ch:bars'),

  LOG_LEVEL: z.enum(['fatal','error','warn','info','debug','trace','silent']).default('info'),
  LOG_PRETTY: z.union([z.literal('1'), z.literal('0')]).default('1'),

  // batching + worker
  BATCH_MAX: z.coerce.number().int().positive().default(500),
  BATCH_FLUSH_MS: z.coerce.number().int().positive().default(200),
  BATCH_CAPACITY: z.coerce.number().int().positive().default(5000),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(8),
  JOB_ATTEMPTS: z.coerce.number().int().positive().default(5),
  JOB_BACKOFF_MS: z.coerce.number().int().nonnegative().default(1000),

  // aggregation
  AGG_INTERVALS: Intervals,
  AGG_GRACE_MS: z.coerce.number().int().nonnegative().default(5000),
  AGG_SWEEP_MS: z.coerce.number().int().positive().default(1000),
  LATE_TICK_POLICY: z.enum(['reject', 'drop']).default('drop'),
  // how far back stored ticks are replayed into the engines at boot
  AGG_RECOVER_SEC: z.coerce.number().int().nonnegative().default(6 * 3600),

  // 0 keeps ticks forever
  TICK_RETENTION_SEC: z.coerce.number().int().nonnegative().default(7 * 24 * 3600),
  RETENTION_SWEEP_MS: z.coerce.number().int().positive().default(3_600_000),

  STORE_PAGE_SIZE: z.coerce.number().int().positive().default(500),
  OPS_PORT: z.coerce.number().int().nonnegative().default(0),
  BOOT_RETRIES: z.coerce.number().int().nonnegative().default(5),
  BOOT_RETRY_BASE_MS: z.coerce.number().int().positive().default(500),
});

const e = Env.parse(process.env);

export const cfg = {
  env: e.NODE_ENV,

  databaseUrl: e.DATABASE_URL,
  redisUrl: e.REDIS_URL,
  pg: { poolMax: e.PG_POOL_MAX, statementTimeoutMs: e.PG_STATEMENT_TIMEOUT_MS },

  queuePrefix: e.QUEUE_PREFIX,
  ingestQueue: e.INGEST_QUEUE,
  pubsubChannel: e.PUBSUB_CHANNEL,

  logLevel: e.LOG_LEVEL,
  logPretty: e.LOG_PRETTY === '1',

  batch: { max: e.BATCH_MAX, flushMs: e.BATCH_FLUSH_MS, capacity: Math.max(e.BATCH_CAPACITY, e.BATCH_MAX) },
  workerConcurrency: e.WORKER_CONCURRENCY,
  job: { attempts: e.JOB_ATTEMPTS, backoffMs: e.JOB_BACKOFF_MS },

  agg: {
    intervals: e.AGG_INTERVALS,
    graceMs: e.AGG_GRACE_MS,
    sweepMs: e.AGG_SWEEP_MS,
    lateTickPolicy: e.LATE_TICK_POLICY,
    recoverSec: e.AGG_RECOVER_SEC,
  },
  retention: { tickSec: e.TICK_RETENTION_SEC, sweepMs: e.RETENTION_SWEEP_MS },

  storePageSize: e.STORE_PAGE_SIZE,
  opsPort: e.OPS_PORT,
  boot: { retries: e.BOOT_RETRIES, retryBaseMs: e.BOOT_RETRY_BASE_MS },
} as const;
