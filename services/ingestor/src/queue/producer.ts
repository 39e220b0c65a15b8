import { Queue } from 'bullmq';
import type { IngestJobBody } from '@pricebase/core';
import { cfg } from '../config/index.js';
import { getBullConnection } from '../redis/index.js';

// IMPORTANT: queue name must NOT contain ":"; use prefix for namespacing
export function createIngestQueue(): Queue<IngestJobBody> {
  return new Queue<IngestJobBody>(cfg.ingestQueue, {
    connection: getBullConnection(),
    prefix: cfg.queuePrefix,
  });
}

export type RetryPolicy = { attempts: number; backoffMs: number };

/**
 * Bulk enqueue. Failed jobs are retried by BullMQ with exponential backoff;
 * workers mark terminal failures unrecoverable so they are not retried.
 */
export async function enqueueIngestJobs(
  queue: Pick<Queue<IngestJobBody>, 'addBulk'>,
  jobs: IngestJobBody[],
  policy: RetryPolicy = { attempts: cfg.job.attempts, backoffMs: cfg.job.backoffMs },
) {
  return queue.addBulk(
    jobs.map((data) => ({
      name: 'ingest',
      data,
      opts: {
        attempts: policy.attempts,
        backoff: { type: 'exponential' as const, delay: policy.backoffMs },
        removeOnComplete: true,
        removeOnFail: 100,
      },
    })),
  );
}
