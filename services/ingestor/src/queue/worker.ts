import { UnrecoverableError, Worker } from 'bullmq';
import { type FeedItem, IngestJobBody } from '@pricebase/core';
import { cfg } from '../config/index.js';
import { jobOutcomes } from '../metrics/metrics.js';
import { getBullConnection } from '../redis/index.js';
import type { ItemOutcome } from '../services/ingest.service.js';
import { logger } from '../utils/logger.js';
import type { Batcher } from './batcher.js';

export type JobSummary = { stored: number; unchanged: number; dropped: number };

type ItemBatcher = Pick<Batcher<FeedItem, ItemOutcome>, 'add'>;

/**
 * Validates one job payload and waits for its items to be flushed. Invalid
 * payloads and rejected items fail the job for good; a retryable storage
 * failure propagates so BullMQ retries the job.
 */
export async function processIngestJob(data: unknown, batcher: ItemBatcher): Promise<JobSummary> {
  const parsed = IngestJobBody.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new UnrecoverableError(`invalid ingest job: ${issues.slice(0, 5).join('; ')}`);
  }

  const outcomes = await batcher.add(parsed.data.items);
  const summary: JobSummary = { stored: 0, unchanged: 0, dropped: 0 };
  const rejected: string[] = [];
  outcomes.forEach((o, i) => {
    if (o.status === 'rejected') rejected.push(`#${i} ${o.code}: ${o.message}`);
    else summary[o.status]++;
  });
  if (rejected.length) {
    throw new UnrecoverableError(
      `${rejected.length} of ${outcomes.length} items rejected (source ${parsed.data.source}): ${rejected.slice(0, 5).join('; ')}`,
    );
  }
  return summary;
}

export function startWorker(batcher: ItemBatcher) {
  // IMPORTANT: queueName has NO colon; namespacing via `prefix`
  const worker = new Worker<unknown, JobSummary>(
    cfg.ingestQueue,
    (job) => processIngestJob(job.data, batcher),
    {
      connection: getBullConnection(),
      concurrency: cfg.workerConcurrency,
      lockDuration: 30000,
      prefix: cfg.queuePrefix,
    }
  );

  worker.on('completed', (job, summary) => {
    jobOutcomes.inc({ outcome: 'completed' });
    logger.debug({ id: job.id, ...summary }, '[worker] completed');
  });
  worker.on('failed', (job, err) => {
    const terminal = err instanceof UnrecoverableError;
    jobOutcomes.inc({ outcome: terminal ? 'rejected' : 'failed' });
    logger.error({ id: job?.id, attemptsMade: job?.attemptsMade, terminal, err }, '[worker] failed');
  });
  worker.on('error', (err) => logger.error({ err }, '[worker] error'));

  return worker;
}
