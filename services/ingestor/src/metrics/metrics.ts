import { Registry, collectDefaultMetrics, Counter, Gauge } from 'prom-client';
import { engineRegistry } from '@pricebase/core';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const ingestBatches = new Counter({
  name: 'ingestor_batches_total',
  help: 'Flushed batches',
  labelNames: ['result'] as const,
  registers: [registry],
});
export const ingestBatchSize = new Gauge({ name: 'ingestor_batch_size', help: 'Last batch size', registers: [registry] });
export const itemOutcomes = new Counter({
  name: 'ingestor_items_total',
  help: 'Feed items by outcome',
  labelNames: ['status'] as const,
  registers: [registry],
});
export const jobOutcomes = new Counter({
  name: 'ingestor_jobs_total',
  help: 'Jobs by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

// what /ops/metrics serves: ingestor metrics plus the engine's counters
export const opsRegistry = Registry.merge([registry, engineRegistry]);
