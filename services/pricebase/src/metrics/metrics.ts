import { Registry, Counter } from 'prom-client';

// Engine-level counters; the ingestor merges this registry into its own.
export const registry = new Registry();

export const barsIngested = new Counter({
  name: 'pricebase_bars_ingested_total',
  help: 'Bars accepted by the price series store',
  labelNames: ['result'] as const,
  registers: [registry],
});
export const barConflicts = new Counter({
  name: 'pricebase_bar_conflicts_total',
  help: 'Bars rejected because a different bar holds the key',
  registers: [registry],
});
export const ticksIngested = new Counter({ name: 'pricebase_ticks_ingested_total', help: 'Ticks appended', registers: [registry] });
export const ticksPruned = new Counter({ name: 'pricebase_ticks_pruned_total', help: 'Ticks removed by retention', registers: [registry] });
export const lateTicks = new Counter({
  name: 'pricebase_late_ticks_total',
  help: 'Ticks that arrived after their bucket was finalized',
  labelNames: ['policy'] as const,
  registers: [registry],
});
export const barsFinalized = new Counter({
  name: 'pricebase_bars_finalized_total',
  help: 'Bars emitted by the aggregation engine',
  labelNames: ['interval'] as const,
  registers: [registry],
});
