import type { Market, MarketId, OhlcvBar, Partition, PriceTick } from '../types/domain.js';
import type { ParsedPartitionName } from '../utils/partition.js';

export type ScanPage = {
  fromTs: number;
  toTs: number;
  afterTs?: number; // keyset cursor (exclusive)
  limit: number;
};

export type TickAppend = { partition: Partition; ticks: readonly PriceTick[] };

/**
 * Persistence port for price partitions. Implementations throw
 * StorageUnavailableError for I/O failures and never retry on their own.
 */
export interface PriceStorage {
  ensurePartition(p: Partition): Promise<void>;
  listPartitions(): Promise<ParsedPartitionName[]>;

  findBar(p: Partition, periodStart: number): Promise<OhlcvBar | null>;
  /** Inserts when the key is free; 'exists' when a row already holds the key. */
  insertBar(p: Partition, bar: OhlcvBar): Promise<'inserted' | 'exists'>;
  scanBars(p: Partition, page: ScanPage): Promise<OhlcvBar[]>;
  latestBarAtOrBefore(p: Partition, ts: number): Promise<OhlcvBar | null>;

  /** Appends every batch in one transaction. Returns the number of rows written. */
  appendTicks(batches: readonly TickAppend[]): Promise<number>;
  scanTicks(p: Partition, fromTs: number, toTs: number): Promise<PriceTick[]>;
  deleteTicksBefore(p: Partition, ts: number): Promise<number>;
}

export interface MarketStorage {
  ensureSchema(): Promise<void>;
  findById(id: MarketId): Promise<Market | null>;
  /** Inserts the market unless its id exists; returns the stored record either way. */
  insertIfAbsent(market: Market): Promise<Market>;
  setActive(id: MarketId, active: boolean): Promise<Market | null>;
  list(activeOnly: boolean): Promise<Market[]>;
}
