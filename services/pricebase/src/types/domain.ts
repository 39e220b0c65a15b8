import type { Decimal, Numeric } from '../utils/decimal.js';

export type MarketId = string;

export type Market = {
  readonly id: MarketId;
  readonly exchange: string;
  readonly base: string;
  readonly quote: string;
  readonly active: boolean;
};

export type PriceTick = {
  readonly marketId: MarketId;
  readonly ts: number;        // epoch seconds
  readonly price: Decimal;
  readonly volume: Decimal;
};

export type OhlcvBar = {
  readonly marketId: MarketId;
  readonly intervalMinutes: number;
  readonly periodStart: number; // epoch seconds, aligned to the interval
  readonly open: Decimal;
  readonly high: Decimal;
  readonly low: Decimal;
  readonly close: Decimal;
  readonly volume: Decimal;
};

export type BarField = 'open' | 'high' | 'low' | 'close' | 'volume';
export const BAR_FIELDS: readonly BarField[] = ['open', 'high', 'low', 'close', 'volume'];

// Unvalidated shapes coming from crawlers, CSV files or tests.
export type TickInput = {
  marketId: MarketId;
  ts: number;
  price: Numeric;
  volume: Numeric;
};

export type BarInput = {
  marketId: MarketId;
  intervalMinutes: number;
  periodStart: number;
  open: Numeric;
  high: Numeric;
  low: Numeric;
  close: Numeric;
  volume: Numeric;
};

export type IngestResult = 'inserted' | 'unchanged';

export type PartitionKind = { kind: 'bars'; intervalMinutes: number } | { kind: 'ticks' };

export type Partition = {
  readonly market: Market;
  readonly table: string;
} & PartitionKind;

export function sameMarket(a: Pick<Market, 'exchange' | 'base' | 'quote'>, b: Pick<Market, 'exchange' | 'base' | 'quote'>): boolean {
  return a.exchange === b.exchange && a.base === b.base && a.quote === b.quote;
}

/** Value equality over the bar's key and payload. */
export function sameBar(a: OhlcvBar, b: OhlcvBar): boolean {
  return (
    a.marketId === b.marketId &&
    a.intervalMinutes === b.intervalMinutes &&
    a.periodStart === b.periodStart &&
    BAR_FIELDS.every((f) => a[f].equals(b[f]))
  );
}
