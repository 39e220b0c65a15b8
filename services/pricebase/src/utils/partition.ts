import type { Market, Partition } from '../types/domain.js';
import type { MarketKey } from './market.js';
import { isValidInterval } from './time.js';

// PriceData_<exchange>_<base>_<quote>_<n>mins | PriceData_<exchange>_<base>_<quote>_tick
const PREFIX = 'PriceData';

export type ParsedPartitionName = MarketKey & ({ kind: 'bars'; intervalMinutes: number } | { kind: 'ticks' });

export function barTableName(key: MarketKey, intervalMinutes: number): string {
  return `${PREFIX}_${key.exchange}_${key.base}_${key.quote}_${intervalMinutes}mins`;
}

export function tickTableName(key: MarketKey): string {
  return `${PREFIX}_${key.exchange}_${key.base}_${key.quote}_tick`;
}

export function barPartition(market: Market, intervalMinutes: number): Partition {
  return { market, kind: 'bars', intervalMinutes, table: barTableName(market, intervalMinutes) };
}

export function tickPartition(market: Market): Partition {
  return { market, kind: 'ticks', table: tickTableName(market) };
}

export function partitionKey(p: Partition): string {
  return p.table;
}

export function parsePartitionName(name: string): ParsedPartitionName | null {
  const parts = name.split('_').map((c) => c.trim());
  if (parts.length !== 5 || parts[0] !== PREFIX) return null;
  const [, exchange, base, quote, suffix] = parts;
  if (!exchange || !base || !quote) return null;
  if (suffix === 'tick') return { exchange, base, quote, kind: 'ticks' };
  const m = /^(\d+)mins$/.exec(suffix);
  if (!m) return null;
  const intervalMinutes = Number(m[1]);
  if (!isValidInterval(intervalMinutes)) return null;
  return { exchange, base, quote, kind: 'bars', intervalMinutes };
}
