import { InvalidSymbolError } from '../errors.js';
import type { Market, MarketId } from '../types/domain.js';

const SYMBOL_RE = /^[A-Z0-9]{1,10}$/;
const EXCHANGE_RE = /^[a-z0-9]{1,16}$/;

export type MarketKey = Pick<Market, 'exchange' | 'base' | 'quote'>;

export function normalizeSymbol(raw: string): string {
  return raw.replace(/\s+/g, '').toUpperCase();
}

export function normalizeExchange(raw: string): string {
  return raw.replace(/\s+/g, '').toLowerCase();
}

/** Normalizes and validates a (base, quote, exchange) triple. */
export function canonicalMarket(base: string, quote: string, exchange: string): MarketKey {
  const key = {
    exchange: normalizeExchange(exchange ?? ''),
    base: normalizeSymbol(base ?? ''),
    quote: normalizeSymbol(quote ?? ''),
  };
  if (!EXCHANGE_RE.test(key.exchange)) {
    throw new InvalidSymbolError(`invalid exchange "${exchange}" (expected 1-16 letters or digits)`);
  }
  if (!SYMBOL_RE.test(key.base)) {
    throw new InvalidSymbolError(`invalid base symbol "${base}" (expected 1-10 letters or digits)`);
  }
  if (!SYMBOL_RE.test(key.quote)) {
    throw new InvalidSymbolError(`invalid quote symbol "${quote}" (expected 1-10 letters or digits)`);
  }
  if (key.base === key.quote) {
    throw new InvalidSymbolError(`base and quote are both "${key.base}"`);
  }
  return key;
}

export function marketIdOf(key: MarketKey): MarketId {
  return `${key.exchange}:${key.base}/${key.quote}`;
}

/** Inverse of marketIdOf; null when the id is not in canonical form. */
export function parseMarketId(id: MarketId): MarketKey | null {
  const m = /^([a-z0-9]{1,16}):([A-Z0-9]{1,10})\/([A-Z0-9]{1,10})$/.exec(id);
  if (!m) return null;
  return { exchange: m[1], base: m[2], quote: m[3] };
}
