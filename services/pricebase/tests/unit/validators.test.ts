import { describe, it, expect } from 'vitest';
import { InvalidBarError, InvalidSymbolError, InvalidTickError } from '../../src/errors.js';
import { formatFixed, toFixedPoint } from '../../src/utils/decimal.js';
import { canonicalMarket, marketIdOf, parseMarketId } from '../../src/utils/market.js';
import { barTableName, parsePartitionName, tickTableName } from '../../src/utils/partition.js';
import { bucketStart, toEpochSec } from '../../src/utils/time.js';
import { IngestJobBody, validateBar, validateTick } from '../../src/utils/validators.js';

const NOW = 1_704_067_200;
const base = {
  marketId: 'bitstamp:BTC/USD',
  intervalMinutes: 60,
  periodStart: NOW - 3600,
  open: 100,
  high: 105,
  low: 99,
  close: 104,
  volume: 3,
};

describe('market keys', () => {
  it('normalizes case and whitespace', () => {
    const key = canonicalMarket(' b tc', 'usd ', 'Bit Stamp');
    expect(key).toEqual({ exchange: 'bitstamp', base: 'BTC', quote: 'USD' });
    expect(marketIdOf(key)).toBe('bitstamp:BTC/USD');
    expect(parseMarketId('bitstamp:BTC/USD')).toEqual(key);
  });

  it('rejects malformed symbols', () => {
    expect(() => canonicalMarket('BTC_X', 'USD', 'kraken')).toThrow(InvalidSymbolError);
    expect(() => canonicalMarket('BTC', 'BTC', 'kraken')).toThrow(InvalidSymbolError);
    expect(() => canonicalMarket('BTC', 'USD', '')).toThrow(InvalidSymbolError);
    expect(parseMarketId('BTC/USD')).toBeNull();
  });
});

describe('partition names', () => {
  const key = { exchange: 'kraken', base: 'ETH', quote: 'EUR' };

  it('builds and parses bar and tick table names', () => {
    expect(barTableName(key, 15)).toBe('PriceData_kraken_ETH_EUR_15mins');
    expect(tickTableName(key)).toBe('PriceData_kraken_ETH_EUR_tick');
    expect(parsePartitionName('PriceData_kraken_ETH_EUR_15mins')).toEqual({ ...key, kind: 'bars', intervalMinutes: 15 });
    expect(parsePartitionName('PriceData_kraken_ETH_EUR_tick')).toEqual({ ...key, kind: 'ticks' });
  });

  it('ignores unrelated tables', () => {
    expect(parsePartitionName('markets')).toBeNull();
    expect(parsePartitionName('PriceData_kraken_ETH_EUR_0mins')).toBeNull();
    expect(parsePartitionName('PriceData_kraken_ETH_EUR_daily')).toBeNull();
  });
});

describe('time helpers', () => {
  it('aligns timestamps down to the bucket start', () => {
    expect(bucketStart(NOW + 59, 1)).toBe(NOW);
    expect(bucketStart(NOW + 3599, 60)).toBe(NOW);
    expect(bucketStart(NOW + 3600, 60)).toBe(NOW + 3600);
  });

  it('parses epoch strings and ISO dates', () => {
    expect(toEpochSec('1704067200')).toBe(NOW);
    expect(toEpochSec('2024-01-01T00:00:00Z')).toBe(NOW);
    expect(toEpochSec('not a date')).toBeNaN();
  });

  it('reads date-times without an offset as UTC', () => {
    expect(toEpochSec('2024-01-01T00:00:00')).toBe(NOW);
    expect(toEpochSec('2024-01-01 01:00:00')).toBe(NOW + 3600);
    expect(toEpochSec('2024-01-01T00:00:30.5')).toBe(NOW + 30);
    expect(toEpochSec('2024-01-01T02:00:00+02:00')).toBe(NOW);
  });
});

describe('fixed point', () => {
  it('rounds half up to 8 places', () => {
    const d = toFixedPoint('1.123456785');
    expect(d && formatFixed(d)).toBe('1.12345679');
  });

  it('rejects values beyond 16 integer digits and non-finite input', () => {
    expect(toFixedPoint('10000000000000000')).toBeNull();
    expect(toFixedPoint(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toFixedPoint('abc')).toBeNull();
  });
});

describe('validateBar', () => {
  it('returns a frozen normalized bar', () => {
    const bar = validateBar(base, NOW);
    expect(Object.isFrozen(bar)).toBe(true);
    expect(bar.open.toString()).toBe('100');
    expect(bar.volume.toString()).toBe('3');
  });

  it.each([
    ['misaligned start', { periodStart: NOW - 1800 }],
    ['future start', { periodStart: NOW + 3600 }],
    ['zero volume', { volume: 0 }],
    ['negative price', { low: -1 }],
    ['low above high', { low: 106 }],
    ['open above high', { open: 106 }],
    ['close below low', { close: 98 }],
    ['bad interval', { intervalMinutes: 0 }],
    ['unparseable number', { high: 'x' }],
  ])('rejects %s', (_name, patch) => {
    expect(() => validateBar({ ...base, ...patch }, NOW)).toThrow(InvalidBarError);
  });
});

describe('validateTick', () => {
  it('accepts fractional timestamps and decimal strings', () => {
    const tick = validateTick({ marketId: 'bitstamp:BTC/USD', ts: NOW - 0.5, price: '42000.1', volume: '0.25' }, NOW);
    expect(tick.ts).toBe(NOW - 0.5);
    expect(tick.price.toString()).toBe('42000.1');
  });

  it('rejects zero price and future timestamps', () => {
    expect(() => validateTick({ marketId: 'm', ts: NOW, price: 0, volume: 1 }, NOW)).toThrow(InvalidTickError);
    expect(() => validateTick({ marketId: 'm', ts: NOW + 1, price: 1, volume: 1 }, NOW)).toThrow(InvalidTickError);
  });
});

describe('IngestJobBody', () => {
  it('parses mixed ticks and bars with ISO timestamps', () => {
    const parsed = IngestJobBody.parse({
      source: 'crawler',
      items: [
        { kind: 'tick', exchange: 'kraken', base: 'BTC', quote: 'EUR', ts: '2024-01-01T00:00:00Z', price: '1.5', volume: 2 },
        {
          kind: 'bar', exchange: 'kraken', base: 'BTC', quote: 'EUR', intervalMinutes: 1,
          ts: NOW, open: 1, high: 2, low: 1, close: 2, volume: 1,
        },
      ],
    });
    expect(parsed.items[0].ts).toBe(NOW);
    expect(parsed.items[1].kind).toBe('bar');
  });

  it('rejects empty batches and unknown kinds', () => {
    expect(IngestJobBody.safeParse({ source: 'x', items: [] }).success).toBe(false);
    expect(IngestJobBody.safeParse({ source: 'x', items: [{ kind: 'quote' }] }).success).toBe(false);
  });
});
