import { z } from 'zod';
import { InvalidBarError, InvalidTickError } from '../errors.js';
import type { BarInput, OhlcvBar, PriceTick, TickInput } from '../types/domain.js';
import { type Decimal, requireFixedPoint } from './decimal.js';
import { isAligned, isValidInterval, toEpochSec } from './time.js';

// ---- wire schemas (crawler payloads) ----
const NumericValue = z.union([
  z.number().finite(),
  z.string().trim().regex(/^-?\d+(\.\d+)?$/, 'expected a decimal string'),
]);
const Timestamp = z
  .union([z.number().finite().nonnegative(), z.string().min(1)])
  .transform((v, ctx) => {
    const ts = toEpochSec(v);
    if (!Number.isFinite(ts)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'unparseable timestamp' });
      return z.NEVER;
    }
    return ts;
  });
const MarketRef = {
  exchange: z.string().min(1),
  base: z.string().min(1),
  quote: z.string().min(1),
};

export const TickItem = z.object({
  kind: z.literal('tick'),
  ...MarketRef,
  ts: Timestamp,
  price: NumericValue,
  volume: NumericValue,
});

export const BarItem = z.object({
  kind: z.literal('bar'),
  ...MarketRef,
  intervalMinutes: z.number().int().positive(),
  ts: Timestamp,
  open: NumericValue,
  high: NumericValue,
  low: NumericValue,
  close: NumericValue,
  volume: NumericValue,
});

export const FeedItem = z.discriminatedUnion('kind', [TickItem, BarItem]);

export const IngestJobBody = z.object({
  source: z.string().min(1),
  items: z.array(FeedItem).min(1),
});

export type TickItem = z.infer<typeof TickItem>;
export type BarItem = z.infer<typeof BarItem>;
export type FeedItem = z.infer<typeof FeedItem>;
export type IngestJobBody = z.infer<typeof IngestJobBody>;

// ---- domain invariants ----

function positive(value: Decimal, field: string, fail: (m: string) => Error): Decimal {
  if (!value.greaterThan(0)) throw fail(`${field} must be > 0 (got ${value.toString()})`);
  return value;
}

/** Checks every OHLCV invariant and returns the normalized, frozen bar. */
export function validateBar(input: BarInput, now: number): OhlcvBar {
  const fail = (m: string) => new InvalidBarError(`invalid bar for ${input.marketId}: ${m}`);

  if (!isValidInterval(input.intervalMinutes)) {
    throw fail(`interval ${input.intervalMinutes} is not a positive whole number of minutes`);
  }
  if (!Number.isFinite(input.periodStart) || input.periodStart < 0) {
    throw fail(`periodStart ${input.periodStart} is not a valid timestamp`);
  }
  if (!isAligned(input.periodStart, input.intervalMinutes)) {
    throw fail(`periodStart ${input.periodStart} is not aligned to ${input.intervalMinutes} minutes`);
  }
  if (input.periodStart > now) {
    throw fail(`periodStart ${input.periodStart} is in the future`);
  }

  const open = positive(requireFixedPoint(input.open, fail), 'open', fail);
  const high = positive(requireFixedPoint(input.high, fail), 'high', fail);
  const low = positive(requireFixedPoint(input.low, fail), 'low', fail);
  const close = positive(requireFixedPoint(input.close, fail), 'close', fail);
  const volume = positive(requireFixedPoint(input.volume, fail), 'volume', fail);

  if (low.greaterThan(high)) throw fail(`low ${low.toString()} > high ${high.toString()}`);
  for (const [name, v] of [['open', open], ['close', close]] as const) {
    if (v.lessThan(low) || v.greaterThan(high)) {
      throw fail(`${name} ${v.toString()} outside [${low.toString()}, ${high.toString()}]`);
    }
  }

  return Object.freeze({
    marketId: input.marketId,
    intervalMinutes: input.intervalMinutes,
    periodStart: input.periodStart,
    open, high, low, close, volume,
  });
}

export function validateTick(input: TickInput, now: number): PriceTick {
  const fail = (m: string) => new InvalidTickError(`invalid tick for ${input.marketId}: ${m}`);

  if (!Number.isFinite(input.ts) || input.ts < 0) throw fail(`timestamp ${input.ts} is not valid`);
  if (input.ts > now) throw fail(`timestamp ${input.ts} is in the future`);
  const price = positive(requireFixedPoint(input.price, fail), 'price', fail);
  const volume = positive(requireFixedPoint(input.volume, fail), 'volume', fail);

  return Object.freeze({ marketId: input.marketId, ts: input.ts, price, volume });
}
