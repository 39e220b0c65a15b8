import { Decimal } from 'decimal.js';

// NUMERIC(24, 8): 16 integer digits, 8 fractional digits.
Decimal.set({
  precision: 48,
  rounding: Decimal.ROUND_HALF_UP,
  toExpPos: 9e15,
  toExpNeg: -9e15,
});

export const SCALE = 8;
export const MAX_INTEGER_DIGITS = 16;
const LIMIT = new Decimal(10).pow(MAX_INTEGER_DIGITS);

export type Numeric = Decimal | number | string;

/**
 * Converts a number-like value to a fixed-point Decimal rounded to 8 places.
 * Returns null for anything that is not a finite number or does not fit 24 digits.
 */
export function toFixedPoint(value: Numeric): Decimal | null {
  let d: Decimal;
  try {
    d = new Decimal(value);
  } catch {
    return null;
  }
  if (!d.isFinite()) return null;
  const rounded = d.toDecimalPlaces(SCALE, Decimal.ROUND_HALF_UP);
  return rounded.abs().lessThan(LIMIT) ? rounded : null;
}

/** Like toFixedPoint but throws the error produced by `fail` when the value is unusable. */
export function requireFixedPoint(value: Numeric, fail: (reason: string) => Error): Decimal {
  const d = toFixedPoint(value);
  if (!d) throw fail(`not a NUMERIC(24, 8) value: ${String(value)}`);
  return d;
}

/** Wire/storage representation, always 8 fractional digits. */
export function formatFixed(value: Decimal): string {
  return value.toFixed(SCALE);
}

export function sum(values: Decimal[]): Decimal {
  return values.reduce((acc, v) => acc.plus(v), new Decimal(0));
}

export function roundFixed(value: Decimal): Decimal {
  return value.toDecimalPlaces(SCALE, Decimal.ROUND_HALF_UP);
}

export { Decimal };
