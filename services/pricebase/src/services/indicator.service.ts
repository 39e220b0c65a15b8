import { InvalidArgumentError, NotFoundError } from '../errors.js';
import type { BarField, MarketId } from '../types/domain.js';
import { type Decimal, roundFixed, sum } from '../utils/decimal.js';
import { bucketStart, intervalSec, isValidInterval } from '../utils/time.js';
import { type PriceSeriesReader, collect } from './price-series.service.js';

export type RollingAverage =
  | {
      status: 'ok';
      average: Decimal;
      current: Decimal | null;
      isAboveCurrent: boolean;
      isBelowCurrent: boolean;
      periods: number;
    }
  | { status: 'insufficient'; periods: number };

export type IndicatorOptions = { minPeriods?: number };

export class IndicatorEngine {
  private readonly minPeriods: number;

  constructor(private readonly series: PriceSeriesReader, opts: IndicatorOptions = {}) {
    this.minPeriods = opts.minPeriods ?? 5;
    if (!Number.isInteger(this.minPeriods) || this.minPeriods < 1) {
      throw new InvalidArgumentError(`minPeriods must be a positive integer (got ${this.minPeriods})`);
    }
  }

  /**
   * Average of `field` over the `windowSize` periods ending at the period that
   * contains `referenceTs`. Missing periods are skipped; fewer than `minPeriods`
   * bars yields an `insufficient` result rather than an error.
   */
  async rollingAverage(
    marketId: MarketId,
    intervalMinutes: number,
    referenceTs: number,
    field: BarField,
    windowSize: number,
  ): Promise<RollingAverage> {
    if (!isValidInterval(intervalMinutes)) throw new InvalidArgumentError(`invalid interval ${intervalMinutes}`);
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new InvalidArgumentError(`windowSize must be a positive integer (got ${windowSize})`);
    }
    const ref = bucketStart(referenceTs, intervalMinutes);
    const from = ref - (windowSize - 1) * intervalSec(intervalMinutes);
    const bars = await collect(this.series.queryRange(marketId, intervalMinutes, from, ref));

    if (bars.length < this.minPeriods) return { status: 'insufficient', periods: bars.length };

    const average = roundFixed(sum(bars.map((b) => b[field])).dividedBy(bars.length));
    const last = bars[bars.length - 1];
    const current = last.periodStart === ref ? last[field] : null;
    return {
      status: 'ok',
      average,
      current,
      isAboveCurrent: current !== null && average.greaterThan(current),
      isBelowCurrent: current !== null && average.lessThan(current),
      periods: bars.length,
    };
  }

  /** `field` of the latest bar at or before `periodsAgo` periods back; null if history ends earlier. */
  async valueAgo(
    marketId: MarketId,
    intervalMinutes: number,
    referenceTs: number,
    periodsAgo: number,
    field: BarField,
  ): Promise<Decimal | null> {
    if (!isValidInterval(intervalMinutes)) throw new InvalidArgumentError(`invalid interval ${intervalMinutes}`);
    if (!Number.isInteger(periodsAgo) || periodsAgo < 0) {
      throw new InvalidArgumentError(`periodsAgo must be a non-negative integer (got ${periodsAgo})`);
    }
    const target = bucketStart(referenceTs, intervalMinutes) - periodsAgo * intervalSec(intervalMinutes);
    // getBar surfaces an unknown market as NotFound before we treat NotFound as "no history"
    const exact = await this.series.getBar(marketId, intervalMinutes, target);
    if (exact) return exact[field];
    try {
      const bar = await this.series.latestBefore(marketId, intervalMinutes, target);
      return bar[field];
    } catch (err) {
      if (err instanceof NotFoundError) return null;
      throw err;
    }
  }
}
