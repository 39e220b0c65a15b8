import { InsufficientBalanceError, InvalidArgumentError } from '../errors.js';
import type { BarField, MarketId } from '../types/domain.js';
import type { Decimal, Numeric } from '../utils/decimal.js';
import { logger } from '../utils/logger.js';
import { bucketStart, intervalSec, isValidInterval } from '../utils/time.js';
import type { IndicatorEngine, RollingAverage } from './indicator.service.js';
import type { BigSession, SessionTracker } from './session-tracker.service.js';

export type TradeAction = 'buy' | 'sell' | 'hold';

export type RuleContext = {
  ts: number;
  signal: Extract<RollingAverage, { status: 'ok' }>;
  price: Decimal;
  holding: boolean;
};

export type TradingRule = (ctx: RuleContext) => TradeAction;

export type BacktestParams = {
  marketId: MarketId;
  intervalMinutes: number;
  fromTs: number;
  toTs: number;
  field?: BarField;
  windowSize: number;
  amount: Numeric;
  rule?: TradingRule;
};

export type BacktestStep = {
  ts: number;
  average: Decimal | null;
  price: Decimal | null;
  bought: boolean;
  sold: boolean;
  realizedPnl: Decimal;
};

export type BacktestTrade = { ts: number; side: 'buy' | 'sell'; price: Decimal; sessionId: string };

export type BacktestReport = {
  steps: BacktestStep[];
  trades: BacktestTrade[];
  realizedPnl: Decimal;
  finalPnl: Decimal;
  bigSession: BigSession;
};

/** Buy when flat and the average sits above the price; sell when holding and it sits below. */
export const movingAverageRule: TradingRule = ({ signal, holding }) => {
  if (!holding && signal.isAboveCurrent) return 'buy';
  if (holding && signal.isBelowCurrent) return 'sell';
  return 'hold';
};

const log = logger.child({ component: 'backtest' });

export class BacktestRunner {
  constructor(
    private readonly indicators: IndicatorEngine,
    private readonly tracker: SessionTracker,
  ) {}

  async run(params: BacktestParams): Promise<BacktestReport> {
    const { marketId, intervalMinutes, fromTs, toTs, windowSize, amount } = params;
    const field = params.field ?? 'close';
    const rule = params.rule ?? movingAverageRule;
    if (!isValidInterval(intervalMinutes)) throw new InvalidArgumentError(`invalid interval ${intervalMinutes}`);
    if (!Number.isFinite(fromTs) || !Number.isFinite(toTs) || fromTs > toTs) {
      throw new InvalidArgumentError(`invalid range [${fromTs}, ${toTs}]`);
    }

    const step = intervalSec(intervalMinutes);
    const big = await this.tracker.createBigSession(marketId);
    const steps: BacktestStep[] = [];
    const trades: BacktestTrade[] = [];
    let lastPrice: Decimal | null = null;

    let t = bucketStart(fromTs, intervalMinutes);
    if (t < fromTs) t += step;

    for (; t < toTs; t += step) {
      const signal = await this.indicators.rollingAverage(marketId, intervalMinutes, t, field, windowSize);
      const price = signal.status === 'ok' ? signal.current : null;
      let bought = false;
      let sold = false;

      if (signal.status === 'ok' && price) {
        lastPrice = price;
        const holding = big.openSessions().length > 0;
        const action = rule({ ts: t, signal, price, holding });
        if (action === 'buy') {
          try {
            const session = await this.tracker.open(marketId, price, amount, { at: t });
            big.addSession(session);
            trades.push({ ts: t, side: 'buy', price, sessionId: session.id });
            bought = true;
          } catch (err) {
            if (!(err instanceof InsufficientBalanceError)) throw err;
            log.warn({ marketId, ts: t, err: err.message }, 'buy skipped');
          }
        } else if (action === 'sell' && holding) {
          for (const closed of await big.closeAll(price, { at: t })) {
            trades.push({ ts: t, side: 'sell', price, sessionId: closed.id });
          }
          sold = true;
        }
      }

      steps.push({
        ts: t,
        average: signal.status === 'ok' ? signal.average : null,
        price,
        bought,
        sold,
        realizedPnl: big.realizedPnl(),
      });
    }

    const realizedPnl = big.realizedPnl();
    const finalPnl = lastPrice ? big.aggregatePnL(lastPrice) : realizedPnl;
    log.info(
      { marketId, intervalMinutes, steps: steps.length, trades: trades.length, finalPnl: finalPnl.toString() },
      'backtest finished',
    );
    return { steps, trades, realizedPnl, finalPnl, bigSession: big };
  }
}
