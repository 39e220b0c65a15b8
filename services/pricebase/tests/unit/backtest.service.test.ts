import { describe, it, expect } from 'vitest';
import { BacktestRunner, type TradingRule } from '../../src/services/backtest.service.js';
import { IndicatorEngine } from '../../src/services/indicator.service.js';
import { SessionTracker } from '../../src/services/session-tracker.service.js';
import { HOUR, NOW, hourBar, setup } from './fixtures.js';

// hourly closes for NOW-10h .. NOW-1h
const CLOSES = [100, 100, 100, 100, 100, 90, 95, 110, 120, 115];
const T = (i: number) => NOW - (10 - i) * HOUR;

async function setupRunner(usd = 1000) {
  const ctx = await setup();
  const market = await ctx.registry.resolve('USD', 'BTC', 'bitstamp');
  for (let i = 0; i < CLOSES.length; i++) await ctx.store.ingestBar(hourBar(market.id, T(i), CLOSES[i]));
  const tracker = new SessionTracker(ctx.registry);
  tracker.openAccount('bitstamp', { USD: usd });
  const runner = new BacktestRunner(new IndicatorEngine(ctx.store), tracker);
  return { ...ctx, market, tracker, runner };
}

describe('BacktestRunner', () => {
  it('buys below the moving average and sells above it', async () => {
    const { runner, market, tracker } = await setupRunner();
    const report = await runner.run({
      marketId: market.id, intervalMinutes: 60, fromTs: T(0), toTs: NOW, windowSize: 5, amount: 1,
    });

    expect(report.steps).toHaveLength(10);
    expect(report.steps.slice(0, 4).every((s) => s.average === null && s.price === null)).toBe(true);
    expect(report.steps[4].average?.toString()).toBe('100');
    expect(report.steps[5]).toMatchObject({ ts: T(5), bought: true, sold: false });
    expect(report.steps[7]).toMatchObject({ ts: T(7), bought: false, sold: true });
    expect(report.steps[7].realizedPnl.toString()).toBe('20');

    expect(report.trades.map((t) => [t.side, t.ts, t.price.toString()])).toEqual([
      ['buy', T(5), '90'],
      ['sell', T(7), '110'],
    ]);
    expect(report.realizedPnl.toString()).toBe('20');
    expect(report.finalPnl.toString()).toBe('20');
    expect(tracker.account('bitstamp').balances.USD.toString()).toBe('1020');
  });

  it('marks a position still open at the end at the last price', async () => {
    const { runner, market } = await setupRunner();
    const report = await runner.run({
      marketId: market.id, intervalMinutes: 60, fromTs: T(0), toTs: T(7), windowSize: 5, amount: 1,
    });
    expect(report.steps).toHaveLength(7);
    expect(report.realizedPnl.toString()).toBe('0');
    expect(report.finalPnl.toString()).toBe('5');
    expect(report.bigSession.openSessions()).toHaveLength(1);
  });

  it('skips buys the account cannot fund', async () => {
    const { runner, market } = await setupRunner(50);
    const report = await runner.run({
      marketId: market.id, intervalMinutes: 60, fromTs: T(0), toTs: NOW, windowSize: 5, amount: 1,
    });
    expect(report.trades).toEqual([]);
    expect(report.steps[5].bought).toBe(false);
  });

  it('accepts a custom rule and starts at the first aligned period', async () => {
    const { runner, market } = await setupRunner();
    const seen: number[] = [];
    const rule: TradingRule = ({ ts }) => {
      seen.push(ts);
      return 'hold';
    };
    const report = await runner.run({
      marketId: market.id, intervalMinutes: 60, fromTs: T(3) + 1, toTs: NOW, windowSize: 5, amount: 1, rule,
    });
    expect(report.steps[0].ts).toBe(T(4));
    expect(seen).toEqual([T(4), T(5), T(6), T(7), T(8), T(9)]);
    expect(report.trades).toEqual([]);
  });
});
