import { describe, it, expect } from 'vitest';
import {
  InsufficientBalanceError,
  InvalidArgumentError,
  InvalidStateTransitionError,
  NotFoundError,
} from '../../src/errors.js';
import { MemoryMarketStorage } from '../../src/repositories/memory-markets.repo.js';
import { MarketRegistry } from '../../src/services/market-registry.service.js';
import { SessionTracker } from '../../src/services/session-tracker.service.js';

async function setupTracker(usd = 1000) {
  const registry = new MarketRegistry(new MemoryMarketStorage());
  const market = await registry.resolve('USD', 'BTC', 'bitstamp');
  const other = await registry.resolve('USD', 'ETH', 'bitstamp');
  const tracker = new SessionTracker(registry);
  tracker.openAccount('Bitstamp', { usd });
  return { tracker, market, other };
}

const usdBalance = (tracker: SessionTracker) => tracker.account('bitstamp').balances.USD?.toString();

describe('SessionTracker', () => {
  it('debits on open and credits on close', async () => {
    const { tracker, market } = await setupTracker();
    const open = await tracker.open(market.id, 100, 2, { at: 10 });
    expect(open.status).toBe('open');
    expect(usdBalance(tracker)).toBe('800');

    const closed = await tracker.close(open.id, 110, { at: 20 });
    expect(closed.status).toBe('closed');
    expect(closed.realizedPnl.toString()).toBe('20');
    expect(closed.closedAt).toBe(20);
    expect(usdBalance(tracker)).toBe('1020');
    expect(Object.isFrozen(closed)).toBe(true);
  });

  it('rejects an open the account cannot cover and leaves the balance alone', async () => {
    const { tracker, market } = await setupTracker();
    const attempt = tracker.open(market.id, 600, 2);
    await expect(attempt).rejects.toBeInstanceOf(InsufficientBalanceError);
    await expect(attempt).rejects.toThrow('tried to remove 1200.00000000 USD while having 1000.00000000 USD');
    expect(usdBalance(tracker)).toBe('1000');
    expect(tracker.sessions()).toEqual([]);
  });

  it('rejects double close and double open', async () => {
    const { tracker, market } = await setupTracker();
    const s = await tracker.open(market.id, 100, 1, { sessionId: 's-1' });
    await tracker.close(s.id, 90);
    await expect(tracker.close(s.id, 95)).rejects.toBeInstanceOf(InvalidStateTransitionError);
    expect(usdBalance(tracker)).toBe('990');
    await expect(tracker.open(market.id, 100, 1, { sessionId: 's-1' })).rejects.toBeInstanceOf(InvalidStateTransitionError);
  });

  it('validates amounts and requires an account', async () => {
    const { tracker, market } = await setupTracker();
    await expect(tracker.open(market.id, 100, 0)).rejects.toBeInstanceOf(InvalidArgumentError);
    await expect(tracker.open(market.id, -1, 1)).rejects.toBeInstanceOf(InvalidArgumentError);

    const registry = new MarketRegistry(new MemoryMarketStorage());
    const kraken = await registry.resolve('USD', 'BTC', 'kraken');
    await expect(new SessionTracker(registry).open(kraken.id, 1, 1)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('serializes concurrent opens on one account', async () => {
    const { tracker, market } = await setupTracker(250);
    const results = await Promise.allSettled(Array.from({ length: 5 }, () => tracker.open(market.id, 100, 1)));
    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(2);
    expect(usdBalance(tracker)).toBe('50');
  });

  it('deposits and filters sessions', async () => {
    const { tracker, market, other } = await setupTracker(0);
    expect((await tracker.deposit('bitstamp', 'usd', '500.5')).toString()).toBe('500.5');
    const a = await tracker.open(market.id, 100, 1);
    await tracker.open(other.id, 10, 1);
    await tracker.close(a.id, 100);
    expect(tracker.sessions({ marketId: market.id }).map((s) => s.id)).toEqual([a.id]);
    expect(tracker.sessions({ status: 'open' }).map((s) => s.marketId)).toEqual([other.id]);
    await expect(tracker.deposit('bitstamp', 'USD', 0)).rejects.toBeInstanceOf(InvalidArgumentError);
  });
});

describe('BigSession', () => {
  it('aggregates realized and unrealized P/L over its members', async () => {
    const { tracker, market, other } = await setupTracker();
    const big = await tracker.createBigSession(market.id);
    const a = await tracker.open(market.id, 100, 1);
    const b = await tracker.open(market.id, 105, 2);
    big.addSession(a);
    big.addSession(b);
    big.addSession(b);
    await tracker.close(a.id, 110);

    expect(big.openSessions().map((s) => s.id)).toEqual([b.id]);
    expect(big.closedSessions().map((s) => s.id)).toEqual([a.id]);
    expect(big.realizedPnl().toString()).toBe('10');
    expect(big.aggregatePnL(120).toString()).toBe('40');

    const foreign = await tracker.open(other.id, 1, 1);
    expect(() => big.addSession(foreign)).toThrow(InvalidArgumentError);

    const closed = await big.closeAll(120);
    expect(closed).toHaveLength(1);
    expect(big.realizedPnl().toString()).toBe('40');
    expect(big.openSessions()).toEqual([]);
  });
});
