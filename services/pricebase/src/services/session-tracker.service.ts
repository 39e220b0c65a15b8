import { randomUUID } from 'node:crypto';
import {
  InsufficientBalanceError,
  InvalidArgumentError,
  InvalidStateTransitionError,
  NotFoundError,
} from '../errors.js';
import type { MarketId } from '../types/domain.js';
import { Decimal, type Numeric, formatFixed, roundFixed, sum, toFixedPoint } from '../utils/decimal.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { logger } from '../utils/logger.js';
import { normalizeExchange, normalizeSymbol } from '../utils/market.js';
import { nowSec } from '../utils/time.js';
import type { MarketLookup } from './market-registry.service.js';

export type SessionId = string;

type SessionFields = {
  readonly id: SessionId;
  readonly marketId: MarketId;
  readonly startedPrice: Decimal;
  readonly amount: Decimal;
  readonly openedAt: number;
};

export type OpenSession = SessionFields & { readonly status: 'open' };

export type ClosedSession = SessionFields & {
  readonly status: 'closed';
  readonly closedPrice: Decimal;
  readonly closedAt: number;
  readonly realizedPnl: Decimal;
};

export type SmallSession = OpenSession | ClosedSession;

export type Account = {
  readonly exchange: string;
  readonly balances: Readonly<Record<string, Decimal>>;
};

export type SessionFilter = { marketId?: MarketId; status?: SmallSession['status'] };

const log = logger.child({ component: 'session-tracker' });

function positive(value: Numeric, what: string): Decimal {
  const d = toFixedPoint(value);
  if (!d || !d.greaterThan(0)) throw new InvalidArgumentError(`${what} must be a positive number (got ${String(value)})`);
  return d;
}

// Hypothetical positions funded from per-exchange accounts. Every balance change
// runs under the account's lock; a rejected open or close leaves all state as it was.
export class SessionTracker {
  private readonly accounts = new Map<string, Map<string, Decimal>>();
  private readonly byId = new Map<SessionId, SmallSession>();
  private readonly reserved = new Set<SessionId>();
  private readonly locks = new KeyedLock();

  constructor(private readonly markets: MarketLookup) {}

  openAccount(exchange: string, balances: Record<string, Numeric> = {}): Account {
    const ex = normalizeExchange(exchange);
    if (!ex) throw new InvalidArgumentError('exchange is required');
    if (this.accounts.has(ex)) throw new InvalidArgumentError(`account for ${ex} already exists`);
    const book = new Map<string, Decimal>();
    for (const [currency, raw] of Object.entries(balances)) {
      const amount = toFixedPoint(raw);
      if (!amount || amount.isNegative()) {
        throw new InvalidArgumentError(`opening balance of ${currency} must be >= 0 (got ${String(raw)})`);
      }
      book.set(normalizeSymbol(currency), amount);
    }
    this.accounts.set(ex, book);
    return this.account(ex);
  }

  account(exchange: string): Account {
    const ex = normalizeExchange(exchange);
    const book = this.accounts.get(ex);
    if (!book) throw new NotFoundError(`no account for exchange ${ex}`);
    return Object.freeze({ exchange: ex, balances: Object.freeze(Object.fromEntries(book)) });
  }

  async deposit(exchange: string, currency: string, amount: Numeric): Promise<Decimal> {
    const ex = normalizeExchange(exchange);
    const value = positive(amount, 'deposit amount');
    const cur = normalizeSymbol(currency);
    return this.locks.run(ex, async () => {
      const book = this.requireBook(ex);
      const next = (book.get(cur) ?? new Decimal(0)).plus(value);
      book.set(cur, next);
      return next;
    });
  }

  async open(
    marketId: MarketId,
    price: Numeric,
    amount: Numeric,
    opts: { sessionId?: SessionId; at?: number } = {},
  ): Promise<OpenSession> {
    const startedPrice = positive(price, 'price');
    const size = positive(amount, 'amount');
    const id = opts.sessionId ?? randomUUID();
    if (this.byId.has(id) || this.reserved.has(id)) {
      throw new InvalidStateTransitionError(`session ${id} is already open or closed`);
    }
    this.reserved.add(id);
    try {
      const market = await this.markets.lookup(marketId);
      return await this.locks.run(market.exchange, async () => {
        const book = this.requireBook(market.exchange);
        const cost = roundFixed(startedPrice.times(size));
        const balance = book.get(market.base) ?? new Decimal(0);
        if (balance.lessThan(cost)) {
          throw new InsufficientBalanceError(market.base, formatFixed(cost), formatFixed(balance));
        }
        book.set(market.base, balance.minus(cost));
        const session: OpenSession = Object.freeze({
          id,
          marketId: market.id,
          startedPrice,
          amount: size,
          openedAt: opts.at ?? nowSec(),
          status: 'open',
        });
        this.byId.set(id, session);
        log.debug({ sessionId: id, marketId, cost: formatFixed(cost) }, 'session opened');
        return session;
      });
    } finally {
      this.reserved.delete(id);
    }
  }

  async close(sessionId: SessionId, price: Numeric, opts: { at?: number } = {}): Promise<ClosedSession> {
    const closedPrice = positive(price, 'price');
    const known = this.get(sessionId);
    const market = await this.markets.lookup(known.marketId);

    return this.locks.run(market.exchange, async () => {
      const session = this.get(sessionId);
      if (session.status !== 'open') {
        throw new InvalidStateTransitionError(`session ${sessionId} is already closed`);
      }
      const closedAt = opts.at ?? nowSec();
      if (closedAt < session.openedAt) {
        throw new InvalidArgumentError(`session ${sessionId} cannot close at ${closedAt}, before it opened at ${session.openedAt}`);
      }
      const book = this.requireBook(market.exchange);
      const proceeds = roundFixed(closedPrice.times(session.amount));
      book.set(market.base, (book.get(market.base) ?? new Decimal(0)).plus(proceeds));

      const closed: ClosedSession = Object.freeze({
        ...session,
        status: 'closed',
        closedPrice,
        closedAt,
        realizedPnl: roundFixed(closedPrice.minus(session.startedPrice).times(session.amount)),
      });
      this.byId.set(sessionId, closed);
      log.debug({ sessionId, pnl: formatFixed(closed.realizedPnl) }, 'session closed');
      return closed;
    });
  }

  get(sessionId: SessionId): SmallSession {
    const session = this.byId.get(sessionId);
    if (!session) throw new NotFoundError(`session ${sessionId} does not exist`);
    return session;
  }

  sessions(filter: SessionFilter = {}): SmallSession[] {
    return [...this.byId.values()].filter(
      (s) => (!filter.marketId || s.marketId === filter.marketId) && (!filter.status || s.status === filter.status),
    );
  }

  async createBigSession(marketId: MarketId): Promise<BigSession> {
    const market = await this.markets.lookup(marketId);
    return new BigSession(this, market.id);
  }

  private requireBook(exchange: string): Map<string, Decimal> {
    const book = this.accounts.get(exchange);
    if (!book) throw new NotFoundError(`no account for exchange ${exchange}`);
    return book;
  }
}

/** A basket of small sessions on one market. Members are read live from the tracker. */
export class BigSession {
  private readonly ids = new Set<SessionId>();

  constructor(private readonly tracker: SessionTracker, readonly marketId: MarketId) {}

  addSession(session: SmallSession): void {
    const stored = this.tracker.get(session.id);
    if (stored.marketId !== this.marketId) {
      throw new InvalidArgumentError(`session ${session.id} trades ${stored.marketId}, not ${this.marketId}`);
    }
    this.ids.add(session.id);
  }

  members(): SmallSession[] {
    return [...this.ids].map((id) => this.tracker.get(id));
  }

  openSessions(): OpenSession[] {
    return this.members().flatMap((s) => (s.status === 'open' ? [s] : []));
  }

  closedSessions(): ClosedSession[] {
    return this.members().flatMap((s) => (s.status === 'closed' ? [s] : []));
  }

  realizedPnl(): Decimal {
    return sum(this.closedSessions().map((s) => s.realizedPnl));
  }

  /** Realized P/L plus open members marked at `markPrice`. */
  aggregatePnL(markPrice: Numeric): Decimal {
    const mark = positive(markPrice, 'mark price');
    const unrealized = this.openSessions().map((s) => mark.minus(s.startedPrice).times(s.amount));
    return roundFixed(this.realizedPnl().plus(sum(unrealized)));
  }

  async closeAll(price: Numeric, opts: { at?: number } = {}): Promise<ClosedSession[]> {
    const out: ClosedSession[] = [];
    for (const s of this.openSessions()) out.push(await this.tracker.close(s.id, price, opts));
    return out;
  }
}
