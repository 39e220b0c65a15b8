import { NotFoundError } from '../errors.js';
import type { MarketStorage } from '../repositories/storage.js';
import type { Market, MarketId } from '../types/domain.js';
import { canonicalMarket, marketIdOf } from '../utils/market.js';
import { logger } from '../utils/logger.js';

export interface MarketLookup {
  lookup(id: MarketId): Promise<Market>;
}

const log = logger.child({ component: 'market-registry' });

// Canonical (exchange, base, quote) records. Markets are never deleted; retired
// markets keep their history and only flip `active`.
export class MarketRegistry implements MarketLookup {
  private readonly cache = new Map<MarketId, Market>();

  constructor(private readonly storage: MarketStorage) {}

  async init(): Promise<void> {
    await this.storage.ensureSchema();
  }

  async resolve(base: string, quote: string, exchange: string): Promise<Market> {
    const key = canonicalMarket(base, quote, exchange);
    const id = marketIdOf(key);
    const cached = this.cache.get(id);
    if (cached) return cached;

    const stored = await this.storage.insertIfAbsent(Object.freeze({ id, ...key, active: true }));
    this.cache.set(id, stored);
    log.debug({ marketId: id }, 'market resolved');
    return stored;
  }

  async lookup(id: MarketId): Promise<Market> {
    const cached = this.cache.get(id);
    if (cached) return cached;
    const stored = await this.storage.findById(id);
    if (!stored) throw new NotFoundError(`market ${id} is not registered`);
    this.cache.set(id, stored);
    return stored;
  }

  async retire(id: MarketId): Promise<Market> {
    const updated = await this.storage.setActive(id, false);
    if (!updated) throw new NotFoundError(`market ${id} is not registered`);
    this.cache.set(id, updated);
    log.info({ marketId: id }, 'market retired');
    return updated;
  }

  async list(opts: { activeOnly?: boolean } = {}): Promise<Market[]> {
    return this.storage.list(opts.activeOnly ?? false);
  }
}
