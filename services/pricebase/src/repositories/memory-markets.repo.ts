import type { Market, MarketId } from '../types/domain.js';
import type { MarketStorage } from './storage.js';

export class MemoryMarketStorage implements MarketStorage {
  private readonly rows = new Map<MarketId, Market>();

  async ensureSchema(): Promise<void> {}

  async findById(id: MarketId): Promise<Market | null> {
    return this.rows.get(id) ?? null;
  }

  async insertIfAbsent(market: Market): Promise<Market> {
    const existing = this.rows.get(market.id);
    if (existing) return existing;
    const row = Object.freeze({ ...market });
    this.rows.set(market.id, row);
    return row;
  }

  async setActive(id: MarketId, active: boolean): Promise<Market | null> {
    const existing = this.rows.get(id);
    if (!existing) return null;
    const row = Object.freeze({ ...existing, active });
    this.rows.set(id, row);
    return row;
  }

  async list(activeOnly: boolean): Promise<Market[]> {
    return [...this.rows.values()]
      .filter((m) => !activeOnly || m.active)
      .sort((a, b) => a.id.localeCompare(b.id));
  }
}
