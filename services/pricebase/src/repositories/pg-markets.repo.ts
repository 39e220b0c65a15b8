import type { Pool } from 'pg';
import { SQL } from '../db/sql.js';
import { mapPgError } from '../db/pg-errors.js';
import type { Market, MarketId } from '../types/domain.js';
import type { MarketStorage } from './storage.js';

type MarketRow = { id: string; exchange: string; base: string; quote: string; active: boolean };

const toMarket = (r: MarketRow): Market =>
  Object.freeze({ id: r.id, exchange: r.exchange, base: r.base, quote: r.quote, active: r.active });

export class PgMarketStorage implements MarketStorage {
  constructor(private readonly pool: Pool) {}

  async ensureSchema(): Promise<void> {
    try {
      await this.pool.query(SQL.markets.createTable);
    } catch (err) {
      throw mapPgError(err, 'create markets table');
    }
  }

  async findById(id: MarketId): Promise<Market | null> {
    try {
      const { rows } = await this.pool.query<MarketRow>(SQL.markets.findById, [id]);
      return rows[0] ? toMarket(rows[0]) : null;
    } catch (err) {
      throw mapPgError(err, 'read markets');
    }
  }

  async insertIfAbsent(market: Market): Promise<Market> {
    try {
      await this.pool.query(SQL.markets.insertIfAbsent, [
        market.id, market.exchange, market.base, market.quote, market.active,
      ]);
      const { rows } = await this.pool.query<MarketRow>(SQL.markets.findById, [market.id]);
      return rows[0] ? toMarket(rows[0]) : market;
    } catch (err) {
      throw mapPgError(err, 'upsert market');
    }
  }

  async setActive(id: MarketId, active: boolean): Promise<Market | null> {
    try {
      const { rows } = await this.pool.query<MarketRow>(SQL.markets.setActive, [id, active]);
      return rows[0] ? toMarket(rows[0]) : null;
    } catch (err) {
      throw mapPgError(err, 'update market');
    }
  }

  async list(activeOnly: boolean): Promise<Market[]> {
    try {
      const { rows } = await this.pool.query<MarketRow>(SQL.markets.list(activeOnly));
      return rows.map(toMarket);
    } catch (err) {
      throw mapPgError(err, 'list markets');
    }
  }
}
