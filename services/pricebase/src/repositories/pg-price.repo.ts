import type { Pool, PoolClient } from 'pg';
import { SQL } from '../db/sql.js';
import { isCheckViolation, mapPgError } from '../db/pg-errors.js';
import { InvalidBarError, InvalidTickError } from '../errors.js';
import type { OhlcvBar, Partition, PriceTick } from '../types/domain.js';
import { Decimal, formatFixed } from '../utils/decimal.js';
import { logger } from '../utils/logger.js';
import { type ParsedPartitionName, parsePartitionName } from '../utils/partition.js';
import { intervalSec } from '../utils/time.js';
import type { PriceStorage, ScanPage, TickAppend } from './storage.js';

type BarRow = { ts: string | number; open: string; high: string; low: string; close: string; volume: string };
type TickRow = { ts: string | number; price: string; volume: string };

function requireBars(p: Partition): number {
  if (p.kind !== 'bars') throw new Error(`partition ${p.table} does not hold bars`);
  return p.intervalMinutes;
}

function toBar(p: Partition, r: BarRow): OhlcvBar {
  return Object.freeze({
    marketId: p.market.id,
    intervalMinutes: requireBars(p),
    periodStart: Number(r.ts),
    open: new Decimal(r.open),
    high: new Decimal(r.high),
    low: new Decimal(r.low),
    close: new Decimal(r.close),
    volume: new Decimal(r.volume),
  });
}

const log = logger.child({ component: 'pg-price-storage' });

// PostgreSQL adapter: one table per partition, NUMERIC(24, 8) columns.
export class PgPriceStorage implements PriceStorage {
  private readonly ensured = new Set<string>();

  constructor(private readonly pool: Pool) {}

  async ensurePartition(p: Partition): Promise<void> {
    if (this.ensured.has(p.table)) return;
    try {
      if (p.kind === 'bars') {
        await this.pool.query(SQL.partitions.createBars(p.table, intervalSec(p.intervalMinutes)));
      } else {
        await this.pool.query(SQL.partitions.createTicks(p.table));
        await this.pool.query(SQL.partitions.indexTicks(p.table));
      }
    } catch (err) {
      throw mapPgError(err, `create partition ${p.table}`);
    }
    this.ensured.add(p.table);
  }

  async listPartitions(): Promise<ParsedPartitionName[]> {
    try {
      const { rows } = await this.pool.query<{ table_name: string }>(SQL.partitions.list);
      const out: ParsedPartitionName[] = [];
      for (const r of rows) {
        const parsed = parsePartitionName(r.table_name);
        if (parsed) {
          out.push(parsed);
          this.ensured.add(r.table_name);
        }
      }
      return out;
    } catch (err) {
      throw mapPgError(err, 'list partitions');
    }
  }

  async findBar(p: Partition, periodStart: number): Promise<OhlcvBar | null> {
    try {
      const { rows } = await this.pool.query<BarRow>(SQL.bars.findOne(p.table), [periodStart]);
      return rows[0] ? toBar(p, rows[0]) : null;
    } catch (err) {
      throw mapPgError(err, `read ${p.table}`);
    }
  }

  async insertBar(p: Partition, bar: OhlcvBar): Promise<'inserted' | 'exists'> {
    try {
      const r = await this.pool.query(SQL.bars.insertIfAbsent(p.table), [
        bar.periodStart,
        formatFixed(bar.open),
        formatFixed(bar.high),
        formatFixed(bar.low),
        formatFixed(bar.close),
        formatFixed(bar.volume),
      ]);
      return r.rowCount === 1 ? 'inserted' : 'exists';
    } catch (err) {
      if (isCheckViolation(err)) {
        throw new InvalidBarError(`${p.table} rejected bar at ${bar.periodStart}`, err);
      }
      throw mapPgError(err, `insert into ${p.table}`);
    }
  }

  async scanBars(p: Partition, page: ScanPage): Promise<OhlcvBar[]> {
    const lower = page.afterTs === undefined ? page.fromTs : Math.max(page.fromTs, page.afterTs + 1);
    try {
      const { rows } = await this.pool.query<BarRow>(SQL.bars.scanRange(p.table), [lower, page.toTs, page.limit]);
      return rows.map((r) => toBar(p, r));
    } catch (err) {
      throw mapPgError(err, `scan ${p.table}`);
    }
  }

  async latestBarAtOrBefore(p: Partition, ts: number): Promise<OhlcvBar | null> {
    try {
      const { rows } = await this.pool.query<BarRow>(SQL.bars.latestAtOrBefore(p.table), [ts]);
      return rows[0] ? toBar(p, rows[0]) : null;
    } catch (err) {
      throw mapPgError(err, `read ${p.table}`);
    }
  }

  async appendTicks(batches: readonly TickAppend[]): Promise<number> {
    const nonEmpty = batches.filter((b) => b.ticks.length > 0);
    if (!nonEmpty.length) return 0;

    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (err) {
      throw mapPgError(err, 'connect');
    }
    try {
      await client.query('BEGIN');
      let n = 0;
      for (const { partition, ticks } of nonEmpty) {
        await client.query(SQL.ticks.insertBatch(partition.table), [
          ticks.map((t) => t.ts),
          ticks.map((t) => formatFixed(t.price)),
          ticks.map((t) => formatFixed(t.volume)),
        ]);
        n += ticks.length;
      }
      await client.query('COMMIT');
      return n;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => log.warn({ err: rollbackErr }, 'rollback failed'));
      if (isCheckViolation(err)) throw new InvalidTickError('tick partition rejected batch', err);
      throw mapPgError(err, 'append ticks');
    } finally {
      client.release();
    }
  }

  async scanTicks(p: Partition, fromTs: number, toTs: number): Promise<PriceTick[]> {
    try {
      const { rows } = await this.pool.query<TickRow>(SQL.ticks.scanRange(p.table), [fromTs, toTs]);
      return rows.map((r) =>
        Object.freeze({
          marketId: p.market.id,
          ts: Number(r.ts),
          price: new Decimal(r.price),
          volume: new Decimal(r.volume),
        }),
      );
    } catch (err) {
      throw mapPgError(err, `scan ${p.table}`);
    }
  }

  async deleteTicksBefore(p: Partition, ts: number): Promise<number> {
    try {
      const r = await this.pool.query(SQL.ticks.deleteBefore(p.table), [ts]);
      return r.rowCount ?? 0;
    } catch (err) {
      throw mapPgError(err, `prune ${p.table}`);
    }
  }
}
