import type { OhlcvBar, Partition, PriceTick } from '../types/domain.js';
import { type ParsedPartitionName, parsePartitionName } from '../utils/partition.js';
import type { PriceStorage, ScanPage, TickAppend } from './storage.js';

type Table = {
  bars: Map<number, OhlcvBar>;
  ticks: PriceTick[];
};

// In-process storage for backtests and tests. Every write is a single Map/array
// operation on frozen values, so readers never see a half-written bar.
export class MemoryPriceStorage implements PriceStorage {
  private readonly tables = new Map<string, Table>();

  async ensurePartition(p: Partition): Promise<void> {
    this.table(p);
  }

  async listPartitions(): Promise<ParsedPartitionName[]> {
    const out: ParsedPartitionName[] = [];
    for (const name of this.tables.keys()) {
      const parsed = parsePartitionName(name);
      if (parsed) out.push(parsed);
    }
    return out;
  }

  async findBar(p: Partition, periodStart: number): Promise<OhlcvBar | null> {
    return this.tables.get(p.table)?.bars.get(periodStart) ?? null;
  }

  async insertBar(p: Partition, bar: OhlcvBar): Promise<'inserted' | 'exists'> {
    const t = this.table(p);
    if (t.bars.has(bar.periodStart)) return 'exists';
    t.bars.set(bar.periodStart, Object.freeze({ ...bar }));
    return 'inserted';
  }

  async scanBars(p: Partition, page: ScanPage): Promise<OhlcvBar[]> {
    const t = this.tables.get(p.table);
    if (!t) return [];
    const lower = page.afterTs === undefined ? page.fromTs : Math.max(page.fromTs, page.afterTs + 1);
    return [...t.bars.keys()]
      .filter((ts) => ts >= lower && ts <= page.toTs)
      .sort((a, b) => a - b)
      .slice(0, page.limit)
      .map((ts) => t.bars.get(ts))
      .filter((b): b is OhlcvBar => b !== undefined);
  }

  async latestBarAtOrBefore(p: Partition, ts: number): Promise<OhlcvBar | null> {
    const t = this.tables.get(p.table);
    if (!t) return null;
    let best: OhlcvBar | null = null;
    for (const bar of t.bars.values()) {
      if (bar.periodStart <= ts && (!best || bar.periodStart > best.periodStart)) best = bar;
    }
    return best;
  }

  async appendTicks(batches: readonly TickAppend[]): Promise<number> {
    let n = 0;
    for (const { partition, ticks } of batches) {
      const t = this.table(partition);
      t.ticks.push(...ticks);
      n += ticks.length;
    }
    return n;
  }

  async scanTicks(p: Partition, fromTs: number, toTs: number): Promise<PriceTick[]> {
    const t = this.tables.get(p.table);
    if (!t) return [];
    // stable sort keeps arrival order for equal timestamps
    return t.ticks.filter((x) => x.ts >= fromTs && x.ts <= toTs).sort((a, b) => a.ts - b.ts);
  }

  async deleteTicksBefore(p: Partition, ts: number): Promise<number> {
    const t = this.tables.get(p.table);
    if (!t) return 0;
    const before = t.ticks.length;
    t.ticks = t.ticks.filter((x) => x.ts >= ts);
    return before - t.ticks.length;
  }

  private table(p: Partition): Table {
    let t = this.tables.get(p.table);
    if (!t) {
      t = { bars: new Map(), ticks: [] };
      this.tables.set(p.table, t);
    }
    return t;
  }
}
