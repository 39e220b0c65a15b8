// Partition tables are created per market/interval, so their names are
// interpolated as quoted identifiers. Names come from validated market keys.
export function ident(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export const SQL = {
  markets: {
    createTable: `
      CREATE TABLE IF NOT EXISTS markets (
        id          TEXT PRIMARY KEY,
        exchange    TEXT NOT NULL,
        base        TEXT NOT NULL,
        quote       TEXT NOT NULL,
        active      BOOLEAN NOT NULL DEFAULT TRUE,
        created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        UNIQUE (exchange, base, quote)
      )
    `,
    findById: `
      SELECT id, exchange, base, quote, active
      FROM markets
      WHERE id = $1
    `,
    insertIfAbsent: `
      INSERT INTO markets (id, exchange, base, quote, active)
      VALUES ($1, $2, $3, $4, $5)
      ON CONFLICT DO NOTHING
    `,
    setActive: `
      UPDATE markets SET active = $2
      WHERE id = $1
      RETURNING id, exchange, base, quote, active
    `,
    list: (activeOnly: boolean) => `
      SELECT id, exchange, base, quote, active
      FROM markets
      ${activeOnly ? 'WHERE active = TRUE' : ''}
      ORDER BY id ASC
    `,
  },
  partitions: {
    list: `
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
        AND table_type = 'BASE TABLE'
        AND table_name LIKE 'PriceData\\_%'
    `,
    createBars: (table: string, stepSec: number) => `
      CREATE TABLE IF NOT EXISTS ${ident(table)} (
        "timestamp" TIMESTAMPTZ PRIMARY KEY,
        "open"      NUMERIC(24, 8) NOT NULL,
        "high"      NUMERIC(24, 8) NOT NULL,
        "low"       NUMERIC(24, 8) NOT NULL,
        "close"     NUMERIC(24, 8) NOT NULL,
        "volume"    NUMERIC(24, 8) NOT NULL,
        CHECK ("volume" > 0),
        CHECK ("low" > 0 AND "low" <= "high"),
        CHECK ("open" BETWEEN "low" AND "high"),
        CHECK ("close" BETWEEN "low" AND "high"),
        CHECK ("timestamp" <= NOW()),
        CHECK (CAST(EXTRACT(EPOCH FROM "timestamp") AS BIGINT) % ${stepSec} = 0)
      )
    `,
    createTicks: (table: string) => `
      CREATE TABLE IF NOT EXISTS ${ident(table)} (
        "id"        BIGSERIAL PRIMARY KEY,
        "timestamp" TIMESTAMPTZ NOT NULL,
        "price"     NUMERIC(24, 8) NOT NULL,
        "volume"    NUMERIC(24, 8) NOT NULL,
        CHECK ("price" > 0),
        CHECK ("volume" > 0),
        CHECK ("timestamp" <= NOW())
      )
    `,
    indexTicks: (table: string) => `
      CREATE INDEX IF NOT EXISTS ${ident(`${table}_ts_idx`)} ON ${ident(table)} ("timestamp")
    `,
  },
  bars: {
    findOne: (table: string) => `
      SELECT EXTRACT(EPOCH FROM "timestamp")::bigint AS ts, "open", "high", "low", "close", "volume"
      FROM ${ident(table)}
      WHERE "timestamp" = to_timestamp($1)
    `,
    // single statement: concurrent readers see the row fully or not at all
    insertIfAbsent: (table: string) => `
      INSERT INTO ${ident(table)} ("timestamp", "open", "high", "low", "close", "volume")
      VALUES (to_timestamp($1), $2, $3, $4, $5, $6)
      ON CONFLICT ("timestamp") DO NOTHING
    `,
    scanRange: (table: string) => `
      SELECT EXTRACT(EPOCH FROM "timestamp")::bigint AS ts, "open", "high", "low", "close", "volume"
      FROM ${ident(table)}
      WHERE "timestamp" >= to_timestamp($1)
        AND "timestamp" <= to_timestamp($2)
      ORDER BY "timestamp" ASC
      LIMIT $3
    `,
    latestAtOrBefore: (table: string) => `
      SELECT EXTRACT(EPOCH FROM "timestamp")::bigint AS ts, "open", "high", "low", "close", "volume"
      FROM ${ident(table)}
      WHERE "timestamp" <= to_timestamp($1)
      ORDER BY "timestamp" DESC
      LIMIT 1
    `,
  },
  ticks: {
    insertBatch: (table: string) => `
      WITH rows AS (
        SELECT
          to_timestamp(unnest($1::double precision[])) AS ts,
          unnest($2::numeric[])                         AS price,
          unnest($3::numeric[])                         AS volume
      )
      INSERT INTO ${ident(table)} ("timestamp", "price", "volume")
      SELECT ts, price, volume FROM rows
    `,
    scanRange: (table: string) => `
      SELECT EXTRACT(EPOCH FROM "timestamp")::double precision AS ts, "price", "volume"
      FROM ${ident(table)}
      WHERE "timestamp" >= to_timestamp($1)
        AND "timestamp" <= to_timestamp($2)
      ORDER BY "timestamp" ASC, "id" ASC
    `,
    deleteBefore: (table: string) => `
      DELETE FROM ${ident(table)}
      WHERE "timestamp" < to_timestamp($1)
    `,
  },
} as const;
