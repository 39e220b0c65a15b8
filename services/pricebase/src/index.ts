export * from './errors.js';
export * from './types/domain.js';
export { Decimal, type Numeric, formatFixed, toFixedPoint } from './utils/decimal.js';
export { bucketStart, intervalSec, isValidInterval, nowSec, toEpochSec } from './utils/time.js';
export { canonicalMarket, marketIdOf, parseMarketId } from './utils/market.js';
export { barTableName, tickTableName, parsePartitionName } from './utils/partition.js';
export { FeedItem, IngestJobBody, TickItem, BarItem, validateBar, validateTick } from './utils/validators.js';
export { KeyedLock } from './utils/keyed-lock.js';
export { logger } from './utils/logger.js';
export { registry as engineRegistry } from './metrics/metrics.js';

export type { PriceStorage, MarketStorage, ScanPage, TickAppend } from './repositories/storage.js';
export { MemoryPriceStorage } from './repositories/memory-price.repo.js';
export { MemoryMarketStorage } from './repositories/memory-markets.repo.js';
export { PgPriceStorage } from './repositories/pg-price.repo.js';
export { PgMarketStorage } from './repositories/pg-markets.repo.js';

export { MarketRegistry, type MarketLookup } from './services/market-registry.service.js';
export * from './services/price-series.service.js';
export * from './services/aggregation.service.js';
export * from './services/indicator.service.js';
export * from './services/session-tracker.service.js';
export * from './services/backtest.service.js';
