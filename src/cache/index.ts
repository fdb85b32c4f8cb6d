export { CandleCache, DEFAULT_TTL_MS, cacheKeyToString } from './candle-cache'
export type { CacheEntry, CacheKey, CandleCacheOptions, CandleCacheStats } from './candle-cache'
