export { createFlagCache, DEFAULT_CACHE_TTL_MS } from './ttl-cache.js';
export { createLock } from './lock.js';
export type { Lock } from './lock.js';
export type { CacheKey, CacheEntry, FlagCache, FlagCacheOptions } from './types.js';
