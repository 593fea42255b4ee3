import type { CacheEntry, FlagCache, FlagCacheOptions } from './types.js';
import { createLock } from './lock.js';

/** Default TTL: 30 seconds */
export const DEFAULT_CACHE_TTL_MS = 30_000;

/**
 * Encodes a (flag key, subject) pair as a map key.
 * JSON keeps an absent subject (null) apart from the string "null".
 */
const toStoreKey = (flagKey: string, subject: string | undefined): string =>
  JSON.stringify([flagKey, subject ?? null]);

/**
 * Creates an in-memory TTL cache for flag decisions.
 *
 * Expiry is lazy: a stale entry is dropped when it is read, or when
 * `cleanupExpired` sweeps the store.
 *
 * @param options - TTL and clock configuration
 * @returns A FlagCache instance
 *
 * @example
 * ```typescript
 * const cache = createFlagCache({ ttlMs: 10_000 });
 * await cache.set('new-checkout', true, 'user-123');
 * await cache.get('new-checkout', 'user-123'); // true
 * await cache.get('new-checkout'); // undefined
 * ```
 */
export const createFlagCache = (options: FlagCacheOptions = {}): FlagCache => {
  const { ttlMs = DEFAULT_CACHE_TTL_MS, now = (): number => performance.now() } = options;

  if (!Number.isFinite(ttlMs) || ttlMs < 0) {
    throw new RangeError(`Cache TTL must be a non-negative number, got ${String(ttlMs)}`);
  }

  const store = new Map<string, CacheEntry>();
  const lock = createLock();

  const getSync = (flagKey: string, subject?: string): boolean | undefined => {
    const key = toStoreKey(flagKey, subject);
    const entry = store.get(key);
    if (entry === undefined) {
      return undefined;
    }

    if (now() > entry.expiresAt) {
      store.delete(key);
      return undefined;
    }

    return entry.value;
  };

  const setSync = (flagKey: string, value: boolean, subject?: string): void => {
    store.set(toStoreKey(flagKey, subject), { value, expiresAt: now() + ttlMs });
  };

  const invalidateSync = (flagKey: string, subject?: string): void => {
    store.delete(toStoreKey(flagKey, subject));
  };

  const clearSync = (): void => {
    store.clear();
  };

  const cleanupExpiredSync = (): number => {
    const current = now();
    let removed = 0;
    for (const [key, entry] of store.entries()) {
      if (current > entry.expiresAt) {
        store.delete(key);
        removed += 1;
      }
    }
    return removed;
  };

  return {
    ttlMs,
    get: (flagKey, subject) => lock.runExclusive(() => getSync(flagKey, subject)),
    set: (flagKey, value, subject) => lock.runExclusive(() => setSync(flagKey, value, subject)),
    invalidate: (flagKey, subject) => lock.runExclusive(() => invalidateSync(flagKey, subject)),
    clear: () => lock.runExclusive(clearSync),
    cleanupExpired: () => lock.runExclusive(cleanupExpiredSync),
    getSync,
    setSync,
    invalidateSync,
    clearSync,
    cleanupExpiredSync,
    size: () => store.size,
  };
};
