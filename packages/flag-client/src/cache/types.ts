/**
 * Identifies one cached decision. An absent subject is its own partition,
 * distinct from every concrete subject string.
 */
export interface CacheKey {
  readonly flagKey: string;
  readonly subject?: string | undefined;
}

/**
 * Internal cache entry with a monotonic expiration timestamp.
 */
export interface CacheEntry {
  readonly value: boolean;
  readonly expiresAt: number;
}

/**
 * Options for creating a flag cache.
 */
export interface FlagCacheOptions {
  /** Time-to-live for entries in milliseconds (default: 30000) */
  readonly ttlMs?: number;
  /** Monotonic clock in milliseconds (default: performance.now) */
  readonly now?: () => number;
}

/**
 * TTL cache for flag decisions keyed by (flag key, subject).
 *
 * Every operation comes in two forms:
 * - the Promise-returning form serializes all reads and writes behind a
 *   per-instance lock and is the one to use from async code;
 * - the `*Sync` form takes no lock and assumes a single, non-interleaved
 *   caller.
 *
 * Do not use both forms against the same instance from concurrent contexts.
 */
export interface FlagCache {
  /** Configured time-to-live in milliseconds */
  readonly ttlMs: number;

  /**
   * Gets a live cached decision.
   * A stale entry is removed and reported as a miss.
   * @returns The cached value, or undefined on a miss
   */
  readonly get: (flagKey: string, subject?: string) => Promise<boolean | undefined>;

  /**
   * Inserts or replaces the decision for a key, expiring after `ttlMs`.
   */
  readonly set: (flagKey: string, value: boolean, subject?: string) => Promise<void>;

  /**
   * Removes the entry for the exact key, if present.
   */
  readonly invalidate: (flagKey: string, subject?: string) => Promise<void>;

  /**
   * Removes all entries.
   */
  readonly clear: () => Promise<void>;

  /**
   * Removes every expired entry.
   * @returns Number of entries removed
   */
  readonly cleanupExpired: () => Promise<number>;

  readonly getSync: (flagKey: string, subject?: string) => boolean | undefined;
  readonly setSync: (flagKey: string, value: boolean, subject?: string) => void;
  readonly invalidateSync: (flagKey: string, subject?: string) => void;
  readonly clearSync: () => void;
  readonly cleanupExpiredSync: () => number;

  /**
   * Number of stored entries, expired or not.
   */
  readonly size: () => number;
}
