import type { HttpClient, HttpClientOptions, SyncHttpClient } from './http/types.js';
import type { FlagLogger } from './logger.js';

/**
 * Options for creating a flag client.
 */
export interface FlagClientOptions {
  /** Environment API key (default: FLAG_CLIENT_API_KEY env var) */
  readonly apiKey?: string | undefined;
  /** Service base URL (default: FLAG_CLIENT_BASE_URL env var or https://api.flaglite.dev/v1) */
  readonly baseUrl?: string | undefined;
  /** How long decisions stay cached, in milliseconds (default: 30000; 0 disables caching) */
  readonly cacheTtlMs?: number | undefined;
  /** Disables caching regardless of cacheTtlMs (default: false) */
  readonly disableCache?: boolean | undefined;
  /** HTTP request timeout in milliseconds (default: 5000) */
  readonly timeoutMs?: number | undefined;
  /**
   * Period of a background sweep removing expired cache entries.
   * Expired entries are dropped on read either way; this only bounds memory
   * when many distinct keys are evaluated once.
   */
  readonly cleanupIntervalMs?: number | undefined;
}

/**
 * Client options after defaults and environment have been applied.
 */
export interface ResolvedClientConfig {
  readonly apiKey: string;
  /** Always ends in "/" */
  readonly baseUrl: string;
  readonly cacheTtlMs: number;
  readonly disableCache: boolean;
  readonly cacheEnabled: boolean;
  readonly timeoutMs: number;
  readonly cleanupIntervalMs?: number | undefined;
}

/**
 * Collaborators of a flag client. All optional; tests replace them.
 */
export interface FlagClientDependencies {
  /** Creates the async transport on first use (default: createFetchClient) */
  readonly createHttpClient?: (options: HttpClientOptions) => HttpClient;
  /** Creates the blocking transport on first use (default: createSyncHttpClient) */
  readonly createSyncHttpClient?: (options: HttpClientOptions) => SyncHttpClient;
  /** Logger (default: tslog logger named "flag-client") */
  readonly logger?: FlagLogger;
  /** Monotonic clock in milliseconds for cache expiry (default: performance.now) */
  readonly now?: () => number;
  /** Environment for API key and base URL lookup (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Per-call evaluation options.
 */
export interface EvaluateOptions {
  /**
   * Subject (e.g. user ID) for consistent percentage rollouts.
   * The same subject always gets the same result for a given flag.
   */
  readonly subject?: string | undefined;
  /** Returned when evaluation fails (default: false, i.e. fail closed) */
  readonly fallback?: boolean | undefined;
}

/**
 * Feature flag client with a local decision cache.
 *
 * `evaluate` and `evaluateSync` never throw. Use one of them per client
 * from concurrent contexts: they read the same cache through its locking
 * and non-locking operations respectively.
 */
export interface FlagClient {
  /** Cache TTL in milliseconds, or 0 when caching is disabled */
  readonly cacheTtlMs: number;

  /**
   * Checks whether a flag is enabled.
   * @param flagKey - The flag key (e.g. "new-checkout")
   * @param options - Subject and fallback
   * @returns The decision, or the fallback on any error
   */
  readonly evaluate: (flagKey: string, options?: EvaluateOptions) => Promise<boolean>;

  /**
   * Blocking version of evaluate().
   */
  readonly evaluateSync: (flagKey: string, options?: EvaluateOptions) => boolean;

  /**
   * Drops the cached decision for one (flag key, subject) pair.
   */
  readonly invalidateCache: (flagKey: string, subject?: string) => Promise<void>;

  /**
   * Drops every cached decision.
   */
  readonly clearCache: () => Promise<void>;

  /**
   * Removes expired cache entries.
   * @returns Number of entries removed
   */
  readonly cleanupCache: () => Promise<number>;

  /**
   * Releases both transports and stops the background sweep.
   * Transports are created again on next use.
   */
  readonly close: () => void;
}
