/**
 * Feature flag client.
 *
 * Wires configuration, the decision cache, both transports and the
 * evaluation pipeline together:
 * - evaluate() → lock-protected cache + fetch client
 * - evaluateSync() → non-locking cache + blocking client
 *
 * @packageDocumentation
 */

import { createFlagCache } from '../cache/ttl-cache.js';
import type { FlagCache } from '../cache/types.js';
import { resolveClientConfig } from '../config.js';
import { createEvaluationPipeline } from '../evaluation/pipeline.js';
import { createFlagFetcher, createSyncFlagFetcher } from '../flags/fetcher.js';
import { createFetchClient } from '../http/fetch-client.js';
import { createSyncHttpClient } from '../http/sync-client.js';
import type { HttpClient, HttpClientOptions, SyncHttpClient } from '../http/types.js';
import { createDefaultLogger } from '../logger.js';
import type { FlagClient, FlagClientDependencies, FlagClientOptions } from '../types.js';

/** Reported in the User-Agent header */
export const CLIENT_VERSION = '0.1.0';

/**
 * Creates a feature flag client.
 *
 * @param options - Client options; unset values come from the environment or defaults
 * @param dependencies - Replacement collaborators (transports, logger, clock)
 * @returns FlagClient instance
 * @throws ConfigurationError when no API key is available or an option is invalid
 *
 * @example
 * ```typescript
 * const flags = createFlagClient(); // API key from FLAG_CLIENT_API_KEY
 *
 * if (await flags.evaluate('new-checkout')) {
 *   showNewCheckout();
 * }
 *
 * // Percentage rollouts, sticky per subject
 * if (await flags.evaluate('new-checkout', { subject: 'user-123' })) {
 *   showNewCheckout();
 * }
 *
 * // Blocking code paths
 * if (flags.evaluateSync('new-checkout', { fallback: true })) {
 *   showNewCheckout();
 * }
 *
 * flags.close();
 * ```
 */
export const createFlagClient = (
  options: FlagClientOptions = {},
  dependencies: FlagClientDependencies = {}
): FlagClient => {
  const config = resolveClientConfig(options, dependencies.env);
  const logger = dependencies.logger ?? createDefaultLogger(dependencies.env);
  const createHttpClient = dependencies.createHttpClient ?? createFetchClient;
  const createBlockingClient = dependencies.createSyncHttpClient ?? createSyncHttpClient;

  const cache: FlagCache | undefined = config.cacheEnabled
    ? createFlagCache({ ttlMs: config.cacheTtlMs, now: dependencies.now })
    : undefined;

  const pipeline = createEvaluationPipeline({ cache, logger });

  const transportOptions: HttpClientOptions = {
    timeoutMs: config.timeoutMs,
    baseHeaders: {
      Authorization: `Bearer ${config.apiKey}`,
      'User-Agent': `flag-client-node/${CLIENT_VERSION}`,
    },
  };

  // Transports are created on first use and dropped by close()
  let httpClient: HttpClient | undefined;
  let syncHttpClient: SyncHttpClient | undefined;

  const getHttpClient = (): HttpClient => {
    if (httpClient === undefined) {
      httpClient = createHttpClient(transportOptions);
    }
    return httpClient;
  };

  const getSyncHttpClient = (): SyncHttpClient => {
    if (syncHttpClient === undefined) {
      syncHttpClient = createBlockingClient(transportOptions);
    }
    return syncHttpClient;
  };

  const fetchFlag = createFlagFetcher(getHttpClient, config.baseUrl);
  const fetchFlagSync = createSyncFlagFetcher(getSyncHttpClient, config.baseUrl);

  let cleanupTimer: NodeJS.Timeout | undefined;
  if (cache !== undefined && config.cleanupIntervalMs !== undefined) {
    cleanupTimer = setInterval(() => {
      cache.cleanupExpired().then(
        (removed) => {
          if (removed > 0) {
            logger.debug(`Removed ${String(removed)} expired flag cache entries`);
          }
        },
        (error: unknown) => {
          logger.error('Flag cache cleanup failed', error);
        }
      );
    }, config.cleanupIntervalMs);
    cleanupTimer.unref();
  }

  const evaluate: FlagClient['evaluate'] = (flagKey, evaluateOptions = {}) =>
    pipeline.evaluate(
      { flagKey, subject: evaluateOptions.subject, fallback: evaluateOptions.fallback },
      fetchFlag
    );

  const evaluateSync: FlagClient['evaluateSync'] = (flagKey, evaluateOptions = {}) =>
    pipeline.evaluateSync(
      { flagKey, subject: evaluateOptions.subject, fallback: evaluateOptions.fallback },
      fetchFlagSync
    );

  const invalidateCache: FlagClient['invalidateCache'] = async (flagKey, subject) => {
    if (cache !== undefined) {
      await cache.invalidate(flagKey, subject);
    }
  };

  const clearCache: FlagClient['clearCache'] = async () => {
    if (cache !== undefined) {
      await cache.clear();
    }
  };

  const cleanupCache: FlagClient['cleanupCache'] = () =>
    cache === undefined ? Promise.resolve(0) : cache.cleanupExpired();

  const close: FlagClient['close'] = () => {
    if (cleanupTimer !== undefined) {
      clearInterval(cleanupTimer);
      cleanupTimer = undefined;
    }
    httpClient?.close();
    httpClient = undefined;
    syncHttpClient = undefined;
  };

  return {
    cacheTtlMs: cache?.ttlMs ?? 0,
    evaluate,
    evaluateSync,
    invalidateCache,
    clearCache,
    cleanupCache,
    close,
  };
};
