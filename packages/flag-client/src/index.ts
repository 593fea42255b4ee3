/**
 * Feature flag client with a local TTL decision cache.
 *
 * @packageDocumentation
 */

// Public types
export type * from './types.js';

// ============================================================================
// CORE: Client
// ============================================================================

export { createFlagClient, withFlagClient, withFlagClientSync, CLIENT_VERSION } from './client/index.js';
export { resolveClientConfig, DEFAULT_BASE_URL } from './config.js';

// ============================================================================
// CORE: Errors
// ============================================================================

export { ConfigurationError } from './errors.js';
export type { FlagError, FlagErrorCode } from './errors.js';

// ============================================================================
// CORE: Logging
// ============================================================================

export { createDefaultLogger } from './logger.js';
export type { FlagLogger } from './logger.js';

// ============================================================================
// ADVANCED: Cache and Pipeline
// ============================================================================

export { createFlagCache, DEFAULT_CACHE_TTL_MS } from './cache/index.js';
export type { CacheKey, FlagCache, FlagCacheOptions } from './cache/index.js';

export { createEvaluationPipeline } from './evaluation/index.js';
export type {
  EvaluationPipeline,
  EvaluationPipelineOptions,
  EvaluationRequest,
} from './evaluation/index.js';

// ============================================================================
// ADVANCED: Custom Transports
// ============================================================================

export { buildFlagRequest, createFlagFetcher, createSyncFlagFetcher, decideFromResponse } from './flags/index.js';
export type { FlagLookupResponse, FlagFetcher, SyncFlagFetcher } from './flags/index.js';

export { createFetchClient, createSyncHttpClient } from './http/index.js';
export type {
  HttpClient,
  SyncHttpClient,
  HttpClientOptions,
  SyncHttpClientOptions,
  ProcessRunner,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './http/index.js';
