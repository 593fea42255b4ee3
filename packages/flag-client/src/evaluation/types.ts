import type { CacheKey, FlagCache } from '../cache/types.js';
import type { FlagFetcher, SyncFlagFetcher } from '../flags/types.js';
import type { FlagLogger } from '../logger.js';

/**
 * One flag evaluation.
 */
export interface EvaluationRequest extends CacheKey {
  /** Returned when the evaluation fails (default: false) */
  readonly fallback?: boolean | undefined;
}

/**
 * Options for creating an evaluation pipeline.
 */
export interface EvaluationPipelineOptions {
  /** Decision cache; caching is disabled when omitted */
  readonly cache?: FlagCache | undefined;
  readonly logger: FlagLogger;
}

/**
 * Evaluates flags cache-first. Neither method ever throws: any failure
 * is logged and replaced by the request's fallback.
 */
export interface EvaluationPipeline {
  /**
   * Evaluates a flag using the lock-protected cache operations.
   * @param request - Flag key, subject and fallback
   * @param fetchFlag - Remote lookup to use on a cache miss
   */
  readonly evaluate: (request: EvaluationRequest, fetchFlag: FlagFetcher) => Promise<boolean>;

  /**
   * Evaluates a flag using the non-locking cache operations.
   * @param request - Flag key, subject and fallback
   * @param fetchFlag - Blocking remote lookup to use on a cache miss
   */
  readonly evaluateSync: (request: EvaluationRequest, fetchFlag: SyncFlagFetcher) => boolean;
}
