/**
 * Cache-aside flag evaluation.
 *
 * One algorithm, two call paths: `evaluate` awaits the lock-protected cache
 * and an async fetcher, `evaluateSync` uses the non-locking cache and a
 * blocking fetcher. Both run the same steps:
 *
 *   cache read → (miss) remote lookup → decide → cache write → return
 *
 * and both turn every failure, thrown ones included, into the caller's
 * fallback in `settle`.
 *
 * @packageDocumentation
 */

import { ok, Result, ResultAsync } from 'neverthrow';
import type { FlagCache } from '../cache/types.js';
import { createUnexpectedError, type FlagError } from '../errors.js';
import { decideFromResponse } from '../flags/decision.js';
import type { FlagFetcher, SyncFlagFetcher } from '../flags/types.js';
import type { FlagLogger } from '../logger.js';
import type { EvaluationPipeline, EvaluationPipelineOptions, EvaluationRequest } from './types.js';

const describeKey = ({ flagKey, subject }: EvaluationRequest): string =>
  subject === undefined ? `'${flagKey}'` : `'${flagKey}' (subject=${subject})`;

const warnFallback = (logger: FlagLogger, request: EvaluationRequest, error: FlagError): void => {
  logger.warn(`Error evaluating flag ${describeKey(request)}: ${error.message}`, {
    code: error.code,
    status: error.status,
    retryAfterSeconds: error.retryAfterSeconds,
    fallback: request.fallback ?? false,
  });
};

/**
 * Creates an evaluation pipeline.
 *
 * @param options - Cache (omit to disable caching) and logger
 * @returns An EvaluationPipeline instance
 *
 * @example
 * ```typescript
 * const pipeline = createEvaluationPipeline({ cache: createFlagCache(), logger });
 * const enabled = await pipeline.evaluate({ flagKey: 'new-checkout' }, fetchFlag);
 * ```
 */
export const createEvaluationPipeline = (options: EvaluationPipelineOptions): EvaluationPipeline => {
  const { cache, logger } = options;

  const reportHit = (request: EvaluationRequest): void => {
    logger.debug(`Cache hit for flag ${describeKey(request)}`);
  };

  /**
   * Result-or-fallback: the only place a failure is handled.
   */
  const settle = (request: EvaluationRequest, decision: Result<boolean, FlagError>): boolean =>
    decision.match(
      (value) => value,
      (error) => {
        warnFallback(logger, request, error);
        return request.fallback ?? false;
      }
    );

  /**
   * Cache read, lookup, decision and cache write. May throw or reject when a
   * collaborator does; the callers below turn that into UNEXPECTED_ERROR.
   */
  const resolve = async (
    request: EvaluationRequest,
    fetchFlag: FlagFetcher
  ): Promise<Result<boolean, FlagError>> => {
    const { flagKey, subject } = request;

    if (cache !== undefined) {
      const cached = await cache.get(flagKey, subject);
      if (cached !== undefined) {
        reportHit(request);
        return ok(cached);
      }
    }

    const decision = (await fetchFlag(flagKey, subject)).andThen(decideFromResponse);
    if (decision.isOk() && cache !== undefined) {
      await cache.set(flagKey, decision.value, subject);
    }
    return decision;
  };

  const resolveSync = (
    request: EvaluationRequest,
    fetchFlag: SyncFlagFetcher
  ): Result<boolean, FlagError> => {
    const { flagKey, subject } = request;

    if (cache !== undefined) {
      const cached = cache.getSync(flagKey, subject);
      if (cached !== undefined) {
        reportHit(request);
        return ok(cached);
      }
    }

    const decision = fetchFlag(flagKey, subject).andThen(decideFromResponse);
    if (decision.isOk() && cache !== undefined) {
      cache.setSync(flagKey, decision.value, subject);
    }
    return decision;
  };

  const guardedResolveSync = Result.fromThrowable(resolveSync, createUnexpectedError);

  const evaluate = async (request: EvaluationRequest, fetchFlag: FlagFetcher): Promise<boolean> => {
    const outcome = await ResultAsync.fromPromise(resolve(request, fetchFlag), createUnexpectedError);
    return settle(request, outcome.andThen((decision) => decision));
  };

  const evaluateSync = (request: EvaluationRequest, fetchFlag: SyncFlagFetcher): boolean =>
    settle(request, guardedResolveSync(request, fetchFlag).andThen((decision) => decision));

  return { evaluate, evaluateSync };
};
