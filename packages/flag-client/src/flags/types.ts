import type { Result } from 'neverthrow';
import type { FlagError } from '../errors.js';

/**
 * Raw outcome of one flag lookup against the remote service.
 */
export interface FlagLookupResponse {
  readonly status: number;
  /** Parsed JSON body; undefined when absent or not JSON */
  readonly body: unknown;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * Looks a flag up remotely. Transport failures come back as NETWORK_ERROR.
 */
export type FlagFetcher = (
  flagKey: string,
  subject?: string
) => Promise<Result<FlagLookupResponse, FlagError>>;

/**
 * Blocking counterpart of FlagFetcher.
 */
export type SyncFlagFetcher = (
  flagKey: string,
  subject?: string
) => Result<FlagLookupResponse, FlagError>;
