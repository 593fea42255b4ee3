export { buildFlagRequest, createFlagFetcher, createSyncFlagFetcher } from './fetcher.js';
export { decideFromResponse, parseRetryAfter } from './decision.js';
export type { FlagLookupResponse, FlagFetcher, SyncFlagFetcher } from './types.js';
