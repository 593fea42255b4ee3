export { createFetchClient } from './fetch-client.js';
export { createSyncHttpClient } from './sync-client.js';
export type { ProcessRunner, SyncHttpClientOptions } from './sync-client.js';
export type {
  HttpClient,
  SyncHttpClient,
  HttpClientOptions,
  HttpRequest,
  HttpResponse,
  HttpError,
} from './types.js';
