import { execFileSync } from 'node:child_process';
import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import type {
  HttpClientOptions,
  HttpError,
  HttpRequest,
  HttpResponse,
  SyncHttpClient,
} from './types.js';
import { DEFAULT_TIMEOUT_MS, parseJsonBody } from './body.js';

/** Extra time the child process gets beyond the request timeout */
const PROCESS_GRACE_MS = 2_000;

/**
 * Script run by the child process. Reads one request from stdin,
 * performs it with fetch and writes a JSON envelope to stdout.
 */
const REQUEST_SCRIPT = `
const chunks = [];
for await (const chunk of process.stdin) chunks.push(chunk);
const request = JSON.parse(Buffer.concat(chunks).toString('utf8'));
let envelope;
try {
  const response = await fetch(request.url, {
    method: request.method,
    headers: request.headers,
    signal: AbortSignal.timeout(request.timeoutMs),
  });
  const headers = {};
  response.headers.forEach((value, key) => { headers[key] = value; });
  envelope = { ok: true, status: response.status, statusText: response.statusText, headers, text: await response.text() };
} catch (error) {
  const timedOut = error instanceof Error && error.name === 'TimeoutError';
  envelope = {
    ok: false,
    type: timedOut ? 'timeout' : 'network',
    message: timedOut ? 'Request timed out after ' + request.timeoutMs + 'ms' : error instanceof Error ? error.message : 'Network error',
  };
}
process.stdout.write(JSON.stringify(envelope));
`;

const envelopeSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    status: z.number().int(),
    statusText: z.string(),
    headers: z.record(z.string()),
    text: z.string(),
  }),
  z.object({
    ok: z.literal(false),
    type: z.enum(['network', 'timeout']),
    message: z.string(),
  }),
]);

/**
 * Runs the request script in a separate process and returns its stdout.
 * Must block until the process exits; throws if it fails or times out.
 */
export type ProcessRunner = (script: string, input: string, timeoutMs: number) => string;

/**
 * Options for creating a blocking HTTP client.
 */
export interface SyncHttpClientOptions extends HttpClientOptions {
  /** Process runner (default: a Node.js child process via execFileSync) */
  readonly runner?: ProcessRunner;
}

const runNodeProcess: ProcessRunner = (script, input, timeoutMs) =>
  execFileSync(process.execPath, ['--input-type=module', '--eval', script], {
    input,
    encoding: 'utf8',
    timeout: timeoutMs,
    windowsHide: true,
  });

/**
 * Creates an HTTP client that blocks until the response arrives.
 *
 * Node.js cannot block the calling thread on a socket, so each request is
 * performed by a short-lived child process; the parent waits on it.
 *
 * @param options - Optional client configuration
 * @returns A SyncHttpClient instance
 *
 * @example
 * ```typescript
 * const client = createSyncHttpClient({ timeoutMs: 2000 });
 * const result = client.request({ url: 'https://api.example.com/flags/beta', method: 'GET' });
 * ```
 */
export const createSyncHttpClient = (options: SyncHttpClientOptions = {}): SyncHttpClient => {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, baseHeaders = {}, runner = runNodeProcess } = options;

  const request = (httpRequest: HttpRequest): Result<HttpResponse<unknown>, HttpError> => {
    const input = JSON.stringify({
      url: httpRequest.url,
      method: httpRequest.method,
      headers: { Accept: 'application/json', ...baseHeaders, ...httpRequest.headers },
      timeoutMs,
    });

    let output: string;
    try {
      output = runner(REQUEST_SCRIPT, input, timeoutMs + PROCESS_GRACE_MS);
    } catch (error) {
      return err({
        type: 'network',
        message: error instanceof Error ? error.message : 'Request process failed',
        cause: error,
      });
    }

    let parsedOutput: unknown;
    try {
      parsedOutput = JSON.parse(output) as unknown;
    } catch (error) {
      return err({ type: 'network', message: 'Malformed output from request process', cause: error });
    }

    const envelope = envelopeSchema.safeParse(parsedOutput);
    if (!envelope.success) {
      return err({
        type: 'network',
        message: 'Malformed output from request process',
        cause: envelope.error,
      });
    }

    const data = envelope.data;
    if (!data.ok) {
      return err({ type: data.type, message: data.message });
    }

    return ok({
      status: data.status,
      statusText: data.statusText,
      headers: data.headers,
      body: parseJsonBody(data.text),
    });
  };

  return { request };
};
