import { describe, it, expect, vi } from 'vitest';
import { createSyncHttpClient, type ProcessRunner } from './sync-client.js';
import { TEST_BASE_URL } from '../test/fixtures.js';

const FLAG_URL = `${TEST_BASE_URL}flags/new-checkout`;

const createRunner = (output: unknown): ProcessRunner =>
  vi.fn<ProcessRunner>().mockReturnValue(JSON.stringify(output));

describe('createSyncHttpClient', () => {
  describe('request', () => {
    describe('given a successful response envelope', () => {
      it('returns status, headers and parsed body', () => {
        const runner = createRunner({
          ok: true,
          status: 200,
          statusText: 'OK',
          headers: { 'content-type': 'application/json' },
          text: '{"enabled":true}',
        });
        const client = createSyncHttpClient({ runner });

        const response = client.request({ url: FLAG_URL, method: 'GET' })._unsafeUnwrap();

        expect(response).toEqual({
          status: 200,
          statusText: 'OK',
          headers: { 'content-type': 'application/json' },
          body: { enabled: true },
        });
      });
    });

    it('passes the request and timeout to the runner', () => {
      const runner = vi.fn<ProcessRunner>().mockReturnValue(
        JSON.stringify({ ok: true, status: 404, statusText: 'Not Found', headers: {}, text: '' })
      );
      const client = createSyncHttpClient({
        runner,
        timeoutMs: 1_000,
        baseHeaders: { Authorization: 'Bearer test-api-key' },
      });

      client.request({ url: FLAG_URL, method: 'GET' });

      expect(runner).toHaveBeenCalledTimes(1);
      const [script, input, timeoutMs] = runner.mock.calls[0] ?? [];
      expect(typeof script).toBe('string');
      expect(JSON.parse(input ?? '')).toEqual({
        url: FLAG_URL,
        method: 'GET',
        headers: { Accept: 'application/json', Authorization: 'Bearer test-api-key' },
        timeoutMs: 1_000,
      });
      expect(timeoutMs).toBe(3_000);
    });

    describe('given an empty body', () => {
      it('returns an undefined body', () => {
        const client = createSyncHttpClient({
          runner: createRunner({ ok: true, status: 404, statusText: 'Not Found', headers: {}, text: '' }),
        });

        const response = client.request({ url: FLAG_URL, method: 'GET' })._unsafeUnwrap();

        expect(response.status).toBe(404);
        expect(response.body).toBeUndefined();
      });
    });

    describe('given a timeout envelope', () => {
      it('returns a timeout error', () => {
        const client = createSyncHttpClient({
          runner: createRunner({
            ok: false,
            type: 'timeout',
            message: 'Request timed out after 5000ms',
          }),
        });

        const error = client.request({ url: FLAG_URL, method: 'GET' })._unsafeUnwrapErr();

        expect(error).toEqual({ type: 'timeout', message: 'Request timed out after 5000ms' });
      });
    });

    describe('given a runner that throws', () => {
      it('returns a network error', () => {
        const failure = new Error('spawnSync ETIMEDOUT');
        const client = createSyncHttpClient({
          runner: () => {
            throw failure;
          },
        });

        const error = client.request({ url: FLAG_URL, method: 'GET' })._unsafeUnwrapErr();

        expect(error).toEqual({ type: 'network', message: 'spawnSync ETIMEDOUT', cause: failure });
      });
    });

    describe('given malformed runner output', () => {
      it('returns a network error for non-JSON output', () => {
        const client = createSyncHttpClient({ runner: () => 'Segmentation fault' });

        const error = client.request({ url: FLAG_URL, method: 'GET' })._unsafeUnwrapErr();

        expect(error.type).toBe('network');
        expect(error.message).toBe('Malformed output from request process');
      });

      it('returns a network error for an unknown envelope', () => {
        const client = createSyncHttpClient({ runner: createRunner({ status: 200 }) });

        const error = client.request({ url: FLAG_URL, method: 'GET' })._unsafeUnwrapErr();

        expect(error.message).toBe('Malformed output from request process');
      });
    });
  });
});
