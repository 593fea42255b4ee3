import { describe, it, expect } from 'vitest';
import { decideFromResponse, parseRetryAfter } from './decision.js';
import { createLookupResponse } from '../test/fixtures.js';

describe('decideFromResponse', () => {
  describe('given 200', () => {
    it('returns body.enabled', () => {
      expect(decideFromResponse(createLookupResponse(200, { enabled: true }))._unsafeUnwrap()).toBe(
        true
      );
      expect(decideFromResponse(createLookupResponse(200, { enabled: false }))._unsafeUnwrap()).toBe(
        false
      );
    });

    it('ignores unrelated fields', () => {
      const result = decideFromResponse(
        createLookupResponse(200, { key: 'new-checkout', enabled: true, rollout: 50 })
      );

      expect(result._unsafeUnwrap()).toBe(true);
    });

    describe('given body without enabled', () => {
      it('returns false', () => {
        expect(decideFromResponse(createLookupResponse(200, {}))._unsafeUnwrap()).toBe(false);
      });
    });

    describe('given body that is not an object', () => {
      it('returns API_ERROR', () => {
        const result = decideFromResponse(createLookupResponse(200, undefined));

        expect(result._unsafeUnwrapErr().code).toBe('API_ERROR');
        expect(result._unsafeUnwrapErr().message).toBe('Invalid flag response body');
        expect(result._unsafeUnwrapErr().status).toBe(200);
      });
    });

    describe('given non-boolean enabled', () => {
      it.each([
        [null, false],
        [0, false],
        ['', false],
        [[], false],
        [{}, false],
        [1, true],
        ['yes', true],
        [['beta'], true],
        [{ variant: 'b' }, true],
      ])('decides %j as %s', (enabled, expected) => {
        const result = decideFromResponse(createLookupResponse(200, { enabled }));

        expect(result._unsafeUnwrap()).toBe(expected);
      });
    });

    describe('given an array body', () => {
      it('returns API_ERROR', () => {
        const result = decideFromResponse(createLookupResponse(200, [{ enabled: true }]));

        expect(result._unsafeUnwrapErr().message).toBe('Invalid flag response body');
      });
    });
  });

  describe('given 401', () => {
    it('returns AUTHENTICATION_ERROR', () => {
      const error = decideFromResponse(createLookupResponse(401))._unsafeUnwrapErr();

      expect(error.code).toBe('AUTHENTICATION_ERROR');
      expect(error.message).toBe('Invalid API key');
      expect(error.status).toBe(401);
    });
  });

  describe('given 404', () => {
    it('decides false without an error', () => {
      const result = decideFromResponse(createLookupResponse(404, { message: 'Flag not found' }));

      expect(result.isOk()).toBe(true);
      expect(result._unsafeUnwrap()).toBe(false);
    });
  });

  describe('given 429', () => {
    it('returns RATE_LIMIT_ERROR with the Retry-After hint', () => {
      const error = decideFromResponse(
        createLookupResponse(429, undefined, { 'retry-after': '30' })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('RATE_LIMIT_ERROR');
      expect(error.message).toBe('Rate limit exceeded');
      expect(error.status).toBe(429);
      expect(error.retryAfterSeconds).toBe(30);
    });

    it('matches the header name case-insensitively', () => {
      const error = decideFromResponse(
        createLookupResponse(429, undefined, { 'Retry-After': '5' })
      )._unsafeUnwrapErr();

      expect(error.retryAfterSeconds).toBe(5);
    });

    describe('given no Retry-After header', () => {
      it('leaves retryAfterSeconds undefined', () => {
        const error = decideFromResponse(createLookupResponse(429))._unsafeUnwrapErr();

        expect(error.retryAfterSeconds).toBeUndefined();
      });
    });
  });

  describe('given another status', () => {
    it('uses body.message when present', () => {
      const error = decideFromResponse(
        createLookupResponse(500, { message: 'Database unavailable' })
      )._unsafeUnwrapErr();

      expect(error.code).toBe('API_ERROR');
      expect(error.message).toBe('Database unavailable');
      expect(error.status).toBe(500);
    });

    it('falls back to the status when the body has no message', () => {
      const error = decideFromResponse(createLookupResponse(503, undefined))._unsafeUnwrapErr();

      expect(error.message).toBe('HTTP 503');
    });

    it('treats other 2xx statuses as errors', () => {
      const error = decideFromResponse(createLookupResponse(204))._unsafeUnwrapErr();

      expect(error.code).toBe('API_ERROR');
      expect(error.message).toBe('HTTP 204');
    });
  });
});

describe('parseRetryAfter', () => {
  it('parses whole seconds', () => {
    expect(parseRetryAfter('120')).toBe(120);
    expect(parseRetryAfter(' 7 ')).toBe(7);
    expect(parseRetryAfter('0')).toBe(0);
  });

  it('returns undefined for anything else', () => {
    expect(parseRetryAfter(undefined)).toBeUndefined();
    expect(parseRetryAfter('')).toBeUndefined();
    expect(parseRetryAfter('1.5')).toBeUndefined();
    expect(parseRetryAfter('-1')).toBeUndefined();
    expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:00 GMT')).toBeUndefined();
  });
});
