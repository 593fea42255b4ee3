import { describe, it, expect } from 'vitest';
import {
  ConfigurationError,
  createApiError,
  createAuthenticationError,
  createNetworkError,
  createRateLimitError,
  createUnexpectedError,
} from './errors.js';

describe('error factories', () => {
  it('createAuthenticationError', () => {
    expect(createAuthenticationError()).toEqual({
      code: 'AUTHENTICATION_ERROR',
      message: 'Invalid API key',
      status: 401,
    });
  });

  it('createRateLimitError', () => {
    const error = createRateLimitError(12);

    expect(error.code).toBe('RATE_LIMIT_ERROR');
    expect(error.status).toBe(429);
    expect(error.retryAfterSeconds).toBe(12);
  });

  it('createNetworkError keeps the cause', () => {
    const cause = new Error('ECONNRESET');

    expect(createNetworkError('Network error: ECONNRESET', cause)).toEqual({
      code: 'NETWORK_ERROR',
      message: 'Network error: ECONNRESET',
      cause,
    });
  });

  it('createApiError', () => {
    expect(createApiError('HTTP 500', 500)).toEqual({
      code: 'API_ERROR',
      message: 'HTTP 500',
      status: 500,
      cause: undefined,
    });
  });

  describe('createUnexpectedError', () => {
    it('uses the error message', () => {
      expect(createUnexpectedError(new Error('boom')).message).toBe('boom');
    });

    it('uses a generic message for non-errors', () => {
      const error = createUnexpectedError('boom');

      expect(error.code).toBe('UNEXPECTED_ERROR');
      expect(error.message).toBe('Unexpected error');
      expect(error.cause).toBe('boom');
    });
  });
});

describe('ConfigurationError', () => {
  it('is an Error with a code and issues', () => {
    const error = new ConfigurationError('API key required');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConfigurationError');
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.issues).toEqual(['API key required']);
  });
});
