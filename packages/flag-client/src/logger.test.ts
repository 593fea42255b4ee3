import { describe, it, expect } from 'vitest';
import { createDefaultLogger, resolveLogLevel } from './logger.js';

describe('resolveLogLevel', () => {
  it('accepts tslog level numbers', () => {
    expect(resolveLogLevel('0')).toBe(0);
    expect(resolveLogLevel(' 5 ')).toBe(5);
  });

  it('defaults to info', () => {
    expect(resolveLogLevel(undefined)).toBe(3);
    expect(resolveLogLevel('debug')).toBe(3);
    expect(resolveLogLevel('7')).toBe(3);
  });
});

describe('createDefaultLogger', () => {
  it('names the logger and applies the level', () => {
    const logger = createDefaultLogger({ FLAG_CLIENT_LOG_LEVEL: '4' });

    expect(logger.settings.name).toBe('flag-client');
    expect(logger.settings.minLevel).toBe(4);
  });
});
