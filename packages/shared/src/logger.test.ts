import { describe, it, expect } from 'vitest';
import { createLogger } from './logger.js';

describe('Logger', () => {
  it('should use the configured level', () => {
    const logger = createLogger({ service: 'test', level: 'debug', console: false });

    expect(logger.getLevel()).toBe('debug');
  });

  it('should default to info', () => {
    const logger = createLogger({ service: 'test', console: false });

    expect(logger.getLevel()).toBe('info');
  });

  it('should create child loggers sharing the level', () => {
    const logger = createLogger({ service: 'test', level: 'warn', console: false });
    const child = logger.child({ kind: 'rsi' });

    expect(child.getLevel()).toBe('warn');
    expect(() => child.warn('threshold changed', { oversold: 30 })).not.toThrow();
  });
});
