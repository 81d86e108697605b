import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from './index.js';

describe('loadConfig', () => {
  it('should fall back to defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      logging: { level: 'warn', console: true, file: false, dir: undefined },
      defaults: { rsiOversold: 20, rsiOverbought: 80, bbandsDistance: 2, mcginleyK: 0.6 },
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      ROLLTA_LOG_LEVEL: 'debug',
      ROLLTA_LOG_CONSOLE: '0',
      ROLLTA_LOG_FILE: 'true',
      ROLLTA_LOG_DIR: '/tmp/rollta-logs',
      ROLLTA_BBANDS_DISTANCE: '2.5',
      ROLLTA_MCGINLEY_K: '0.8',
    });

    expect(config.logging).toEqual({
      level: 'debug',
      console: false,
      file: true,
      dir: '/tmp/rollta-logs',
    });
    expect(config.defaults.bbandsDistance).toBe(2.5);
    expect(config.defaults.mcginleyK).toBe(0.8);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ ROLLTA_LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });

  it('should reject an oversold threshold above the overbought one', () => {
    try {
      loadConfig({ ROLLTA_RSI_OVERSOLD: '75', ROLLTA_RSI_OVERBOUGHT: '60' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual(['ROLLTA_RSI_OVERSOLD: must not exceed ROLLTA_RSI_OVERBOUGHT']);
      }
    }
  });

  it('should reject a non-numeric constant', () => {
    expect(() => loadConfig({ ROLLTA_MCGINLEY_K: 'fast' })).toThrow(ConfigError);
  });
});
