import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_SCAN_DELAY_SECONDS, getEnvConfig, loadEnvConfig, resetEnvConfig } from '@/core/env';
import { ConfigError } from '@/core/errors';

const KEYS = ['ALPHA_VANTAGE_API_KEY', 'SCAN_DELAY_SECONDS', 'FX_PAIRS'] as const;
const originalEnv: Record<string, string | undefined> = {};

describe('loadEnvConfig', () => {
  beforeEach(() => {
    KEYS.forEach((key) => {
      originalEnv[key] = process.env[key];
      delete process.env[key];
    });
  });

  afterEach(() => {
    resetEnvConfig();
    KEYS.forEach((key) => {
      if (originalEnv[key] === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = originalEnv[key];
      }
    });
  });

  it('falls back to defaults when nothing is set', () => {
    expect(loadEnvConfig()).toEqual({
      alphaVantageApiKey: null,
      scanDelaySeconds: DEFAULT_SCAN_DELAY_SECONDS,
      pairs: null,
    });
  });

  it('reads the key, delay and pair override', () => {
    process.env.ALPHA_VANTAGE_API_KEY = '  test-key  ';
    process.env.SCAN_DELAY_SECONDS = '0.5';
    process.env.FX_PAIRS = 'usd/eur,EUR/GBP';

    expect(loadEnvConfig()).toEqual({
      alphaVantageApiKey: 'test-key',
      scanDelaySeconds: 0.5,
      pairs: [
        { from: 'USD', to: 'EUR' },
        { from: 'EUR', to: 'GBP' },
      ],
    });
  });

  it('treats a blank key as missing', () => {
    process.env.ALPHA_VANTAGE_API_KEY = '   ';

    expect(loadEnvConfig().alphaVantageApiKey).toBeNull();
  });

  it('ignores a delay that is negative or not a number', () => {
    process.env.SCAN_DELAY_SECONDS = '-3';
    expect(loadEnvConfig().scanDelaySeconds).toBe(12);

    process.env.SCAN_DELAY_SECONDS = 'soon';
    expect(loadEnvConfig().scanDelaySeconds).toBe(12);
  });

  it('falls back to the default for a delay longer than the timer can schedule', () => {
    process.env.SCAN_DELAY_SECONDS = '3000000';

    expect(loadEnvConfig().scanDelaySeconds).toBe(DEFAULT_SCAN_DELAY_SECONDS);
  });

  it('rejects a malformed pair override', () => {
    process.env.FX_PAIRS = 'USD-EUR';

    expect(() => loadEnvConfig()).toThrow(ConfigError);
  });

  it('caches the config until reset', () => {
    const first = getEnvConfig();
    process.env.SCAN_DELAY_SECONDS = '1';

    expect(getEnvConfig()).toBe(first);
    resetEnvConfig();
    expect(getEnvConfig().scanDelaySeconds).toBe(1);
  });
});
