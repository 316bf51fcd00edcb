import { describe, expect, it } from 'vitest';
import { parseScanArgs, resolveScanSettings } from '@/cli/args';
import type { AppConfig } from '@/core/config';
import type { EnvConfig } from '@/core/env';
import { ConfigError } from '@/core/errors';

const CONFIG: AppConfig = {
  pairList: {
    name: 'Majors',
    pairs: [
      { from: 'USD', to: 'EUR' },
      { from: 'USD', to: 'GBP' },
    ],
  },
  pairListPath: '/tmp/pairs.json',
};

const EMPTY_ENV: EnvConfig = { alphaVantageApiKey: null, scanDelaySeconds: 12, pairs: null };

describe('parseScanArgs', () => {
  it('returns only the confirmation default when no flags are given', () => {
    expect(parseScanArgs([])).toEqual({ assumeYes: false });
  });

  it('reads --name=value and --name value forms', () => {
    expect(
      parseScanArgs(['--api-key=test-key', '--delay', '1.5', '--threshold=0.05', '--pairs', 'usd/jpy', '-y'])
    ).toEqual({
      apiKey: 'test-key',
      delaySeconds: 1.5,
      threshold: 0.05,
      pairs: [{ from: 'USD', to: 'JPY' }],
      assumeYes: true,
    });
  });

  it('rejects a negative or missing delay', () => {
    expect(() => parseScanArgs(['--delay=-1'])).toThrow(ConfigError);
    expect(() => parseScanArgs(['--delay', '--yes'])).toThrow(
      '--delay expects a non-negative number, got ""'
    );
  });

  it('rejects a delay longer than the timer can schedule', () => {
    expect(() => parseScanArgs(['--delay=3000000'])).toThrow(
      '--delay must be at most 2147483.647 seconds, got "3000000"'
    );
    expect(parseScanArgs(['--delay=2147483.647']).delaySeconds).toBe(2147483.647);
  });

  it('rejects an empty pair list', () => {
    expect(() => parseScanArgs(['--pairs=,'])).toThrow('--pairs needs at least one FROM/TO pair');
  });
});

describe('resolveScanSettings', () => {
  it('uses the config file and defaults when neither flags nor env are set', () => {
    expect(resolveScanSettings({ assumeYes: false }, EMPTY_ENV, CONFIG)).toEqual({
      apiKey: null,
      pairListName: 'Majors',
      delaySeconds: 12,
      threshold: 0.01,
      pairs: CONFIG.pairList.pairs,
      assumeYes: false,
    });
  });

  it('prefers the environment over the config file', () => {
    const env: EnvConfig = {
      alphaVantageApiKey: 'env-key',
      scanDelaySeconds: 3,
      pairs: [{ from: 'EUR', to: 'CHF' }],
    };

    const settings = resolveScanSettings({ assumeYes: false }, env, CONFIG);

    expect(settings.apiKey).toBe('env-key');
    expect(settings.pairListName).toBe('FX_PAIRS');
    expect(settings.delaySeconds).toBe(3);
    expect(settings.pairs).toEqual([{ from: 'EUR', to: 'CHF' }]);
  });

  it('prefers flags over the environment', () => {
    const env: EnvConfig = {
      alphaVantageApiKey: 'env-key',
      scanDelaySeconds: 3,
      pairs: [{ from: 'EUR', to: 'CHF' }],
    };
    const args = parseScanArgs(['--api-key=flag-key', '--delay=0', '--pairs=GBP/JPY']);

    const settings = resolveScanSettings(args, env, CONFIG);

    expect(settings.apiKey).toBe('flag-key');
    expect(settings.pairListName).toBe('--pairs');
    expect(settings.delaySeconds).toBe(0);
    expect(settings.pairs).toEqual([{ from: 'GBP', to: 'JPY' }]);
  });
});
