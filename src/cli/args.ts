/**
 * Command-line flags for the scan script.
 *
 * Precedence for every setting: flag, then environment, then config/pairs.json
 * or the built-in default.
 */

import { ConfigError } from '@/core/errors';
import { parsePairList } from '@/core/pairs';
import { MAX_TIMER_DELAY_MS, isSchedulableDelaySeconds } from '@/core/time';
import type { AppConfig } from '@/core/config';
import type { EnvConfig } from '@/core/env';
import { DEFAULT_SPREAD_THRESHOLD } from '@/scanner/arbitrage';
import type { CurrencyPair } from '@/types/fx';

export interface ScanCliArgs {
  apiKey?: string;
  delaySeconds?: number;
  threshold?: number;
  pairs?: CurrencyPair[];
  assumeYes: boolean;
}

export interface ScanSettings {
  apiKey: string | null;
  pairListName: string; // Where the pairs came from: the flag, the env var or the config file's name
  delaySeconds: number;
  threshold: number;
  pairs: CurrencyPair[];
  assumeYes: boolean;
}

/** Reads `--name=value` or `--name value`. */
function readFlag(argv: readonly string[], name: string): string | undefined {
  const flag = `--${name}`;
  const equalsArg = argv.find((arg) => arg.startsWith(`${flag}=`));
  if (equalsArg) {
    return equalsArg.slice(flag.length + 1);
  }
  const index = argv.indexOf(flag);
  if (index >= 0) {
    const next = argv[index + 1];
    return next !== undefined && !next.startsWith('--') ? next : '';
  }
  return undefined;
}

function parseNonNegative(raw: string, flag: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || value < 0) {
    throw new ConfigError(`--${flag} expects a non-negative number, got "${raw}"`, `--${flag}`);
  }
  return value;
}

export function parseScanArgs(argv: readonly string[]): ScanCliArgs {
  const args: ScanCliArgs = {
    assumeYes: argv.includes('--yes') || argv.includes('-y'),
  };

  const apiKey = readFlag(argv, 'api-key');
  if (apiKey !== undefined && apiKey.trim() !== '') {
    args.apiKey = apiKey.trim();
  }

  const delay = readFlag(argv, 'delay');
  if (delay !== undefined) {
    const seconds = parseNonNegative(delay, 'delay');
    if (!isSchedulableDelaySeconds(seconds)) {
      throw new ConfigError(
        `--delay must be at most ${MAX_TIMER_DELAY_MS / 1000} seconds, got "${delay}"`,
        '--delay'
      );
    }
    args.delaySeconds = seconds;
  }

  const threshold = readFlag(argv, 'threshold');
  if (threshold !== undefined) {
    args.threshold = parseNonNegative(threshold, 'threshold');
  }

  const pairs = readFlag(argv, 'pairs');
  if (pairs !== undefined) {
    const parsed = parsePairList(pairs, '--pairs');
    if (parsed.length === 0) {
      throw new ConfigError('--pairs needs at least one FROM/TO pair', '--pairs');
    }
    args.pairs = parsed;
  }

  return args;
}

export function resolveScanSettings(
  args: ScanCliArgs,
  env: EnvConfig,
  config: AppConfig
): ScanSettings {
  const pairListName = args.pairs ? '--pairs' : env.pairs ? 'FX_PAIRS' : config.pairList.name;

  return {
    apiKey: args.apiKey ?? env.alphaVantageApiKey,
    pairListName,
    delaySeconds: args.delaySeconds ?? env.scanDelaySeconds,
    threshold: args.threshold ?? DEFAULT_SPREAD_THRESHOLD,
    pairs: args.pairs ?? env.pairs ?? config.pairList.pairs,
    assumeYes: args.assumeYes,
  };
}
