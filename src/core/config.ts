/**
 * Pair list configuration loaded from JSON files
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join } from 'path';
import type { CurrencyPair } from '@/types/fx';
import { ConfigError } from './errors';
import { parsePairKey } from './pairs';
import { isRecord } from '@/utils/guards';

export interface PairListConfig {
  name: string;
  pairs: CurrencyPair[];
}

export interface AppConfig {
  pairList: PairListConfig;
  pairListPath: string;
}

let cachedConfig: AppConfig | null = null;

function getProjectRoot(): string {
  return process.cwd();
}

function resolvePairListPath(projectRoot: string): string {
  const envPath = process.env.FX_PAIRS_CONFIG;
  if (envPath) {
    if (isAbsolute(envPath)) return envPath;
    // Bare names refer to files under config/
    if (!envPath.includes('/') && !envPath.endsWith('.json')) {
      return join(projectRoot, 'config', `${envPath}.json`);
    }
    return join(projectRoot, envPath);
  }
  return join(projectRoot, 'config', 'pairs.json');
}

export function normalizePairList(raw: unknown, source: string): PairListConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Pair list must be a JSON object', source);
  }
  const entries: unknown = raw.pairs;
  if (!Array.isArray(entries)) {
    throw new ConfigError('Pair list must contain a "pairs" array', source);
  }

  const list: unknown[] = entries;
  const pairs: CurrencyPair[] = [];
  for (const entry of list) {
    if (typeof entry === 'string') {
      pairs.push(parsePairKey(entry, source));
    } else if (isRecord(entry) && typeof entry.from === 'string' && typeof entry.to === 'string') {
      pairs.push(parsePairKey(`${entry.from}/${entry.to}`, source));
    } else {
      throw new ConfigError(`Unsupported pair entry: ${JSON.stringify(entry)}`, source);
    }
  }

  return {
    name: typeof raw.name === 'string' ? raw.name : 'Pairs',
    pairs,
  };
}

export function loadConfig(): AppConfig {
  const projectRoot = getProjectRoot();
  const pairListPath = resolvePairListPath(projectRoot);
  if (!existsSync(pairListPath)) {
    throw new ConfigError(`Pair list not found: ${pairListPath}`, pairListPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(pairListPath, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Pair list is not valid JSON: ${detail}`, pairListPath);
  }

  return {
    pairList: normalizePairList(raw, pairListPath),
    pairListPath,
  };
}

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
