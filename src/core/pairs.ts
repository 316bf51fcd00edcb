import type { CurrencyPair } from '@/types/fx';
import { ConfigError } from './errors';

const PAIR_PATTERN = /^([A-Z0-9]{2,10})\/([A-Z0-9]{2,10})$/;

export function formatPairKey(pair: CurrencyPair): string {
  return `${pair.from}/${pair.to}`;
}

export function parsePairKey(raw: string, source: string = 'pair'): CurrencyPair {
  const normalized = raw.trim().toUpperCase();
  const match = PAIR_PATTERN.exec(normalized);
  if (!match) {
    throw new ConfigError(`Invalid currency pair "${raw}" (expected FROM/TO, e.g. USD/EUR)`, source);
  }
  return { from: match[1], to: match[2] };
}

/**
 * Parses "USD/EUR, EUR/GBP". Empty segments are skipped; duplicates are kept
 * and fetched independently.
 */
export function parsePairList(raw: string, source: string = 'pair list'): CurrencyPair[] {
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => parsePairKey(part, source));
}
