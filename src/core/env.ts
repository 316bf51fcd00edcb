/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

import type { CurrencyPair } from '@/types/fx';
import { parsePairList } from './pairs';
import { isSchedulableDelaySeconds } from './time';

export const DEFAULT_SCAN_DELAY_SECONDS = 12; // Free tier: 5 calls per minute

export interface EnvConfig {
  alphaVantageApiKey: string | null;
  scanDelaySeconds: number;
  pairs: CurrencyPair[] | null;
}

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value === '' ? undefined : value;
}

function parseDelaySeconds(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_SCAN_DELAY_SECONDS;
  const parsed = Number(raw);
  return isSchedulableDelaySeconds(parsed) ? parsed : DEFAULT_SCAN_DELAY_SECONDS;
}

export function loadEnvConfig(): EnvConfig {
  // The key may still come from a flag or the prompt, so it is optional here
  const apiKey = getEnvVar('ALPHA_VANTAGE_API_KEY')?.trim();
  const pairsRaw = getEnvVar('FX_PAIRS')?.trim();

  return {
    alphaVantageApiKey: apiKey ? apiKey : null,
    scanDelaySeconds: parseDelaySeconds(getEnvVar('SCAN_DELAY_SECONDS')),
    pairs: pairsRaw ? parsePairList(pairsRaw, 'FX_PAIRS') : null,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
