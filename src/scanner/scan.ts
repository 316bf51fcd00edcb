/**
 * Sequential scan over a pair list.
 *
 * One fetch per pair in input order, a fixed pause between consecutive pairs
 * (never after the last), failures skipped. Nothing runs concurrently: the
 * upstream free tier allows five calls per minute.
 */

import { createChildLogger } from '@/utils/logger';
import { sleep as defaultSleep, type SleepFn } from '@/utils/sleep';
import { ScanAbortedError } from '@/core/errors';
import { formatPairKey } from '@/core/pairs';
import type { ExchangeRateProvider, FetchFailure } from '@/providers/types';
import type { CurrencyPair, RateRecord, ResultMapping } from '@/types/fx';

const logger = createChildLogger('scan');

interface ScanStep {
  index: number; // 1-based
  total: number;
  key: string;
}

export type ScanProgressEvent =
  | ({ type: 'start' } & ScanStep)
  | ({ type: 'success'; record: RateRecord } & ScanStep)
  | ({ type: 'failure'; failure: FetchFailure } & ScanStep);

export interface ScanOptions {
  provider: ExchangeRateProvider;
  delayMs: number;
  sleep?: SleepFn;
  signal?: AbortSignal;
  onProgress?: (event: ScanProgressEvent) => void;
}

export async function scanPairs(
  pairs: readonly CurrencyPair[],
  options: ScanOptions
): Promise<ResultMapping> {
  const { provider, delayMs, sleep = defaultSleep, signal, onProgress } = options;
  const results = new Map<string, RateRecord>();
  const total = pairs.length;
  let failed = 0;

  logger.info({ total, delayMs }, 'Starting scan');

  for (const [offset, pair] of pairs.entries()) {
    if (signal?.aborted) {
      throw new ScanAbortedError();
    }

    const step: ScanStep = { index: offset + 1, total, key: formatPairKey(pair) };
    onProgress?.({ type: 'start', ...step });

    const outcome = await provider.fetchExchangeRate(pair.from, pair.to, signal);
    if (outcome.ok) {
      results.set(step.key, outcome.record);
      onProgress?.({ type: 'success', ...step, record: outcome.record });
    } else {
      failed++;
      logger.debug({ pair: step.key, kind: outcome.failure.kind }, 'Skipping pair');
      onProgress?.({ type: 'failure', ...step, failure: outcome.failure });
    }

    if (step.index < total) {
      await sleep(delayMs, signal);
    }
  }

  logger.info({ total, succeeded: total - failed, failed }, 'Scan finished');
  return results;
}
