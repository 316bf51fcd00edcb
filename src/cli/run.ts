/**
 * Interactive scan flow behind scripts/scan_forex.ts.
 *
 * Prompts and output go through the injected `ask` and `out`, so the flow runs
 * the same against a terminal or a scripted session.
 */

import { isInterruptError, sanitizeError } from '@/core/errors';
import { formatPairKey } from '@/core/pairs';
import { secondsToMilliseconds } from '@/core/time';
import type { ExchangeRateProvider } from '@/providers/types';
import { findAnomalies } from '@/scanner/arbitrage';
import { renderAnomalies, renderResults } from '@/scanner/report';
import { scanPairs, type ScanProgressEvent } from '@/scanner/scan';
import type { ResultMapping } from '@/types/fx';
import { createChildLogger } from '@/utils/logger';
import type { SleepFn } from '@/utils/sleep';
import type { ScanSettings } from './args';

const logger = createChildLogger('cli');

export const API_KEY_URL = 'https://www.alphavantage.co/support/#api-key';
export const MIN_RESULTS_FOR_ARBITRAGE = 2;

export const BANNER = `
    ╔══════════════════════════════════════════════════════════════╗
    ║                        FOREX SCANNER                         ║
    ║              Live Currency Exchange Rate Monitor             ║
    ╚══════════════════════════════════════════════════════════════╝
`;

export type AskFn = (question: string) => Promise<string>;

export interface OutputSink {
  write(text: string): void;
}

export type RunScanStatus = 'completed' | 'missing_key' | 'cancelled' | 'interrupted' | 'failed';

export interface RunScanResult {
  status: RunScanStatus;
  results: ResultMapping | null;
}

export interface RunScanOptions {
  resolveSettings: () => ScanSettings;
  ask: AskFn;
  createProvider: (apiKey: string) => ExchangeRateProvider;
  out: OutputSink;
  signal?: AbortSignal;
  sleep?: SleepFn;
  now?: () => Date;
}

function progressWriter(out: OutputSink) {
  return (event: ScanProgressEvent): void => {
    switch (event.type) {
      case 'start':
        out.write(`[${event.index}/${event.total}] Fetching ${event.key}... `);
        break;
      case 'success':
        out.write(`✓ ${event.record.rate.toFixed(4)}\n`);
        break;
      case 'failure':
        out.write(`✗ Failed (${event.failure.kind}: ${event.failure.message})\n`);
        break;
    }
  };
}

async function scanFlow(options: RunScanOptions): Promise<RunScanResult> {
  const { ask, out, signal, sleep, now = () => new Date() } = options;
  const line = (text: string = '') => out.write(`${text}\n`);

  const settings = options.resolveSettings();

  const apiKey = settings.apiKey ?? (await ask('Enter your Alpha Vantage API key: ')).trim();
  if (!apiKey) {
    line('Error: API key is required!');
    line(`   Get your free API key at: ${API_KEY_URL}`);
    return { status: 'missing_key', results: null };
  }

  line(`\nCurrency pairs to scan (${settings.pairListName}):`);
  for (const pair of settings.pairs) {
    line(`   • ${formatPairKey(pair)}`);
  }
  line(`\nNote: Free API tier allows 5 calls/minute (${settings.delaySeconds} sec delay between calls)`);

  if (!settings.assumeYes) {
    const proceed = (await ask('\nProceed with scan? (y/n): ')).trim().toLowerCase();
    if (proceed !== 'y') {
      line('Scan cancelled');
      return { status: 'cancelled', results: null };
    }
  }

  const provider = options.createProvider(apiKey);
  const rule = '='.repeat(70);
  line(`\n${rule}`);
  line(`FOREX SCANNER - Starting scan of ${settings.pairs.length} currency pairs`);
  line(`${rule}\n`);

  const results = await scanPairs(settings.pairs, {
    provider,
    delayMs: secondsToMilliseconds(settings.delaySeconds),
    sleep,
    signal,
    onProgress: progressWriter(out),
  });
  logger.debug({ requests: provider.getRequestCount() }, 'Requests issued');

  line(`\n${renderResults(results, { generatedAt: now() })}\n`);

  if (results.size >= MIN_RESULTS_FOR_ARBITRAGE) {
    line(`${renderAnomalies(findAnomalies(results, settings.threshold))}\n`);
  }

  line('Scan complete!\n');
  return { status: 'completed', results };
}

/**
 * Runs the whole session. Never throws: an interrupt or any other error is
 * printed as one line and reported through the returned status.
 */
export async function runScan(options: RunScanOptions): Promise<RunScanResult> {
  options.out.write(`${BANNER}\n`);

  try {
    return await scanFlow(options);
  } catch (error) {
    if (isInterruptError(error)) {
      options.out.write('\n\nScan interrupted by user\n');
      return { status: 'interrupted', results: null };
    }
    logger.debug({ error }, 'Unhandled error');
    options.out.write(`\nUnexpected error: ${sanitizeError(error)}\n`);
    return { status: 'failed', results: null };
  }
}
