/**
 * Forex Scan Script
 * Fetches the configured currency pairs, prints the rate table and the
 * arbitrage check
 *
 * Usage: npx tsx scripts/scan_forex.ts [--api-key=KEY] [--pairs=USD/EUR,EUR/GBP]
 *        [--delay=12] [--threshold=0.01] [--yes]
 */

import dotenv from 'dotenv';
import { resolve } from 'path';
import { createInterface } from 'readline/promises';

// Load .env.local first, then fall back to .env
dotenv.config({ path: resolve(process.cwd(), '.env.local') });
dotenv.config();
import { getConfig } from '../src/core/config';
import { getEnvConfig } from '../src/core/env';
import { parseScanArgs, resolveScanSettings } from '../src/cli/args';
import { runScan } from '../src/cli/run';
import { createAlphaVantageClient } from '../src/providers/alphavantage/client';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('scan_forex');

async function main(): Promise<void> {
  const controller = new AbortController();
  const interrupt = () => controller.abort();
  process.on('SIGINT', interrupt);

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  // With a terminal attached, readline receives Ctrl+C instead of the process
  rl.on('SIGINT', interrupt);

  try {
    const { status } = await runScan({
      resolveSettings: () =>
        resolveScanSettings(parseScanArgs(process.argv.slice(2)), getEnvConfig(), getConfig()),
      ask: (question) => rl.question(question, { signal: controller.signal }),
      createProvider: (apiKey) => createAlphaVantageClient(apiKey),
      out: process.stdout,
      signal: controller.signal,
    });
    logger.debug({ status }, 'Scan session finished');
  } finally {
    rl.close();
    process.off('SIGINT', interrupt);
  }
}

main().catch(console.error);
