/**
 * Plain-text rendering of scan results and arbitrage findings
 */

import { formatTimestamp } from '@/core/time';
import type { ArbitrageFinding, ResultMapping } from '@/types/fx';

export const NO_RESULTS_MESSAGE = 'No results to display';
export const NO_ANOMALIES_MESSAGE = 'No significant arbitrage opportunities detected';

const RULE_WIDTH = 70;
const COLUMNS = [
  { title: 'PAIR', width: 15 },
  { title: 'RATE', width: 12 },
  { title: 'BID', width: 12 },
  { title: 'ASK', width: 12 },
  { title: 'UPDATED', width: 20 },
] as const;

export interface RenderOptions {
  generatedAt?: Date;
}

function formatRow(cells: readonly string[]): string {
  return cells
    .map((cell, i) => cell.padEnd(COLUMNS[i]?.width ?? 0))
    .join(' ')
    .trimEnd();
}

export function renderResults(results: ResultMapping, options: RenderOptions = {}): string {
  if (results.size === 0) {
    return NO_RESULTS_MESSAGE;
  }

  const title = options.generatedAt
    ? `FOREX SCANNER RESULTS - ${formatTimestamp(options.generatedAt)}`
    : 'FOREX SCANNER RESULTS';

  const lines = [
    '='.repeat(RULE_WIDTH),
    title,
    '='.repeat(RULE_WIDTH),
    '',
    formatRow(COLUMNS.map((c) => c.title)),
    '-'.repeat(RULE_WIDTH),
  ];

  for (const [key, record] of results) {
    lines.push(
      formatRow([
        key,
        record.rate.toFixed(5),
        record.bid.toFixed(5),
        record.ask.toFixed(5),
        record.lastRefreshed,
      ])
    );
  }

  lines.push('='.repeat(RULE_WIDTH));
  return lines.join('\n');
}

export function renderAnomalies(findings: readonly ArbitrageFinding[]): string {
  const lines = ['Arbitrage Analysis:', '-'.repeat(RULE_WIDTH)];

  if (findings.length === 0) {
    lines.push(NO_ANOMALIES_MESSAGE);
    return lines.join('\n');
  }

  lines.push('Potential opportunities detected (further analysis required):');
  for (const { pair1, pair2, spread } of findings) {
    lines.push(`  • ${pair1} × ${pair2} - Spread: ${spread.toFixed(4)}`);
  }
  return lines.join('\n');
}
