import { describe, expect, it } from 'vitest';
import {
  NO_ANOMALIES_MESSAGE,
  NO_RESULTS_MESSAGE,
  renderAnomalies,
  renderResults,
} from '@/scanner/report';
import { formatTimestamp } from '@/core/time';
import type { RateRecord, ResultMapping } from '@/types/fx';

const RULE = '='.repeat(70);
const DASHES = '-'.repeat(70);

function makeRecord(overrides: Partial<RateRecord>): RateRecord {
  return {
    fromCode: 'USD',
    fromName: 'United States Dollar',
    toCode: 'EUR',
    toName: 'Euro',
    rate: 0.9201,
    bid: 0.92005,
    ask: 0.92015,
    lastRefreshed: '2026-10-18 09:05:03',
    timezone: 'UTC',
    ...overrides,
  };
}

const RESULTS: ResultMapping = new Map([
  ['USD/EUR', makeRecord({})],
  [
    'USD/JPY',
    makeRecord({
      toCode: 'JPY',
      toName: 'Japanese Yen',
      rate: 149.5,
      bid: 149.48,
      ask: 149.52,
      lastRefreshed: '2026-10-18 09:06:15',
    }),
  ],
]);

describe('renderResults', () => {
  it('renders a fixed-width table in mapping order with five decimals', () => {
    const text = renderResults(RESULTS, { generatedAt: new Date(2026, 9, 18, 9, 7, 0) });

    expect(text.split('\n')).toEqual([
      RULE,
      'FOREX SCANNER RESULTS - 2026-10-18 09:07:00',
      RULE,
      '',
      'PAIR            RATE         BID          ASK          UPDATED',
      DASHES,
      'USD/EUR         0.92010      0.92005      0.92015      2026-10-18 09:05:03',
      'USD/JPY         149.50000    149.48000    149.52000    2026-10-18 09:06:15',
      RULE,
    ]);
  });

  it('omits the timestamp when no generation time is given', () => {
    expect(renderResults(RESULTS).split('\n')[1]).toBe('FOREX SCANNER RESULTS');
  });

  it('returns the no-results notice for an empty mapping', () => {
    expect(renderResults(new Map())).toBe(NO_RESULTS_MESSAGE);
  });

  it('produces identical text when called twice on the same mapping', () => {
    const generatedAt = new Date(2026, 9, 18, 9, 7, 0);

    expect(renderResults(RESULTS, { generatedAt })).toBe(renderResults(RESULTS, { generatedAt }));
  });
});

describe('renderAnomalies', () => {
  it('lists each finding with a four-decimal spread', () => {
    const text = renderAnomalies([
      { pair1: 'USD/EUR', pair2: 'EUR/USD', spread: 0.75 },
      { pair1: 'EUR/USD', pair2: 'USD/EUR', spread: 0.75 },
    ]);

    expect(text.split('\n')).toEqual([
      'Arbitrage Analysis:',
      DASHES,
      'Potential opportunities detected (further analysis required):',
      '  • USD/EUR × EUR/USD - Spread: 0.7500',
      '  • EUR/USD × USD/EUR - Spread: 0.7500',
    ]);
  });

  it('prints the all-clear line when there are no findings', () => {
    expect(renderAnomalies([])).toBe(`Arbitrage Analysis:\n${DASHES}\n${NO_ANOMALIES_MESSAGE}`);
  });
});

describe('formatTimestamp', () => {
  it('formats local time as yyyy-MM-dd HH:mm:ss', () => {
    expect(formatTimestamp(new Date(2026, 0, 5, 7, 3, 9))).toBe('2026-01-05 07:03:09');
  });
});
