/**
 * Pairwise rate-product check.
 *
 * Flags every ordered pair of distinct pair keys whose rate product is more
 * than `threshold` away from 1.0. Both (A, B) and (B, A) are evaluated and no
 * shared bridge currency is required, so this is a coarse anomaly filter and
 * not triangular-arbitrage detection.
 */

import type { ArbitrageFinding, ResultMapping } from '@/types/fx';

export const DEFAULT_SPREAD_THRESHOLD = 0.01;
export const MAX_FINDINGS = 5;

export function rateProductSpread(rate1: number, rate2: number): number {
  return Math.abs(rate1 * rate2 - 1.0);
}

export function findAnomalies(
  results: ResultMapping,
  threshold: number = DEFAULT_SPREAD_THRESHOLD,
  limit: number = MAX_FINDINGS
): ArbitrageFinding[] {
  const rates = Array.from(results, ([key, record]) => ({ key, rate: record.rate }));
  const findings: ArbitrageFinding[] = [];

  for (const first of rates) {
    for (const second of rates) {
      if (first.key === second.key) continue;

      const spread = rateProductSpread(first.rate, second.rate);
      if (spread > threshold) {
        findings.push({ pair1: first.key, pair2: second.key, spread });
      }
    }
  }

  // Discovery order, not ranked by spread
  return findings.slice(0, limit);
}
