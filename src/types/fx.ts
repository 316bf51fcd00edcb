/**
 * Currency pair and quote types shared by the scanner
 */

export interface CurrencyPair {
  from: string;
  to: string;
}

export interface RateRecord {
  readonly fromCode: string;
  readonly fromName: string;
  readonly toCode: string;
  readonly toName: string;
  readonly rate: number;
  readonly bid: number;
  readonly ask: number;
  readonly lastRefreshed: string; // As sent by the API, e.g. "2026-10-18 09:05:03"
  readonly timezone: string;
}

/** Pair key ("USD/EUR") to quote, in scan order. */
export type ResultMapping = ReadonlyMap<string, RateRecord>;

export interface ArbitrageFinding {
  pair1: string;
  pair2: string;
  spread: number;
}
