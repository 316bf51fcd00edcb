/**
 * Shared types and interfaces for exchange rate providers.
 *
 * A provider turns one currency pair into either a RateRecord or a classified
 * failure. Per-pair failures are returned, never thrown, so a scan keeps going
 * after any single bad response.
 */
import type { RateRecord } from '@/types/fx';

export type FetchFailureKind =
  | 'network' // timeout, connection error or non-2xx status
  | 'api_error' // "Error Message" in the body
  | 'rate_limit' // "Note"/"Information": soft signal to slow down
  | 'malformed_response' // no quote object
  | 'parse'; // bad JSON, missing key or non-numeric value

export interface FetchFailure {
  kind: FetchFailureKind;
  message: string;
  status?: number;
}

export type FailedFetch = { ok: false; failure: FetchFailure };

export type FetchOutcome = { ok: true; record: RateRecord } | FailedFetch;

export interface ExchangeRateProvider {
  fetchExchangeRate(
    fromCurrency: string,
    toCurrency: string,
    signal?: AbortSignal
  ): Promise<FetchOutcome>;
  getRequestCount(): number;
}

export function fetchFailure(
  kind: FetchFailureKind,
  message: string,
  status?: number
): FailedFetch {
  const failure: FetchFailure = status === undefined ? { kind, message } : { kind, message, status };
  return { ok: false, failure };
}
