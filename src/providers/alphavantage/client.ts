/**
 * Alpha Vantage API Client
 * One GET per currency pair; no retries, failures are classified and returned
 */

import { createChildLogger } from '@/utils/logger';
import { ScanAbortedError } from '@/core/errors';
import {
  fetchFailure,
  type ExchangeRateProvider,
  type FailedFetch,
  type FetchOutcome,
} from '../types';
import { parseExchangeRateBody } from './parse';

const logger = createChildLogger('alphavantage');

export const BASE_URL = 'https://www.alphavantage.co/query';
export const EXCHANGE_RATE_FUNCTION = 'CURRENCY_EXCHANGE_RATE';
export const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface AlphaVantageClientOptions {
  timeoutMs?: number;
  baseUrl?: string;
  fetchImpl?: FetchLike;
}

export class AlphaVantageClient implements ExchangeRateProvider {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private requestCount = 0;

  constructor(apiKey: string, options: AlphaVantageClientOptions = {}) {
    this.apiKey = apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.baseUrl = options.baseUrl ?? BASE_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  getRequestCount(): number {
    return this.requestCount;
  }

  buildUrl(fromCurrency: string, toCurrency: string): URL {
    const url = new URL(this.baseUrl);
    url.searchParams.set('function', EXCHANGE_RATE_FUNCTION);
    url.searchParams.set('from_currency', fromCurrency);
    url.searchParams.set('to_currency', toCurrency);
    url.searchParams.set('apikey', this.apiKey);
    return url;
  }

  async fetchExchangeRate(
    fromCurrency: string,
    toCurrency: string,
    signal?: AbortSignal
  ): Promise<FetchOutcome> {
    const from = fromCurrency.trim().toUpperCase();
    const to = toCurrency.trim().toUpperCase();
    const pair = `${from}/${to}`;
    const url = this.buildUrl(from, to);

    if (signal?.aborted) {
      throw new ScanAbortedError();
    }

    // Local controller so the timeout and the caller's signal both cancel the request
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let body: string;
    try {
      logger.debug({ pair, url: redactUrl(url) }, 'Requesting exchange rate');
      const response = await this.fetchImpl(url.toString(), { signal: controller.signal });
      this.requestCount++;

      if (!response.ok) {
        // Release the connection; the error body is not used
        await response.body?.cancel();
        return this.fail(
          pair,
          fetchFailure('network', `HTTP ${response.status} ${response.statusText}`.trim(), response.status)
        );
      }

      body = await response.text();
    } catch (error) {
      if (signal?.aborted) {
        throw new ScanAbortedError();
      }
      const message = timedOut
        ? `Request timed out after ${this.timeoutMs}ms`
        : describeNetworkError(error);
      return this.fail(pair, fetchFailure('network', message));
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    const outcome = parseExchangeRateBody(body);
    if (!outcome.ok) {
      return this.fail(pair, outcome);
    }

    logger.debug({ pair, rate: outcome.record.rate }, 'Fetched exchange rate');
    return outcome;
  }

  private fail(pair: string, outcome: FailedFetch): FailedFetch {
    const { kind, message, status } = outcome.failure;
    if (kind === 'rate_limit') {
      logger.warn({ pair, message }, 'Alpha Vantage rate limit notice');
    } else {
      logger.warn({ pair, kind, status, message }, 'Exchange rate request failed');
    }
    return outcome;
  }
}

function describeNetworkError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  // Node's fetch reports "fetch failed" and keeps the socket error as the cause
  if (error.cause instanceof Error) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}

export function redactUrl(url: URL): string {
  const copy = new URL(url.toString());
  copy.searchParams.set('apikey', '[REDACTED]');
  return copy.toString();
}

export function createAlphaVantageClient(
  apiKey: string,
  options: AlphaVantageClientOptions = {}
): AlphaVantageClient {
  return new AlphaVantageClient(apiKey, options);
}
