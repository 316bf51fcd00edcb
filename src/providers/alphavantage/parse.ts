/**
 * Maps a CURRENCY_EXCHANGE_RATE body to a RateRecord or a classified failure.
 *
 * Checks run in a fixed order: error message, rate-limit note, missing quote
 * object, then the quote fields themselves. The first match wins, so a body
 * carrying both "Error Message" and "Note" is an api_error.
 */

import type { RateRecord } from '@/types/fx';
import { isRecord } from '@/utils/guards';
import { validateQuote } from '@/validation/ajv_instance';
import { fetchFailure, type FetchOutcome } from '../types';
import { QUOTE_OBJECT_KEY } from './types';

function describeValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

// Plain decimal or exponent notation; no hex, binary or octal literals
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function parseDecimal(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function parseExchangeRateBody(body: string): FetchOutcome {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return fetchFailure('parse', `Response is not valid JSON: ${detail}`);
  }
  return parseExchangeRatePayload(data);
}

export function parseExchangeRatePayload(data: unknown): FetchOutcome {
  if (!isRecord(data)) {
    return fetchFailure('malformed_response', 'Response body is not a JSON object');
  }

  if (data['Error Message'] !== undefined) {
    return fetchFailure('api_error', describeValue(data['Error Message']));
  }

  if (data.Note !== undefined) {
    return fetchFailure('rate_limit', describeValue(data.Note));
  }

  if (data.Information !== undefined) {
    return fetchFailure('rate_limit', describeValue(data.Information));
  }

  const quote = data[QUOTE_OBJECT_KEY];
  if (!isRecord(quote)) {
    return fetchFailure('malformed_response', `Response has no "${QUOTE_OBJECT_KEY}" object`);
  }

  const validation = validateQuote(quote);
  if (!validation.valid) {
    return fetchFailure('parse', validation.errors.join('; '));
  }

  const q = validation.data;
  const rate = parseDecimal(q['5. Exchange Rate']);
  const bid = parseDecimal(q['8. Bid Price']);
  const ask = parseDecimal(q['9. Ask Price']);

  const invalid = [
    rate === null ? `5. Exchange Rate=${JSON.stringify(q['5. Exchange Rate'])}` : null,
    bid === null ? `8. Bid Price=${JSON.stringify(q['8. Bid Price'])}` : null,
    ask === null ? `9. Ask Price=${JSON.stringify(q['9. Ask Price'])}` : null,
  ].filter((entry): entry is string => entry !== null);

  if (rate === null || bid === null || ask === null) {
    return fetchFailure('parse', `Non-numeric quote fields: ${invalid.join(', ')}`);
  }

  const record: RateRecord = Object.freeze({
    fromCode: q['1. From_Currency Code'],
    fromName: q['2. From_Currency Name'],
    toCode: q['3. To_Currency Code'],
    toName: q['4. To_Currency Name'],
    rate,
    bid,
    ask,
    lastRefreshed: q['6. Last Refreshed'],
    timezone: q['7. Time Zone'],
  });

  return { ok: true, record };
}
