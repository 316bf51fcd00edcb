/**
 * Ajv validation instance with schema validators
 * Upstream payloads are checked against the schemas before they are mapped
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import { getExchangeRateQuoteSchema } from './schema_loader';
import type { AlphaVantageQuote } from '@/providers/alphavantage/types';

// Create Ajv instance with Draft 2020-12 support
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Lazy-loaded validators
let quoteValidator: ValidateFunction<AlphaVantageQuote> | null = null;

export function getQuoteValidator(): ValidateFunction<AlphaVantageQuote> {
  if (!quoteValidator) {
    quoteValidator = ajv.compile<AlphaVantageQuote>(getExchangeRateQuoteSchema());
  }
  return quoteValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

export function validateQuote(data: unknown): ValidationResult<AlphaVantageQuote> {
  const validate = getQuoteValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}
