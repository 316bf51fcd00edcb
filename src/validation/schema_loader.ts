/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export type Schema = {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
};

const schemaCache = new Map<string, Schema>();

export function loadSchema(schemaName: string): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const projectRoot = process.cwd();
  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const schemaJson = readFileSync(schemaPath, 'utf-8');
  const schema: Schema = JSON.parse(schemaJson);

  schemaCache.set(schemaName, schema);
  return schema;
}

export function getExchangeRateQuoteSchema(): Schema {
  return loadSchema('currency_exchange_rate.v1');
}
