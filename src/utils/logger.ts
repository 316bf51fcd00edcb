/**
 * Logging with Pino - the Alpha Vantage key is redacted
 */

import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export const REDACT_PATHS = [
  'apiKey',
  'apikey',
  'alphaVantageApiKey',
  '*.apiKey',
  '*.apikey',
  '*.alphaVantageApiKey',
];

const usePretty = process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test';

export function buildLogger(
  options: Pick<LoggerOptions, 'level'> = {},
  destination?: DestinationStream
): Logger {
  const base: LoggerOptions = {
    level: options.level ?? (process.env.LOG_LEVEL || 'info'),
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };

  if (destination) {
    return pino(base, destination);
  }

  return pino({
    ...base,
    transport: usePretty
      ? {
          target: 'pino-pretty',
          options: { colorize: true, ignore: 'pid,hostname' },
        }
      : undefined,
  });
}

export const logger = buildLogger();

export function createChildLogger(name: string) {
  return logger.child({ module: name });
}
