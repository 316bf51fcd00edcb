/**
 * Errors raised outside the per-pair fetch path
 */

export class ConfigError extends Error {
  constructor(
    message: string,
    public source: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ScanAbortedError extends Error {
  constructor(message: string = 'Scan aborted') {
    super(message);
    this.name = 'ScanAbortedError';
  }
}

export function isInterruptError(error: unknown): boolean {
  if (error instanceof ScanAbortedError) return true;
  // readline/promises rejects an aborted question with a DOMException named AbortError
  return error instanceof Error && error.name === 'AbortError';
}

export function sanitizeError(error: unknown): string {
  if (error instanceof ConfigError) {
    return `${error.message} (${error.source})`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return 'An unknown error occurred';
}
