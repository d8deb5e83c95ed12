/**
 * Extraction Error Classes
 *
 * Every failure of the OCR collaborator (document load, vision model call)
 * surfaces as an ExtractionError. `retryable` marks the transient ones.
 */

import { AttemptTimeoutError } from '../../utils/backoff.js';

export type ExtractionErrorCategory =
  | 'EXTRACTION_FAILED'
  | 'EXTRACTION_TIMEOUT'
  | 'EXTRACTION_AUTH_ERROR';

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly category: ExtractionErrorCategory = 'EXTRACTION_FAILED',
    public readonly retryable: boolean = false
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/**
 * Non-2xx response from the vision model server. 5xx and 429 are transient,
 * 401/403 are authentication failures.
 */
export class ExtractionAPIError extends ExtractionError {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(
      message,
      statusCode === 401 || statusCode === 403 ? 'EXTRACTION_AUTH_ERROR' : 'EXTRACTION_FAILED',
      statusCode >= 500 || statusCode === 429
    );
    this.name = 'ExtractionAPIError';
  }
}

export class ExtractionTimeoutError extends ExtractionError {
  constructor(
    message: string,
    public readonly timeoutMs: number
  ) {
    super(message, 'EXTRACTION_TIMEOUT', true);
    this.name = 'ExtractionTimeoutError';
  }
}

export class DocumentLoadError extends ExtractionError {
  constructor(
    message: string,
    public readonly source: string,
    retryable: boolean = false
  ) {
    super(message, 'EXTRACTION_FAILED', retryable);
    this.name = 'DocumentLoadError';
  }
}

const TRANSIENT_NETWORK_PATTERN = /ECONNREFUSED|ECONNRESET|ETIMEDOUT|EAI_AGAIN|fetch failed|socket hang up/i;

/**
 * Whether an extraction failure is worth another attempt
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof ExtractionError) return error.retryable;
  if (error instanceof AttemptTimeoutError) return true;
  if (error instanceof Error) return TRANSIENT_NETWORK_PATTERN.test(error.message);
  return false;
}

/**
 * Normalize anything thrown during extraction into an ExtractionError
 */
export function toExtractionError(error: unknown): ExtractionError {
  if (error instanceof ExtractionError) return error;
  if (error instanceof AttemptTimeoutError) {
    return new ExtractionTimeoutError(error.message, error.timeoutMs);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExtractionError(message, 'EXTRACTION_FAILED', isTransientError(error));
}
