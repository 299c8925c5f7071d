/**
 * Error taxonomy surfaced at the API boundary.
 *
 * Everything a caller can see is a PaperError with a short message.
 * Lower layers throw their own classes (ExtractionError, gateway failures)
 * which are translated here.
 */

import type { GatewayFailure } from './models/gateway.js';

export type PaperErrorCode =
  | 'INVALID_REQUEST'
  | 'EXTRACTION_FAILED'
  | 'MODEL_UNAVAILABLE'
  | 'UPSTREAM_ERROR'
  | 'NO_DOCUMENT_FOR_SESSION';

export class PaperError extends Error {
  constructor(
    public readonly code: PaperErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'PaperError';
  }
}

export type ExtractionFailureReason = 'UNREACHABLE' | 'UNSUPPORTED_FORMAT' | 'EMPTY_DOCUMENT';

export class ExtractionError extends Error {
  constructor(
    public readonly reason: ExtractionFailureReason,
    message: string
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

const EXTRACTION_MESSAGES: Record<ExtractionFailureReason, string> = {
  UNREACHABLE: 'Could not download the paper from the provided URL',
  UNSUPPORTED_FORMAT: 'The URL does not point to a PDF or HTML document',
  EMPTY_DOCUMENT: 'Could not extract enough text from the provided URL',
};

export function fromExtractionError(error: ExtractionError): PaperError {
  return new PaperError('EXTRACTION_FAILED', EXTRACTION_MESSAGES[error.reason]);
}

/**
 * Exhausted retries on transient failures mean the model is unavailable;
 * anything else is an upstream error.
 */
export function fromGatewayFailure(failure: GatewayFailure): PaperError {
  if (failure.kind === 'RATE_LIMITED' || failure.kind === 'TIMEOUT') {
    return new PaperError('MODEL_UNAVAILABLE', 'The language model is unavailable, please try again later');
  }
  return new PaperError('UPSTREAM_ERROR', 'The language model returned an error');
}
