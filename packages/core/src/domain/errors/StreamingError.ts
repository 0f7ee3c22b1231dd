/**
 * - `CONFIGURATION`: invalid options, fatal before any input is read.
 * - `INVALID_TIMESTAMP`: a session event whose timestamp is not an integer.
 * - `DECODE`: a record payload that is not valid JSON.
 */
export type StreamingErrorCode = 'CONFIGURATION' | 'INVALID_TIMESTAMP' | 'DECODE';

export interface StreamingErrorOptions {
  /** 1-based line number of the offending input line, when known. */
  readonly lineNumber?: number;
  readonly cause?: unknown;
}

export class StreamingError extends Error {
  readonly code: StreamingErrorCode;
  readonly lineNumber?: number;

  constructor(code: StreamingErrorCode, message: string, options?: StreamingErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'StreamingError';
    this.code = code;
    this.lineNumber = options?.lineNumber;
  }
}

export function isStreamingError(error: unknown): error is StreamingError {
  return error instanceof StreamingError;
}
