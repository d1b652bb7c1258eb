import { ResultAsync } from 'neverthrow';
import { type ErrorCode, type ScraperError, createError } from '../core/errors.js';

/**
 * Creates a ResultAsync from a Promise with consistent error handling
 */
export const resultFrom = <T>(
  promise: Promise<T>,
  code: ErrorCode,
  msgFn: (error: unknown) => string
): ResultAsync<T, ScraperError> =>
  ResultAsync.fromPromise(promise, (error) => createError(code, msgFn(error)));

export const describeError = (error: unknown): string => {
  if (!(error instanceof Error)) {
    return String(error);
  }
  // undici reports transport failures as "fetch failed" with the real reason in `cause`
  return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
};
