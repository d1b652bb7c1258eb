import type { ResultAsync } from 'neverthrow';
import { ErrorCode, type ScraperError } from '../core/errors.js';
import { type HttpFetch, createUserAgent } from '../lib/http-utils.js';
import type { Logger } from '../lib/logger.js';
import { describeError, resultFrom } from '../lib/result.js';

export interface SourcePageDeps {
  fetch: HttpFetch;
  timeoutMs: number;
  logger: Logger;
}

/**
 * GETs the source page and decodes the body as UTF-8.
 *
 * Any HTTP response counts as content; the status is only logged. Only a failure to get a
 * response at all is an error.
 */
export function fetchSourcePage(
  url: string,
  { fetch, timeoutMs, logger }: SourcePageDeps
): ResultAsync<string, ScraperError> {
  logger.debug({ url }, `Requesting ${url}`);

  const request = fetch(url, {
    method: 'GET',
    signal: AbortSignal.timeout(timeoutMs),
    headers: {
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      ...createUserAgent('fetcher'),
    },
  }).then(async (res) => {
    const bytes = new Uint8Array(await res.arrayBuffer());
    return { status: res.status, content: new TextDecoder('utf-8').decode(bytes) };
  });

  return resultFrom(
    request,
    ErrorCode.TransportError,
    (error) => `Couldn't retrieve website: ${describeError(error)}`
  ).map(({ status, content }) => {
    if (status >= 400) {
      logger.warn({ url, status }, 'Source page answered with an error status');
    }
    logger.debug({ url, status }, content);
    return content;
  });
}
