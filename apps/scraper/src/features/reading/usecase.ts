import { type ResultAsync, errAsync, okAsync } from 'neverthrow';
import { BackendClient } from '../../clients/backend.js';
import { fetchSourcePage } from '../../clients/source-page.js';
import { ErrorCode, type ScraperError, createError } from '../../core/errors.js';
import type { ForwardResult, WaterReading } from '../../core/types.js';
import { type Config, checkRequiredConfig } from '../../lib/config.js';
import type { HttpFetch } from '../../lib/http-utils.js';
import { type Logger, componentLogger } from '../../lib/logger.js';
import { extractReadingElements } from './extractor.js';
import { normalizeReading } from './normalizer.js';
import { parseDocument } from './parser.js';

export interface PipelineDeps {
  config: Config;
  fetch: HttpFetch;
  logger: Logger;
}

export interface ForwardedReading {
  reading: WaterReading;
  url: string;
}

/**
 * CheckConfig -> Fetch -> Parse -> Extract -> Normalize -> Forward.
 * The first failing stage ends the run.
 */
export function collectReading({
  config,
  fetch,
  logger,
}: PipelineDeps): ResultAsync<ForwardedReading, ScraperError> {
  const requiredResult = checkRequiredConfig(config);
  if (requiredResult.isErr()) {
    return errAsync(requiredResult.error);
  }
  const { lakeId, apiKey } = requiredResult.value;

  const backend = new BackendClient({
    baseUrl: config.backendUrl,
    pathTemplate: config.backendPath,
    lakeId,
    apiKey,
    timeoutMs: config.fetchTimeoutMs,
    fetch,
    logger: componentLogger(logger, 'forwarder'),
  });

  return fetchSourcePage(config.sourceUrl, {
    fetch,
    timeoutMs: config.fetchTimeoutMs,
    logger: componentLogger(logger, 'fetcher'),
  })
    .map(parseDocument)
    .andThen((document) =>
      extractReadingElements(document, componentLogger(logger, 'extractor'))
    )
    .andThen((pair) =>
      normalizeReading(pair, {
        timestampPrefix: config.timestampPrefix,
        timeZone: config.sourceTimeZone,
      })
    )
    .andThen((reading) =>
      backend.forwardReading(reading).andThen((result) => ensureAccepted(reading, result))
    );
}

const ensureAccepted = (
  reading: WaterReading,
  { response, url }: ForwardResult
): ResultAsync<ForwardedReading, ScraperError> => {
  if (response?.ok) {
    return okAsync({ reading, url });
  }

  return errAsync(
    createError(
      ErrorCode.BackendRejectionError,
      `Failed to put data (${JSON.stringify(reading)}) to backend: ${url}\n${
        response?.body ?? 'no response from backend'
      }`,
      { url, status: response?.status }
    )
  );
};
