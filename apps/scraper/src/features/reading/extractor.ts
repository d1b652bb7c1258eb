import { type Result, err, ok } from 'neverthrow';
import { ErrorCode, type ScraperError, createError } from '../../core/errors.js';
import type { ExtractedPair } from '../../core/types.js';
import type { Logger } from '../../lib/logger.js';

export const TEMPERATURE_TAG = 'temp';
export const TIMESTAMP_TAG = 'temp-normal';

const findFilledElement = (document: Document, tagName: string): Element | undefined => {
  const element = document.getElementsByTagName(tagName).item(0);
  return element?.textContent?.trim() ? element : undefined;
};

export function extractReadingElements(
  document: Document,
  logger: Logger
): Result<ExtractedPair, ScraperError> {
  const temperature = findFilledElement(document, TEMPERATURE_TAG);
  if (!temperature) {
    return missingElement(TEMPERATURE_TAG, document, logger);
  }

  const timestamp = findFilledElement(document, TIMESTAMP_TAG);
  if (!timestamp) {
    return missingElement(TIMESTAMP_TAG, document, logger);
  }

  return ok({ temperature, timestamp });
}

const missingElement = (
  tagName: string,
  document: Document,
  logger: Logger
): Result<ExtractedPair, ScraperError> => {
  logger.error(
    { tagName, html: document.documentElement.outerHTML },
    `<${tagName}> not found in html`
  );
  return err(
    createError(
      ErrorCode.ExtractionError,
      `Couldn't find a <${tagName}> element in the source page`,
      { tagName }
    )
  );
};
