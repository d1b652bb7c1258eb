import { describe, expect, it, vi } from 'vitest';
import { ErrorCode } from '../../../../src/core/errors.js';
import { extractReadingElements } from '../../../../src/features/reading/extractor.js';
import { parseDocument } from '../../../../src/features/reading/parser.js';
import { createLogger } from '../../../../src/lib/logger.js';
import { HTML_FIXTURES } from '../../../helpers/fixtures.js';

describe('Extractor', () => {
  const logger = createLogger('silent');

  it('finds_temperature_and_timestamp_elements', () => {
    const pair = extractReadingElements(parseDocument(HTML_FIXTURES.summer), logger)._unsafeUnwrap();

    expect(pair.temperature.textContent).toBe('18.4°C');
    expect(pair.timestamp.textContent).toBe('Last update: 2024-06-01 14:30:00');
  });

  it('takes_first_match_for_each_tag', () => {
    const document = parseDocument(
      '<temp>18.4°C</temp><temp>3.0°C</temp>' +
        '<temp-normal>Last update: 2024-06-01 14:30:00</temp-normal>' +
        '<temp-normal>Last update: 2020-01-01 00:00:00</temp-normal>'
    );

    const pair = extractReadingElements(document, logger)._unsafeUnwrap();

    expect(pair.temperature.textContent).toBe('18.4°C');
    expect(pair.timestamp.textContent).toBe('Last update: 2024-06-01 14:30:00');
  });

  it('fails_when_temperature_is_missing', () => {
    const error = extractReadingElements(
      parseDocument(HTML_FIXTURES.withoutTemperature),
      logger
    )._unsafeUnwrapErr();

    expect(error).toEqual({
      code: ErrorCode.ExtractionError,
      message: "Couldn't find a <temp> element in the source page",
      details: { tagName: 'temp' },
    });
  });

  it('fails_when_timestamp_is_missing', () => {
    const errorLogger = createLogger('silent');
    const errorSpy = vi.spyOn(errorLogger, 'error');

    const error = extractReadingElements(
      parseDocument('<p><temp>18.4°C</temp></p>'),
      errorLogger
    )._unsafeUnwrapErr();

    expect(error.details).toEqual({ tagName: 'temp-normal' });
    expect(errorSpy).toHaveBeenCalledWith(
      { tagName: 'temp-normal', html: expect.any(String) },
      '<temp-normal> not found in html'
    );
  });

  it('treats_blank_element_as_missing', () => {
    const document = parseDocument(
      '<temp>   </temp><temp-normal>Last update: 2024-06-01 14:30:00</temp-normal>'
    );

    const error = extractReadingElements(document, logger)._unsafeUnwrapErr();

    expect(error.details).toEqual({ tagName: 'temp' });
  });

  it('reads_elements_from_malformed_markup', () => {
    const document = parseDocument(
      '<p><temp>12.5°C</p><temp-normal>Last update: 2024-06-01 14:30:00'
    );

    const pair = extractReadingElements(document, logger)._unsafeUnwrap();

    expect(pair.temperature.textContent).toBe('12.5°C');
    expect(pair.timestamp.textContent).toBe('Last update: 2024-06-01 14:30:00');
  });

  it('fails_for_unrelated_page', () => {
    const result = extractReadingElements(parseDocument(HTML_FIXTURES.maintenance), logger);

    expect(result._unsafeUnwrapErr().details).toEqual({ tagName: 'temp' });
  });
});
