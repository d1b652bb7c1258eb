import { type Result, err, ok } from 'neverthrow';
import { createIsoTimestamp } from '../../core/branded-types.js';
import { ErrorCode, type ScraperError, createError } from '../../core/errors.js';
import type { ExtractedPair, WaterReading } from '../../core/types.js';
import {
  type WallClockTime,
  formatUtcIso,
  isValidWallClockTime,
  zonedTimeToUtc,
} from '../../lib/timezone.js';

export interface NormalizeOptions {
  timestampPrefix: string;
  timeZone: string;
}

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const DEGREE_SIGN = '°';

const parseFailure = (message: string, text: string): ScraperError =>
  createError(ErrorCode.ParseValueError, message, { text });

export function parseWallClockTime(
  text: string,
  prefix: string
): Result<WallClockTime, ScraperError> {
  const trimmed = text.trim();
  if (!trimmed.startsWith(prefix)) {
    return err(parseFailure(`Timestamp "${trimmed}" does not start with "${prefix}"`, trimmed));
  }

  const match = TIMESTAMP_PATTERN.exec(trimmed.slice(prefix.length));
  if (!match) {
    return err(
      parseFailure(`Timestamp "${trimmed}" does not match YYYY-MM-DD HH:MM:SS`, trimmed)
    );
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((field) => Number.parseInt(field, 10));
  const time: WallClockTime = {
    year: year ?? 0,
    month: month ?? 0,
    day: day ?? 0,
    hour: hour ?? 0,
    minute: minute ?? 0,
    second: second ?? 0,
  };

  return isValidWallClockTime(time)
    ? ok(time)
    : err(parseFailure(`Timestamp "${trimmed}" is not a valid date and time`, trimmed));
}

export function parseTemperature(text: string): Result<number, ScraperError> {
  const trimmed = text.trim();
  const [numberPart = ''] = trimmed.split(DEGREE_SIGN);
  const candidate = numberPart.trim();

  if (!DECIMAL_PATTERN.test(candidate)) {
    return err(parseFailure(`Temperature "${trimmed}" is not a number`, trimmed));
  }

  return ok(Number(candidate));
}

export function normalizeReading(
  { temperature, timestamp }: ExtractedPair,
  { timestampPrefix, timeZone }: NormalizeOptions
): Result<WaterReading, ScraperError> {
  return parseWallClockTime(timestamp.textContent ?? '', timestampPrefix).andThen((wallClock) =>
    parseTemperature(temperature.textContent ?? '').map((value) => ({
      time: createIsoTimestamp(formatUtcIso(zonedTimeToUtc(wallClock, timeZone))),
      temperature: value,
    }))
  );
}
