export interface WallClockTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatterCache = new Map<string, Intl.DateTimeFormat>();

const formatterFor = (timeZone: string): Intl.DateTimeFormat => {
  const cached = formatterCache.get(timeZone);
  if (cached) {
    return cached;
  }

  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
  formatterCache.set(timeZone, formatter);
  return formatter;
};

const wallClockAt = (epochMs: number, timeZone: string): WallClockTime => {
  const fields: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(new Date(epochMs))) {
    if (part.type !== 'literal') {
      fields[part.type] = Number.parseInt(part.value, 10);
    }
  }

  return {
    year: fields.year ?? 0,
    month: fields.month ?? 0,
    day: fields.day ?? 0,
    // some ICU builds still render midnight as 24 under h23
    hour: (fields.hour ?? 0) % 24,
    minute: fields.minute ?? 0,
    second: fields.second ?? 0,
  };
};

const toEpochMs = (time: WallClockTime): number =>
  Date.UTC(time.year, time.month - 1, time.day, time.hour, time.minute, time.second);

/**
 * Offset of `timeZone` from UTC at the given instant, in milliseconds (positive east of UTC).
 */
export const zoneOffsetMs = (epochMs: number, timeZone: string): number => {
  const wholeSeconds = epochMs - (epochMs % 1000);
  return toEpochMs(wallClockAt(wholeSeconds, timeZone)) - wholeSeconds;
};

/**
 * Converts a wall-clock time in `timeZone` to the UTC instant it denotes.
 *
 * Times repeated by a fall-back transition resolve to standard time; times skipped by a
 * spring-forward transition are read with the standard offset.
 */
export const zonedTimeToUtc = (time: WallClockTime, timeZone: string): Date => {
  const naive = toEpochMs(time);
  const guessOffset = zoneOffsetMs(naive, timeZone);
  const candidate = naive - guessOffset;
  const actualOffset = zoneOffsetMs(candidate, timeZone);

  return new Date(actualOffset === guessOffset ? candidate : naive - actualOffset);
};

export const isValidWallClockTime = (time: WallClockTime): boolean => {
  const date = new Date(toEpochMs(time));
  return (
    date.getUTCFullYear() === time.year &&
    date.getUTCMonth() === time.month - 1 &&
    date.getUTCDate() === time.day &&
    time.hour >= 0 &&
    time.hour < 24 &&
    time.minute >= 0 &&
    time.minute < 60 &&
    time.second >= 0 &&
    time.second < 60
  );
};

/** ISO-8601 in UTC with an explicit `+00:00` offset and second precision. */
export const formatUtcIso = (date: Date): string =>
  date.toISOString().replace(/\.\d{3}Z$/, '+00:00');
