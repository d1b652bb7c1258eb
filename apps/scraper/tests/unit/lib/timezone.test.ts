import { describe, expect, it } from 'vitest';
import {
  formatUtcIso,
  isValidWallClockTime,
  zoneOffsetMs,
  zonedTimeToUtc,
} from '../../../src/lib/timezone.js';

const BERLIN = 'Europe/Berlin';
const HOUR_MS = 60 * 60 * 1000;

describe('Timezone', () => {
  describe('zonedTimeToUtc', () => {
    const cases = [
      {
        name: 'summer_time_uses_two_hour_offset',
        local: { year: 2024, month: 6, day: 1, hour: 14, minute: 30, second: 0 },
        expected: '2024-06-01T12:30:00+00:00',
      },
      {
        name: 'winter_time_uses_one_hour_offset',
        local: { year: 2024, month: 1, day: 15, hour: 8, minute: 0, second: 0 },
        expected: '2024-01-15T07:00:00+00:00',
      },
      {
        name: 'crosses_into_previous_day',
        local: { year: 2024, month: 1, day: 1, hour: 0, minute: 15, second: 0 },
        expected: '2023-12-31T23:15:00+00:00',
      },
      {
        name: 'ambiguous_fall_back_time_resolves_to_standard_time',
        local: { year: 2024, month: 10, day: 27, hour: 2, minute: 30, second: 0 },
        expected: '2024-10-27T01:30:00+00:00',
      },
      {
        name: 'skipped_spring_time_uses_standard_offset',
        local: { year: 2024, month: 3, day: 31, hour: 2, minute: 30, second: 0 },
        expected: '2024-03-31T01:30:00+00:00',
      },
    ];

    for (const { name, local, expected } of cases) {
      it(name, () => {
        expect(formatUtcIso(zonedTimeToUtc(local, BERLIN))).toBe(expected);
      });
    }

    it('leaves_utc_wall_clock_unchanged', () => {
      const local = { year: 2024, month: 6, day: 1, hour: 14, minute: 30, second: 0 };
      expect(formatUtcIso(zonedTimeToUtc(local, 'UTC'))).toBe('2024-06-01T14:30:00+00:00');
    });
  });

  describe('zoneOffsetMs', () => {
    it('returns_summer_and_winter_offsets', () => {
      expect(zoneOffsetMs(Date.UTC(2024, 6, 1, 12), BERLIN)).toBe(2 * HOUR_MS);
      expect(zoneOffsetMs(Date.UTC(2024, 0, 1, 12), BERLIN)).toBe(HOUR_MS);
    });

    it('returns_zero_for_utc', () => {
      expect(zoneOffsetMs(Date.UTC(2024, 6, 1, 12), 'UTC')).toBe(0);
    });
  });

  describe('isValidWallClockTime', () => {
    it('accepts_leap_day', () => {
      expect(
        isValidWallClockTime({ year: 2024, month: 2, day: 29, hour: 23, minute: 59, second: 59 })
      ).toBe(true);
    });

    it('rejects_day_outside_month', () => {
      expect(
        isValidWallClockTime({ year: 2023, month: 2, day: 29, hour: 12, minute: 0, second: 0 })
      ).toBe(false);
    });

    it('rejects_hour_24', () => {
      expect(
        isValidWallClockTime({ year: 2024, month: 6, day: 1, hour: 24, minute: 0, second: 0 })
      ).toBe(false);
    });
  });

  describe('formatUtcIso', () => {
    it('drops_milliseconds_and_uses_explicit_offset', () => {
      const date = new Date(Date.UTC(2024, 5, 1, 12, 30, 0, 123));
      expect(formatUtcIso(date)).toBe('2024-06-01T12:30:00+00:00');
    });
  });
});
