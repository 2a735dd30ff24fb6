/**
 * Calendar Helper Unit Tests
 *
 * @module tests/unit/utils/calendar.spec
 */

import { describe, it, expect } from 'vitest';
import {
  bucketSubDayTime,
  calendarDay,
  localTimeOfDay,
  normalizeSubDayTime,
  normalizeTimestamp,
} from '../../../src/utils/calendar';

describe('calendar helpers', () => {
  describe('normalizeTimestamp', () => {
    it('should convert offset timestamps to UTC ISO form', () => {
      expect(normalizeTimestamp('2024-03-10T10:00:00+02:00')).toBe('2024-03-10T08:00:00.000Z');
    });

    it('should leave UTC ISO form unchanged', () => {
      expect(normalizeTimestamp('2024-03-10T08:00:00.000Z')).toBe('2024-03-10T08:00:00.000Z');
    });

    it('should throw RangeError for unparseable input', () => {
      expect(() => normalizeTimestamp('not-a-date')).toThrow(RangeError);
    });
  });

  describe('calendarDay', () => {
    it('should use the UTC day in UTC', () => {
      expect(calendarDay('2024-03-10T23:30:00.000Z', 'UTC')).toBe('2024-03-10');
    });

    it('should move late-evening instants back a day west of UTC', () => {
      // 03:30Z is 22:30 EST on the previous day
      expect(calendarDay('2024-03-10T03:30:00.000Z', 'America/New_York')).toBe('2024-03-09');
    });

    it('should move instants forward a day east of UTC', () => {
      expect(calendarDay('2024-03-10T20:00:00.000Z', 'Asia/Tokyo')).toBe('2024-03-11');
    });
  });

  describe('localTimeOfDay', () => {
    it('should format with a 24-hour clock', () => {
      expect(localTimeOfDay('2024-03-10T03:30:00.000Z', 'America/New_York')).toBe('22:30');
    });

    it('should render midnight as 00:00', () => {
      expect(localTimeOfDay('2024-03-10T00:00:00.000Z', 'UTC')).toBe('00:00');
    });
  });

  describe('bucketSubDayTime', () => {
    it('should keep minute precision with 1-minute buckets', () => {
      expect(bucketSubDayTime('23:59', 1)).toBe('23:59');
    });

    it('should floor to the start of the bucket', () => {
      expect(bucketSubDayTime('07:14', 15)).toBe('07:00');
      expect(bucketSubDayTime('07:15', 15)).toBe('07:15');
      expect(bucketSubDayTime('00:07', 5)).toBe('00:05');
    });
  });

  describe('normalizeSubDayTime', () => {
    it('should keep HH:mm as is', () => {
      expect(normalizeSubDayTime('06:30')).toBe('06:30');
    });

    it('should drop seconds and fractions', () => {
      expect(normalizeSubDayTime('06:30:15')).toBe('06:30');
      expect(normalizeSubDayTime('23:59:59.500')).toBe('23:59');
    });

    it('should discard values that are not a time of day', () => {
      expect(normalizeSubDayTime('24:00')).toBeUndefined();
      expect(normalizeSubDayTime('6:30')).toBeUndefined();
      expect(normalizeSubDayTime('morning')).toBeUndefined();
      expect(normalizeSubDayTime(undefined)).toBeUndefined();
    });
  });
});
