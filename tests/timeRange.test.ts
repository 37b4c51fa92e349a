import { describe, it, expect } from 'vitest';
import {
  contains,
  formatClock,
  formatTimeRange,
  overlaps,
  parseClock,
  parseTimeRange,
  validateDate,
} from '../src/domain/timeRange.js';
import { ValidationError } from '../src/domain/errors/index.js';

describe('timeRange', () => {
  describe('parseTimeRange', () => {
    it('parses HH:MM-HH:MM', () => {
      expect(parseTimeRange('10:00-11:30')).toEqual({ start: 600, end: 690 });
    });

    it('parses the short hour form', () => {
      expect(parseTimeRange('10-11')).toEqual({ start: 600, end: 660 });
    });

    it('tolerates spaces around the dash', () => {
      expect(parseTimeRange(' 9:15 - 10:45 ')).toEqual({ start: 555, end: 645 });
    });

    it('rejects end before or equal to start', () => {
      expect(() => parseTimeRange('11:00-10:00')).toThrow(ValidationError);
      expect(() => parseTimeRange('10:00-10:00')).toThrow(ValidationError);
    });

    it('rejects malformed input', () => {
      expect(() => parseTimeRange('ten to eleven')).toThrow(ValidationError);
      expect(() => parseTimeRange('10:75-11:00')).toThrow(ValidationError);
      expect(() => parseTimeRange('23:00-25:00')).toThrow(ValidationError);
    });
  });

  describe('formatting', () => {
    it('pads hours and minutes', () => {
      expect(formatClock(545)).toBe('09:05');
      expect(formatTimeRange({ start: 600, end: 660 })).toBe('10:00-11:00');
    });

    it('parses clock values', () => {
      expect(parseClock('18:00')).toBe(1080);
      expect(() => parseClock('6pm')).toThrow(ValidationError);
    });
  });

  describe('overlaps', () => {
    it('treats ranges as half-open', () => {
      const tenToEleven = { start: 600, end: 660 };

      expect(overlaps(tenToEleven, { start: 660, end: 720 })).toBe(false);
      expect(overlaps(tenToEleven, { start: 540, end: 600 })).toBe(false);
      expect(overlaps(tenToEleven, { start: 630, end: 690 })).toBe(true);
      expect(overlaps(tenToEleven, { start: 615, end: 645 })).toBe(true);
    });
  });

  describe('contains', () => {
    it('accepts ranges touching the window edges', () => {
      const window = { start: 540, end: 1080 };

      expect(contains(window, { start: 540, end: 600 })).toBe(true);
      expect(contains(window, { start: 1020, end: 1080 })).toBe(true);
      expect(contains(window, { start: 1050, end: 1110 })).toBe(false);
    });
  });

  describe('validateDate', () => {
    it('accepts real calendar days', () => {
      expect(validateDate('2024-02-29')).toBe('2024-02-29');
    });

    it('rejects impossible days', () => {
      expect(() => validateDate('2023-02-29')).toThrow(ValidationError);
      expect(() => validateDate('2024-13-01')).toThrow(ValidationError);
    });

    it('rejects other formats', () => {
      expect(() => validateDate('06/02/2025')).toThrow(ValidationError);
    });
  });
});
