/**
 * Tests for date-helpers
 */

import { describe, expect, it } from 'vitest';
import { extractISODate, isValidISODate, toISODateString, utcDateOfOffsetDateTime } from './date-helpers';

describe('date-helpers', () => {
  describe('toISODateString', () => {
    it('should convert valid date to YYYY-MM-DD format', () => {
      expect(toISODateString(new Date('2024-01-15T10:30:00.000Z'))).toBe('2024-01-15');
    });

    it('should handle leap year dates', () => {
      expect(toISODateString(new Date('2024-02-29T12:00:00.000Z'))).toBe('2024-02-29');
    });

    it('should throw error for invalid date', () => {
      expect(() => toISODateString(new Date('invalid'))).toThrow('Invalid date');
    });
  });

  describe('extractISODate', () => {
    it('returns plain dates unchanged', () => {
      expect(extractISODate('2023-12-31')).toBe('2023-12-31');
    });

    it('drops time parts written with a space or a T', () => {
      expect(extractISODate('2023-09-30 00:00:00')).toBe('2023-09-30');
      expect(extractISODate('2023-09-30T00:00:00Z')).toBe('2023-09-30');
      expect(extractISODate('2023-09-30T08:15:00.000+09:00')).toBe('2023-09-30');
    });

    it('returns null for non-date labels', () => {
      expect(extractISODate('2023')).toBeNull();
      expect(extractISODate('2023-Q4')).toBeNull();
      expect(extractISODate('2023-09-30 trailing')).toBeNull();
    });
  });

  describe('isValidISODate', () => {
    it('accepts real calendar days', () => {
      expect(isValidISODate('2024-02-29')).toBe(true);
    });

    it('rejects impossible days', () => {
      expect(isValidISODate('2023-02-29')).toBe(false);
      expect(isValidISODate('2023-13-01')).toBe(false);
    });
  });

  describe('utcDateOfOffsetDateTime', () => {
    it('moves instants onto their UTC calendar day', () => {
      expect(utcDateOfOffsetDateTime('2023-12-31T23:00:00-05:00')).toBe('2024-01-01');
      expect(utcDateOfOffsetDateTime('2023-09-30T08:15:00.000+09:00')).toBe('2023-09-29');
      expect(utcDateOfOffsetDateTime('2023-12-31T20:30+0530')).toBe('2023-12-31');
      expect(utcDateOfOffsetDateTime('2023-09-30T00:00:00Z')).toBe('2023-09-30');
    });

    it('returns null without an offset', () => {
      expect(utcDateOfOffsetDateTime('2023-12-31 23:00:00')).toBeNull();
      expect(utcDateOfOffsetDateTime('2023-12-31')).toBeNull();
      expect(utcDateOfOffsetDateTime('FY2023')).toBeNull();
    });
  });
});
