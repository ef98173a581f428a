import { describe, it, expect } from 'vitest';
import { formatLocalDate, isIsoDate, isoWeekOf } from '../calendar.js';

describe('calendar', () => {
  describe('isoWeekOf', () => {
    it.each([
      ['2024-01-01', 2024, 1], // Monday
      ['2023-01-01', 2022, 52], // Sunday before the first Thursday
      ['2021-01-03', 2020, 53],
      ['2020-12-31', 2020, 53],
      ['2026-12-31', 2026, 53],
      ['2019-12-30', 2020, 1],
      ['2024-06-15', 2024, 24],
    ])('should place %s in %i-W%i', (date, year, week) => {
      expect(isoWeekOf(date)).toEqual({ year, week });
    });
  });

  describe('formatLocalDate', () => {
    it('should use the local calendar day with zero padding', () => {
      expect(formatLocalDate(new Date(2024, 2, 5, 23, 59))).toBe('2024-03-05');
    });
  });

  describe('isIsoDate', () => {
    it('should accept only existing YYYY-MM-DD dates', () => {
      expect(isIsoDate('2024-02-29')).toBe(true);
      expect(isIsoDate('2024-02-30')).toBe(false);
      expect(isIsoDate('yesterday')).toBe(false);
    });
  });
});
