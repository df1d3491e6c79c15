import { describe, it, expect } from 'vitest';
import { TimeRangeVO, monthRange } from '../../../src/domain/value-objects/time-range.vo';
import { InvalidInputError } from '../../../src/domain/errors/usage-report.errors';

describe('TimeRangeVO', () => {
  describe('forMonth', () => {
    it('should cover a leap February from its first instant to one second before March', () => {
      const range = TimeRangeVO.forMonth(2024, 2);

      expect(range.startMs).toBe(1706745600000);
      expect(range.endMs).toBe(1709251199000);
      expect(new Date(range.startMs).toISOString()).toBe('2024-02-01T00:00:00.000Z');
      expect(new Date(range.endMs).toISOString()).toBe('2024-02-29T23:59:59.000Z');
    });

    it('should roll December over into January of the next year', () => {
      const range = TimeRangeVO.forMonth(2023, 12);

      expect(range.startMs).toBe(1701388800000);
      expect(range.endMs).toBe(1704067199000);
      expect(new Date(range.endMs).toISOString()).toBe('2023-12-31T23:59:59.000Z');
    });

    it('should end exactly one second before the next month starts', () => {
      for (let month = 1; month <= 12; month++) {
        const range = TimeRangeVO.forMonth(2025, month);
        const next = month === 12 ? TimeRangeVO.forMonth(2026, 1) : TimeRangeVO.forMonth(2025, month + 1);

        expect(next.startMs - range.endMs).toBe(1000);
      }
    });

    it.each([
      [2024, 0],
      [2024, 13],
      [2024, 2.5],
      [999, 1],
      [10000, 1],
      [2024.5, 1],
    ])('should reject year %s month %s', (year, month) => {
      expect(() => TimeRangeVO.forMonth(year, month)).toThrow(InvalidInputError);
    });
  });

  it('should name the report without zero-padding the month', () => {
    expect(TimeRangeVO.forMonth(2024, 3).reportFilename).toBe('usage_2024_3.csv');
    expect(TimeRangeVO.forMonth(2024, 11).reportFilename).toBe('usage_2024_11.csv');
  });

  it('should compute the same range through monthRange', () => {
    expect(monthRange(2024, 5).toJSON()).toEqual(TimeRangeVO.forMonth(2024, 5).toJSON());
  });

  it('should serialize to plain JSON', () => {
    expect(TimeRangeVO.forMonth(2023, 12).toJSON()).toEqual({
      year: 2023,
      month: 12,
      startMs: 1701388800000,
      endMs: 1704067199000,
    });
  });
});
