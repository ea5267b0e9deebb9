/**
 * Statistics Unit Tests
 */

import {
  mean,
  quantileSorted,
  sortAscending,
  roundTo,
  safeDivide,
  sampleStdDev,
  sum,
} from '../../src/utils/statistics';

describe('statistics', () => {
  describe('sum and mean', () => {
    it('should add values', () => {
      expect(sum([1, 2, 3.5])).toBe(6.5);
    });

    it('should average values', () => {
      expect(mean([1, 2, 3, 4])).toBe(2.5);
    });

    it('should return 0 for empty input', () => {
      expect(sum([])).toBe(0);
      expect(mean([])).toBe(0);
    });
  });

  describe('sampleStdDev', () => {
    it('should use the n - 1 denominator', () => {
      // squared deviations sum to 32 over 7 degrees of freedom
      expect(sampleStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(Math.sqrt(32 / 7), 10);
    });

    it('should return 0 for a single value', () => {
      expect(sampleStdDev([42])).toBe(0);
    });

    it('should return 0 for empty input', () => {
      expect(sampleStdDev([])).toBe(0);
    });

    it('should match the large transaction scenario', () => {
      const amounts = [...new Array<number>(99).fill(10), 10000];
      expect(mean(amounts)).toBeCloseTo(109.9, 10);
      expect(sampleStdDev(amounts)).toBeCloseTo(999, 8);
    });
  });

  describe('quantileSorted', () => {
    it('should interpolate linearly between ranks', () => {
      expect(quantileSorted([1, 2, 3, 4, 5], 0.8)).toBeCloseTo(4.2, 10);
    });

    it('should read sorted copies of unordered input', () => {
      expect(quantileSorted(sortAscending([5, 3, 1, 4, 2]), 0.8)).toBeCloseTo(4.2, 10);
    });

    it('should return the extremes at 0 and 1', () => {
      expect(quantileSorted([3, 7, 9], 0)).toBe(3);
      expect(quantileSorted([3, 7, 9], 1)).toBe(9);
    });

    it('should handle empty and single-value input', () => {
      expect(quantileSorted([], 0.5)).toBe(0);
      expect(quantileSorted([7], 0.95)).toBe(7);
    });

    it('should take the middle of an even count as the median', () => {
      expect(quantileSorted([1, 2, 3, 4], 0.5)).toBe(2.5);
    });
  });

  describe('roundTo', () => {
    it('should round to two decimals by default', () => {
      expect(roundTo(3.14159)).toBe(3.14);
      expect(roundTo(2.675001)).toBe(2.68);
    });

    it('should accept a precision', () => {
      expect(roundTo(2.5, 0)).toBe(3);
    });
  });

  describe('safeDivide', () => {
    it('should divide', () => {
      expect(safeDivide(6, 3)).toBe(2);
    });

    it('should fall back on a zero denominator', () => {
      expect(safeDivide(1, 0)).toBe(0);
      expect(safeDivide(1, 0, -1)).toBe(-1);
    });
  });
});
