import { describe, expect, it } from 'vitest';
import { correlationMatrix, pearson, round, summarize, toNumberOrNaN } from './math';

describe('round', () => {
  it('rounds half away from zero', () => {
    expect(round(0.125, 2)).toBe(0.13);
    expect(round(-0.125, 2)).toBe(-0.13);
    expect(round(12.3456, 1)).toBe(12.3);
  });

  it('keeps NaN', () => {
    expect(round(Number.NaN, 4)).toBeNaN();
  });
});

describe('toNumberOrNaN', () => {
  it('only passes numbers through', () => {
    expect(toNumberOrNaN(0.5)).toBe(0.5);
    expect(toNumberOrNaN('0.5')).toBeNaN();
    expect(toNumberOrNaN(undefined)).toBeNaN();
  });
});

describe('pearson', () => {
  it('is 1 for perfectly correlated series', () => {
    expect(pearson([1, 2, 3], [2, 4, 6])).toBeCloseTo(1, 12);
  });

  it('is -1 for perfectly anti-correlated series', () => {
    expect(pearson([1, 2, 3], [3, 2, 1])).toBeCloseTo(-1, 12);
  });

  it('ignores pairs with a missing value', () => {
    expect(pearson([1, 2, Number.NaN, 3], [2, 4, 100, 6])).toBeCloseTo(1, 12);
  });

  it('is NaN without variance or with fewer than two pairs', () => {
    expect(pearson([1, 1, 1], [1, 2, 3])).toBeNaN();
    expect(pearson([1], [1])).toBeNaN();
  });
});

describe('correlationMatrix', () => {
  it('builds a symmetric matrix with a unit diagonal', () => {
    const matrix = correlationMatrix([
      [1, 2, 3],
      [3, 2, 1],
    ]);
    expect(matrix[0][0]).toBe(1);
    expect(matrix[1][1]).toBe(1);
    expect(matrix[0][1]).toBeCloseTo(-1, 12);
    expect(matrix[1][0]).toBeCloseTo(-1, 12);
  });

  it('marks a constant column as NaN', () => {
    const matrix = correlationMatrix([
      [1, 2, 3],
      [5, 5, 5],
    ]);
    expect(matrix[1][1]).toBeNaN();
    expect(matrix[0][1]).toBeNaN();
  });
});

describe('summarize', () => {
  it('uses the sample standard deviation', () => {
    const summary = summarize([2, 4, 4, 4, 5, 5, 7, 9]);
    expect(summary?.min).toBe(2);
    expect(summary?.max).toBe(9);
    expect(summary?.mean).toBe(5);
    expect(summary?.stdDev).toBeCloseTo(Math.sqrt(32 / 7), 12);
  });

  it('returns null for an empty series', () => {
    expect(summarize([])).toBeNull();
  });
});
