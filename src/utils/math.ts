/**
 * Numeric helpers for statistics
 * Location: src/utils/math.ts
 */

import type { SeriesSummary } from '@/types/analysis';

/** Round half away from zero; NaN stays NaN */
export function round(value: number, digits: number): number {
  if (!Number.isFinite(value)) return value;
  const factor = 10 ** digits;
  return Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
}

export function toNumberOrNaN(value: unknown): number {
  return typeof value === 'number' ? value : Number.NaN;
}

/**
 * Pearson correlation over the pairs where both values are finite.
 * NaN when fewer than two pairs remain or either side has no variance.
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number {
  const pairs: Array<[number, number]> = [];
  for (let i = 0; i < Math.min(xs.length, ys.length); i++) {
    if (Number.isFinite(xs[i]) && Number.isFinite(ys[i])) {
      pairs.push([xs[i], ys[i]]);
    }
  }
  if (pairs.length < 2) return Number.NaN;

  const n = pairs.length;
  const meanX = pairs.reduce((sum, [x]) => sum + x, 0) / n;
  const meanY = pairs.reduce((sum, [, y]) => sum + y, 0) / n;

  let cov = 0;
  let varX = 0;
  let varY = 0;
  for (const [x, y] of pairs) {
    cov += (x - meanX) * (y - meanY);
    varX += (x - meanX) ** 2;
    varY += (y - meanY) ** 2;
  }

  if (varX === 0 || varY === 0) return Number.NaN;
  return cov / Math.sqrt(varX * varY);
}

/** Symmetric matrix of pairwise correlations between columns */
export function correlationMatrix(columns: readonly number[][]): number[][] {
  return columns.map((xs, i) =>
    columns.map((ys, j) => {
      if (i === j) {
        return Number.isNaN(pearson(xs, xs)) ? Number.NaN : 1;
      }
      return pearson(xs, ys);
    })
  );
}

/** min/max/mean and sample standard deviation; null for an empty series */
export function summarize(values: readonly number[]): SeriesSummary | null {
  if (values.length === 0) return null;

  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance = values.length > 1
    ? values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (values.length - 1)
    : Number.NaN;

  return {
    min: Math.min(...values),
    max: Math.max(...values),
    mean,
    stdDev: Math.sqrt(variance),
  };
}
