/**
 * Index Time Series
 * Mean index value over the AOI for each month (or half-month) of a year.
 * Periods are processed one after another; a failing period is logged and
 * left out, the loop carries on.
 * Location: src/services/timeSeries.ts
 */

import { ANALYSIS_DEFAULTS } from '@/config';
import type { AreaOfInterest } from '@/types/geo';
import type { ComputeService } from '@/types/compute';
import type {
  IndexName,
  StatFailure,
  TimeSeriesInterval,
  TimeSeriesPeriod,
  TimeSeriesPoint,
  TimeSeriesResult,
} from '@/types/analysis';
import { summarize } from '@/utils/math';
import { buildSentinelCollection, computeIndex } from './indices';

const pad = (value: number) => String(value).padStart(2, '0');

/**
 * Periods of one year as [start, end) date strings.
 *   monthly  - 12 periods labelled "01".."12", dated the 15th
 *   biweekly - 24 periods, days 1-14 ("01a", dated the 8th) and 15-end
 *              ("01b", dated the 22nd)
 * The year's last period ends on Dec 31.
 */
export function buildPeriods(year: number, interval: TimeSeriesInterval): TimeSeriesPeriod[] {
  const periods: TimeSeriesPeriod[] = [];

  for (let month = 1; month <= 12; month++) {
    const mm = pad(month);
    const monthEnd = month === 12 ? `${year}-12-31` : `${year}-${pad(month + 1)}-01`;

    if (interval === 'monthly') {
      periods.push({ start: `${year}-${mm}-01`, end: monthEnd, label: mm, date: `${year}-${mm}-15` });
      continue;
    }

    periods.push(
      { start: `${year}-${mm}-01`, end: `${year}-${mm}-15`, label: `${mm}a`, date: `${year}-${mm}-08` },
      { start: `${year}-${mm}-15`, end: monthEnd, label: `${mm}b`, date: `${year}-${mm}-22` }
    );
  }

  return periods;
}

export interface TimeSeriesRequest {
  aoi: AreaOfInterest;
  index: IndexName;
  year: number;
  interval: TimeSeriesInterval;
  cloudThreshold?: number;
}

/**
 * Median-composite index mean per period. Periods without imagery are
 * skipped; a period whose reduction has no value is kept with value null.
 */
export async function computeIndexTimeSeries(
  compute: ComputeService,
  request: TimeSeriesRequest
): Promise<TimeSeriesResult> {
  const { aoi, index, year, interval } = request;
  const cloudThreshold = request.cloudThreshold ?? ANALYSIS_DEFAULTS.timeSeriesCloudThreshold;

  const periods = buildPeriods(year, interval);
  const points: TimeSeriesPoint[] = [];
  const failures: StatFailure[] = [];

  console.log(`[TimeSeries] ${index} ${year} (${interval}, ${periods.length} periods)`);

  for (const period of periods) {
    try {
      const collection = buildSentinelCollection({ aoi, start: period.start, end: period.end, cloudThreshold });
      const size = await compute.collectionSize(collection);
      if (size === 0) {
        console.log(`[TimeSeries] No imagery for ${period.label}, skipping`);
        continue;
      }

      const layer = computeIndex({ kind: 'composite', collection, reducer: 'median' }, index);
      const stats = await compute.reduceRegion({
        image: layer.image,
        reducer: { type: 'mean' },
        geometry: aoi.geometry,
        scale: ANALYSIS_DEFAULTS.timeSeriesScale,
        maxPixels: ANALYSIS_DEFAULTS.maxPixels,
        bestEffort: true,
      });

      const value = stats[index];
      points.push({
        period: period.label,
        date: period.date,
        value: typeof value === 'number' && Number.isFinite(value) ? value : null,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[TimeSeries] ⚠️ Period ${period.label} failed:`, message);
      failures.push({ target: period.label, message });
    }
  }

  const values = points.flatMap((point) => (point.value === null ? [] : [point.value]));
  const summary = summarize(values);

  console.log('[TimeSeries] ✅ Complete:', { points: points.length, failed: failures.length });
  return { index, year, interval, points, summary, failures };
}
