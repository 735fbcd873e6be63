import { describe, expect, it } from 'vitest';
import type { ImageExpr } from '@/types/compute';
import { INDEX_NAMES, type IndexName } from '@/types/analysis';
import { evaluatePixel } from '@/utils/bandMath';
import { buildAreaOfInterest } from '@/utils/geometry';
import {
  buildSentinelCollection,
  computeIndex,
  dateRangeForYearMonths,
  isIndexName,
  medianComposite,
  VEGETATION_INDICES,
} from './indices';

const aoi = buildAreaOfInterest({
  name: 'Test box',
  sourceMode: 'drawn',
  geometry: {
    type: 'Polygon',
    coordinates: [[[106.7, -6.3], [106.9, -6.3], [106.9, -6.1], [106.7, -6.1], [106.7, -6.3]]],
  },
});

const composite: ImageExpr = {
  kind: 'composite',
  collection: { id: 'COPERNICUS/S2_SR_HARMONIZED', filters: [] },
  reducer: 'median',
};

const pixel = { B2: 0.05, B3: 0.08, B4: 0.1, B8: 0.4, B11: 0.2 };

function indexValue(name: IndexName, values: Record<string, number> = pixel): number {
  const result = evaluatePixel(computeIndex(composite, name).image, values);
  expect(Object.keys(result)).toEqual([name]);
  return result[name];
}

describe('VEGETATION_INDICES', () => {
  it('holds the eight indices with their Sentinel-2 bands', () => {
    expect(Object.keys(VEGETATION_INDICES)).toEqual([...INDEX_NAMES]);
    expect(VEGETATION_INDICES.NDVI.requiredBands).toEqual(['B8', 'B4']);
    expect(VEGETATION_INDICES.MNDWI.requiredBands).toEqual(['B3', 'B11']);
    expect(VEGETATION_INDICES.BSI.requiredBands).toEqual(['B11', 'B4', 'B8', 'B2']);
    for (const name of INDEX_NAMES) {
      expect(VEGETATION_INDICES[name].valueRange).toEqual([-1, 1]);
    }
  });

  it('validates index names', () => {
    expect(isIndexName('NDVI')).toBe(true);
    expect(isIndexName('ndvi')).toBe(false);
    expect(isIndexName('toString')).toBe(false);
  });
});

describe('computeIndex', () => {
  it('computes normalized differences', () => {
    expect(indexValue('NDVI')).toBeCloseTo((0.4 - 0.1) / (0.4 + 0.1), 12);
    expect(indexValue('NDWI')).toBeCloseTo((0.08 - 0.4) / (0.08 + 0.4), 12);
    expect(indexValue('MNDWI')).toBeCloseTo((0.08 - 0.2) / (0.08 + 0.2), 12);
    expect(indexValue('NDBI')).toBeCloseTo((0.2 - 0.4) / (0.2 + 0.4), 12);
    expect(indexValue('NDMI')).toBeCloseTo((0.4 - 0.2) / (0.4 + 0.2), 12);
  });

  it('gives NDVI 0.6 for NIR 0.4 and RED 0.1', () => {
    expect(indexValue('NDVI', { B4: 0.1, B8: 0.4 })).toBeCloseTo(0.6, 12);
  });

  it('computes EVI', () => {
    expect(indexValue('EVI')).toBeCloseTo(0.75 / 1.625, 12);
  });

  it('computes SAVI', () => {
    expect(indexValue('SAVI')).toBeCloseTo(0.45, 12);
  });

  it('computes BSI', () => {
    expect(indexValue('BSI')).toBeCloseTo(-0.2, 12);
  });

  it('does not clamp values outside the documented range', () => {
    expect(indexValue('NDVI', { B4: -0.6, B8: 0.5 })).toBeCloseTo(-11, 10);
  });

  it('carries the catalog palette and range as visualization', () => {
    const layer = computeIndex(composite, 'NDBI');
    expect(layer.band).toBe('NDBI');
    expect(layer.visualization).toEqual({
      min: -1,
      max: 1,
      palette: ['#006400', '#90EE90', '#FFD700', '#FF0000'],
    });
  });
});

describe('dateRangeForYearMonths', () => {
  it('ends on the first day of the following month', () => {
    expect(dateRangeForYearMonths(2024, 3, 5)).toEqual({ start: '2024-03-01', end: '2024-06-01' });
  });

  it('ends on December 31 for a December end month', () => {
    expect(dateRangeForYearMonths(2023, 1, 12)).toEqual({ start: '2023-01-01', end: '2023-12-31' });
  });
});

describe('Sentinel-2 collection', () => {
  it('filters by AOI, date and cloud cover and masks QA60 clouds', () => {
    expect(buildSentinelCollection({ aoi, start: '2024-01-01', end: '2024-07-01', cloudThreshold: 20 })).toEqual({
      id: 'COPERNICUS/S2_SR_HARMONIZED',
      filters: [
        { type: 'bounds', geometry: aoi.geometry },
        { type: 'date', start: '2024-01-01', end: '2024-07-01' },
        { type: 'lte', property: 'CLOUDY_PIXEL_PERCENTAGE', value: 20 },
      ],
      cloudMask: { band: 'QA60', bits: [10, 11], scaleDivisor: 10_000 },
    });
  });

  it('clips the median composite to the AOI', () => {
    const collection = buildSentinelCollection({ aoi, start: '2024-01-01', end: '2024-02-01', cloudThreshold: 40 });
    expect(medianComposite(collection, aoi)).toEqual({
      kind: 'clip',
      source: { kind: 'composite', collection, reducer: 'median' },
      geometry: aoi.geometry,
    });
  });
});
