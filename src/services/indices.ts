/**
 * Index Engine
 * Spectral index catalog and band math over a Sentinel-2 median composite
 * Location: src/services/indices.ts
 */

import type { AreaOfInterest } from '@/types/geo';
import type { CollectionExpr, ImageExpr, Visualization } from '@/types/compute';
import type { IndexDefinition, IndexLayer, IndexName } from '@/types/analysis';
import { add, clip, divide, multiply, normalizedDifference, rename, select, subtract } from '@/utils/bandMath';

// Sentinel-2 L2A band aliases
const BLUE = 'B2';
const GREEN = 'B3';
const RED = 'B4';
const NIR = 'B8';
const SWIR = 'B11';

const VEGETATION_RAMP = ['#8B4513', '#FFFF00', '#90EE90', '#006400'] as const;

/**
 * Index catalog (Sentinel-2 band names, documented range [-1, 1])
 */
export const VEGETATION_INDICES: Readonly<Record<IndexName, IndexDefinition>> = {
  NDVI: {
    name: 'NDVI',
    longName: 'Normalized Difference Vegetation Index',
    requiredBands: [NIR, RED],
    valueRange: [-1, 1],
    colorRamp: VEGETATION_RAMP,
    formula: '(NIR - RED) / (NIR + RED)',
    description: 'General vegetation health',
  },
  NDWI: {
    name: 'NDWI',
    longName: 'Normalized Difference Water Index',
    requiredBands: [GREEN, NIR],
    valueRange: [-1, 1],
    colorRamp: ['#8B4513', '#F5DEB3', '#87CEEB', '#0000FF'],
    formula: '(GREEN - NIR) / (GREEN + NIR)',
    description: 'Water content in vegetation',
  },
  MNDWI: {
    name: 'MNDWI',
    longName: 'Modified NDWI',
    requiredBands: [GREEN, SWIR],
    valueRange: [-1, 1],
    colorRamp: ['#FFFFE0', '#98FB98', '#4682B4', '#000080'],
    formula: '(GREEN - SWIR) / (GREEN + SWIR)',
    description: 'Open water detection',
  },
  NDBI: {
    name: 'NDBI',
    longName: 'Normalized Difference Built-up Index',
    requiredBands: [SWIR, NIR],
    valueRange: [-1, 1],
    colorRamp: ['#006400', '#90EE90', '#FFD700', '#FF0000'],
    formula: '(SWIR - NIR) / (SWIR + NIR)',
    description: 'Built-up area',
  },
  EVI: {
    name: 'EVI',
    longName: 'Enhanced Vegetation Index',
    requiredBands: [NIR, RED, BLUE],
    valueRange: [-1, 1],
    colorRamp: VEGETATION_RAMP,
    formula: '2.5 * (NIR - RED) / (NIR + 6*RED - 7.5*BLUE + 1)',
    description: 'Vegetation with atmospheric correction',
  },
  SAVI: {
    name: 'SAVI',
    longName: 'Soil Adjusted Vegetation Index',
    requiredBands: [NIR, RED],
    valueRange: [-1, 1],
    colorRamp: VEGETATION_RAMP,
    formula: '1.5 * (NIR - RED) / (NIR + RED + 0.5)',
    description: 'Vegetation with soil brightness correction',
  },
  BSI: {
    name: 'BSI',
    longName: 'Bare Soil Index',
    requiredBands: [SWIR, RED, NIR, BLUE],
    valueRange: [-1, 1],
    colorRamp: ['#006400', '#90EE90', '#DEB887', '#8B4513'],
    formula: '(SWIR + RED - NIR - BLUE) / (SWIR + RED + NIR + BLUE)',
    description: 'Bare soil',
  },
  NDMI: {
    name: 'NDMI',
    longName: 'Normalized Difference Moisture Index',
    requiredBands: [NIR, SWIR],
    valueRange: [-1, 1],
    colorRamp: ['#8B4513', '#D2691E', '#90EE90', '#006400'],
    formula: '(NIR - SWIR) / (NIR + SWIR)',
    description: 'Vegetation moisture',
  },
};

export const SENTINEL_RGB_VISUALIZATION: Visualization = {
  bands: [RED, GREEN, BLUE],
  min: 0,
  max: 0.3,
  palette: [],
};

export function isIndexName(value: string): value is IndexName {
  return Object.prototype.hasOwnProperty.call(VEGETATION_INDICES, value);
}

// ============================================================================
// FORMULAS
// ============================================================================

function indexExpression(composite: ImageExpr, name: IndexName): ImageExpr {
  const band = (id: string) => select(composite, id);

  switch (name) {
    case 'EVI': {
      const nir = band(NIR);
      const red = band(RED);
      const blue = band(BLUE);
      return divide(
        multiply(subtract(nir, red), 2.5),
        add(subtract(add(nir, multiply(red, 6)), multiply(blue, 7.5)), 1)
      );
    }

    case 'SAVI': {
      const nir = band(NIR);
      const red = band(RED);
      return multiply(divide(subtract(nir, red), add(add(nir, red), 0.5)), 1.5);
    }

    case 'BSI': {
      const blue = band(BLUE);
      const red = band(RED);
      const nir = band(NIR);
      const swir = band(SWIR);
      return divide(
        subtract(subtract(add(swir, red), nir), blue),
        add(add(add(swir, red), nir), blue)
      );
    }

    // NDVI, NDWI, MNDWI, NDBI, NDMI
    default: {
      const [first, second] = VEGETATION_INDICES[name].requiredBands;
      return normalizedDifference(composite, [first, second]);
    }
  }
}

/**
 * Build the single-band layer for one index. Values are not clamped to the
 * documented range.
 */
export function computeIndex(composite: ImageExpr, indexName: IndexName): IndexLayer {
  if (!isIndexName(indexName)) {
    throw new Error(`Unknown index "${String(indexName)}"`);
  }

  const definition = VEGETATION_INDICES[indexName];
  return {
    name: indexName,
    band: indexName,
    image: rename(indexExpression(composite, indexName), indexName),
    visualization: {
      min: definition.valueRange[0],
      max: definition.valueRange[1],
      palette: [...definition.colorRamp],
    },
  };
}

// ============================================================================
// SENTINEL-2 COLLECTION
// ============================================================================

/**
 * [start, end) covering months m0..m1 of one year. A December end stops at
 * Dec 31, so the last day of the year is excluded.
 */
export function dateRangeForYearMonths(year: number, startMonth: number, endMonth: number): { start: string; end: string } {
  const pad = (month: number) => String(month).padStart(2, '0');
  return {
    start: `${year}-${pad(startMonth)}-01`,
    end: endMonth === 12 ? `${year}-12-31` : `${year}-${pad(endMonth + 1)}-01`,
  };
}

export interface SentinelQuery {
  aoi: AreaOfInterest;
  start: string;
  end: string;
  cloudThreshold: number;
}

/**
 * Sentinel-2 surface reflectance over the AOI and period, scenes above the
 * cloud threshold dropped, QA60 cloud and cirrus bits masked, reflectance
 * scaled to 0..1
 */
export function buildSentinelCollection({ aoi, start, end, cloudThreshold }: SentinelQuery): CollectionExpr {
  return {
    id: 'COPERNICUS/S2_SR_HARMONIZED',
    filters: [
      { type: 'bounds', geometry: aoi.geometry },
      { type: 'date', start, end },
      { type: 'lte', property: 'CLOUDY_PIXEL_PERCENTAGE', value: cloudThreshold },
    ],
    cloudMask: { band: 'QA60', bits: [10, 11], scaleDivisor: 10_000 },
  };
}

export function medianComposite(collection: CollectionExpr, aoi: AreaOfInterest): ImageExpr {
  return clip({ kind: 'composite', collection, reducer: 'median' }, aoi.geometry);
}
