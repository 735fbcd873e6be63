/**
 * Land Cover Datasets
 * Dataset-specific logic for Dynamic World, ESA WorldCover and ESRI Land Cover
 * Location: src/services/datasets/landCover.ts
 */

import type { AreaOfInterest } from '@/types/geo';
import type { CollectionExpr, ImageExpr } from '@/types/compute';
import type { DynamicWorldMode, LandCoverDatasetId, LandCoverLayer, LandCoverLegend } from '@/types/analysis';
import { clip, divide, multiply, select, visualize } from '@/utils/bandMath';

// ============================================================================
// LEGENDS
// ============================================================================

export const DYNAMIC_WORLD_LEGEND: LandCoverLegend = {
  '0': { color: '#419BDF', label: 'Water' },
  '1': { color: '#397D49', label: 'Trees' },
  '2': { color: '#88B053', label: 'Grass' },
  '3': { color: '#7A87C6', label: 'Flooded vegetation' },
  '4': { color: '#E49635', label: 'Crops' },
  '5': { color: '#DFC35A', label: 'Shrub & Scrub' },
  '6': { color: '#C4281B', label: 'Built Area' },
  '7': { color: '#A59B8F', label: 'Bare ground' },
  '8': { color: '#B39FE1', label: 'Snow & Ice' },
};

export const ESA_WORLDCOVER_LEGEND: LandCoverLegend = {
  '10': { color: '#006400', label: 'Trees' },
  '20': { color: '#ffbb22', label: 'Shrubland' },
  '30': { color: '#ffff4c', label: 'Grassland' },
  '40': { color: '#f096ff', label: 'Cropland' },
  '50': { color: '#fa0000', label: 'Built-up' },
  '60': { color: '#b4b4b4', label: 'Barren/sparse vegetation' },
  '70': { color: '#f0f0f0', label: 'Snow and ice' },
  '80': { color: '#0032c8', label: 'Open water' },
  '90': { color: '#0096a0', label: 'Herbaceous wetland' },
  '95': { color: '#00cf75', label: 'Mangroves' },
  '100': { color: '#fae6a0', label: 'Moss and lichen' },
};

export const ESRI_LANDCOVER_LEGEND: LandCoverLegend = {
  '1': { color: '#1A5BAB', label: 'Water' },
  '2': { color: '#358221', label: 'Trees' },
  '3': { color: '#A7D282', label: 'Grass' },
  '4': { color: '#87D19E', label: 'Flooded Vegetation' },
  '5': { color: '#FFDB5C', label: 'Crops' },
  '6': { color: '#EECFA8', label: 'Scrub/Shrub' },
  '7': { color: '#ED022A', label: 'Built Area' },
  '8': { color: '#EDE9E4', label: 'Bare Ground' },
  '9': { color: '#F2FAFF', label: 'Snow/Ice' },
  '10': { color: '#C8C8C8', label: 'Clouds' },
};

function legendPalette(legend: LandCoverLegend): string[] {
  return Object.values(legend).map((entry) => entry.color);
}

// ============================================================================
// DYNAMIC WORLD
// ============================================================================

export const DYNAMIC_WORLD_PROBABILITY_BANDS = [
  'water',
  'trees',
  'grass',
  'flooded_vegetation',
  'crops',
  'shrub_and_scrub',
  'built',
  'bare',
  'snow_and_ice',
];

// Hillshade rendering uses the bare hex form
const DYNAMIC_WORLD_HILLSHADE_PALETTE = legendPalette(DYNAMIC_WORLD_LEGEND).map((color) =>
  color.replace('#', '').toLowerCase()
);

function dynamicWorldCollection(aoi: AreaOfInterest, start: string, end: string, bands: string[]): CollectionExpr {
  return {
    id: 'GOOGLE/DYNAMICWORLD/V1',
    filters: [
      { type: 'date', start, end },
      { type: 'bounds', geometry: aoi.geometry },
    ],
    bands,
  };
}

/**
 * Dynamic World over [start, end):
 *   mode        - per-pixel majority class (band label_mode)
 *   probability - mean of the 9 class probabilities
 *   hillshade   - majority class shaded by max class probability
 */
export function createDynamicWorldLayer(
  aoi: AreaOfInterest,
  start: string,
  end: string,
  mode: DynamicWorldMode
): LandCoverLayer {
  const base = {
    dataset: 'dynamic-world' as const,
    scale: 30,
    legend: DYNAMIC_WORLD_LEGEND,
  };

  if (mode === 'mode') {
    return {
      ...base,
      label: 'Dynamic World',
      image: clip(
        { kind: 'composite', collection: dynamicWorldCollection(aoi, start, end, ['label']), reducer: 'mode', suffixBands: true },
        aoi.geometry
      ),
      classBand: 'label_mode',
      visualization: { min: 0, max: 8, palette: legendPalette(DYNAMIC_WORLD_LEGEND) },
    };
  }

  const probabilities: ImageExpr = {
    kind: 'composite',
    collection: dynamicWorldCollection(aoi, start, end, DYNAMIC_WORLD_PROBABILITY_BANDS),
    reducer: 'mean',
  };

  if (mode === 'probability') {
    return {
      ...base,
      label: 'Dynamic World Probability',
      image: clip(probabilities, aoi.geometry),
      visualization: { min: 0, max: 1, palette: ['white', 'blue'], bands: ['water'] },
    };
  }

  const classification: ImageExpr = {
    kind: 'composite',
    collection: dynamicWorldCollection(aoi, start, end, ['label']),
    reducer: 'mode',
  };
  const maxProbability: ImageExpr = { kind: 'bandReduce', source: probabilities, reducer: 'max' };
  const shade = divide(
    { kind: 'hillshade', source: multiply(maxProbability, 100), azimuth: 270, elevation: 45 },
    255
  );
  const rgb = visualize(classification, { min: 0, max: 8, palette: DYNAMIC_WORLD_HILLSHADE_PALETTE });

  return {
    ...base,
    label: 'Dynamic World Hillshade',
    image: clip(multiply(rgb, shade), aoi.geometry),
  };
}

// ============================================================================
// STATIC PRODUCTS
// ============================================================================

/**
 * ESA WorldCover 10 m (first image of the collection), band Map
 */
export function createEsaWorldCoverLayer(aoi: AreaOfInterest): LandCoverLayer {
  return {
    dataset: 'esa-worldcover',
    label: 'ESA WorldCover',
    image: clip(
      select({ kind: 'composite', collection: { id: 'ESA/WorldCover/v100', filters: [] }, reducer: 'first' }, 'Map'),
      aoi.geometry
    ),
    classBand: 'Map',
    scale: 10,
    legend: ESA_WORLDCOVER_LEGEND,
  };
}

/**
 * ESRI Global LULC 10 m mosaic, band b1
 */
export function createEsriLandCoverLayer(aoi: AreaOfInterest): LandCoverLayer {
  return {
    dataset: 'esri-landcover',
    label: 'ESRI Land Cover',
    image: clip(
      {
        kind: 'composite',
        collection: { id: 'projects/sat-io/open-datasets/landcover/ESRI_Global-LULC_10m', filters: [] },
        reducer: 'mosaic',
      },
      aoi.geometry
    ),
    classBand: 'b1',
    scale: 10,
    legend: ESRI_LANDCOVER_LEGEND,
    visualization: { min: 1, max: 10, palette: legendPalette(ESRI_LANDCOVER_LEGEND) },
  };
}

// ============================================================================
// COMPOSER
// ============================================================================

export interface LandCoverOptions {
  datasets: readonly LandCoverDatasetId[];
  year: number;
  dynamicWorldMode: DynamicWorldMode;
}

/**
 * Build the selected land cover layers, Dynamic World over the calendar year
 */
export function composeLandCover(aoi: AreaOfInterest, options: LandCoverOptions): LandCoverLayer[] {
  const layers: LandCoverLayer[] = [];

  if (options.datasets.includes('dynamic-world')) {
    console.log(`[LandCover] Loading Dynamic World (${options.dynamicWorldMode} mode)...`);
    layers.push(
      createDynamicWorldLayer(aoi, `${options.year}-01-01`, `${options.year}-12-31`, options.dynamicWorldMode)
    );
  }
  if (options.datasets.includes('esa-worldcover')) {
    console.log('[LandCover] Loading ESA WorldCover...');
    layers.push(createEsaWorldCoverLayer(aoi));
  }
  if (options.datasets.includes('esri-landcover')) {
    console.log('[LandCover] Loading ESRI Land Cover...');
    layers.push(createEsriLandCoverLayer(aoi));
  }

  return layers;
}
