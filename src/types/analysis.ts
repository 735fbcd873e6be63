/**
 * Analysis Types
 * Index catalog, land cover layers and derived statistics
 * Location: src/types/analysis.ts
 */

import type { ImageExpr, Visualization } from './compute';

// ============================================================================
// VEGETATION INDICES
// ============================================================================

export const INDEX_NAMES = ['NDVI', 'NDWI', 'MNDWI', 'NDBI', 'EVI', 'SAVI', 'BSI', 'NDMI'] as const;

export type IndexName = (typeof INDEX_NAMES)[number];

export interface IndexDefinition {
  name: IndexName;
  longName: string;
  requiredBands: readonly string[];
  valueRange: readonly [number, number];
  colorRamp: readonly string[];
  formula: string;                // documentation only
  description: string;
}

/** Single-band raster function over the AOI, not materialized until reduced */
export interface IndexLayer {
  name: IndexName;
  band: IndexName;
  image: ImageExpr;
  visualization: Visualization;
}

// ============================================================================
// LAND COVER
// ============================================================================

export const LAND_COVER_DATASETS = ['dynamic-world', 'esa-worldcover', 'esri-landcover'] as const;

export type LandCoverDatasetId = (typeof LAND_COVER_DATASETS)[number];

export const DYNAMIC_WORLD_MODES = ['mode', 'probability', 'hillshade'] as const;

export type DynamicWorldMode = (typeof DYNAMIC_WORLD_MODES)[number];

export interface LegendEntry {
  color: string;
  label: string;
}

/** Class code (as string) -> legend entry */
export type LandCoverLegend = Readonly<Record<string, LegendEntry>>;

export interface LandCoverLayer {
  dataset: LandCoverDatasetId;
  label: string;
  image: ImageExpr;
  classBand?: string;             // only for categorical layers
  scale: number;                  // native resolution, metres
  legend: LandCoverLegend;
  visualization?: Visualization;
}

// ============================================================================
// STATISTICS
// ============================================================================

export interface IndexStatRecord {
  index: IndexName;
  min: number;
  mean: number;
  max: number;
  stdDev: number;
  description: string;
}

export interface ClassAreaRecord {
  classCode: number;
  label: string;
  color: string;
  areaHectares: number;
  pixelCount: number;
  percentage: number;
}

export interface LandCoverStats {
  dataset: LandCoverDatasetId;
  label: string;
  scale: number;
  classes: ClassAreaRecord[];
  totalAreaHectares: number;
}

export type CorrelationResult =
  | {
      status: 'available';
      indices: IndexName[];
      matrix: number[][];
      sampleSize: number;
    }
  | { status: 'unavailable'; reason: string };

export interface StatFailure {
  target: string;
  message: string;
}

// ============================================================================
// TIME SERIES
// ============================================================================

export type TimeSeriesInterval = 'monthly' | 'biweekly';

export interface TimeSeriesPeriod {
  start: string;
  end: string;
  label: string;
  date: string;                   // representative mid-period date
}

export interface TimeSeriesPoint {
  period: string;
  date: string;
  value: number | null;
}

export interface SeriesSummary {
  min: number;
  max: number;
  mean: number;
  stdDev: number;
}

// ============================================================================
// RESULTS
// ============================================================================

export interface IndexStatsResult {
  records: IndexStatRecord[];
  failures: StatFailure[];
}

export interface LandCoverSummary {
  stats: LandCoverStats[];
  failures: StatFailure[];
}

export interface TimeSeriesResult {
  index: IndexName;
  year: number;
  interval: TimeSeriesInterval;
  points: TimeSeriesPoint[];
  summary: SeriesSummary | null;  // over non-null values only
  failures: StatFailure[];
}
