/**
 * Analysis Run
 * Orchestrates one analysis over the session's AOI: Sentinel-2 composite,
 * index layers and statistics, land cover layers and class areas.
 * Also submits GeoTIFF exports of individual layers.
 * Location: src/services/analysis.ts
 */

import { z } from 'zod';
import { ANALYSIS_DEFAULTS } from '@/config';
import type { AreaOfInterest } from '@/types/geo';
import type { ComputeService, ExportTask, ImageExpr, Visualization } from '@/types/compute';
import {
  DYNAMIC_WORLD_MODES,
  INDEX_NAMES,
  LAND_COVER_DATASETS,
  type CorrelationResult,
  type IndexLayer,
  type IndexStatRecord,
  type LandCoverLayer,
  type LandCoverStats,
  type StatFailure,
} from '@/types/analysis';
import type { AoiSession } from './aoiResolver';
import { composeLandCover } from './datasets/landCover';
import {
  buildSentinelCollection,
  computeIndex,
  dateRangeForYearMonths,
  medianComposite,
  SENTINEL_RGB_VISUALIZATION,
} from './indices';
import { computeIndexCorrelation, computeIndexStats, summarizeLandCover } from './statistics';

export type AnalysisHaltReason = 'no-aoi' | 'no-imagery' | 'compute-failed';

/**
 * Stops the current analysis run; the session itself stays usable
 */
export class AnalysisHaltedError extends Error {
  constructor(message: string, readonly reason: AnalysisHaltReason) {
    super(message);
    this.name = 'AnalysisHaltedError';
  }
}

const monthSchema = z.number().int().min(1).max(12);

export const analysisParamsSchema = z.object({
  analysisType: z.enum(['vegetation', 'land-cover', 'combined']),
  year: z.number().int().min(2015),
  months: z
    .tuple([monthSchema, monthSchema])
    .refine(([first, last]) => first <= last, 'Start month must not be after end month')
    .default([1, 12]),
  cloudThreshold: z.number().min(0).max(100).default(ANALYSIS_DEFAULTS.cloudThreshold),
  indices: z.array(z.enum(INDEX_NAMES)).default([]),
  landCoverDatasets: z.array(z.enum(LAND_COVER_DATASETS)).default([]),
  dynamicWorldMode: z.enum(DYNAMIC_WORLD_MODES).default('mode'),
});

export type AnalysisParams = z.input<typeof analysisParamsSchema>;

export interface SentinelComposite {
  start: string;
  end: string;
  imageCount: number;
  image: ImageExpr;
  visualization: Visualization;
}

export interface AnalysisResult {
  aoi: AreaOfInterest;
  composite: SentinelComposite | null;
  indexLayers: IndexLayer[];
  indexStats: IndexStatRecord[];
  correlation: CorrelationResult | null;   // null with fewer than two indices
  landCoverLayers: LandCoverLayer[];
  landCoverStats: LandCoverStats[];
  failures: StatFailure[];
}

/**
 * Run one analysis. Throws AnalysisHaltedError without an AOI, when the
 * Sentinel-2 collection query fails, or when it is empty for the requested
 * period. Per-statistic failures are collected in `failures`.
 */
export async function runAnalysis(
  compute: ComputeService,
  session: AoiSession,
  params: AnalysisParams
): Promise<AnalysisResult> {
  const { aoi } = session;
  if (!aoi) {
    throw new AnalysisHaltedError('Select an area of interest first', 'no-aoi');
  }

  const options = analysisParamsSchema.parse(params);
  const result: AnalysisResult = {
    aoi,
    composite: null,
    indexLayers: [],
    indexStats: [],
    correlation: null,
    landCoverLayers: [],
    landCoverStats: [],
    failures: [],
  };

  console.log(`[Analysis] Starting ${options.analysisType} analysis for "${aoi.name}" (${options.year})`);

  if (options.analysisType !== 'land-cover') {
    const { start, end } = dateRangeForYearMonths(options.year, options.months[0], options.months[1]);
    const collection = buildSentinelCollection({ aoi, start, end, cloudThreshold: options.cloudThreshold });

    let imageCount: number;
    try {
      imageCount = await compute.collectionSize(collection);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[Analysis] Sentinel-2 collection query failed:', message);
      throw new AnalysisHaltedError(`Could not query Sentinel-2 imagery: ${message}`, 'compute-failed');
    }
    console.log(`[Analysis] Found ${imageCount} Sentinel-2 images (${start} to ${end})`);
    if (imageCount === 0) {
      throw new AnalysisHaltedError(
        'No Sentinel-2 images found for this period. Try adjusting the date range or cloud threshold.',
        'no-imagery'
      );
    }

    const image = medianComposite(collection, aoi);
    result.composite = { start, end, imageCount, image, visualization: SENTINEL_RGB_VISUALIZATION };
    result.indexLayers = options.indices.map((name) => computeIndex(image, name));

    const indexStats = await computeIndexStats(compute, result.indexLayers, aoi);
    result.indexStats = indexStats.records;
    result.failures.push(...indexStats.failures);

    if (result.indexLayers.length > 1) {
      result.correlation = await computeIndexCorrelation(compute, result.indexLayers, aoi);
    }
  }

  if (options.analysisType !== 'vegetation') {
    result.landCoverLayers = composeLandCover(aoi, {
      datasets: options.landCoverDatasets,
      year: options.year,
      dynamicWorldMode: options.dynamicWorldMode,
    });

    const landCover = await summarizeLandCover(compute, result.landCoverLayers, aoi);
    result.landCoverStats = landCover.stats;
    result.failures.push(...landCover.failures);
  }

  console.log('[Analysis] ✅ Complete:', {
    indexLayers: result.indexLayers.length,
    landCoverLayers: result.landCoverLayers.length,
    failures: result.failures.length,
  });
  return result;
}

// ============================================================================
// EXPORT
// ============================================================================

export interface LayerExportRequest {
  layer: IndexLayer | LandCoverLayer;
  aoi: AreaOfInterest;
  description: string;
}

/**
 * Submit a GeoTIFF export job: 10 m for land cover layers, 20 m otherwise
 */
export async function submitLayerExport(compute: ComputeService, request: LayerExportRequest): Promise<ExportTask> {
  const { layer, aoi } = request;
  const scale = 'dataset' in layer ? 10 : 20;

  const task = await compute.startExport({
    image: layer.image,
    description: request.description.replace(/ /g, '_'),
    scale,
    region: aoi.geometry,
    fileFormat: 'GeoTIFF',
    maxPixels: ANALYSIS_DEFAULTS.exportMaxPixels,
  });

  console.log(`[Analysis] ✅ Export started: ${task.id}`);
  return task;
}
