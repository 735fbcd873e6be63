/**
 * Statistics Aggregator
 * Per-index scalar stats, cross-index correlation and per-class land cover
 * areas, each computed remotely and post-processed here.
 * A failing index or dataset is recorded and skipped; the rest continue.
 * Location: src/services/statistics.ts
 */

import { z } from 'zod';
import { ANALYSIS_DEFAULTS } from '@/config';
import type { AreaOfInterest } from '@/types/geo';
import type { ComputeService, SampleResult } from '@/types/compute';
import type {
  ClassAreaRecord,
  CorrelationResult,
  IndexLayer,
  IndexStatRecord,
  IndexStatsResult,
  LandCoverLayer,
  LandCoverStats,
  LandCoverSummary,
  StatFailure,
} from '@/types/analysis';
import { cat, select } from '@/utils/bandMath';
import { correlationMatrix, round, toNumberOrNaN } from '@/utils/math';
import { VEGETATION_INDICES } from './indices';

const histogramSchema = z.record(z.number());

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// INDEX STATISTICS
// ============================================================================

/**
 * min / mean / max / stdDev per index layer in one combined reduction each.
 * Missing keys become NaN; values are rounded to 4 decimals.
 */
export async function computeIndexStats(
  compute: ComputeService,
  layers: readonly IndexLayer[],
  aoi: AreaOfInterest
): Promise<IndexStatsResult> {
  const records: IndexStatRecord[] = [];
  const failures: StatFailure[] = [];

  for (const layer of layers) {
    try {
      console.log(`[Stats] Calculating ${layer.name}...`);
      const stats = await compute.reduceRegion({
        image: layer.image,
        reducer: { type: 'combined', reducers: ['minMax', 'mean', 'stdDev'], sharedInputs: true },
        geometry: aoi.geometry,
        scale: ANALYSIS_DEFAULTS.indexStatsScale,
        maxPixels: ANALYSIS_DEFAULTS.maxPixels,
        bestEffort: true,
      });

      const stat = (suffix: string) => round(toNumberOrNaN(stats[`${layer.band}_${suffix}`]), 4);
      records.push({
        index: layer.name,
        min: stat('min'),
        mean: stat('mean'),
        max: stat('max'),
        stdDev: stat('stdDev'),
        description: VEGETATION_INDICES[layer.name].description,
      });
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`[Stats] ⚠️ Failed to calculate ${layer.name} statistics:`, message);
      failures.push({ target: layer.name, message });
    }
  }

  console.log('[Stats] ✅ Index statistics:', { computed: records.length, failed: failures.length });
  return { records, failures };
}

// ============================================================================
// CORRELATION
// ============================================================================

/**
 * Pearson correlation between index layers over a random pixel sample of
 * the stacked layers. Degrades to "unavailable" instead of throwing.
 */
export async function computeIndexCorrelation(
  compute: ComputeService,
  layers: readonly IndexLayer[],
  aoi: AreaOfInterest
): Promise<CorrelationResult> {
  if (layers.length < 2) {
    return { status: 'unavailable', reason: 'At least two indices are needed for a correlation' };
  }

  let features: SampleResult['features'];
  try {
    const sample = await compute.sample({
      image: cat(layers.map((layer) => layer.image)),
      region: aoi.geometry,
      scale: ANALYSIS_DEFAULTS.correlationScale,
      numPixels: ANALYSIS_DEFAULTS.correlationSamplePoints,
      geometries: false,
    });
    features = sample.features;
  } catch (error) {
    const reason = `Could not sample indices: ${errorMessage(error)}`;
    console.warn(`[Stats] ⚠️ ${reason}`);
    return { status: 'unavailable', reason };
  }

  if (features.length === 0) {
    return { status: 'unavailable', reason: 'Sample returned no pixels' };
  }

  const columns = layers.map((layer) =>
    features.map((feature) => toNumberOrNaN(feature.properties[layer.band]))
  );

  return {
    status: 'available',
    indices: layers.map((layer) => layer.name),
    matrix: correlationMatrix(columns),
    sampleSize: features.length,
  };
}

// ============================================================================
// LAND COVER
// ============================================================================

/**
 * Class areas from a frequency histogram of the layer's class band at its
 * native scale. Codes missing from the legend are dropped.
 */
export async function computeLandCoverStats(
  compute: ComputeService,
  layer: LandCoverLayer,
  aoi: AreaOfInterest
): Promise<LandCoverStats> {
  const { classBand } = layer;
  if (!classBand) {
    throw new Error(`${layer.label} is not a categorical layer`);
  }

  const counts = await compute.reduceRegion({
    image: select(layer.image, classBand),
    reducer: { type: 'frequencyHistogram' },
    geometry: aoi.geometry,
    scale: layer.scale,
    maxPixels: ANALYSIS_DEFAULTS.maxPixels,
    bestEffort: true,
  });

  const histogram = histogramSchema.safeParse(counts[classBand]);
  if (!histogram.success) {
    console.warn(`[Stats] ⚠️ No histogram for ${layer.label}`);
    return { dataset: layer.dataset, label: layer.label, scale: layer.scale, classes: [], totalAreaHectares: 0 };
  }

  const rows: Array<Omit<ClassAreaRecord, 'percentage'>> = [];
  for (const [key, pixelCount] of Object.entries(histogram.data)) {
    // histogram keys may come back as "10" or "10.0"
    const classCode = Number(key);
    const entry = layer.legend[String(classCode)];
    if (!entry) continue;

    rows.push({
      classCode,
      label: entry.label,
      color: entry.color,
      areaHectares: round((pixelCount * layer.scale * layer.scale) / 10_000, 2),
      pixelCount,
    });
  }

  const total = rows.reduce((sum, row) => sum + row.areaHectares, 0);
  const classes: ClassAreaRecord[] = rows
    .map((row) => ({ ...row, percentage: total > 0 ? round((row.areaHectares / total) * 100, 1) : 0 }))
    .sort((a, b) => b.areaHectares - a.areaHectares);

  return {
    dataset: layer.dataset,
    label: layer.label,
    scale: layer.scale,
    classes,
    totalAreaHectares: round(total, 2),
  };
}

/**
 * Class statistics for every categorical layer
 */
export async function summarizeLandCover(
  compute: ComputeService,
  layers: readonly LandCoverLayer[],
  aoi: AreaOfInterest
): Promise<LandCoverSummary> {
  const stats: LandCoverStats[] = [];
  const failures: StatFailure[] = [];

  for (const layer of layers) {
    if (!layer.classBand) {
      console.log(`[Stats] Skipping ${layer.label} (not categorical)`);
      continue;
    }

    try {
      console.log(`[Stats] Processing ${layer.label}...`);
      stats.push(await computeLandCoverStats(compute, layer, aoi));
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`[Stats] ⚠️ Failed to calculate ${layer.label} statistics:`, message);
      failures.push({ target: layer.label, message });
    }
  }

  return { stats, failures };
}
