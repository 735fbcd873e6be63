/**
 * Geometry Utilities
 * Validation, union and measurement of AOI geometries
 * Location: src/utils/geometry.ts
 */

import { area, bbox, featureCollection, union } from '@turf/turf';
import type { Feature, MultiPolygon, Polygon, Position } from 'geojson';
import { z } from 'zod';
import type { AoiGeometry, AoiMode, AreaOfInterest, FeatureAttributes, RegionRef } from '@/types/geo';

// ============================================================================
// SCHEMAS
// ============================================================================

const positionSchema = z.array(z.number()).min(2);
const ringSchema = z.array(positionSchema);

export const polygonSchema = z.object({
  type: z.literal('Polygon'),
  coordinates: z.array(ringSchema),
});

export const multiPolygonSchema = z.object({
  type: z.literal('MultiPolygon'),
  coordinates: z.array(z.array(ringSchema)),
});

export const aoiGeometrySchema = z.discriminatedUnion('type', [polygonSchema, multiPolygonSchema]);

/** Any GeoJSON geometry; only the type is inspected up front */
const looseGeometrySchema = z.object({ type: z.string() }).passthrough();

export const featureSchema = z.object({
  type: z.literal('Feature'),
  geometry: looseGeometrySchema.nullable(),
  properties: z.record(z.unknown()).nullable().optional(),
});

export const featureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(featureSchema),
  crs: z.unknown().optional(),
});

export type LooseFeature = z.infer<typeof featureSchema>;

// ============================================================================
// VALIDATION
// ============================================================================

function allPositions(geometry: AoiGeometry): Position[] {
  if (geometry.type === 'Polygon') return geometry.coordinates.flat();
  return geometry.coordinates.flat(2);
}

/**
 * Returns a reason when the geometry cannot be used as an AOI:
 * no ring with at least 4 positions, or a position outside lon/lat bounds.
 */
export function geometryProblem(geometry: AoiGeometry): string | null {
  const rings = geometry.type === 'Polygon' ? geometry.coordinates : geometry.coordinates.flat();
  if (!rings.some((ring) => ring.length >= 4)) {
    return 'Geometry has no closed ring';
  }

  for (const [lon, lat] of allPositions(geometry)) {
    if (!Number.isFinite(lon) || !Number.isFinite(lat)) {
      return 'Geometry contains non-numeric coordinates';
    }
    if (lon < -180 || lon > 180 || lat < -90 || lat > 90) {
      return `Coordinate [${lon}, ${lat}] is outside geographic bounds`;
    }
  }
  return null;
}

/** Narrow a loose geometry to Polygon/MultiPolygon, or null */
export function asAoiGeometry(geometry: unknown): AoiGeometry | null {
  const parsed = aoiGeometrySchema.safeParse(geometry);
  return parsed.success ? parsed.data : null;
}

// ============================================================================
// UNION
// ============================================================================

/**
 * Dissolve polygonal geometries into one. A single geometry is returned as-is
 * so that its coordinates are not rewritten by the clipping library.
 */
export function unionGeometries(geometries: AoiGeometry[]): AoiGeometry | null {
  if (geometries.length === 0) return null;
  if (geometries.length === 1) return geometries[0];

  const features: Feature<Polygon | MultiPolygon>[] = geometries.map((geometry) => ({
    type: 'Feature',
    properties: {},
    geometry,
  }));

  const merged = union(featureCollection(features));
  return merged ? merged.geometry : null;
}

// ============================================================================
// AOI
// ============================================================================

export interface AoiDraft {
  name: string;
  sourceMode: AoiMode;
  geometry: AoiGeometry;
  attributes?: FeatureAttributes[];
  region?: RegionRef[];
}

function freezeTree(node: unknown): void {
  if (!Array.isArray(node)) return;
  node.forEach(freezeTree);
  Object.freeze(node);
}

/** Deep copy of the geometry with every ring and position frozen */
function frozenGeometry(geometry: AoiGeometry): AoiGeometry {
  const copy = structuredClone(geometry);
  freezeTree(copy.coordinates);
  Object.freeze(copy);
  return copy;
}

/**
 * Freeze a validated geometry into an AreaOfInterest. The geometry is copied
 * and frozen down to its positions; the draft stays untouched.
 */
export function buildAreaOfInterest(draft: AoiDraft): AreaOfInterest {
  const problem = geometryProblem(draft.geometry);
  if (problem) {
    throw new Error(problem);
  }

  const geometry = frozenGeometry(draft.geometry);
  const feature: Feature<AoiGeometry> = { type: 'Feature', properties: {}, geometry };

  const aoi: AreaOfInterest = {
    name: draft.name,
    sourceMode: draft.sourceMode,
    geometry,
    attributes: Object.freeze([...(draft.attributes ?? [])]),
    sourceCrs: 'EPSG:4326',
    bounds: bbox(feature),
    areaKm2: area(feature) / 1_000_000,
    ...(draft.region ? { region: Object.freeze([...draft.region]) } : {}),
  };
  return Object.freeze(aoi);
}
