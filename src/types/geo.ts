/**
 * Area of Interest & Geometry Types
 * Location: src/types/geo.ts
 */

import type { BBox, MultiPolygon, Polygon } from 'geojson';

// ============================================================================
// GEOMETRY
// ============================================================================

/** Canonical AOI geometry, always EPSG:4326 with [lon, lat] positions */
export type AoiGeometry = Polygon | MultiPolygon;

export interface LatLonEnvelope {
  latMin: number;
  latMax: number;
  lonMin: number;
  lonMax: number;
}

// ============================================================================
// ADMINISTRATIVE REGIONS
// ============================================================================

export type AdminLevel = 'province' | 'city' | 'district' | 'village';

export interface RegionRef {
  level: AdminLevel;
  name: string;
  code: string;
}

/** Dropdown payload of the boundary API: display name -> region code */
export type RegionOptions = Record<string, string>;

// ============================================================================
// AREA OF INTEREST
// ============================================================================

export type AoiMode = 'admin' | 'upload' | 'point-buffer' | 'drawn';

export type FeatureAttributes = Record<string, unknown>;

export interface AreaOfInterest {
  readonly name: string;
  readonly sourceMode: AoiMode;
  readonly geometry: AoiGeometry;
  readonly attributes: readonly FeatureAttributes[];
  readonly sourceCrs: 'EPSG:4326';
  readonly bounds: BBox;           // [west, south, east, north]
  readonly areaKm2: number;        // geodesic
  readonly region?: readonly RegionRef[];
}

export type AoiIssueKind = 'fetch-failed' | 'invalid-geometry';

export interface AoiIssue {
  kind: AoiIssueKind;
  message: string;
}

/** Outcome of a single resolution attempt */
export type AoiResolution =
  | { aoi: AreaOfInterest; issue?: undefined }
  | { aoi: null; issue: AoiIssue };

// ============================================================================
// INPUTS
// ============================================================================

export interface PointBufferInput {
  lat: number;
  lon: number;
  bufferKm: number;
}

/** Feature emitted by a map drawing tool (geometry type casing varies by tool) */
export interface DrawnFeature {
  geometry: {
    type: string;
    coordinates: unknown;
  } | null;
  properties?: Record<string, unknown> | null;
}

export interface UploadedFile {
  name: string;
  content: Uint8Array;
}
