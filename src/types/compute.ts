/**
 * Compute Service Types
 * Serializable image expressions, reducers and request/response shapes
 * sent to the remote geospatial compute gateway
 * Location: src/types/compute.ts
 */

import type { AoiGeometry } from './geo';

// ============================================================================
// COLLECTIONS
// ============================================================================

export type CollectionFilter =
  | { type: 'bounds'; geometry: AoiGeometry }
  | { type: 'date'; start: string; end: string }         // end exclusive
  | { type: 'lte'; property: string; value: number };

/** Bitmask cloud mask applied to every image before compositing */
export interface CloudMask {
  band: string;
  bits: number[];       // any set bit masks the pixel
  scaleDivisor: number; // reflectance scaling applied after masking
}

export interface CollectionExpr {
  id: string;
  filters: CollectionFilter[];
  cloudMask?: CloudMask;
  bands?: string[];
}

// ============================================================================
// IMAGES
// ============================================================================

export type CompositeReducer = 'median' | 'mean' | 'mode' | 'mosaic' | 'first';

export type BinaryOperator = 'add' | 'subtract' | 'multiply' | 'divide';

export interface Visualization {
  min: number;
  max: number;
  palette: string[];
  bands?: string[];
}

export type ImageExpr =
  | {
      kind: 'composite';
      collection: CollectionExpr;
      reducer: CompositeReducer;
      // reduce(Reducer.x()) style naming: <band>_<reducer>
      suffixBands?: boolean;
    }
  | { kind: 'select'; source: ImageExpr; bands: string[] }
  | { kind: 'constant'; value: number }
  | { kind: 'binary'; op: BinaryOperator; left: ImageExpr; right: ImageExpr }
  | { kind: 'normalizedDifference'; source: ImageExpr; bands: [string, string] }
  | { kind: 'rename'; source: ImageExpr; name: string }
  | { kind: 'bandReduce'; source: ImageExpr; reducer: 'max' }
  | { kind: 'hillshade'; source: ImageExpr; azimuth: number; elevation: number }
  | { kind: 'visualize'; source: ImageExpr; visualization: Visualization }
  | { kind: 'clip'; source: ImageExpr; geometry: AoiGeometry }
  | { kind: 'cat'; sources: ImageExpr[] };

// ============================================================================
// REDUCERS
// ============================================================================

export type SimpleReducer = 'mean' | 'minMax' | 'stdDev' | 'frequencyHistogram';

export type ReducerSpec =
  | { type: SimpleReducer }
  | { type: 'combined'; reducers: SimpleReducer[]; sharedInputs: boolean };

// ============================================================================
// REQUESTS & RESPONSES
// ============================================================================

export interface ReduceRegionRequest {
  image: ImageExpr;
  reducer: ReducerSpec;
  geometry: AoiGeometry;
  scale: number;
  maxPixels: number;
  bestEffort: boolean;
}

/** Reduced dictionary, keyed by band (or <band>_<stat> for combined reducers) */
export type ReduceRegionResult = Record<string, unknown>;

export interface SampleRequest {
  image: ImageExpr;
  region: AoiGeometry;
  scale: number;
  numPixels: number;
  geometries: boolean;
}

export interface SampleResult {
  features: Array<{ properties: Record<string, unknown> }>;
}

export interface ExportRequest {
  image: ImageExpr;
  description: string;
  scale: number;
  region: AoiGeometry;
  fileFormat: 'GeoTIFF';
  maxPixels: number;
}

export interface ExportTask {
  id: string;
  state: string;
}

/**
 * Remote compute collaborator. All heavy work (filtering, band math,
 * reductions) happens behind this interface.
 */
export interface ComputeService {
  collectionSize(collection: CollectionExpr): Promise<number>;
  reduceRegion(request: ReduceRegionRequest): Promise<ReduceRegionResult>;
  sample(request: SampleRequest): Promise<SampleResult>;
  startExport(request: ExportRequest): Promise<ExportTask>;
}
