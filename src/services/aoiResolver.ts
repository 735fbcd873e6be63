/**
 * AOI Resolver
 * Turns one of four input modes into a single frozen AreaOfInterest:
 *   admin        - province -> city -> district -> village cascade
 *   upload       - GeoJSON or zipped shapefile
 *   point-buffer - (lat, lon) + radius in km, bounding rectangle
 *   drawn        - polygon drawn on the map
 * Location: src/services/aoiResolver.ts
 */

import { bbox, bboxPolygon, buffer, point } from '@turf/turf';
import type {
  AoiGeometry,
  AoiIssue,
  AoiIssueKind,
  AoiMode,
  AoiResolution,
  AreaOfInterest,
  DrawnFeature,
  PointBufferInput,
  RegionOptions,
  RegionRef,
  UploadedFile,
} from '@/types/geo';
import { INDONESIA_ENVELOPE } from '@/utils/axisOrder';
import { asAoiGeometry, buildAreaOfInterest, unionGeometries, type AoiDraft } from '@/utils/geometry';
import type { BoundaryService, RegionFeatureCollection } from './boundaries';
import { readUploadedGeometry } from './uploads';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function failure(kind: AoiIssueKind, message: string): AoiResolution {
  console.warn(`[AOI] ⚠️ ${message}`);
  return { aoi: null, issue: { kind, message } };
}

function finalize(draft: AoiDraft): AoiResolution {
  try {
    const aoi = buildAreaOfInterest(draft);
    console.log(`[AOI] ✅ Resolved "${aoi.name}" (${aoi.sourceMode}):`, {
      type: aoi.geometry.type,
      areaKm2: Number(aoi.areaKm2.toFixed(2)),
    });
    return { aoi };
  } catch (error) {
    return failure('invalid-geometry', `Invalid geometry for "${draft.name}": ${errorMessage(error)}`);
  }
}

// ============================================================================
// ADMINISTRATIVE SELECTION
// ============================================================================

export type AdminSelectionState =
  | { level: 'province'; options: RegionOptions }
  | { level: 'city'; province: RegionRef; options: RegionOptions }
  | { level: 'district'; province: RegionRef; city: RegionRef; options: RegionOptions }
  | { level: 'village'; province: RegionRef; city: RegionRef; district: RegionRef; options: RegionOptions }
  | { level: 'resolved'; path: RegionRef[]; boundary: RegionRef };

export interface AdminStep {
  state: AdminSelectionState;
  aoi: AreaOfInterest | null;
  issue?: AoiIssue;
}

function pathOf(state: AdminSelectionState): RegionRef[] {
  switch (state.level) {
    case 'province':
      return [];
    case 'city':
      return [state.province];
    case 'district':
      return [state.province, state.city];
    case 'village':
      return [state.province, state.city, state.district];
    case 'resolved':
      return state.path;
  }
}

function isNearEnvelope([west, south, east, north]: number[]): boolean {
  const pad = 1;
  return west >= INDONESIA_ENVELOPE.lonMin - pad && east <= INDONESIA_ENVELOPE.lonMax + pad &&
    south >= INDONESIA_ENVELOPE.latMin - pad && north <= INDONESIA_ENVELOPE.latMax + pad;
}

async function resolveRegionBoundary(
  service: BoundaryService,
  boundary: RegionRef,
  path: RegionRef[]
): Promise<AoiResolution> {
  let collection: RegionFeatureCollection | null;
  try {
    collection = await service.fetchRegionGeometry(boundary.level, boundary.code);
  } catch (error) {
    return failure('fetch-failed', `Error fetching geometry for ${boundary.name}: ${errorMessage(error)}`);
  }

  if (!collection || collection.features.length === 0) {
    return failure('fetch-failed', `No boundary returned for ${boundary.name}`);
  }

  const polygons: AoiGeometry[] = [];
  for (const feature of collection.features) {
    const geometry = asAoiGeometry(feature.geometry);
    if (geometry) polygons.push(geometry);
  }

  const geometry = unionGeometries(polygons);
  if (!geometry) {
    return failure('invalid-geometry', `Boundary of ${boundary.name} has no polygon geometry`);
  }

  const resolution = finalize({
    name: boundary.name,
    sourceMode: 'admin',
    geometry,
    attributes: collection.features.map((feature) => ({ ...(feature.properties ?? {}) })),
    region: path,
  });
  if (resolution.aoi && !isNearEnvelope(resolution.aoi.bounds)) {
    console.warn(`[AOI] ⚠️ Boundary of ${boundary.name} lies outside the expected envelope`, resolution.aoi.bounds);
  }
  return resolution;
}

async function loadOptions(
  service: BoundaryService,
  level: RegionRef['level'],
  parentCode?: string
): Promise<{ options: RegionOptions } | { issue: AoiIssue }> {
  try {
    return { options: await service.fetchRegionOptions(level, parentCode) };
  } catch (error) {
    const message = `Error fetching ${level} list: ${errorMessage(error)}`;
    console.warn(`[AOI] ⚠️ ${message}`);
    return { issue: { kind: 'fetch-failed', message } };
  }
}

function pick(options: RegionOptions, level: RegionRef['level'], name: string): RegionRef {
  const code = options[name];
  if (code === undefined) {
    throw new Error(`Unknown ${level} "${name}"`);
  }
  return { level, name, code };
}

async function resolveTo(
  service: BoundaryService,
  state: AdminSelectionState,
  boundary: RegionRef,
  path: RegionRef[]
): Promise<AdminStep> {
  const resolution = await resolveRegionBoundary(service, boundary, path);
  if (resolution.aoi === null) {
    return { state, aoi: null, issue: resolution.issue };
  }
  return { state: { level: 'resolved', path, boundary }, aoi: resolution.aoi };
}

/**
 * Load the province list. On failure the province state carries no options
 * and can be started again.
 */
export async function startAdminSelection(service: BoundaryService): Promise<AdminStep> {
  const loaded = await loadOptions(service, 'province');
  if ('issue' in loaded) {
    return { state: { level: 'province', options: {} }, aoi: null, issue: loaded.issue };
  }
  return { state: { level: 'province', options: loaded.options }, aoi: null };
}

/**
 * Descend one level by region name. Choosing a village resolves the AOI to
 * that village. Fetch failures keep the current state for retry.
 */
export async function selectRegion(
  service: BoundaryService,
  state: AdminSelectionState,
  name: string
): Promise<AdminStep> {
  switch (state.level) {
    case 'province': {
      const province = pick(state.options, 'province', name);
      const loaded = await loadOptions(service, 'city', province.code);
      if ('issue' in loaded) return { state, aoi: null, issue: loaded.issue };
      return { state: { level: 'city', province, options: loaded.options }, aoi: null };
    }

    case 'city': {
      const city = pick(state.options, 'city', name);
      const loaded = await loadOptions(service, 'district', city.code);
      if ('issue' in loaded) return { state, aoi: null, issue: loaded.issue };
      return {
        state: { level: 'district', province: state.province, city, options: loaded.options },
        aoi: null,
      };
    }

    case 'district': {
      const district = pick(state.options, 'district', name);
      const loaded = await loadOptions(service, 'village', district.code);
      if ('issue' in loaded) return { state, aoi: null, issue: loaded.issue };
      return {
        state: {
          level: 'village',
          province: state.province,
          city: state.city,
          district,
          options: loaded.options,
        },
        aoi: null,
      };
    }

    case 'village': {
      const village = pick(state.options, 'village', name);
      return resolveTo(service, state, village, [...pathOf(state), village]);
    }

    case 'resolved':
      throw new Error('Administrative selection is already resolved');
  }
}

/**
 * Stop descending and use the parent level's own boundary: at the city
 * level this resolves the province, at the district level the city, at the
 * village level the district. The child level's geometry is never fetched.
 */
export async function useCurrentLevelBoundary(
  service: BoundaryService,
  state: AdminSelectionState
): Promise<AdminStep> {
  switch (state.level) {
    case 'city':
      return resolveTo(service, state, state.province, [state.province]);
    case 'district':
      return resolveTo(service, state, state.city, [state.province, state.city]);
    case 'village':
      return resolveTo(service, state, state.district, [state.province, state.city, state.district]);
    case 'province':
    case 'resolved':
      throw new Error(`No parent boundary to use at the ${state.level} step`);
  }
}

// ============================================================================
// UPLOADED FILE
// ============================================================================

export async function resolveUploadedFile(
  upload: UploadedFile,
  options: { tempRoot?: string } = {}
): Promise<AoiResolution> {
  try {
    const parsed = await readUploadedGeometry(upload, options);
    return finalize({
      name: upload.name,
      sourceMode: 'upload',
      geometry: parsed.geometry,
      attributes: parsed.attributes,
    });
  } catch (error) {
    return failure('invalid-geometry', `Error processing file ${upload.name}: ${errorMessage(error)}`);
  }
}

// ============================================================================
// POINT + BUFFER
// ============================================================================

/**
 * Circular buffer of bufferKm around (lat, lon), reduced to its bounding
 * rectangle.
 */
export function resolvePointBuffer({ lat, lon, bufferKm }: PointBufferInput): AoiResolution {
  if (!Number.isFinite(lat) || !Number.isFinite(lon) || !Number.isFinite(bufferKm) || bufferKm <= 0) {
    return failure('invalid-geometry', `Invalid point/buffer input (${lat}, ${lon}, ${bufferKm} km)`);
  }

  const circle = buffer(point([lon, lat]), bufferKm * 1000, { units: 'meters' });
  if (!circle) {
    return failure('invalid-geometry', 'Buffer produced no geometry');
  }

  return finalize({
    name: `Point (${lat.toFixed(4)}, ${lon.toFixed(4)})`,
    sourceMode: 'point-buffer',
    geometry: bboxPolygon(bbox(circle)).geometry,
  });
}

// ============================================================================
// DRAWN POLYGON
// ============================================================================

const DRAWN_TYPES: Record<string, AoiGeometry['type']> = {
  polygon: 'Polygon',
  multipolygon: 'MultiPolygon',
};

/** Uses the most recent drawing; only polygons and multipolygons are accepted */
export function resolveDrawnPolygon(drawings: readonly DrawnFeature[]): AoiResolution {
  const last = drawings[drawings.length - 1];
  if (!last?.geometry) {
    return failure('invalid-geometry', 'No polygon has been drawn yet');
  }

  const type = DRAWN_TYPES[last.geometry.type.toLowerCase()];
  if (!type) {
    return failure('invalid-geometry', `Please draw a polygon (got ${last.geometry.type})`);
  }

  const geometry = asAoiGeometry({ type, coordinates: last.geometry.coordinates });
  if (!geometry) {
    return failure('invalid-geometry', 'Drawn polygon has malformed coordinates');
  }

  return finalize({
    name: 'Custom Polygon',
    sourceMode: 'drawn',
    geometry,
    attributes: last.properties ? [{ ...last.properties }] : [],
  });
}

// ============================================================================
// SESSION
// ============================================================================

/** Exactly one mode, and at most one AOI, is live at a time */
export interface AoiSession {
  mode: AoiMode;
  aoi: AreaOfInterest | null;
  admin: AdminSelectionState | null;
  issue: AoiIssue | null;
}

export function createAoiSession(mode: AoiMode = 'admin'): AoiSession {
  return { mode, aoi: null, admin: null, issue: null };
}

/** Changing mode discards the previous AOI and selection entirely */
export function switchMode(session: AoiSession, mode: AoiMode): AoiSession {
  if (session.mode === mode) return session;
  console.log(`[AOI] Mode ${session.mode} -> ${mode}`);
  return createAoiSession(mode);
}

export function applyResolution(session: AoiSession, mode: AoiMode, resolution: AoiResolution): AoiSession {
  if (session.mode !== mode) {
    throw new Error(`Cannot apply a ${mode} resolution to a ${session.mode} session`);
  }
  return { ...session, aoi: resolution.aoi, issue: resolution.issue ?? null };
}

export function applyAdminStep(session: AoiSession, step: AdminStep): AoiSession {
  if (session.mode !== 'admin') {
    throw new Error(`Cannot apply an admin step to a ${session.mode} session`);
  }
  return { ...session, admin: step.state, aoi: step.aoi, issue: step.issue ?? null };
}
