/**
 * Upload Service
 * Reads user-supplied GeoJSON or zipped shapefiles into one EPSG:4326
 * polygon geometry. Uploads are staged in a temporary directory that is
 * removed once parsing ends, successfully or not.
 * Location: src/services/uploads.ts
 */

import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, extname, join } from 'node:path';
import JSZip from 'jszip';
import { read as readShapefile } from 'shapefile';
import type { Position } from 'geojson';
import { z } from 'zod';
import type { AoiGeometry, FeatureAttributes, UploadedFile } from '@/types/geo';
import { isGeographicWgs84Wkt, mapPositions, projectionForName, toWgs84Converter, WGS84 } from '@/utils/crs';
import { asAoiGeometry, featureCollectionSchema, featureSchema, unionGeometries } from '@/utils/geometry';

export interface ParsedUpload {
  geometry: AoiGeometry;
  attributes: FeatureAttributes[];
  featureCount: number;
  declaredCrs: string;
}

interface RawFeature {
  geometry: { type: string; coordinates?: unknown } | null;
  properties?: Record<string, unknown> | null;
}

export interface RawLayer {
  features: RawFeature[];
  crs: string;                                   // proj4 definition or WKT
  convert: ((position: Position) => Position) | null;
}

const namedCrsSchema = z.object({
  properties: z.object({ name: z.string() }),
});

const bareGeometrySchema = z.object({
  type: z.string(),
  coordinates: z.unknown(),
});

// ============================================================================
// GEOJSON
// ============================================================================

function crsFromGeoJson(crs: unknown): Pick<RawLayer, 'crs' | 'convert'> {
  if (crs === undefined || crs === null) {
    return { crs: WGS84, convert: null };
  }

  const named = namedCrsSchema.safeParse(crs);
  if (!named.success) {
    throw new Error('Unsupported "crs" member in GeoJSON');
  }

  const projection = projectionForName(named.data.properties.name);
  if (!projection) {
    throw new Error(`Unsupported CRS "${named.data.properties.name}"`);
  }
  if (projection === WGS84) {
    return { crs: WGS84, convert: null };
  }
  return { crs: named.data.properties.name, convert: toWgs84Converter(projection) };
}

export function parseGeoJsonLayer(text: string): RawLayer {
  const json: unknown = JSON.parse(text);

  const collection = featureCollectionSchema.safeParse(json);
  if (collection.success) {
    return { features: collection.data.features, ...crsFromGeoJson(collection.data.crs) };
  }

  const feature = featureSchema.safeParse(json);
  if (feature.success) {
    return { features: [feature.data], crs: WGS84, convert: null };
  }

  const geometry = bareGeometrySchema.safeParse(json);
  if (geometry.success) {
    return { features: [{ geometry: geometry.data, properties: {} }], crs: WGS84, convert: null };
  }

  throw new Error('File is not a GeoJSON FeatureCollection, Feature or geometry');
}

// ============================================================================
// SHAPEFILE
// ============================================================================

function entryWithExtension(zip: JSZip, extension: string, base?: string): JSZip.JSZipObject | null {
  const entries = zip
    .file(new RegExp(`\\.${extension}$`, 'i'))
    .filter((entry) => !entry.dir && !entry.name.startsWith('__MACOSX/'));

  if (base) {
    const sameBase = entries.find((entry) => basename(entry.name, extname(entry.name)).toLowerCase() === base);
    if (sameBase) return sameBase;
  }
  return entries[0] ?? null;
}

async function readShapefileLayer(shpPath: string, dbfPath: string | null, prj: string | null): Promise<RawLayer> {
  // copy into fresh arrays so the parser sees zero-offset buffers
  const shp = new Uint8Array(await readFile(shpPath));
  const dbf = dbfPath ? new Uint8Array(await readFile(dbfPath)) : undefined;

  const collection = await readShapefile(shp, dbf);
  const features: RawFeature[] = collection.features.map((feature) => ({
    geometry: feature.geometry,
    properties: feature.properties,
  }));

  if (!prj || isGeographicWgs84Wkt(prj)) {
    return { features, crs: WGS84, convert: null };
  }
  return { features, crs: prj.trim(), convert: toWgs84Converter(prj) };
}

async function readZippedShapefile(zipPath: string, stagingDir: string): Promise<RawLayer> {
  const zip = await JSZip.loadAsync(await readFile(zipPath));

  const shpEntry = entryWithExtension(zip, 'shp');
  if (!shpEntry) {
    throw new Error('Zip archive contains no .shp file');
  }
  const base = basename(shpEntry.name, extname(shpEntry.name)).toLowerCase();
  const dbfEntry = entryWithExtension(zip, 'dbf', base);
  const prjEntry = entryWithExtension(zip, 'prj', base);

  const shpPath = join(stagingDir, 'bundle.shp');
  await writeFile(shpPath, await shpEntry.async('uint8array'));

  let dbfPath: string | null = null;
  if (dbfEntry) {
    dbfPath = join(stagingDir, 'bundle.dbf');
    await writeFile(dbfPath, await dbfEntry.async('uint8array'));
  }

  const prj = prjEntry ? await prjEntry.async('string') : null;
  return readShapefileLayer(shpPath, dbfPath, prj);
}

// ============================================================================
// ENTRY POINT
// ============================================================================

function toAoiGeometry(feature: RawFeature, convert: RawLayer['convert']): AoiGeometry | null {
  const { geometry } = feature;
  if (!geometry) return null;

  const type = geometry.type;
  if (type !== 'Polygon' && type !== 'MultiPolygon') return null;

  const coordinates = convert ? mapPositions(geometry.coordinates, convert) : geometry.coordinates;
  return asAoiGeometry({ type, coordinates });
}

async function readLayer(filePath: string, stagingDir: string): Promise<RawLayer> {
  const extension = extname(filePath).toLowerCase();

  if (extension === '.zip') {
    return readZippedShapefile(filePath, stagingDir);
  }
  if (extension === '.shp') {
    return readShapefileLayer(filePath, null, null);
  }
  return parseGeoJsonLayer(await readFile(filePath, 'utf8'));
}

/**
 * Convert an uploaded GeoJSON/JSON file or zipped shapefile into a single
 * polygon geometry: reprojected to EPSG:4326 when another CRS is declared,
 * then all polygonal features unioned.
 */
export async function readUploadedGeometry(
  upload: UploadedFile,
  options: { tempRoot?: string } = {}
): Promise<ParsedUpload> {
  const stagingDir = await mkdtemp(join(options.tempRoot ?? tmpdir(), 'aoi-upload-'));

  try {
    const filePath = join(stagingDir, basename(upload.name) || 'upload');
    await writeFile(filePath, upload.content);

    const layer = await readLayer(filePath, stagingDir);
    if (layer.features.length === 0) {
      throw new Error('File contains no features');
    }

    const polygons: AoiGeometry[] = [];
    for (const feature of layer.features) {
      const geometry = toAoiGeometry(feature, layer.convert);
      if (geometry) polygons.push(geometry);
    }

    const geometry = unionGeometries(polygons);
    if (!geometry) {
      throw new Error('File contains no polygon features');
    }

    console.log(`[Upload] ✅ ${upload.name} parsed:`, {
      features: layer.features.length,
      polygons: polygons.length,
      crs: layer.crs === WGS84 ? WGS84 : 'reprojected to EPSG:4326',
    });

    return {
      geometry,
      attributes: layer.features.map((feature) => ({ ...(feature.properties ?? {}) })),
      featureCount: layer.features.length,
      declaredCrs: layer.crs,
    };
  } finally {
    await rm(stagingDir, { recursive: true, force: true });
  }
}
