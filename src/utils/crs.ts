/**
 * CRS helpers
 * Resolves declared coordinate reference systems and reprojects to EPSG:4326
 * Location: src/utils/crs.ts
 */

import proj4 from 'proj4';
import type { Position } from 'geojson';

export const WGS84 = 'EPSG:4326';

const WGS84_ALIASES = new Set([
  'EPSG:4326',
  'URN:OGC:DEF:CRS:EPSG::4326',
  'URN:OGC:DEF:CRS:OGC:1.3:CRS84',
  'URN:OGC:DEF:CRS:OGC::CRS84',
  'CRS84',
  'OGC:CRS84',
]);

const WEB_MERCATOR_CODES = new Set(['3857', '900913', '3785', '102100']);

/** Extracts the EPSG code from "EPSG:3857" or "urn:ogc:def:crs:EPSG::3857" */
function epsgCode(name: string): string | null {
  const match = /EPSG:{1,2}(\d+)$/i.exec(name.trim());
  return match ? match[1] : null;
}

export function isWgs84Name(name: string): boolean {
  return WGS84_ALIASES.has(name.trim().toUpperCase());
}

/**
 * proj4 definition for a named CRS, or null when it is not supported.
 * Covers Web Mercator and the WGS 84 / UTM zones used across Indonesia
 * (EPSG:326xx north, EPSG:327xx south).
 */
export function projectionForName(name: string): string | null {
  if (isWgs84Name(name)) return WGS84;

  const code = epsgCode(name);
  if (!code) return null;

  if (WEB_MERCATOR_CODES.has(code)) return 'EPSG:3857';

  const utm = /^32([67])(\d{2})$/.exec(code);
  if (utm) {
    const zone = Number(utm[2]);
    if (zone < 1 || zone > 60) return null;
    const south = utm[1] === '7' ? ' +south' : '';
    return `+proj=utm +zone=${zone}${south} +datum=WGS84 +units=m +no_defs`;
  }

  return null;
}

/** True for .prj WKT describing plain geographic WGS 84 */
export function isGeographicWgs84Wkt(wkt: string): boolean {
  const text = wkt.trim().toUpperCase();
  return text.startsWith('GEOGCS') && /WGS[ _]?(19)?84/.test(text);
}

/**
 * Apply a position transform to every position of a coordinate tree.
 * Positions are arrays whose first element is a number.
 */
export function mapPositions(node: unknown, fn: (position: Position) => Position): unknown {
  if (!Array.isArray(node)) return node;
  if (node.length >= 2 && typeof node[0] === 'number' && typeof node[1] === 'number') {
    return fn(node.filter((value): value is number => typeof value === 'number'));
  }
  return node.map((child) => mapPositions(child, fn));
}

/** Position converter from `source` (proj4 definition, name or WKT) to EPSG:4326 */
export function toWgs84Converter(source: string): (position: Position) => Position {
  const converter = proj4(source, WGS84);
  return (position) => {
    const [x, y, ...rest] = position;
    const [lon, lat] = converter.forward([x, y]);
    return [lon, lat, ...rest];
  };
}
