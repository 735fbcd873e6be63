/**
 * Axis Order Utilities
 * Detects [lat, lon] pairs inside a regional envelope and rewrites GeoJSON
 * coordinate trees to canonical [lon, lat]
 * Location: src/utils/axisOrder.ts
 *
 * Known limitation: any pair that fits the envelope in its given order is read
 * as [lat, lon] and swapped. For an envelope whose latitude and longitude
 * ranges overlap, pairs inside the overlap are ambiguous and always swapped.
 */

import type { LatLonEnvelope } from '@/types/geo';

export const INDONESIA_ENVELOPE: LatLonEnvelope = {
  latMin: -11.5,
  latMax: 6.5,
  lonMin: 94.0,
  lonMax: 141.5,
};

export interface AxisOrderHeuristic {
  looksLikeLatLon(pair: unknown): boolean;
}

// plain decimal or exponent notation; no hex, binary or octal literals
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/** Parses numbers and decimal numeric strings; anything else is null */
export function toCoordinateNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isNaN(value) ? null : value;
  }
  if (typeof value === 'string') {
    const text = value.trim();
    return DECIMAL_PATTERN.test(text) ? Number(text) : null;
  }
  return null;
}

export class EnvelopeAxisHeuristic implements AxisOrderHeuristic {
  constructor(private readonly envelope: LatLonEnvelope) {}

  looksLikeLatLon(pair: unknown): boolean {
    if (!Array.isArray(pair) || pair.length < 2) return false;

    const a = toCoordinateNumber(pair[0]);
    const b = toCoordinateNumber(pair[1]);
    if (a === null || b === null) return false;

    const { latMin, latMax, lonMin, lonMax } = this.envelope;
    return a >= latMin && a <= latMax && b >= lonMin && b <= lonMax;
  }
}

function isLeafPair(node: unknown[]): boolean {
  if (node.length < 2) return false;
  const [a, b] = node;
  return (typeof a === 'number' || typeof a === 'string') &&
    (typeof b === 'number' || typeof b === 'string');
}

function coerce(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  return toCoordinateNumber(value) ?? value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface AxisNormalizer {
  normalizeCoordinates(node: unknown): unknown;
  normalizeFeatureGeometry(feature: unknown): unknown;
  normalizeFeatureCollection(fc: unknown): unknown;
}

/**
 * Bind the recursive rewrite to a heuristic. The recursion never branches on
 * geometry type: points, rings and multi-part trees are walked the same way.
 */
export function createAxisNormalizer(heuristic: AxisOrderHeuristic): AxisNormalizer {
  function normalizeCoordinates(node: unknown): unknown {
    if (Array.isArray(node)) {
      if (isLeafPair(node)) {
        if (heuristic.looksLikeLatLon(node)) {
          const [lat, lon, ...rest] = node.map(coerce);
          return [lon, lat, ...rest];
        }
        return node.map(coerce);
      }
      return node.map(normalizeCoordinates);
    }

    if (isRecord(node)) {
      const out: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(node)) {
        out[key] = key === 'type' ? value : normalizeCoordinates(value);
      }
      return out;
    }

    return node;
  }

  function normalizeFeatureGeometry(feature: unknown): unknown {
    if (!isRecord(feature)) return feature;

    const geometry = feature.geometry;
    if (!isRecord(geometry) || !('type' in geometry) || !('coordinates' in geometry)) {
      return feature;
    }

    return {
      ...feature,
      geometry: {
        type: geometry.type,
        coordinates: normalizeCoordinates(geometry.coordinates),
      },
    };
  }

  function normalizeFeatureCollection(fc: unknown): unknown {
    if (!isRecord(fc) || fc.type !== 'FeatureCollection') return fc;

    const features = Array.isArray(fc.features) ? fc.features : [];
    return {
      ...fc,
      features: features.map(normalizeFeatureGeometry),
    };
  }

  return { normalizeCoordinates, normalizeFeatureGeometry, normalizeFeatureCollection };
}

const indonesiaHeuristic = new EnvelopeAxisHeuristic(INDONESIA_ENVELOPE);
const indonesiaNormalizer = createAxisNormalizer(indonesiaHeuristic);

export function looksLikeLatLon(pair: unknown): boolean {
  return indonesiaHeuristic.looksLikeLatLon(pair);
}

export const {
  normalizeCoordinates,
  normalizeFeatureGeometry,
  normalizeFeatureCollection,
} = indonesiaNormalizer;
