/**
 * Runtime configuration
 * Endpoints and tunables, overridable through environment variables
 * Location: src/config.ts
 */

import { z } from 'zod';

function numberFromEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;

  const parsed = z.coerce.number().nonnegative().safeParse(raw);
  if (!parsed.success) {
    console.warn(`[Config] ⚠️ Ignoring invalid ${key}="${raw}", using ${fallback}`);
    return fallback;
  }
  return parsed.data;
}

// Indonesian administrative boundary API
export const BOUNDARY_API_URL = process.env.BOUNDARY_API_URL || 'https://api.sp3stab.id/api/en';

// Compute gateway (Earth Engine behind it)
export const COMPUTE_API_URL = process.env.COMPUTE_API_URL || 'http://localhost:8000';
export const COMPUTE_API_V1 = process.env.COMPUTE_API_V1 || '/api/v1';

export const BOUNDARY_SETTINGS = {
  lookupTimeoutMs: numberFromEnv('BOUNDARY_LOOKUP_TIMEOUT_MS', 10_000),
  geometryTimeoutMs: numberFromEnv('BOUNDARY_GEOMETRY_TIMEOUT_MS', 15_000),
  cacheTtlMs: numberFromEnv('BOUNDARY_CACHE_TTL_MS', 60 * 60 * 1000), // 1 hour
} as const;

export const COMPUTE_SETTINGS = {
  timeoutMs: numberFromEnv('COMPUTE_TIMEOUT_MS', 300_000),
} as const;

export const ANALYSIS_DEFAULTS = {
  indexStatsScale: 20,
  correlationScale: 30,
  correlationSamplePoints: 1000,
  maxPixels: 1e8,
  exportMaxPixels: 1e9,
  cloudThreshold: numberFromEnv('DEFAULT_CLOUD_THRESHOLD', 40),
  timeSeriesCloudThreshold: 40,
  timeSeriesScale: 20,
} as const;
