/**
 * Administrative Boundary Service
 * Fetches Indonesian province/city/district/village lists and boundaries
 * Responses are cached for one hour per (endpoint, code) pair
 * Location: src/services/boundaries.ts
 */

import axios, { type AxiosError, type AxiosInstance } from 'axios';
import { QueryClient } from '@tanstack/query-core';
import { z } from 'zod';
import { BOUNDARY_API_URL, BOUNDARY_SETTINGS } from '@/config';
import type { AdminLevel, RegionOptions } from '@/types/geo';
import { normalizeFeatureCollection } from '@/utils/axisOrder';
import { featureCollectionSchema } from '@/utils/geometry';

// Dropdown payload: {"ACEH": "11", "BALI": "51", ...}
const regionOptionsSchema = z.record(z.union([z.string(), z.number()]));

const regionGeometryResponseSchema = z.object({
  meta: z.object({ code: z.number() }).passthrough().optional(),
  data: z.object({ region: z.unknown().optional() }).passthrough().nullable().optional(),
}).passthrough();

export type RegionFeatureCollection = z.infer<typeof featureCollectionSchema>;

/**
 * Lookups stay fresh for the cache lifetime and are evicted once it passes.
 * Eviction runs on timers; clearCache() drops entries and their timers.
 */
export function createBoundaryCache(): QueryClient {
  return new QueryClient({
    defaultOptions: {
      queries: {
        staleTime: BOUNDARY_SETTINGS.cacheTtlMs,
        gcTime: BOUNDARY_SETTINGS.cacheTtlMs,
        retry: false,
      },
    },
  });
}

// Process-wide cache shared by every BoundaryService without its own
const sharedCache = createBoundaryCache();

export function createBoundaryClient(): AxiosInstance {
  const client = axios.create({
    baseURL: BOUNDARY_API_URL,
    headers: {
      Accept: 'application/json',
    },
  });

  client.interceptors.request.use((config) => {
    console.log(`[Boundaries] ${config.method?.toUpperCase()} ${config.url}`, config.params ?? {});
    return config;
  });

  client.interceptors.response.use(
    (response) => response,
    (error: AxiosError) => {
      console.error('[Boundaries Error]', error.response?.status ?? error.code, error.message);
      return Promise.reject(error);
    }
  );

  return client;
}

export class BoundaryService {
  private client: AxiosInstance;
  private cache: QueryClient;

  constructor(options: { client?: AxiosInstance; cache?: QueryClient } = {}) {
    this.client = options.client ?? createBoundaryClient();
    this.cache = options.cache ?? sharedCache;
  }

  /**
   * List the regions of one level, optionally under a parent region code.
   * Throws on HTTP errors; a payload that is not a name->code map yields {}.
   */
  async fetchRegionOptions(level: AdminLevel, parentCode?: string): Promise<RegionOptions> {
    return this.cache.fetchQuery<RegionOptions>({
      queryKey: ['region-options', level, parentCode ?? null],
      queryFn: async () => {
        const params: Record<string, string | number> = { is_for_dropdown: 1 };
        if (parentCode) {
          params.parent_code = parentCode;
        }

        const response = await this.client.get<unknown>(`/${level}`, {
          params,
          timeout: BOUNDARY_SETTINGS.lookupTimeoutMs,
        });

        const parsed = regionOptionsSchema.safeParse(response.data);
        if (!parsed.success) {
          console.warn(`[Boundaries] ⚠️ Unexpected ${level} list payload, treating as empty`);
          return {};
        }

        const options: RegionOptions = {};
        for (const [name, code] of Object.entries(parsed.data)) {
          options[name] = String(code);
        }
        return options;
      },
    });
  }

  /**
   * Fetch a region boundary as a FeatureCollection with [lon, lat] positions.
   * The API mixes axis orders between endpoints, so every response goes
   * through the axis normalizer. Returns null when meta.code is not 200 or
   * the region is missing.
   */
  async fetchRegionGeometry(level: AdminLevel, code: string): Promise<RegionFeatureCollection | null> {
    return this.cache.fetchQuery<RegionFeatureCollection | null>({
      queryKey: ['region-geometry', level, code],
      queryFn: async () => {
        const response = await this.client.get<unknown>(`/${level}`, {
          params: { code },
          timeout: BOUNDARY_SETTINGS.geometryTimeoutMs,
        });

        const envelope = regionGeometryResponseSchema.safeParse(response.data);
        if (!envelope.success || envelope.data.meta?.code !== 200) {
          console.warn(`[Boundaries] ⚠️ No geometry for ${level} ${code}`);
          return null;
        }

        const region = envelope.data.data?.region;
        if (typeof region !== 'object' || region === null || !('features' in region)) {
          console.warn(`[Boundaries] ⚠️ Region payload missing for ${level} ${code}`);
          return null;
        }

        const normalized = featureCollectionSchema.safeParse(normalizeFeatureCollection(region));
        if (!normalized.success) {
          throw new Error(`Malformed region geometry for ${level} ${code}: ${normalized.error.message}`);
        }

        console.log(`[Boundaries] ✅ Geometry loaded for ${level} ${code}:`, {
          features: normalized.data.features.length,
        });
        return normalized.data;
      },
    });
  }

  /** Drop every cached lookup along with its pending eviction timer */
  clearCache(): void {
    this.cache.clear();
    console.log('[Boundaries] Cache cleared');
  }
}

/**
 * Clear the process-wide boundary cache
 */
export function clearBoundaryCache(): void {
  sharedCache.clear();
  console.log('[Boundaries] Cache cleared');
}

export const boundaries = new BoundaryService();
