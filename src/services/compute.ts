/**
 * Compute Gateway Client
 * Axios-based client for the geospatial compute back end (Earth Engine)
 * Location: src/services/compute.ts
 */

import axios, { type AxiosError, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { COMPUTE_API_URL, COMPUTE_API_V1, COMPUTE_SETTINGS } from '@/config';
import type {
  CollectionExpr,
  ComputeService,
  ExportRequest,
  ExportTask,
  ReduceRegionRequest,
  ReduceRegionResult,
  SampleRequest,
  SampleResult,
} from '@/types/compute';

/** Every gateway response is wrapped as { success, data?, error? } */
const gatewayResponseSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
});

const sizeSchema = z.object({ size: z.number().int().nonnegative() });
const reduceSchema = z.object({ result: z.record(z.unknown()).nullable() });
const sampleSchema = z.object({
  features: z.array(z.object({ properties: z.record(z.unknown()).nullable().optional() })),
});
const exportSchema = z.object({ task: z.object({ id: z.string(), state: z.string() }) });

export class ComputeClient implements ComputeService {
  private client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: `${COMPUTE_API_URL}${COMPUTE_API_V1}`,
      timeout: COMPUTE_SETTINGS.timeoutMs,
      headers: {
        'Content-Type': 'application/json',
      },
    });

    // Request interceptor
    this.client.interceptors.request.use(
      (config) => {
        console.log(`[Compute] ${config.method?.toUpperCase()} ${config.url}`);
        return config;
      },
      (error) => Promise.reject(error)
    );

    // Response interceptor
    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        console.error('[Compute Error]', error.response?.data || error.message);
        return Promise.reject(error);
      }
    );
  }

  private async post<T>(path: string, body: unknown, schema: z.ZodType<T>): Promise<T> {
    const response = await this.client.post<unknown>(path, body);

    const wrapped = gatewayResponseSchema.safeParse(response.data);
    if (!wrapped.success) {
      throw new Error(`Malformed response from ${path}: ${wrapped.error.message}`);
    }
    if (!wrapped.data.success) {
      throw new Error(`Compute request ${path} failed: ${wrapped.data.error ?? 'unknown error'}`);
    }

    const parsed = schema.safeParse(wrapped.data.data);
    if (!parsed.success) {
      throw new Error(`Unexpected payload from ${path}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  // =========================================================================
  // COLLECTIONS
  // =========================================================================

  /**
   * Number of images left after the collection's filters
   */
  async collectionSize(collection: CollectionExpr): Promise<number> {
    const data = await this.post('/compute/collection-size', { collection }, sizeSchema);
    return data.size;
  }

  // =========================================================================
  // REDUCTIONS
  // =========================================================================

  /**
   * Reduce an image over a geometry (reduceRegion). A null result from the
   * service is returned as an empty dictionary.
   */
  async reduceRegion(request: ReduceRegionRequest): Promise<ReduceRegionResult> {
    const data = await this.post('/compute/reduce-region', request, reduceSchema);
    return data.result ?? {};
  }

  /**
   * Random pixel sample of an image within a region
   */
  async sample(request: SampleRequest): Promise<SampleResult> {
    const data = await this.post('/compute/sample', request, sampleSchema);
    return {
      features: data.features.map((feature) => ({ properties: feature.properties ?? {} })),
    };
  }

  // =========================================================================
  // EXPORTS
  // =========================================================================

  /**
   * Submit a batch export job (GeoTIFF to cloud storage)
   */
  async startExport(request: ExportRequest): Promise<ExportTask> {
    const data = await this.post('/compute/export', request, exportSchema);
    return data.task;
  }
}

// Export singleton instance
export const compute = new ComputeClient();
