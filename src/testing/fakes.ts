/**
 * In-process stand-ins for the HTTP APIs and the compute service, used by tests
 * Location: src/testing/fakes.ts
 */

import axios, { AxiosError, type AxiosInstance, type AxiosResponse } from 'axios';
import { vi } from 'vitest';
import type { ComputeService } from '@/types/compute';

export interface RecordedRequest {
  method: string;
  url: string;
  params: unknown;
  body: unknown;
  timeout: number | undefined;
}

export interface FakeReply {
  status: number;
  data: unknown;
}

/**
 * Axios instance whose adapter answers from `route` instead of the network.
 * Status codes >= 400 reject with an AxiosError, as the http adapter does.
 */
export function createFakeAxios(route: (request: RecordedRequest) => FakeReply): {
  client: AxiosInstance;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];

  const client = axios.create({
    adapter: async (config) => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        params: config.params,
        body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
        timeout: config.timeout,
      };
      requests.push(request);

      const reply = route(request);
      const response: AxiosResponse = {
        data: reply.data,
        status: reply.status,
        statusText: String(reply.status),
        headers: {},
        config,
      };
      if (reply.status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${reply.status}`,
          AxiosError.ERR_BAD_RESPONSE,
          config,
          null,
          response
        );
      }
      return response;
    },
  });

  return { client, requests };
}

/**
 * ComputeService backed by vi.fn mocks. Defaults: one image per collection,
 * empty reductions and samples, a READY export task.
 */
export function createFakeCompute(handlers: Partial<ComputeService> = {}) {
  const collectionSize: ComputeService['collectionSize'] = handlers.collectionSize ?? (async () => 1);
  const reduceRegion: ComputeService['reduceRegion'] = handlers.reduceRegion ?? (async () => ({}));
  const sample: ComputeService['sample'] = handlers.sample ?? (async () => ({ features: [] }));
  const startExport: ComputeService['startExport'] =
    handlers.startExport ?? (async () => ({ id: 'task-1', state: 'READY' }));

  return {
    collectionSize: vi.fn(collectionSize),
    reduceRegion: vi.fn(reduceRegion),
    sample: vi.fn(sample),
    startExport: vi.fn(startExport),
  };
}
