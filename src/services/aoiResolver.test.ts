import { describe, expect, it } from 'vitest';
import { createFakeAxios, type FakeReply, type RecordedRequest } from '@/testing/fakes';
import {
  applyAdminStep,
  applyResolution,
  createAoiSession,
  resolveDrawnPolygon,
  resolvePointBuffer,
  resolveUploadedFile,
  selectRegion,
  startAdminSelection,
  switchMode,
  useCurrentLevelBoundary,
} from './aoiResolver';
import { BoundaryService, createBoundaryCache } from './boundaries';

function param(request: RecordedRequest, key: string): unknown {
  const { params } = request;
  if (typeof params !== 'object' || params === null) return undefined;
  const value: unknown = Reflect.get(params, key);
  return value;
}

/** Square of 0.1 degree whose corner is (lat, lon), returned in [lat, lon] order */
function latLonRegion(lat: number, lon: number) {
  return {
    meta: { code: 200 },
    data: {
      region: {
        type: 'FeatureCollection',
        features: [
          {
            type: 'Feature',
            properties: { source: 'test' },
            geometry: {
              type: 'Polygon',
              coordinates: [
                [
                  [lat, lon],
                  [lat, lon + 0.1],
                  [lat + 0.1, lon + 0.1],
                  [lat + 0.1, lon],
                  [lat, lon],
                ],
              ],
            },
          },
        ],
      },
    },
  };
}

const DROPDOWNS: Record<string, Record<string, string>> = {
  'province:': { 'DKI JAKARTA': '31', 'JAWA BARAT': '32' },
  'city:31': { 'KOTA ADM. JAKARTA PUSAT': '3171' },
  'district:3171': { GAMBIR: '317101' },
  'village:317101': { 'GAMBIR VILLAGE': '3171011001' },
};

function boundaryApi(overrides: (request: RecordedRequest) => FakeReply | null = () => null) {
  const { client, requests } = createFakeAxios((request) => {
    const override = overrides(request);
    if (override) return override;

    const level = request.url.slice(1);
    const code = param(request, 'code');
    if (typeof code === 'string') {
      return { status: 200, data: latLonRegion(-6.2, 106.8) };
    }

    const parent = param(request, 'parent_code');
    const options = DROPDOWNS[`${level}:${typeof parent === 'string' ? parent : ''}`];
    return options ? { status: 200, data: options } : { status: 404, data: 'not found' };
  });

  return { service: new BoundaryService({ client, cache: createBoundaryCache() }), requests };
}

describe('administrative selection', () => {
  it('descends to a village and resolves its boundary', async () => {
    const { service } = boundaryApi();

    const provinces = await startAdminSelection(service);
    expect(provinces.state).toEqual({ level: 'province', options: { 'DKI JAKARTA': '31', 'JAWA BARAT': '32' } });

    const cities = await selectRegion(service, provinces.state, 'DKI JAKARTA');
    const districts = await selectRegion(service, cities.state, 'KOTA ADM. JAKARTA PUSAT');
    const villages = await selectRegion(service, districts.state, 'GAMBIR');
    expect(villages.state.level).toBe('village');
    expect(villages.aoi).toBeNull();

    const resolved = await selectRegion(service, villages.state, 'GAMBIR VILLAGE');

    expect(resolved.issue).toBeUndefined();
    expect(resolved.state).toEqual({
      level: 'resolved',
      boundary: { level: 'village', name: 'GAMBIR VILLAGE', code: '3171011001' },
      path: [
        { level: 'province', name: 'DKI JAKARTA', code: '31' },
        { level: 'city', name: 'KOTA ADM. JAKARTA PUSAT', code: '3171' },
        { level: 'district', name: 'GAMBIR', code: '317101' },
        { level: 'village', name: 'GAMBIR VILLAGE', code: '3171011001' },
      ],
    });
    expect(resolved.aoi?.name).toBe('GAMBIR VILLAGE');
    expect(resolved.aoi?.sourceMode).toBe('admin');
    expect(resolved.aoi?.attributes).toEqual([{ source: 'test' }]);
    expect(resolved.aoi?.region).toHaveLength(4);
  });

  it('stores the boundary in [lon, lat] order', async () => {
    const { service } = boundaryApi();

    const provinces = await startAdminSelection(service);
    const cities = await selectRegion(service, provinces.state, 'DKI JAKARTA');
    const resolved = await useCurrentLevelBoundary(service, cities.state);

    const bounds = resolved.aoi?.bounds ?? [];
    expect(bounds[0]).toBeCloseTo(106.8, 10);
    expect(bounds[1]).toBeCloseTo(-6.2, 10);
    expect(bounds[2]).toBeCloseTo(106.9, 10);
    expect(bounds[3]).toBeCloseTo(-6.1, 10);
  });

  it('uses the province boundary at the city step without fetching city geometry', async () => {
    const { service, requests } = boundaryApi();

    const provinces = await startAdminSelection(service);
    const cities = await selectRegion(service, provinces.state, 'DKI JAKARTA');
    const resolved = await useCurrentLevelBoundary(service, cities.state);

    expect(resolved.aoi?.name).toBe('DKI JAKARTA');
    expect(resolved.state).toEqual({
      level: 'resolved',
      boundary: { level: 'province', name: 'DKI JAKARTA', code: '31' },
      path: [{ level: 'province', name: 'DKI JAKARTA', code: '31' }],
    });

    const geometryRequests = requests.filter((request) => param(request, 'code') !== undefined);
    expect(geometryRequests.map((request) => [request.url, param(request, 'code')])).toEqual([['/province', '31']]);
  });

  it('keeps the state and reports a fetch failure when a list cannot be loaded', async () => {
    const { service } = boundaryApi((request) =>
      request.url === '/city' ? { status: 500, data: 'boom' } : null
    );

    const provinces = await startAdminSelection(service);
    const step = await selectRegion(service, provinces.state, 'JAWA BARAT');

    expect(step.state).toBe(provinces.state);
    expect(step.aoi).toBeNull();
    expect(step.issue).toEqual({
      kind: 'fetch-failed',
      message: 'Error fetching city list: Request failed with status code 500',
    });
  });

  it('starts with an empty province list when the API is down', async () => {
    const { service } = boundaryApi(() => ({ status: 503, data: 'down' }));

    const step = await startAdminSelection(service);

    expect(step.state).toEqual({ level: 'province', options: {} });
    expect(step.issue?.kind).toBe('fetch-failed');
  });

  it('reports a missing boundary without leaving the current step', async () => {
    const { service } = boundaryApi((request) =>
      param(request, 'code') !== undefined ? { status: 200, data: { meta: { code: 404 } } } : null
    );

    const provinces = await startAdminSelection(service);
    const cities = await selectRegion(service, provinces.state, 'DKI JAKARTA');
    const step = await useCurrentLevelBoundary(service, cities.state);

    expect(step.state).toBe(cities.state);
    expect(step.aoi).toBeNull();
    expect(step.issue).toEqual({ kind: 'fetch-failed', message: 'No boundary returned for DKI JAKARTA' });
  });

  it('rejects names that are not among the options', async () => {
    const { service } = boundaryApi();
    const provinces = await startAdminSelection(service);
    await expect(selectRegion(service, provinces.state, 'ATLANTIS')).rejects.toThrow('Unknown province "ATLANTIS"');
  });

  it('has no parent boundary at the province step', async () => {
    const { service } = boundaryApi();
    const provinces = await startAdminSelection(service);
    await expect(useCurrentLevelBoundary(service, provinces.state)).rejects.toThrow(
      'No parent boundary to use at the province step'
    );
  });
});

describe('resolvePointBuffer', () => {
  it('uses the bounding rectangle of the buffer circle', () => {
    const { aoi } = resolvePointBuffer({ lat: -6.1754, lon: 106.8272, bufferKm: 10 });
    if (!aoi) throw new Error('expected an AOI');

    const [west, south, east, north] = aoi.bounds;
    expect(aoi.name).toBe('Point (-6.1754, 106.8272)');
    expect(aoi.sourceMode).toBe('point-buffer');
    expect(aoi.geometry.type).toBe('Polygon');
    expect((west + east) / 2).toBeCloseTo(106.8272, 3);
    expect((south + north) / 2).toBeCloseTo(-6.1754, 3);
    // 10 km is about 0.09 degrees of latitude
    expect(north - south).toBeCloseTo(0.18, 2);
  });

  it('rejects a non-positive radius', () => {
    expect(resolvePointBuffer({ lat: -6.1754, lon: 106.8272, bufferKm: 0 }).issue).toEqual({
      kind: 'invalid-geometry',
      message: 'Invalid point/buffer input (-6.1754, 106.8272, 0 km)',
    });
  });
});

describe('resolveDrawnPolygon', () => {
  const ring = [[106.8, -6.2], [106.9, -6.2], [106.9, -6.1], [106.8, -6.1], [106.8, -6.2]];

  it('uses the most recent drawing and accepts any type casing', () => {
    const first = { geometry: { type: 'Polygon', coordinates: [[[0, 0], [1, 0], [1, 1], [0, 1], [0, 0]]] } };
    const last = { geometry: { type: 'polygon', coordinates: [ring] }, properties: { label: 'site' } };

    const { aoi } = resolveDrawnPolygon([first, last]);

    expect(aoi?.name).toBe('Custom Polygon');
    expect(aoi?.geometry).toEqual({ type: 'Polygon', coordinates: [ring] });
    expect(aoi?.attributes).toEqual([{ label: 'site' }]);
  });

  it('warns when the drawing is not a polygon', () => {
    const line = { geometry: { type: 'LineString', coordinates: ring } };
    expect(resolveDrawnPolygon([line]).issue).toEqual({
      kind: 'invalid-geometry',
      message: 'Please draw a polygon (got LineString)',
    });
  });

  it('warns when nothing has been drawn', () => {
    expect(resolveDrawnPolygon([]).issue?.message).toBe('No polygon has been drawn yet');
  });
});

describe('resolveUploadedFile', () => {
  it('turns parse errors into an invalid-geometry issue', async () => {
    const content = new TextEncoder().encode(JSON.stringify({ type: 'FeatureCollection', features: [] }));
    const result = await resolveUploadedFile({ name: 'empty.geojson', content });
    expect(result).toEqual({
      aoi: null,
      issue: { kind: 'invalid-geometry', message: 'Error processing file empty.geojson: File contains no features' },
    });
  });
});

describe('AOI session', () => {
  it('discards the AOI when switching modes', () => {
    const drawn = applyResolution(createAoiSession('drawn'), 'drawn', drawnTriangle());
    expect(drawn.aoi).not.toBeNull();

    const switched = switchMode(drawn, 'upload');
    expect(switched).toEqual({ mode: 'upload', aoi: null, admin: null, issue: null });
    expect(switchMode(drawn, 'drawn')).toBe(drawn);
  });

  it('refuses a resolution from another mode', () => {
    expect(() => applyResolution(createAoiSession('admin'), 'drawn', resolveDrawnPolygon([]))).toThrow(
      'Cannot apply a drawn resolution to a admin session'
    );
  });

  it('clears the AOI when a later attempt fails', () => {
    const session = applyResolution(createAoiSession('drawn'), 'drawn', drawnTriangle());
    const failed = applyResolution(session, 'drawn', resolveDrawnPolygon([]));
    expect(failed.aoi).toBeNull();
    expect(failed.issue?.kind).toBe('invalid-geometry');
  });

  it('tracks the admin selection state', async () => {
    const { service } = boundaryApi();
    const step = await startAdminSelection(service);
    const session = applyAdminStep(createAoiSession(), step);
    expect(session.admin).toBe(step.state);
    expect(() => applyAdminStep(createAoiSession('upload'), step)).toThrow(
      'Cannot apply an admin step to a upload session'
    );
  });
});

function drawnTriangle() {
  return resolveDrawnPolygon([
    { geometry: { type: 'Polygon', coordinates: [[[106.8, -6.2], [106.9, -6.2], [106.9, -6.1], [106.8, -6.2]]] } },
  ]);
}
