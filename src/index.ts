/**
 * AOI land cover & vegetation analysis
 * Public entry point
 */

export * from './config';

export type * from './types/geo';
export type * from './types/compute';
export * from './types/analysis';

export * from './utils/axisOrder';
export * from './utils/crs';
export * from './utils/geometry';
export * from './utils/bandMath';
export * from './utils/math';

export * from './services/boundaries';
export * from './services/compute';
export * from './services/uploads';
export * from './services/aoiResolver';
export * from './services/indices';
export * from './services/datasets/landCover';
export * from './services/statistics';
export * from './services/timeSeries';
export * from './services/analysis';
