// ---------------------------------------------------------------------------
// @spatial-text/motion-core: Barrel Export
// ---------------------------------------------------------------------------
// Gaze / pointer smoothing: scalar Kalman estimate, exponential smoothing,
// finite-difference velocity, median jitter and 2σ outlier pre-filters.

export type {
  Vec3,
  PositionSample,
  MovementBand,
  FilterState,
  FilterStep,
  SmootherDebugInfo,
} from './types.js';

export {
  ZERO,
  vec3,
  vecAdd,
  vecSub,
  vecScale,
  vecAbs,
  vecLength,
  vecLengthSquared,
  vecMaxAbs,
  isFiniteVec,
} from './types.js';

export {
  smootherOptionsSchema,
  vec3Schema,
  type SmootherOptions,
  type SmootherConfig,
} from './config.js';

export { appendBounded, newest } from './sample-window.js';
export { meanOf, axisVariance, totalVariance, axisMedian } from './statistics.js';
export { reduceJitter, rejectOutlier } from './robust-filters.js';

export {
  createFilterState,
  stepFilter,
  predictPosition,
  estimateVelocity,
  isStableWindow,
  movementBand,
  ADAPTIVE_SMOOTHING,
  type FilterParams,
} from './filter-state.js';

export { MotionSmoother, type MotionSmootherDeps } from './motion-smoother.js';
