// ---------------------------------------------------------------------------
// Pre-filters for Raw Samples
// ---------------------------------------------------------------------------
// Optional, applied by the caller before `update`:
//   jitter:  3-tap median over recent history (50% breakdown point)
//   outlier: replace a sample beyond 2σ on any axis with the 5-sample mean

import { axisMedian, axisVariance, meanOf } from './statistics.js';
import { newest } from './sample-window.js';
import { vecAbs, vecSub, type PositionSample, type Vec3 } from './types.js';

export const JITTER_WINDOW = 3;
export const OUTLIER_WINDOW = 5;
export const OUTLIER_SIGMAS = 2;

/**
 * Component-wise median of the last three history positions. The candidate
 * itself does not vote; with fewer than three samples it passes through.
 */
export function reduceJitter(history: readonly PositionSample[], position: Vec3): Vec3 {
  if (history.length < JITTER_WINDOW) return position;
  return axisMedian(newest(history, JITTER_WINDOW).map((s) => s.position));
}

/**
 * Mean of the last five history positions when `position` lies more than two
 * standard deviations from it on any axis, otherwise `position`.
 */
export function rejectOutlier(history: readonly PositionSample[], position: Vec3): Vec3 {
  if (history.length < OUTLIER_WINDOW) return position;

  const recent = newest(history, OUTLIER_WINDOW).map((s) => s.position);
  const mean = meanOf(recent);
  const variance = axisVariance(recent, mean);
  const diff = vecAbs(vecSub(position, mean));

  const outside =
    diff.x > OUTLIER_SIGMAS * Math.sqrt(variance.x) ||
    diff.y > OUTLIER_SIGMAS * Math.sqrt(variance.y) ||
    diff.z > OUTLIER_SIGMAS * Math.sqrt(variance.z);

  return outside ? mean : position;
}
