// ---------------------------------------------------------------------------
// Recursive Position Estimator
// ---------------------------------------------------------------------------
// Scalar-uncertainty Kalman filter applied per axis, then exponential smoothing.
// Predict: x̂⁻ = x̂ + v̂·h            (h = predictionFactor, fixed horizon)
//          P⁻ = P + q,  Pv = Pv + q
// Update:  K  = P⁻ / (P⁻ + r)
//          x̂  = x̂⁻ + K·(z − x̂⁻)
//          P  = (1 − K)·P⁻
// Smooth:  s  = (1 − α)·s + α·x̂
// Velocity is re-measured from the last three samples (finite differences),
// not propagated by the filter.

import type { SmootherConfig } from './config.js';
import { appendBounded, newest } from './sample-window.js';
import { totalVariance } from './statistics.js';
import {
  ZERO,
  vecAdd,
  vecLength,
  vecMaxAbs,
  vecScale,
  vecSub,
  type FilterState,
  type FilterStep,
  type MovementBand,
  type PositionSample,
  type Vec3,
} from './types.js';

export const VELOCITY_WINDOW = 3;
export const STABILITY_WINDOW = 5;
export const MIN_STABILITY_SAMPLES = 3;

/** Speed bounds (units/s) between the movement bands. */
export const FAST_SPEED = 1.0;
export const SLOW_SPEED = 0.1;

/** Smoothing factors used per band when adaptive smoothing is on. */
export const ADAPTIVE_SMOOTHING: Readonly<Record<Exclude<MovementBand, 'normal'>, number>> = {
  fast: 0.3,
  slow: 0.05,
};

export type FilterParams = Pick<
  SmootherConfig,
  | 'smoothingFactor'
  | 'predictionFactor'
  | 'processNoise'
  | 'measurementNoise'
  | 'stabilityThreshold'
  | 'historyCapacity'
  | 'adaptiveSmoothing'
>;

export function createFilterState(position: Vec3, uncertainty: number): FilterState {
  return {
    estimatedPosition: position,
    estimatedVelocity: ZERO,
    positionUncertainty: uncertainty,
    velocityUncertainty: uncertainty,
    smoothedPosition: position,
    stable: false,
    history: [],
  };
}

export function movementBand(speed: number): MovementBand {
  if (speed > FAST_SPEED) return 'fast';
  if (speed < SLOW_SPEED) return 'slow';
  return 'normal';
}

function smoothingFactorFor(velocity: Vec3, params: FilterParams): number {
  if (!params.adaptiveSmoothing) return params.smoothingFactor;
  const band = movementBand(vecLength(velocity));
  return band === 'normal' ? params.smoothingFactor : ADAPTIVE_SMOOTHING[band];
}

/**
 * Mean of Δposition/Δt over consecutive pairs among the newest three samples.
 * Pairs with Δt ≤ 0 are skipped; null when no pair qualifies.
 */
export function estimateVelocity(history: readonly PositionSample[]): Vec3 | null {
  const recent = newest(history, VELOCITY_WINDOW);
  let total = ZERO;
  let pairs = 0;

  for (let i = 1; i < recent.length; i++) {
    const prev = recent[i - 1]!;
    const curr = recent[i]!;
    const dt = curr.timestamp - prev.timestamp;
    if (dt > 0) {
      total = vecAdd(total, vecScale(vecSub(curr.position, prev.position), 1 / dt));
      pairs++;
    }
  }

  return pairs > 0 ? vecScale(total, 1 / pairs) : null;
}

/** Stable when the newest five samples' total variance is under the threshold. */
export function isStableWindow(history: readonly PositionSample[], threshold: number): boolean {
  if (history.length < MIN_STABILITY_SAMPLES) return false;
  const recent = newest(history, STABILITY_WINDOW).map((s) => s.position);
  return totalVariance(recent) < threshold;
}

/** Extrapolate the estimate `offsetSeconds` ahead along the current velocity. */
export function predictPosition(state: FilterState, offsetSeconds: number): Vec3 {
  return vecAdd(state.estimatedPosition, vecScale(state.estimatedVelocity, offsetSeconds));
}

/** Fold one sample into the state. Pure: `state` is left untouched. */
export function stepFilter(state: FilterState, sample: PositionSample, params: FilterParams): FilterStep {
  const history = appendBounded(state.history, sample, params.historyCapacity);

  // Predict
  const predicted = vecAdd(
    state.estimatedPosition,
    vecScale(state.estimatedVelocity, params.predictionFactor),
  );
  const priorUncertainty = state.positionUncertainty + params.processNoise;
  let velocityUncertainty = state.velocityUncertainty + params.processNoise;

  // Update
  const gain = priorUncertainty / (priorUncertainty + params.measurementNoise);
  const innovation = vecSub(sample.position, predicted);
  const estimatedPosition = vecAdd(predicted, vecScale(innovation, gain));
  const positionUncertainty = priorUncertainty * (1 - gain);

  // Smooth
  const alpha = smoothingFactorFor(state.estimatedVelocity, params);
  const smoothedPosition = vecAdd(
    vecScale(state.smoothedPosition, 1 - alpha),
    vecScale(estimatedPosition, alpha),
  );

  let estimatedVelocity = state.estimatedVelocity;
  const measured = estimateVelocity(history);
  if (measured) {
    estimatedVelocity = measured;
    velocityUncertainty = vecMaxAbs(measured) * 0.1;
  }

  const next: FilterState = {
    estimatedPosition,
    estimatedVelocity,
    positionUncertainty,
    velocityUncertainty,
    smoothedPosition,
    stable: isStableWindow(history, params.stabilityThreshold),
    history,
  };
  return { state: next, smoothed: smoothedPosition };
}
