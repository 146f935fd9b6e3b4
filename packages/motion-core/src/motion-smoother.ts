// ---------------------------------------------------------------------------
// Motion Smoother
// ---------------------------------------------------------------------------
// Owns one FilterState per tracking session and folds caller-timed samples
// into it. Single writer: calls on one instance must not interleave.

import { createLogger, parseOptions, type Logger } from '@spatial-text/shared';
import { smootherOptionsSchema, type SmootherConfig, type SmootherOptions } from './config.js';
import {
  createFilterState,
  movementBand,
  predictPosition,
  stepFilter,
  type FilterParams,
} from './filter-state.js';
import { reduceJitter, rejectOutlier } from './robust-filters.js';
import { totalVariance } from './statistics.js';
import {
  ZERO,
  isFiniteVec,
  vecLength,
  type FilterState,
  type SmootherDebugInfo,
  type Vec3,
} from './types.js';

export const MIN_MEASUREMENT_NOISE = 0.1;
export const CALIBRATION_NOISE_SCALE = 0.1;

export interface MotionSmootherDeps {
  logger?: Logger;
}

export class MotionSmoother {
  private readonly config: SmootherConfig;
  private params: FilterParams;
  private state: FilterState;
  private readonly log: Logger;

  /** @throws ConfigurationError when options fail validation */
  constructor(options: SmootherOptions = {}, deps: MotionSmootherDeps = {}) {
    this.config = parseOptions(smootherOptionsSchema, options, 'MotionSmoother');
    this.params = { ...this.config };
    this.state = createFilterState(this.config.initialPosition, this.config.initialUncertainty);
    this.log = deps.logger ?? createLogger('motion-smoother');
  }

  /**
   * Fold a raw sample into the estimate and return the smoothed position.
   * Samples with a non-finite coordinate or timestamp are dropped.
   */
  update(position: Vec3, timestamp: number): Vec3 {
    if (!isFiniteVec(position) || !Number.isFinite(timestamp)) {
      this.log.warn('non-finite sample dropped', { position, timestamp });
      return this.state.smoothedPosition;
    }
    const { state, smoothed } = stepFilter(this.state, { position, timestamp }, this.params);
    this.state = state;
    return smoothed;
  }

  predict(offsetSeconds: number): Vec3 {
    return predictPosition(this.state, offsetSeconds);
  }

  isStable(): boolean {
    return this.state.stable;
  }

  velocity(): Vec3 {
    return this.state.estimatedVelocity;
  }

  smoothedPosition(): Vec3 {
    return this.state.smoothedPosition;
  }

  /** Current estimator state; safe to keep, later updates replace it. */
  snapshot(): FilterState {
    return this.state;
  }

  applyJitterReduction(position: Vec3): Vec3 {
    return reduceJitter(this.state.history, position);
  }

  applyOutlierRejection(position: Vec3): Vec3 {
    return rejectOutlier(this.state.history, position);
  }

  /**
   * Derive measurement noise from samples taken while the target is held
   * still: max(0.1, totalVariance · 0.1). Non-finite samples are dropped;
   * no-op when none remain.
   */
  calibrate(samples: readonly Vec3[]): void {
    const finite = samples.filter(isFiniteVec);
    const dropped = samples.length - finite.length;
    if (dropped > 0) {
      this.log.warn('non-finite calibration samples dropped', { dropped, kept: finite.length });
    }
    if (finite.length === 0) return;
    const variance = totalVariance(finite);
    const measurementNoise = Math.max(MIN_MEASUREMENT_NOISE, variance * CALIBRATION_NOISE_SCALE);
    this.params = { ...this.params, measurementNoise };
    this.log.info('calibrated', { samples: finite.length, variance, measurementNoise });
  }

  /** Clear history and zero the estimate. Calibration is kept. */
  reset(): void {
    this.state = createFilterState(ZERO, this.config.initialUncertainty);
  }

  debugInfo(): SmootherDebugInfo {
    const { state } = this;
    return {
      currentPosition: state.smoothedPosition,
      estimatedPosition: state.estimatedPosition,
      velocity: state.estimatedVelocity,
      isStable: state.stable,
      historySize: state.history.length,
      positionUncertainty: state.positionUncertainty,
      velocityUncertainty: state.velocityUncertainty,
      measurementNoise: this.params.measurementNoise,
      movement: movementBand(vecLength(state.estimatedVelocity)),
    };
  }
}
