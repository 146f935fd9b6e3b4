// ---------------------------------------------------------------------------
// @spatial-text/motion-core: Types & Vector Utilities
// ---------------------------------------------------------------------------

export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

/** A tracked position and the caller-supplied capture time in seconds. */
export interface PositionSample {
  readonly position: Vec3;
  readonly timestamp: number;
}

export type MovementBand = 'slow' | 'normal' | 'fast';

/**
 * Complete estimator state for one tracking session. Replaced, never
 * mutated, by `stepFilter`.
 */
export interface FilterState {
  readonly estimatedPosition: Vec3;
  readonly estimatedVelocity: Vec3;
  /** Scalar variance proxy shared by all three axes. */
  readonly positionUncertainty: number;
  readonly velocityUncertainty: number;
  readonly smoothedPosition: Vec3;
  readonly stable: boolean;
  /** Oldest first, at most `historyCapacity` entries. */
  readonly history: readonly PositionSample[];
}

export interface FilterStep {
  state: FilterState;
  smoothed: Vec3;
}

export interface SmootherDebugInfo {
  currentPosition: Vec3;
  estimatedPosition: Vec3;
  velocity: Vec3;
  isStable: boolean;
  historySize: number;
  positionUncertainty: number;
  velocityUncertainty: number;
  measurementNoise: number;
  movement: MovementBand;
}

// ---------------------------------------------------------------------------
// Vector utilities
// ---------------------------------------------------------------------------

export const ZERO: Vec3 = Object.freeze({ x: 0, y: 0, z: 0 });

export function vec3(x: number, y: number, z: number): Vec3 {
  return { x, y, z };
}

export function vecAdd(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x + b.x, y: a.y + b.y, z: a.z + b.z };
}

export function vecSub(a: Vec3, b: Vec3): Vec3 {
  return { x: a.x - b.x, y: a.y - b.y, z: a.z - b.z };
}

export function vecScale(a: Vec3, s: number): Vec3 {
  return { x: a.x * s, y: a.y * s, z: a.z * s };
}

export function vecAbs(a: Vec3): Vec3 {
  return { x: Math.abs(a.x), y: Math.abs(a.y), z: Math.abs(a.z) };
}

export function vecLengthSquared(a: Vec3): number {
  return a.x * a.x + a.y * a.y + a.z * a.z;
}

export function vecLength(a: Vec3): number {
  return Math.sqrt(vecLengthSquared(a));
}

/** Largest absolute component (L∞ norm). */
export function vecMaxAbs(a: Vec3): number {
  return Math.max(Math.abs(a.x), Math.abs(a.y), Math.abs(a.z));
}

export function isFiniteVec(a: Vec3): boolean {
  return Number.isFinite(a.x) && Number.isFinite(a.y) && Number.isFinite(a.z);
}
