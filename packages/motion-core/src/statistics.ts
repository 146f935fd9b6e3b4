// ---------------------------------------------------------------------------
// Robust Statistics over Vec3 Windows
// ---------------------------------------------------------------------------
// Population (÷n) moments, per axis or pooled across axes.

import { ZERO, vecAdd, vecScale, vecSub, vecLengthSquared, type Vec3 } from './types.js';

export function meanOf(points: readonly Vec3[]): Vec3 {
  if (points.length === 0) return ZERO;
  return vecScale(points.reduce(vecAdd, ZERO), 1 / points.length);
}

/** Per-axis population variance. */
export function axisVariance(points: readonly Vec3[], mean: Vec3 = meanOf(points)): Vec3 {
  if (points.length === 0) return ZERO;
  let x = 0;
  let y = 0;
  let z = 0;
  for (const p of points) {
    const d = vecSub(p, mean);
    x += d.x * d.x;
    y += d.y * d.y;
    z += d.z * d.z;
  }
  const n = points.length;
  return { x: x / n, y: y / n, z: z / n };
}

/** Mean squared distance from the centroid (trace of the covariance). */
export function totalVariance(points: readonly Vec3[]): number {
  if (points.length === 0) return 0;
  const mean = meanOf(points);
  let sum = 0;
  for (const p of points) sum += vecLengthSquared(vecSub(p, mean));
  return sum / points.length;
}

function median(values: number[]): number {
  const sorted = values.sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  if (sorted.length % 2 === 1) return sorted[mid]!;
  return (sorted[mid - 1]! + sorted[mid]!) / 2;
}

/** Component-wise median; empty input yields the origin. */
export function axisMedian(points: readonly Vec3[]): Vec3 {
  if (points.length === 0) return ZERO;
  return {
    x: median(points.map((p) => p.x)),
    y: median(points.map((p) => p.y)),
    z: median(points.map((p) => p.z)),
  };
}
