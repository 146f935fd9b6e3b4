// ---------------------------------------------------------------------------
// Levenshtein Edit Distance
// ---------------------------------------------------------------------------
// d[i][0] = i, d[0][j] = j
// d[i][j] = min(d[i-1][j] + 1, d[i][j-1] + 1, d[i-1][j-1] + [a_i ≠ b_j])
// Two rolling rows of the (m+1)×(n+1) table; O(m·n) time, O(n) space.
// Compares code points, so astral characters count as one edit.

/** Signature shared by every distance function the engine accepts. */
export type DistanceFn = (a: string, b: string) => number;

/**
 * Edit distance between `a` and `b`.
 *
 * With `maxDistance`, stops as soon as a whole row exceeds the cap and returns
 * `min(distance, maxDistance + 1)`, so callers can only learn whether the true
 * distance is within the cap.
 */
export function levenshteinDistance(a: string, b: string, maxDistance?: number): number {
  const s1 = Array.from(a);
  const s2 = Array.from(b);
  const m = s1.length;
  const n = s2.length;
  const cap = maxDistance ?? Infinity;

  if (m === 0) return Math.min(n, cap + 1);
  if (n === 0) return Math.min(m, cap + 1);
  if (Math.abs(m - n) > cap) return cap + 1;

  let prev = new Int32Array(n + 1);
  let curr = new Int32Array(n + 1);
  for (let j = 0; j <= n; j++) prev[j] = j;

  for (let i = 1; i <= m; i++) {
    curr[0] = i;
    let rowMin = i;
    const ch = s1[i - 1];
    for (let j = 1; j <= n; j++) {
      const cost = ch === s2[j - 1] ? 0 : 1;
      const value = Math.min(prev[j]! + 1, curr[j - 1]! + 1, prev[j - 1]! + cost);
      curr[j] = value;
      if (value < rowMin) rowMin = value;
    }
    if (rowMin > cap) return cap + 1;
    [prev, curr] = [curr, prev];
  }

  return Math.min(prev[n]!, cap + 1);
}

/** Distance function capped at `maxDistance`, for fuzzy candidate scans. */
export function boundedDistance(maxDistance: number): DistanceFn {
  return (a, b) => levenshteinDistance(a, b, maxDistance);
}
