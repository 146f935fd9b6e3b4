// ---------------------------------------------------------------------------
// Sample Window: Bounded FIFO History
// ---------------------------------------------------------------------------

/** Append `item`, dropping the oldest entries beyond `capacity`. */
export function appendBounded<T>(window: readonly T[], item: T, capacity: number): T[] {
  const next = [...window, item];
  return next.length > capacity ? next.slice(next.length - capacity) : next;
}

/** The newest `count` entries, oldest first. */
export function newest<T>(window: readonly T[], count: number): T[] {
  return count >= window.length ? [...window] : window.slice(window.length - count);
}
