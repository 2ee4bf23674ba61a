/**
 * @escrowpoint/escrow — Binary-search indexer.
 *
 * One search for both the per-position and the global history,
 * parameterized over the point accessor.
 */

/** Anything with a checkpoint timestamp. */
export interface Timestamped {
  readonly ts: number;
}

/**
 * Index of the newest checkpoint at or before `timestamp`.
 *
 * Returns 0 when the history is empty or starts after `timestamp`
 * (slot 0 is the zero point, so callers read a zero balance).
 *
 * @param pointAt - accessor for the 1-indexed history
 * @param epochCount - highest written index
 */
export function indexAtOrBefore(
  pointAt: (index: number) => Timestamped,
  epochCount: number,
  timestamp: number,
): number {
  if (epochCount === 0) {
    return 0;
  }

  // Most lookups are for "now"
  if (pointAt(epochCount).ts <= timestamp) {
    return epochCount;
  }

  if (pointAt(1).ts > timestamp) {
    return 0;
  }

  let lower = 0;
  let upper = epochCount;
  while (upper > lower) {
    // Ceiling so that `lower = center` always makes progress
    const center = upper - Math.floor((upper - lower) / 2);
    const ts = pointAt(center).ts;
    if (ts === timestamp) {
      return center;
    }
    if (ts < timestamp) {
      lower = center;
    } else {
      upper = center - 1;
    }
  }
  return lower;
}
