/**
 * Checkpoint Types
 *
 * Timestamped snapshots of a position's or the aggregate's decay state.
 * Bias and slope are WAD-scaled signed accumulators.
 */

/**
 * A per-position checkpoint.
 */
export interface UserPoint {
  /** Decay-adjusted weight at `ts` (WAD-scaled) */
  readonly bias: bigint;

  /** Per-second decay rate (WAD-scaled); zero while permanent */
  readonly slope: bigint;

  /** Unix seconds */
  readonly ts: number;

  /** Block number */
  readonly blk: number;

  /** Frozen weight while permanent, zero otherwise */
  readonly permanent: bigint;
}

/**
 * A checkpoint of the global aggregate.
 */
export interface GlobalPoint {
  /** Sum of all decaying positions' bias at `ts` (WAD-scaled) */
  readonly bias: bigint;

  /** Sum of all decaying positions' slope (WAD-scaled) */
  readonly slope: bigint;

  readonly ts: number;

  readonly blk: number;

  /** Sum of all permanent positions' amounts */
  readonly permanentLockBalance: bigint;
}

export interface SerializedUserPoint {
  readonly bias: string;
  readonly slope: string;
  readonly ts: number;
  readonly blk: number;
  readonly permanent: string;
}

export interface SerializedGlobalPoint {
  readonly bias: string;
  readonly slope: string;
  readonly ts: number;
  readonly blk: number;
  readonly permanentLockBalance: string;
}
