/**
 * @escrowpoint/escrow — Checkpointed voting-escrow engine.
 *
 * Holders lock an 18-decimal token until a week-aligned unlock time and
 * receive weight that decays linearly to zero at that time, or stays
 * frozen while the position is permanent. Weight of any position, and
 * the aggregate, can be read back at any past timestamp.
 *
 * Design rules:
 * - All types are readonly
 * - All arithmetic uses bigint; casts are checked, never truncated
 * - Fail-closed: invalid operations throw, never silently succeed
 * - A thrown operation leaves committed state untouched
 */

// Core engine
export { VotingEscrow, GLOBAL_SPLIT_ACCOUNT, resolveEscrowConfig } from "./escrow.js";
export type { EscrowEventListener } from "./escrow.js";

// Clocks
export { SystemClock, ManualClock } from "./clock.js";

// Position registry
export {
  PositionRegistry,
  PositionWriter,
  EMPTY_LOCK,
  positionExists,
  isApprovedOrOwner,
} from "./positions.js";
export type { PositionReader, PositionRegistryState } from "./positions.js";

// Checkpoints
export {
  CheckpointStore,
  CheckpointWriter,
  ZERO_USER_POINT,
  ZERO_GLOBAL_POINT,
} from "./checkpoint-store.js";
export type { CheckpointReader, CheckpointState } from "./checkpoint-store.js";
export { StagedMap } from "./staged-map.js";

// History reads
export { indexAtOrBefore } from "./search.js";
export type { Timestamped } from "./search.js";
export {
  balanceOfPositionAt,
  supplyAt,
  totalSupplyAt,
  userPointIndexAt,
  globalPointIndexAt,
} from "./balance.js";

// Fixed-point arithmetic
export {
  WAD,
  INT128_MIN,
  INT128_MAX,
  UINT128_MAX,
  INT256_MIN,
  INT256_MAX,
  UINT256_MAX,
  toInt128,
  toUint128,
  toInt256,
  toUint256,
  mulDiv,
  toWadSlope,
  fromWad,
  decay,
  parseWad,
  formatWad,
} from "./fixed-point.js";

// Week alignment
export {
  roundDownToWeek,
  roundUpToWeek,
  nextWeekBoundary,
  isWeekAligned,
  lockEndFor,
} from "./epoch-time.js";

// Snapshots
export {
  createSnapshot,
  restoreEscrowState,
  serializeEscrowState,
  computeStateHash,
  verifySnapshotIntegrity,
} from "./snapshot.js";
export type { SnapshotSource, RestoredEscrow } from "./snapshot.js";

// Types
export type {
  EscrowConfig,
  ResolvedEscrowConfig,
  Clock,
  EscrowErrorCategory,
  EscrowErrorCode,
  WithdrawResult,
  EarlyWithdrawResult,
  SplitResult,
  PublicLock,
  SerializedPosition,
  EscrowStateSnapshot,
  EscrowSnapshot,
} from "./types.js";

export {
  EscrowError,
  ERROR_CATEGORY,
  WEEK,
  MAX_REPLAY_WEEKS,
  BPS,
  DEFAULT_MAX_LOCK_TIME,
  DEFAULT_MIN_LOCK_TIME,
  DEFAULT_MIN_LOCK_AMOUNT,
  DEFAULT_EARLY_WITHDRAW_PENALTY_BPS,
} from "./types.js";
