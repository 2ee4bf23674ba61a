/**
 * @escrowpoint/escrow — Internal types for the escrow engine.
 *
 * These extend the shared @escrowpoint/types with engine-specific
 * structures: configuration, clock, errors, operation results and
 * snapshots.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - A thrown operation leaves no trace in committed state
 */

import type {
  Address,
  PositionId,
  SerializedGlobalPoint,
  SerializedLockedBalance,
  SerializedUserPoint,
} from "@escrowpoint/types";

// ─── Constants ───────────────────────────────────────────────────────────

/** One week in seconds. Lock ends and slope changes align to it. */
export const WEEK = 7 * 86_400;

/** Upper bound on weekly steps when replaying the global aggregate. */
export const MAX_REPLAY_WEEKS = 255;

/** Denominator of penalty basis points. */
export const BPS = 10_000n;

export const DEFAULT_MAX_LOCK_TIME = 365 * 86_400;
export const DEFAULT_MIN_LOCK_TIME = 4 * WEEK;
export const DEFAULT_MIN_LOCK_AMOUNT = 10n ** 18n;
export const DEFAULT_EARLY_WITHDRAW_PENALTY_BPS = 5_000n;

// ─── Configuration ───────────────────────────────────────────────────────

/**
 * Engine configuration. Only `team` and `earlyWithdrawTreasury` are
 * required; everything else falls back to the defaults above.
 */
export interface EscrowConfig {
  /** Administrator of split permissions and penalty settings */
  readonly team: Address;
  /** Recipient of early-withdrawal penalties */
  readonly earlyWithdrawTreasury: Address;
  /** Longest lock in seconds; also the slope denominator */
  readonly maxLockTime?: number | undefined;
  /** Shortest lock (and shortest remaining time for top-ups) in seconds */
  readonly minLockTime?: number | undefined;
  readonly minLockAmount?: bigint | undefined;
  readonly earlyWithdrawPenaltyBps?: bigint | undefined;
}

/** EscrowConfig with every default applied. */
export interface ResolvedEscrowConfig {
  readonly team: Address;
  readonly earlyWithdrawTreasury: Address;
  readonly maxLockTime: number;
  readonly minLockTime: number;
  readonly minLockAmount: bigint;
  readonly earlyWithdrawPenaltyBps: bigint;
}

/**
 * Source of "now". The host decides what a timestamp and a block are.
 */
export interface Clock {
  /** Current Unix time in whole seconds */
  now(): number;
  /** Current block number */
  blockNumber(): number;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Broad family of a failure. */
export type EscrowErrorCategory =
  | "validation"
  | "authorization"
  | "state"
  | "arithmetic";

/** Error codes for escrow operations. */
export type EscrowErrorCode =
  // validation
  | "ZERO_AMOUNT"
  | "INVALID_AMOUNT"
  | "AMOUNT_TOO_SMALL"
  | "AMOUNT_TOO_LARGE"
  | "ZERO_ADDRESS"
  | "LOCK_TOO_SHORT"
  | "LOCK_TOO_LONG"
  | "INVALID_DURATION"
  | "LOCK_DURATION_NOT_IN_FUTURE"
  | "SAME_POSITION"
  | "INVALID_PENALTY"
  | "INVALID_CONFIG"
  | "INVALID_SNAPSHOT"
  // authorization
  | "NOT_APPROVED_OR_OWNER"
  | "SPLIT_NOT_ALLOWED"
  | "NOT_TEAM"
  | "NOT_PENDING_TEAM"
  // state
  | "NONEXISTENT_POSITION"
  | "ALREADY_WITHDRAWN"
  | "ALREADY_PERMANENT"
  | "NOT_PERMANENT"
  | "EXPIRED"
  | "NOT_EXPIRED"
  | "DEPOSIT_DURATION_TOO_SHORT"
  | "CLOCK_WENT_BACKWARDS"
  // arithmetic
  | "SAFE_CAST_OVERFLOW"
  | "DIVISION_BY_ZERO"
  | "LOOKBACK_EXCEEDED";

export const ERROR_CATEGORY: Readonly<Record<EscrowErrorCode, EscrowErrorCategory>> = {
  ZERO_AMOUNT: "validation",
  INVALID_AMOUNT: "validation",
  AMOUNT_TOO_SMALL: "validation",
  AMOUNT_TOO_LARGE: "validation",
  ZERO_ADDRESS: "validation",
  LOCK_TOO_SHORT: "validation",
  LOCK_TOO_LONG: "validation",
  INVALID_DURATION: "validation",
  LOCK_DURATION_NOT_IN_FUTURE: "validation",
  SAME_POSITION: "validation",
  INVALID_PENALTY: "validation",
  INVALID_CONFIG: "validation",
  INVALID_SNAPSHOT: "validation",
  NOT_APPROVED_OR_OWNER: "authorization",
  SPLIT_NOT_ALLOWED: "authorization",
  NOT_TEAM: "authorization",
  NOT_PENDING_TEAM: "authorization",
  NONEXISTENT_POSITION: "state",
  ALREADY_WITHDRAWN: "state",
  ALREADY_PERMANENT: "state",
  NOT_PERMANENT: "state",
  EXPIRED: "state",
  NOT_EXPIRED: "state",
  DEPOSIT_DURATION_TOO_SHORT: "state",
  CLOCK_WENT_BACKWARDS: "state",
  SAFE_CAST_OVERFLOW: "arithmetic",
  DIVISION_BY_ZERO: "arithmetic",
  LOOKBACK_EXCEEDED: "arithmetic",
} as const;

/**
 * Structured error from the escrow engine.
 * Always thrown — never returns error codes silently.
 */
export class EscrowError extends Error {
  public readonly code: EscrowErrorCode;
  public readonly category: EscrowErrorCategory;

  constructor(code: EscrowErrorCode, message: string) {
    super(message);
    this.name = "EscrowError";
    this.code = code;
    this.category = ERROR_CATEGORY[code];
  }
}

// ─── Operation Results ───────────────────────────────────────────────────

/** Amount released by a matured withdrawal. */
export interface WithdrawResult {
  readonly positionId: PositionId;
  readonly amount: bigint;
}

/** Split of a position's amount between holder and treasury. */
export interface EarlyWithdrawResult {
  readonly positionId: PositionId;
  readonly payout: bigint;
  readonly penalty: bigint;
  readonly treasury: Address;
}

/** The two positions minted by a split, in [remainder, split-off] order. */
export type SplitResult = readonly [PositionId, PositionId];

/**
 * Externally visible lock: `end` reads 0 while permanent.
 */
export interface PublicLock {
  readonly amount: bigint;
  readonly end: number;
  readonly isPermanent: boolean;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

export interface SerializedPosition {
  readonly id: PositionId;
  readonly owner: Address | null;
  readonly approved: Address | null;
  readonly locked: SerializedLockedBalance;
  readonly withdrawn: boolean;
  readonly history: readonly SerializedUserPoint[];
}

export interface EscrowStateSnapshot {
  readonly config: {
    readonly team: Address;
    readonly pendingTeam: Address | null;
    readonly earlyWithdrawTreasury: Address;
    readonly maxLockTime: number;
    readonly minLockTime: number;
    readonly minLockAmount: string;
    readonly earlyWithdrawPenaltyBps: string;
  };
  readonly nextPositionId: PositionId;
  readonly supply: string;
  readonly permanentLockBalance: string;
  readonly positions: readonly SerializedPosition[];
  readonly operators: readonly (readonly [Address, readonly Address[]])[];
  readonly splitPermissions: readonly Address[];
  readonly globalHistory: readonly SerializedGlobalPoint[];
  readonly slopeChanges: readonly (readonly [number, string])[];
}

/**
 * Serializable snapshot of the entire escrow state.
 * Used for persistence and rehydration.
 */
export interface EscrowSnapshot {
  readonly version: 1;
  readonly state: EscrowStateSnapshot;
  /** SHA-256 over the RFC 8785 canonical JSON of `state` */
  readonly stateHash: string;
  readonly createdAt: string;
}
