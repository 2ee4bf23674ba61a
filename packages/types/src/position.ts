/**
 * Position Types
 *
 * A position is one locked balance with decaying or frozen weight,
 * individually owned and transferable.
 *
 * Rules:
 * - Amounts are bigint base units of an 18-decimal token
 * - Timestamps are integer Unix seconds
 * - Position ids are never reused, even after withdrawal
 */

/**
 * Opaque holder identifier (an account address in the host system).
 */
export type Address = string;

/**
 * Integer id of a position in the escrow arena. Ids start at 1.
 */
export type PositionId = number;

/**
 * Lifecycle state of a position.
 *
 * - active: decaying toward its unlock time (may already be expired)
 * - permanent: frozen at its deposited amount until converted back
 * - withdrawn: terminal, the id is burned
 */
export type PositionState = "active" | "permanent" | "withdrawn";

/**
 * The locked balance stored for a position.
 */
export interface LockedBalance {
  /** Locked amount in token base units */
  readonly amount: bigint;

  /**
   * Week-aligned unlock timestamp. Retained while the position is
   * permanent so that converting back resumes the original decay curve.
   */
  readonly end: number;

  /** Whether the position is a permanent (non-decaying) lock */
  readonly isPermanent: boolean;

  /**
   * Amount-weighted average deposit time. Only used to size the
   * early-withdrawal penalty.
   */
  readonly effectiveStart: number;
}

/**
 * Serialized LockedBalance (bigints as decimal strings).
 */
export interface SerializedLockedBalance {
  readonly amount: string;
  readonly end: number;
  readonly isPermanent: boolean;
  readonly effectiveStart: number;
}
