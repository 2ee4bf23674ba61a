/**
 * Runtime Type Guards
 *
 * Narrowing functions for escrow domain types.
 * These enable safe runtime validation at system boundaries
 * (restored snapshots, host input, deserialized data).
 */

import type { Address, PositionId, SerializedLockedBalance } from "./position.js";
import type { SerializedGlobalPoint, SerializedUserPoint } from "./checkpoint.js";
import type { DepositKind, EscrowEventType } from "./event.js";

// =============================================================================
// Scalar guards
// =============================================================================

const DECIMAL_INTEGER = /^-?\d+$/;
const UNSIGNED_DECIMAL_INTEGER = /^\d+$/;
const ZERO_HEX_ADDRESS = /^0x0{40}$/i;

/** A string holding a (possibly negative) base-10 integer. */
export function isDecimalString(value: unknown): value is string {
  return typeof value === "string" && DECIMAL_INTEGER.test(value);
}

/** A string holding a non-negative base-10 integer. */
export function isUnsignedDecimalString(value: unknown): value is string {
  return typeof value === "string" && UNSIGNED_DECIMAL_INTEGER.test(value);
}

/** A non-negative safe integer (timestamps, block numbers). */
export function isTimestamp(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isPositionId(value: unknown): value is PositionId {
  return typeof value === "number" && Number.isSafeInteger(value) && value > 0;
}

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && value.trim().length > 0;
}

/**
 * The zero address: empty, blank, or the all-zero hex account.
 */
export function isZeroAddress(value: Address): boolean {
  return value.trim() === "" || ZERO_HEX_ADDRESS.test(value.trim());
}

// =============================================================================
// Position guards
// =============================================================================

export function isSerializedLockedBalance(value: unknown): value is SerializedLockedBalance {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isUnsignedDecimalString(v.amount) &&
    isTimestamp(v.end) &&
    typeof v.isPermanent === "boolean" &&
    isTimestamp(v.effectiveStart)
  );
}

// =============================================================================
// Checkpoint guards
// =============================================================================

export function isSerializedUserPoint(value: unknown): value is SerializedUserPoint {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isDecimalString(v.bias) &&
    isDecimalString(v.slope) &&
    isTimestamp(v.ts) &&
    isTimestamp(v.blk) &&
    isUnsignedDecimalString(v.permanent)
  );
}

export function isSerializedGlobalPoint(value: unknown): value is SerializedGlobalPoint {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isDecimalString(v.bias) &&
    isDecimalString(v.slope) &&
    isTimestamp(v.ts) &&
    isTimestamp(v.blk) &&
    isUnsignedDecimalString(v.permanentLockBalance)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const DEPOSIT_KINDS = new Set<string>([
  "create_lock", "increase_amount", "increase_unlock_time", "deposit_for",
]);

const EVENT_TYPES = new Set<string>([
  "escrow.deposit",
  "escrow.withdraw",
  "escrow.early_withdraw",
  "escrow.merge",
  "escrow.split",
  "escrow.lock_permanent",
  "escrow.unlock_permanent",
  "escrow.supply",
  "position.transfer",
  "position.approval",
  "position.approval_for_all",
  "admin.split_permission",
  "admin.team_proposed",
  "admin.team_accepted",
  "admin.config_updated",
]);

export function isDepositKind(value: unknown): value is DepositKind {
  return typeof value === "string" && DEPOSIT_KINDS.has(value);
}

export function isEscrowEventType(value: unknown): value is EscrowEventType {
  return typeof value === "string" && EVENT_TYPES.has(value);
}
