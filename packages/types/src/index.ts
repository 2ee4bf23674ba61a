/**
 * @escrowpoint/types — Shared domain types for the escrow stack.
 *
 * These types are used across all escrowpoint packages:
 * - Positions and their locked balances
 * - User and global checkpoints
 * - Escrow events
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Position types
export type {
  Address,
  PositionId,
  PositionState,
  LockedBalance,
  SerializedLockedBalance,
} from "./position.js";

// Checkpoint types
export type {
  UserPoint,
  GlobalPoint,
  SerializedUserPoint,
  SerializedGlobalPoint,
} from "./checkpoint.js";

// Event types
export type {
  EventMetadata,
  DepositKind,
  EscrowEvent,
  EscrowEventType,
  DepositEvent,
  WithdrawEvent,
  EarlyWithdrawEvent,
  MergeEvent,
  SplitEvent,
  LockPermanentEvent,
  UnlockPermanentEvent,
  SupplyEvent,
  TransferEvent,
  ApprovalEvent,
  ApprovalForAllEvent,
  SplitPermissionEvent,
  TeamProposedEvent,
  TeamAcceptedEvent,
  ConfigUpdatedEvent,
} from "./event.js";

// Runtime type guards
export {
  isDecimalString,
  isUnsignedDecimalString,
  isTimestamp,
  isPositionId,
  isAddress,
  isZeroAddress,
  isSerializedLockedBalance,
  isSerializedUserPoint,
  isSerializedGlobalPoint,
  isDepositKind,
  isEscrowEventType,
} from "./guards.js";
