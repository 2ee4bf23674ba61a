/**
 * Event Types
 *
 * Every committed state change in the escrow is announced as an
 * EscrowEvent, delivered to listeners after the change is committed.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, at which block)
 * - Events are emitted only for committed changes, never for rejected ones
 */

import type { Address, PositionId } from "./position.js";

/**
 * Metadata common to all escrow events.
 */
export interface EventMetadata {
  /** Unix seconds at which the change was committed */
  readonly timestamp: number;

  /** Block number at which the change was committed */
  readonly blockNumber: number;

  /** Who caused this event */
  readonly actor: Address;
}

/** How a Deposit event came about. */
export type DepositKind =
  | "create_lock"
  | "increase_amount"
  | "increase_unlock_time"
  | "deposit_for";

interface EventOf<T extends string, P> {
  readonly type: T;
  readonly metadata: EventMetadata;
  readonly payload: Readonly<P>;
}

export type DepositEvent = EventOf<"escrow.deposit", {
  positionId: PositionId;
  kind: DepositKind;
  amount: bigint;
  end: number;
}>;

export type WithdrawEvent = EventOf<"escrow.withdraw", {
  positionId: PositionId;
  amount: bigint;
}>;

export type EarlyWithdrawEvent = EventOf<"escrow.early_withdraw", {
  positionId: PositionId;
  payout: bigint;
  penalty: bigint;
  treasury: Address;
}>;

export type MergeEvent = EventOf<"escrow.merge", {
  from: PositionId;
  to: PositionId;
  amountFrom: bigint;
  amountTo: bigint;
  amountFinal: bigint;
  endFinal: number;
}>;

export type SplitEvent = EventOf<"escrow.split", {
  from: PositionId;
  first: PositionId;
  second: PositionId;
  firstAmount: bigint;
  secondAmount: bigint;
  end: number;
}>;

export type LockPermanentEvent = EventOf<"escrow.lock_permanent", {
  positionId: PositionId;
  amount: bigint;
}>;

export type UnlockPermanentEvent = EventOf<"escrow.unlock_permanent", {
  positionId: PositionId;
  amount: bigint;
  end: number;
}>;

export type SupplyEvent = EventOf<"escrow.supply", {
  previous: bigint;
  current: bigint;
}>;

export type TransferEvent = EventOf<"position.transfer", {
  positionId: PositionId;
  from: Address | null;
  to: Address | null;
}>;

export type ApprovalEvent = EventOf<"position.approval", {
  positionId: PositionId;
  owner: Address;
  approved: Address | null;
}>;

export type ApprovalForAllEvent = EventOf<"position.approval_for_all", {
  owner: Address;
  operator: Address;
  approved: boolean;
}>;

export type SplitPermissionEvent = EventOf<"admin.split_permission", {
  account: Address;
  enabled: boolean;
}>;

export type TeamProposedEvent = EventOf<"admin.team_proposed", {
  current: Address;
  pending: Address;
}>;

export type TeamAcceptedEvent = EventOf<"admin.team_accepted", {
  previous: Address;
  current: Address;
}>;

export type ConfigUpdatedEvent = EventOf<"admin.config_updated", {
  key: "earlyWithdrawPenaltyBps" | "earlyWithdrawTreasury" | "minLockAmount";
  value: string;
}>;

/**
 * An escrow event. Discriminated by `type`.
 */
export type EscrowEvent =
  | DepositEvent
  | WithdrawEvent
  | EarlyWithdrawEvent
  | MergeEvent
  | SplitEvent
  | LockPermanentEvent
  | UnlockPermanentEvent
  | SupplyEvent
  | TransferEvent
  | ApprovalEvent
  | ApprovalForAllEvent
  | SplitPermissionEvent
  | TeamProposedEvent
  | TeamAcceptedEvent
  | ConfigUpdatedEvent;

export type EscrowEventType = EscrowEvent["type"];
