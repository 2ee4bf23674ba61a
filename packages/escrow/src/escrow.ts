/**
 * @escrowpoint/escrow — VotingEscrow, the lock lifecycle manager.
 *
 * Time-weighted, checkpointed escrow. Each position's weight decays
 * linearly to zero at its unlock time, or stays frozen while the
 * position is permanent. Historical weight of any position, and of the
 * aggregate, can be read back at any past timestamp.
 *
 * API surface:
 * - createLock() / createLockFor() — open a position
 * - increaseAmount() / depositFor() — top up, same unlock time
 * - increaseUnlockTime() — push the unlock time forward
 * - lockPermanent() / unlockPermanent() — freeze and unfreeze decay
 * - merge() / split() — combine or divide positions
 * - withdraw() / earlyWithdraw() — close a position
 * - balanceOf() / balanceAt() / totalSupply() / totalSupplyAt() — reads
 *
 * Every mutator removes the position's old contribution from the
 * aggregate, applies the change, adds the new contribution, and writes
 * the position checkpoint, the global checkpoint and the slope-change
 * schedule as one staged transaction. Nothing is committed unless the
 * whole operation succeeds.
 */

import type {
  Address,
  EscrowEvent,
  EventMetadata,
  GlobalPoint,
  LockedBalance,
  PositionId,
  PositionState,
  UserPoint,
} from "@escrowpoint/types";
import { isZeroAddress } from "@escrowpoint/types";
import { balanceOfPositionAt, totalSupplyAt } from "./balance.js";
import { CheckpointStore } from "./checkpoint-store.js";
import type { CheckpointWriter } from "./checkpoint-store.js";
import { lockEndFor, roundDownToWeek } from "./epoch-time.js";
import { mulDiv, toInt256, toUint128, toWadSlope, WAD } from "./fixed-point.js";
import {
  EMPTY_LOCK,
  isApprovedOrOwner,
  positionExists,
  PositionRegistry,
} from "./positions.js";
import type { PositionReader, PositionWriter } from "./positions.js";
import { createSnapshot, restoreEscrowState } from "./snapshot.js";
import type { SnapshotSource } from "./snapshot.js";
import type {
  Clock,
  EarlyWithdrawResult,
  EscrowConfig,
  EscrowSnapshot,
  PublicLock,
  ResolvedEscrowConfig,
  SplitResult,
  WithdrawResult,
} from "./types.js";
import {
  BPS,
  DEFAULT_EARLY_WITHDRAW_PENALTY_BPS,
  DEFAULT_MAX_LOCK_TIME,
  DEFAULT_MIN_LOCK_AMOUNT,
  DEFAULT_MIN_LOCK_TIME,
  EscrowError,
  MAX_REPLAY_WEEKS,
  WEEK,
} from "./types.js";

/** Key of the split permission that applies to every holder. */
export const GLOBAL_SPLIT_ACCOUNT: Address = "0x0000000000000000000000000000000000000000";

export type EscrowEventListener = (event: EscrowEvent) => void;

/**
 * One staged operation.
 */
interface Transaction {
  readonly checkpoints: CheckpointWriter;
  readonly positions: PositionWriter;
  readonly events: EscrowEvent[];
  readonly metadata: EventMetadata;
  readonly now: number;
  readonly blk: number;
}

/** A position's share of the aggregate bias and slope. */
interface Contribution {
  readonly bias: bigint;
  readonly slope: bigint;
}

const NO_CONTRIBUTION: Contribution = { bias: 0n, slope: 0n };

/**
 * Mutable administrative settings.
 */
interface EscrowSettings {
  team: Address;
  pendingTeam: Address | null;
  earlyWithdrawTreasury: Address;
  earlyWithdrawPenaltyBps: bigint;
  minLockAmount: bigint;
  readonly maxLockTime: number;
  readonly minLockTime: number;
}

/**
 * Apply defaults and validate an EscrowConfig.
 */
export function resolveEscrowConfig(config: EscrowConfig): ResolvedEscrowConfig {
  const resolved: ResolvedEscrowConfig = {
    team: config.team,
    earlyWithdrawTreasury: config.earlyWithdrawTreasury,
    maxLockTime: config.maxLockTime ?? DEFAULT_MAX_LOCK_TIME,
    minLockTime: config.minLockTime ?? DEFAULT_MIN_LOCK_TIME,
    minLockAmount: config.minLockAmount ?? DEFAULT_MIN_LOCK_AMOUNT,
    earlyWithdrawPenaltyBps: config.earlyWithdrawPenaltyBps ?? DEFAULT_EARLY_WITHDRAW_PENALTY_BPS,
  };

  if (isZeroAddress(resolved.team)) {
    throw new EscrowError("ZERO_ADDRESS", "Team address must not be the zero address");
  }
  if (isZeroAddress(resolved.earlyWithdrawTreasury)) {
    throw new EscrowError("ZERO_ADDRESS", "Early-withdraw treasury must not be the zero address");
  }
  if (!Number.isSafeInteger(resolved.maxLockTime) || resolved.maxLockTime < WEEK) {
    throw new EscrowError(
      "INVALID_CONFIG",
      `maxLockTime must be an integer of at least one week, got ${String(resolved.maxLockTime)}`,
    );
  }
  if (
    !Number.isSafeInteger(resolved.minLockTime) ||
    resolved.minLockTime < 0 ||
    resolved.minLockTime > resolved.maxLockTime
  ) {
    throw new EscrowError(
      "INVALID_CONFIG",
      `minLockTime must be an integer in [0, maxLockTime], got ${String(resolved.minLockTime)}`,
    );
  }
  if (resolved.minLockAmount <= 0n) {
    throw new EscrowError("INVALID_CONFIG", "minLockAmount must be positive");
  }
  assertPenalty(resolved.earlyWithdrawPenaltyBps);

  return resolved;
}

function assertPenalty(bps: bigint): void {
  if (bps < 0n || bps > BPS) {
    throw new EscrowError(
      "INVALID_PENALTY",
      `Early-withdraw penalty must be within [0, ${BPS.toString()}] bps, got ${bps.toString()}`,
    );
  }
}

function assertAddress(address: Address, role: string): void {
  if (isZeroAddress(address)) {
    throw new EscrowError("ZERO_ADDRESS", `${role} must not be the zero address`);
  }
}

function assertPositiveAmount(value: bigint): void {
  if (value === 0n) {
    throw new EscrowError("ZERO_AMOUNT", "Amount must be greater than zero");
  }
  if (value < 0n) {
    throw new EscrowError("INVALID_AMOUNT", `Amount must be positive, got ${value.toString()}`);
  }
  toUint128(value);
}

function assertDuration(duration: number): void {
  if (!Number.isSafeInteger(duration) || duration < 0) {
    throw new EscrowError(
      "INVALID_DURATION",
      `Lock duration must be a non-negative integer number of seconds, got ${String(duration)}`,
    );
  }
}

/**
 * Unlock time that drives decay: none while permanent.
 */
function decayingEnd(lock: LockedBalance): number {
  return lock.isPermanent ? 0 : lock.end;
}

/**
 * Amount-weighted average of two start times, rounded down.
 */
function weightedStart(
  amountA: bigint,
  startA: number,
  amountB: bigint,
  startB: number,
): number {
  const total = amountA + amountB;
  if (total === 0n) {
    return startB;
  }
  return Number((amountA * BigInt(startA) + amountB * BigInt(startB)) / total);
}

/**
 * Checkpointed voting escrow.
 */
export class VotingEscrow {
  private readonly _clock: Clock;
  private readonly _settings: EscrowSettings;
  private readonly _checkpoints: CheckpointStore;
  private readonly _positions: PositionRegistry;
  private readonly _listeners: Set<EscrowEventListener> = new Set();

  constructor(config: EscrowConfig, clock: Clock, restored?: SnapshotSource) {
    const resolved = resolveEscrowConfig(config);
    this._clock = clock;
    this._settings = { ...resolved, pendingTeam: restored?.pendingTeam ?? null };
    this._checkpoints = restored?.checkpoints ?? new CheckpointStore();
    this._positions = restored?.positions ?? new PositionRegistry();
  }

  // ─── Events ──────────────────────────────────────────────────────────

  /**
   * Subscribe to committed events. Returns an unsubscribe function.
   * Listeners run after commit; an exception from a listener reaches
   * the caller of the operation, whose changes are already committed.
   */
  onEvent(listener: EscrowEventListener): () => void {
    this._listeners.add(listener);
    return () => {
      this._listeners.delete(listener);
    };
  }

  // ─── Lock Creation ───────────────────────────────────────────────────

  /**
   * Lock `value` for `duration` seconds, rounded down to a week
   * boundary, on behalf of the caller.
   */
  createLock(caller: Address, value: bigint, duration: number): PositionId {
    return this._createLock(caller, value, duration, caller);
  }

  /**
   * Lock `value` for `duration` seconds and mint the position to
   * `recipient`.
   */
  createLockFor(
    caller: Address,
    value: bigint,
    duration: number,
    recipient: Address,
  ): PositionId {
    return this._createLock(caller, value, duration, recipient);
  }

  private _createLock(
    caller: Address,
    value: bigint,
    duration: number,
    recipient: Address,
  ): PositionId {
    assertAddress(recipient, "Recipient");
    assertPositiveAmount(value);
    assertDuration(duration);
    if (value < this._settings.minLockAmount) {
      throw new EscrowError(
        "AMOUNT_TOO_SMALL",
        `Amount ${value.toString()} is below the minimum lock amount ${this._settings.minLockAmount.toString()}`,
      );
    }

    return this._transact(caller, (tx) => {
      const end = lockEndFor(tx.now, duration);
      if (end <= tx.now || end - tx.now < this._settings.minLockTime) {
        throw new EscrowError(
          "LOCK_TOO_SHORT",
          `Lock would end at ${String(end)}, less than ${String(this._settings.minLockTime)}s after ${String(tx.now)}`,
        );
      }
      if (end > tx.now + this._settings.maxLockTime) {
        throw new EscrowError(
          "LOCK_TOO_LONG",
          `Lock would end at ${String(end)}, more than ${String(this._settings.maxLockTime)}s after ${String(tx.now)}`,
        );
      }

      const positionId = tx.positions.mint(recipient);
      tx.events.push({
        type: "position.transfer",
        metadata: tx.metadata,
        payload: { positionId, from: null, to: recipient },
      });

      this._depositFor(
        tx,
        positionId,
        value,
        end,
        { ...EMPTY_LOCK, effectiveStart: tx.now },
        "create_lock",
      );
      return positionId;
    });
  }

  // ─── Top-ups ─────────────────────────────────────────────────────────

  /**
   * Add `value` to a position the caller owns or is approved for.
   */
  increaseAmount(caller: Address, positionId: PositionId, value: bigint): void {
    this._transact(caller, (tx) => {
      this._requireAuthorized(tx.positions, caller, positionId);
      this._increaseAmountFor(tx, positionId, value, "increase_amount");
    });
  }

  /**
   * Add `value` to any live position. No authorization required.
   */
  depositFor(caller: Address, positionId: PositionId, value: bigint): void {
    this._transact(caller, (tx) => {
      this._increaseAmountFor(tx, positionId, value, "deposit_for");
    });
  }

  private _increaseAmountFor(
    tx: Transaction,
    positionId: PositionId,
    value: bigint,
    kind: "increase_amount" | "deposit_for",
  ): void {
    assertPositiveAmount(value);
    const oldLocked = this._requireLive(tx.positions, positionId);

    if (!oldLocked.isPermanent) {
      if (oldLocked.end <= tx.now) {
        throw new EscrowError("EXPIRED", `Position ${String(positionId)} expired at ${String(oldLocked.end)}`);
      }
      // Topping up a nearly-expired lock would cheapen a later early exit
      if (oldLocked.end - tx.now < this._settings.minLockTime) {
        throw new EscrowError(
          "DEPOSIT_DURATION_TOO_SHORT",
          `Position ${String(positionId)} unlocks in ${String(oldLocked.end - tx.now)}s, below the ${String(this._settings.minLockTime)}s minimum`,
        );
      }
    }

    if (oldLocked.isPermanent) {
      tx.checkpoints.permanentLockBalance += value;
    }

    const effectiveStart = weightedStart(
      oldLocked.amount,
      oldLocked.effectiveStart,
      value,
      tx.now,
    );
    this._depositFor(tx, positionId, value, 0, oldLocked, kind, effectiveStart);
  }

  // ─── Duration ────────────────────────────────────────────────────────

  /**
   * Move the unlock time to `now + duration`, rounded down to a week.
   * Only ever forward; never on permanent positions.
   */
  increaseUnlockTime(caller: Address, positionId: PositionId, duration: number): void {
    assertDuration(duration);

    this._transact(caller, (tx) => {
      const oldLocked = this._requireAuthorized(tx.positions, caller, positionId);
      if (oldLocked.isPermanent) {
        throw new EscrowError("ALREADY_PERMANENT", `Position ${String(positionId)} is permanent`);
      }
      if (oldLocked.end <= tx.now) {
        throw new EscrowError("EXPIRED", `Position ${String(positionId)} expired at ${String(oldLocked.end)}`);
      }

      const end = lockEndFor(tx.now, duration);
      if (end <= oldLocked.end) {
        throw new EscrowError(
          "LOCK_DURATION_NOT_IN_FUTURE",
          `New unlock time ${String(end)} is not after the current ${String(oldLocked.end)}`,
        );
      }
      if (end > tx.now + this._settings.maxLockTime) {
        throw new EscrowError(
          "LOCK_TOO_LONG",
          `Lock would end at ${String(end)}, more than ${String(this._settings.maxLockTime)}s after ${String(tx.now)}`,
        );
      }

      this._depositFor(tx, positionId, 0n, end, oldLocked, "increase_unlock_time");
    });
  }

  /**
   * Shared tail of every deposit: update supply and the lock, then
   * checkpoint. `end` of 0 keeps the current unlock time.
   */
  private _depositFor(
    tx: Transaction,
    positionId: PositionId,
    value: bigint,
    end: number,
    oldLocked: LockedBalance,
    kind: "create_lock" | "increase_amount" | "increase_unlock_time" | "deposit_for",
    effectiveStart: number = oldLocked.effectiveStart,
  ): void {
    const supplyBefore = tx.positions.supply;
    tx.positions.supply = supplyBefore + value;

    const newLocked: LockedBalance = {
      amount: toUint128(oldLocked.amount + value),
      end: end !== 0 ? end : oldLocked.end,
      isPermanent: oldLocked.isPermanent,
      effectiveStart,
    };
    tx.positions.setLock(positionId, newLocked);
    this._checkpoint(tx, positionId, oldLocked, newLocked);

    tx.events.push({
      type: "escrow.deposit",
      metadata: tx.metadata,
      payload: { positionId, kind, amount: value, end: newLocked.end },
    });
    tx.events.push({
      type: "escrow.supply",
      metadata: tx.metadata,
      payload: { previous: supplyBefore, current: tx.positions.supply },
    });
  }

  // ─── Permanent Locks ─────────────────────────────────────────────────

  /**
   * Freeze a position's weight at its amount. The unlock time is kept
   * so that unlockPermanent() resumes the original decay curve.
   */
  lockPermanent(caller: Address, positionId: PositionId): void {
    this._transact(caller, (tx) => {
      const oldLocked = this._requireAuthorized(tx.positions, caller, positionId);
      if (oldLocked.isPermanent) {
        throw new EscrowError("ALREADY_PERMANENT", `Position ${String(positionId)} is already permanent`);
      }
      if (oldLocked.end <= tx.now) {
        throw new EscrowError("EXPIRED", `Position ${String(positionId)} expired at ${String(oldLocked.end)}`);
      }

      const newLocked: LockedBalance = { ...oldLocked, isPermanent: true };
      tx.checkpoints.permanentLockBalance += oldLocked.amount;
      tx.positions.setLock(positionId, newLocked);
      this._checkpoint(tx, positionId, oldLocked, newLocked);

      tx.events.push({
        type: "escrow.lock_permanent",
        metadata: tx.metadata,
        payload: { positionId, amount: oldLocked.amount },
      });
    });
  }

  /**
   * Resume decay toward the retained unlock time, as though the clock
   * had never paused. A retained unlock time already in the past leaves
   * the position expired and immediately withdrawable.
   */
  unlockPermanent(caller: Address, positionId: PositionId): void {
    this._transact(caller, (tx) => {
      const oldLocked = this._requireAuthorized(tx.positions, caller, positionId);
      if (!oldLocked.isPermanent) {
        throw new EscrowError("NOT_PERMANENT", `Position ${String(positionId)} is not permanent`);
      }

      const newLocked: LockedBalance = { ...oldLocked, isPermanent: false };
      tx.checkpoints.permanentLockBalance -= oldLocked.amount;
      tx.positions.setLock(positionId, newLocked);
      this._checkpoint(tx, positionId, oldLocked, newLocked);

      tx.events.push({
        type: "escrow.unlock_permanent",
        metadata: tx.metadata,
        payload: { positionId, amount: oldLocked.amount, end: newLocked.end },
      });
    });
  }

  // ─── Merge & Split ───────────────────────────────────────────────────

  /**
   * Fold `from` into `to`. `to` ends at the later of the two unlock
   * times and stays permanent if it was. `from` is burned.
   */
  merge(caller: Address, from: PositionId, to: PositionId): void {
    if (from === to) {
      throw new EscrowError("SAME_POSITION", `Cannot merge position ${String(from)} into itself`);
    }

    this._transact(caller, (tx) => {
      const fromLocked = this._requireAuthorized(tx.positions, caller, from);
      const toLocked = this._requireAuthorized(tx.positions, caller, to);
      if (fromLocked.isPermanent) {
        throw new EscrowError("ALREADY_PERMANENT", `Cannot merge from permanent position ${String(from)}`);
      }
      if (!toLocked.isPermanent && toLocked.end <= tx.now) {
        throw new EscrowError("EXPIRED", `Position ${String(to)} expired at ${String(toLocked.end)}`);
      }

      const end = Math.max(fromLocked.end, toLocked.end);
      const fromOwner = this._ownerIn(tx.positions, from);

      tx.positions.burn(from);
      this._checkpoint(tx, from, fromLocked, EMPTY_LOCK);

      const newLocked: LockedBalance = {
        amount: toUint128(toLocked.amount + fromLocked.amount),
        end,
        isPermanent: toLocked.isPermanent,
        effectiveStart: weightedStart(
          toLocked.amount,
          toLocked.effectiveStart,
          fromLocked.amount,
          fromLocked.effectiveStart,
        ),
      };
      if (newLocked.isPermanent) {
        tx.checkpoints.permanentLockBalance += fromLocked.amount;
      }
      tx.positions.setLock(to, newLocked);
      this._checkpoint(tx, to, toLocked, newLocked);

      tx.events.push({
        type: "position.transfer",
        metadata: tx.metadata,
        payload: { positionId: from, from: fromOwner, to: null },
      });
      tx.events.push({
        type: "escrow.merge",
        metadata: tx.metadata,
        payload: {
          from,
          to,
          amountFrom: fromLocked.amount,
          amountTo: toLocked.amount,
          amountFinal: newLocked.amount,
          endFinal: newLocked.end,
        },
      });
    });
  }

  /**
   * Divide a position into `[original - amount, amount]`, both with the
   * same unlock time, permanence and effective start. The source is
   * burned. Requires split permission for the current owner or the
   * global split flag.
   */
  split(caller: Address, positionId: PositionId, amount: bigint): SplitResult {
    return this._transact(caller, (tx) => {
      const locked = this._requireLive(tx.positions, positionId);
      const owner = this._ownerIn(tx.positions, positionId);
      if (!tx.positions.canSplit(owner) && !tx.positions.canSplit(GLOBAL_SPLIT_ACCOUNT)) {
        throw new EscrowError("SPLIT_NOT_ALLOWED", `Splitting is not enabled for ${owner}`);
      }
      this._requireAuthorized(tx.positions, caller, positionId);
      if (!locked.isPermanent && locked.end <= tx.now) {
        throw new EscrowError("EXPIRED", `Position ${String(positionId)} expired at ${String(locked.end)}`);
      }
      assertPositiveAmount(amount);
      if (amount >= locked.amount) {
        throw new EscrowError(
          "AMOUNT_TOO_LARGE",
          `Split amount ${amount.toString()} must be below the position amount ${locked.amount.toString()}`,
        );
      }

      tx.positions.burn(positionId);
      this._checkpoint(tx, positionId, locked, EMPTY_LOCK);
      tx.events.push({
        type: "position.transfer",
        metadata: tx.metadata,
        payload: { positionId, from: owner, to: null },
      });

      const first = this._mintSplit(tx, owner, { ...locked, amount: locked.amount - amount });
      const second = this._mintSplit(tx, owner, { ...locked, amount });

      tx.events.push({
        type: "escrow.split",
        metadata: tx.metadata,
        payload: {
          from: positionId,
          first,
          second,
          firstAmount: locked.amount - amount,
          secondAmount: amount,
          end: locked.end,
        },
      });
      return [first, second] as const;
    });
  }

  private _mintSplit(tx: Transaction, owner: Address, locked: LockedBalance): PositionId {
    const positionId = tx.positions.mint(owner);
    tx.positions.setLock(positionId, locked);
    this._checkpoint(tx, positionId, EMPTY_LOCK, locked);
    tx.events.push({
      type: "position.transfer",
      metadata: tx.metadata,
      payload: { positionId, from: null, to: owner },
    });
    return positionId;
  }

  // ─── Withdrawal ──────────────────────────────────────────────────────

  /**
   * Release the full amount of an expired, non-permanent position.
   */
  withdraw(caller: Address, positionId: PositionId): WithdrawResult {
    return this._transact(caller, (tx) => {
      const locked = this._requireAuthorized(tx.positions, caller, positionId);
      if (locked.isPermanent) {
        throw new EscrowError("ALREADY_PERMANENT", `Position ${String(positionId)} is permanent`);
      }
      if (tx.now < locked.end) {
        throw new EscrowError(
          "NOT_EXPIRED",
          `Position ${String(positionId)} unlocks at ${String(locked.end)}`,
        );
      }

      this._close(tx, positionId, locked);
      tx.events.push({
        type: "escrow.withdraw",
        metadata: tx.metadata,
        payload: { positionId, amount: locked.amount },
      });
      return { positionId, amount: locked.amount };
    });
  }

  /**
   * Close a position before its unlock time. The penalty shrinks
   * linearly with the time remaining relative to the time locked since
   * the effective start, and goes to the treasury.
   */
  earlyWithdraw(caller: Address, positionId: PositionId): EarlyWithdrawResult {
    return this._transact(caller, (tx) => {
      const locked = this._requireAuthorized(tx.positions, caller, positionId);
      if (locked.isPermanent) {
        throw new EscrowError("ALREADY_PERMANENT", `Position ${String(positionId)} is permanent`);
      }
      if (locked.end <= tx.now) {
        throw new EscrowError(
          "EXPIRED",
          `Position ${String(positionId)} expired at ${String(locked.end)}; use withdraw`,
        );
      }

      const penalty = this.earlyWithdrawPenaltyOf(locked, tx.now);
      const payout = locked.amount - penalty;
      const treasury = this._settings.earlyWithdrawTreasury;

      this._close(tx, positionId, locked);
      tx.events.push({
        type: "escrow.early_withdraw",
        metadata: tx.metadata,
        payload: { positionId, payout, penalty, treasury },
      });
      return { positionId, payout, penalty, treasury };
    });
  }

  /**
   * Penalty an early withdrawal of `locked` would pay at `now`.
   */
  earlyWithdrawPenaltyOf(locked: LockedBalance, now: number): bigint {
    if (locked.isPermanent || locked.end <= now) {
      return 0n;
    }
    const remaining = BigInt(locked.end - now);
    const total = BigInt(locked.end - Math.min(locked.effectiveStart, now));
    return mulDiv(
      locked.amount * this._settings.earlyWithdrawPenaltyBps,
      remaining,
      BPS * total,
    );
  }

  private _close(tx: Transaction, positionId: PositionId, locked: LockedBalance): void {
    const owner = this._ownerIn(tx.positions, positionId);
    const supplyBefore = tx.positions.supply;

    tx.positions.burn(positionId);
    tx.positions.supply = supplyBefore - locked.amount;
    this._checkpoint(tx, positionId, locked, EMPTY_LOCK);

    tx.events.push({
      type: "position.transfer",
      metadata: tx.metadata,
      payload: { positionId, from: owner, to: null },
    });
    tx.events.push({
      type: "escrow.supply",
      metadata: tx.metadata,
      payload: { previous: supplyBefore, current: tx.positions.supply },
    });
  }

  // ─── Global Checkpoint ───────────────────────────────────────────────

  /**
   * Write a global checkpoint with no position change, recording one
   * point per elapsed week. A gap longer than MAX_REPLAY_WEEKS is
   * bridged in part; call again to continue.
   */
  checkpoint(caller: Address): void {
    this._transact(caller, (tx) => {
      this._checkpoint(tx, null, EMPTY_LOCK, EMPTY_LOCK);
    });
  }

  // ─── Ownership ───────────────────────────────────────────────────────

  transferFrom(caller: Address, from: Address, to: Address, positionId: PositionId): void {
    assertAddress(to, "Recipient");

    this._transact(caller, (tx) => {
      this._requireAuthorized(tx.positions, caller, positionId);
      const owner = this._ownerIn(tx.positions, positionId);
      if (owner !== from) {
        throw new EscrowError(
          "NOT_APPROVED_OR_OWNER",
          `Position ${String(positionId)} is not owned by ${from}`,
        );
      }

      tx.positions.transfer(positionId, to);
      tx.events.push({
        type: "position.transfer",
        metadata: tx.metadata,
        payload: { positionId, from, to },
      });
    });
  }

  /**
   * Approve `approved` (or nobody, with null) for one position. Only the
   * owner or one of its operators may do this.
   */
  approve(caller: Address, approved: Address | null, positionId: PositionId): void {
    this._transact(caller, (tx) => {
      this._requireLive(tx.positions, positionId);
      const owner = this._ownerIn(tx.positions, positionId);
      if (caller !== owner && !tx.positions.isApprovedForAll(owner, caller)) {
        throw new EscrowError(
          "NOT_APPROVED_OR_OWNER",
          `${caller} may not approve for position ${String(positionId)}`,
        );
      }

      tx.positions.approve(positionId, approved);
      tx.events.push({
        type: "position.approval",
        metadata: tx.metadata,
        payload: { positionId, owner, approved },
      });
    });
  }

  setApprovalForAll(caller: Address, operator: Address, approved: boolean): void {
    assertAddress(operator, "Operator");

    this._transact(caller, (tx) => {
      tx.positions.setApprovalForAll(caller, operator, approved);
      tx.events.push({
        type: "position.approval_for_all",
        metadata: tx.metadata,
        payload: { owner: caller, operator, approved },
      });
    });
  }

  // ─── Administration ──────────────────────────────────────────────────

  /**
   * Enable or disable splitting for `account`. GLOBAL_SPLIT_ACCOUNT
   * toggles it for everyone.
   */
  toggleSplit(caller: Address, account: Address, enabled: boolean): void {
    this._requireTeam(caller);

    const key = isZeroAddress(account) ? GLOBAL_SPLIT_ACCOUNT : account;

    this._transact(caller, (tx) => {
      tx.positions.setSplitPermission(key, enabled);
      tx.events.push({
        type: "admin.split_permission",
        metadata: tx.metadata,
        payload: { account: key, enabled },
      });
    });
  }

  /**
   * First step of a team handover; `acceptTeam` completes it.
   */
  setTeam(caller: Address, newTeam: Address): void {
    this._requireTeam(caller);
    assertAddress(newTeam, "Team");

    this._transact(caller, (tx) => {
      this._settings.pendingTeam = newTeam;
      tx.events.push({
        type: "admin.team_proposed",
        metadata: tx.metadata,
        payload: { current: this._settings.team, pending: newTeam },
      });
    });
  }

  acceptTeam(caller: Address): void {
    if (this._settings.pendingTeam === null || caller !== this._settings.pendingTeam) {
      throw new EscrowError("NOT_PENDING_TEAM", `${caller} is not the pending team`);
    }
    const previous = this._settings.team;

    this._transact(caller, (tx) => {
      this._settings.team = caller;
      this._settings.pendingTeam = null;
      tx.events.push({
        type: "admin.team_accepted",
        metadata: tx.metadata,
        payload: { previous, current: caller },
      });
    });
  }

  setEarlyWithdrawPenalty(caller: Address, bps: bigint): void {
    this._requireTeam(caller);
    assertPenalty(bps);
    this._updateSetting(caller, "earlyWithdrawPenaltyBps", bps.toString(), () => {
      this._settings.earlyWithdrawPenaltyBps = bps;
    });
  }

  setEarlyWithdrawTreasury(caller: Address, treasury: Address): void {
    this._requireTeam(caller);
    assertAddress(treasury, "Treasury");
    this._updateSetting(caller, "earlyWithdrawTreasury", treasury, () => {
      this._settings.earlyWithdrawTreasury = treasury;
    });
  }

  setMinLockAmount(caller: Address, amount: bigint): void {
    this._requireTeam(caller);
    assertPositiveAmount(amount);
    this._updateSetting(caller, "minLockAmount", amount.toString(), () => {
      this._settings.minLockAmount = amount;
    });
  }

  private _updateSetting(
    caller: Address,
    key: "earlyWithdrawPenaltyBps" | "earlyWithdrawTreasury" | "minLockAmount",
    value: string,
    apply: () => void,
  ): void {
    this._transact(caller, (tx) => {
      apply();
      tx.events.push({
        type: "admin.config_updated",
        metadata: tx.metadata,
        payload: { key, value },
      });
    });
  }

  private _requireTeam(caller: Address): void {
    if (caller !== this._settings.team) {
      throw new EscrowError("NOT_TEAM", `${caller} is not the team`);
    }
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  /** Current weight of a position. */
  balanceOf(positionId: PositionId): bigint {
    return this.balanceAt(positionId, this._clock.now());
  }

  /** Weight of a position at `timestamp`. */
  balanceAt(positionId: PositionId, timestamp: number): bigint {
    return balanceOfPositionAt(this._checkpoints, positionId, timestamp);
  }

  /** Current total weight. */
  totalSupply(): bigint {
    return this.totalSupplyAt(this._clock.now());
  }

  /** Total weight at `timestamp`. */
  totalSupplyAt(timestamp: number): bigint {
    return totalSupplyAt(this._checkpoints, timestamp);
  }

  /**
   * Lock as seen from outside: `end` reads 0 while permanent, and a
   * withdrawn or unknown position reads as empty.
   */
  locked(positionId: PositionId): PublicLock {
    const lock = this._positions.lockOf(positionId);
    return {
      amount: lock.amount,
      end: lock.isPermanent ? 0 : lock.end,
      isPermanent: lock.isPermanent,
    };
  }

  /**
   * Full stored lock, including the retained unlock time and the
   * effective start.
   */
  lockDetails(positionId: PositionId): LockedBalance {
    this._requireLive(this._positions, positionId);
    return this._positions.lockOf(positionId);
  }

  positionState(positionId: PositionId): PositionState {
    if (!positionExists(this._positions, positionId)) {
      throw new EscrowError("NONEXISTENT_POSITION", `Position ${String(positionId)} does not exist`);
    }
    if (this._positions.isWithdrawn(positionId)) {
      return "withdrawn";
    }
    return this._positions.lockOf(positionId).isPermanent ? "permanent" : "active";
  }

  ownerOf(positionId: PositionId): Address {
    this._requireLive(this._positions, positionId);
    return this._ownerIn(this._positions, positionId);
  }

  getApproved(positionId: PositionId): Address | null {
    this._requireLive(this._positions, positionId);
    return this._positions.getApproved(positionId) ?? null;
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this._positions.isApprovedForAll(owner, operator);
  }

  isApprovedOrOwner(spender: Address, positionId: PositionId): boolean {
    return isApprovedOrOwner(this._positions, spender, positionId);
  }

  positionsOf(owner: Address): readonly PositionId[] {
    return this._positions.positionsOf(owner);
  }

  /** Number of live positions held by `owner`. */
  balanceOfOwner(owner: Address): number {
    return this._positions.positionsOf(owner).length;
  }

  canSplit(account: Address): boolean {
    return this._positions.canSplit(account);
  }

  /** Sum of all locked amounts. */
  get supply(): bigint {
    return this._positions.supply;
  }

  get permanentLockBalance(): bigint {
    return this._checkpoints.permanentLockBalance;
  }

  /** Highest written index of the global history. */
  get epoch(): number {
    return this._checkpoints.epoch;
  }

  pointHistory(index: number): GlobalPoint {
    return this._checkpoints.globalPointAt(index);
  }

  userPointEpoch(positionId: PositionId): number {
    return this._checkpoints.userPointEpoch(positionId);
  }

  userPointHistory(positionId: PositionId, index: number): UserPoint {
    return this._checkpoints.userPointAt(positionId, index);
  }

  /** Scheduled slope delta at a week boundary. */
  slopeChanges(timestamp: number): bigint {
    return this._checkpoints.slopeChangeAt(timestamp);
  }

  get team(): Address {
    return this._settings.team;
  }

  get pendingTeam(): Address | null {
    return this._settings.pendingTeam;
  }

  get earlyWithdrawTreasury(): Address {
    return this._settings.earlyWithdrawTreasury;
  }

  get earlyWithdrawPenaltyBps(): bigint {
    return this._settings.earlyWithdrawPenaltyBps;
  }

  get minLockAmount(): bigint {
    return this._settings.minLockAmount;
  }

  get maxLockTime(): number {
    return this._settings.maxLockTime;
  }

  get minLockTime(): number {
    return this._settings.minLockTime;
  }

  /**
   * Current configuration, including administrative changes.
   */
  get config(): ResolvedEscrowConfig {
    const { team, earlyWithdrawTreasury, maxLockTime, minLockTime, minLockAmount, earlyWithdrawPenaltyBps } =
      this._settings;
    return { team, earlyWithdrawTreasury, maxLockTime, minLockTime, minLockAmount, earlyWithdrawPenaltyBps };
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Serialize the committed state. Restore with VotingEscrow.fromSnapshot().
   */
  snapshot(createdAt?: Date): EscrowSnapshot {
    return createSnapshot(
      this.config,
      {
        checkpoints: this._checkpoints,
        positions: this._positions,
        pendingTeam: this._settings.pendingTeam,
      },
      createdAt,
    );
  }

  /**
   * Restore an escrow from a snapshot, verifying its hash first.
   */
  static fromSnapshot(snapshot: unknown, clock: Clock): VotingEscrow {
    const restored = restoreEscrowState(snapshot);
    return new VotingEscrow(restored.config, clock, restored.source);
  }

  // ─── Internals ───────────────────────────────────────────────────────

  /**
   * Run `operation` against staged stores and commit only if it
   * returns. Events are published after commit.
   */
  private _transact<T>(actor: Address, operation: (tx: Transaction) => T): T {
    const now = this._clock.now();
    const blk = this._clock.blockNumber();
    const tx: Transaction = {
      checkpoints: this._checkpoints.begin(),
      positions: this._positions.begin(),
      events: [],
      metadata: { timestamp: now, blockNumber: blk, actor },
      now,
      blk,
    };

    const result = operation(tx);

    tx.checkpoints.commit();
    tx.positions.commit();

    for (const event of tx.events) {
      for (const listener of this._listeners) {
        listener(event);
      }
    }
    return result;
  }

  private _requireLive(reader: PositionReader, positionId: PositionId): LockedBalance {
    if (!positionExists(reader, positionId)) {
      throw new EscrowError("NONEXISTENT_POSITION", `Position ${String(positionId)} does not exist`);
    }
    if (reader.isWithdrawn(positionId)) {
      throw new EscrowError("ALREADY_WITHDRAWN", `Position ${String(positionId)} has been withdrawn`);
    }
    return reader.lockOf(positionId);
  }

  private _requireAuthorized(
    reader: PositionReader,
    caller: Address,
    positionId: PositionId,
  ): LockedBalance {
    const locked = this._requireLive(reader, positionId);
    if (!isApprovedOrOwner(reader, caller, positionId)) {
      throw new EscrowError(
        "NOT_APPROVED_OR_OWNER",
        `${caller} is not the owner of or approved for position ${String(positionId)}`,
      );
    }
    return locked;
  }

  private _ownerIn(reader: PositionReader, positionId: PositionId): Address {
    const owner = reader.ownerOf(positionId);
    if (owner === undefined) {
      throw new EscrowError("ALREADY_WITHDRAWN", `Position ${String(positionId)} has no owner`);
    }
    return owner;
  }

  private _contribution(locked: LockedBalance, now: number): Contribution {
    const end = decayingEnd(locked);
    if (end <= now || locked.amount <= 0n) {
      return NO_CONTRIBUTION;
    }
    const slope = toWadSlope(locked.amount, this._settings.maxLockTime);
    return { slope, bias: toInt256(slope * BigInt(end - now)) };
  }

  /**
   * Bring the global aggregate up to now and record the change from
   * `oldLocked` to `newLocked` for `positionId` (null: global only).
   *
   * The aggregate is replayed one week boundary at a time from its
   * newest point, applying scheduled slope changes; one global point is
   * written per elapsed boundary. The position's old contribution is
   * then swapped for the new one and the schedule is adjusted so that
   * natural expiry is applied when time is replayed later.
   */
  private _checkpoint(
    tx: Transaction,
    positionId: PositionId | null,
    oldLocked: LockedBalance,
    newLocked: LockedBalance,
  ): void {
    const cp = tx.checkpoints;
    const { now, blk } = tx;
    const oldEnd = decayingEnd(oldLocked);
    const newEnd = decayingEnd(newLocked);

    let uOld = NO_CONTRIBUTION;
    let uNew = NO_CONTRIBUTION;
    let oldDslope = 0n;
    let newDslope = 0n;

    if (positionId !== null) {
      uOld = this._contribution(oldLocked, now);
      uNew = this._contribution(newLocked, now);
      oldDslope = cp.slopeChangeAt(oldEnd);
      if (newEnd !== 0) {
        newDslope = newEnd === oldEnd ? oldDslope : cp.slopeChangeAt(newEnd);
      }
    }

    const initial: GlobalPoint =
      cp.epoch > 0
        ? cp.globalPointAt(cp.epoch)
        : { bias: 0n, slope: 0n, ts: now, blk, permanentLockBalance: 0n };

    if (now < initial.ts) {
      throw new EscrowError(
        "CLOCK_WENT_BACKWARDS",
        `Clock reads ${String(now)}, before the last checkpoint at ${String(initial.ts)}`,
      );
    }

    const blockSlope =
      now > initial.ts ? (WAD * BigInt(blk - initial.blk)) / BigInt(now - initial.ts) : 0n;

    let bias = initial.bias;
    let slope = initial.slope;
    let lastCheckpoint = initial.ts;
    let reached = false;

    let tI = roundDownToWeek(lastCheckpoint);
    for (let i = 0; i < MAX_REPLAY_WEEKS; i++) {
      tI += WEEK;
      let dSlope = 0n;
      if (tI > now) {
        tI = now;
      } else {
        dSlope = cp.slopeChangeAt(tI);
      }

      bias = toInt256(bias - slope * BigInt(tI - lastCheckpoint));
      slope = toInt256(slope + dSlope);
      if (bias < 0n) bias = 0n;
      if (slope < 0n) slope = 0n;
      lastCheckpoint = tI;

      if (tI === now) {
        reached = true;
        break;
      }

      cp.appendGlobalPoint({
        bias,
        slope,
        ts: tI,
        blk: initial.blk + Number((blockSlope * BigInt(tI - initial.ts)) / WAD),
        permanentLockBalance: initial.permanentLockBalance,
      });
    }

    if (!reached) {
      if (positionId === null) {
        // Keep the weekly points; the next global checkpoint resumes here
        return;
      }
      throw new EscrowError(
        "LOOKBACK_EXCEEDED",
        `Last global checkpoint at ${String(initial.ts)} is more than ${String(MAX_REPLAY_WEEKS)} weeks before ${String(now)}`,
      );
    }

    if (positionId !== null) {
      slope = toInt256(slope + uNew.slope - uOld.slope);
      bias = toInt256(bias + uNew.bias - uOld.bias);
      if (slope < 0n) slope = 0n;
      if (bias < 0n) bias = 0n;
    }

    cp.recordGlobalPoint({
      bias,
      slope,
      ts: now,
      blk,
      permanentLockBalance: cp.permanentLockBalance,
    });

    if (positionId === null) {
      return;
    }

    if (oldEnd > now) {
      // The old slope no longer expires here
      oldDslope += uOld.slope;
      if (newEnd === oldEnd) {
        oldDslope -= uNew.slope;
      }
      cp.setSlopeChange(oldEnd, toInt256(oldDslope));
    }

    if (newEnd > now && newEnd > oldEnd) {
      newDslope -= uNew.slope;
      cp.setSlopeChange(newEnd, toInt256(newDslope));
    }

    cp.recordUserPoint(positionId, {
      bias: uNew.bias,
      slope: uNew.slope,
      ts: now,
      blk,
      permanent: newLocked.isPermanent ? newLocked.amount : 0n,
    });
  }
}
