/**
 * @escrowpoint/escrow — Position registry.
 *
 * An arena of positions addressed by integer ids, with ownership kept
 * in side maps: owner, single-position approval, approval-for-all
 * operators and split permissions.
 *
 * Rules:
 * - Ids start at 1 and are never reused, even after withdrawal
 * - A withdrawn (burned) position has no owner, approval or lock
 * - Split permissions are keyed by holder, not by position
 * - Writes are staged in a PositionWriter and land together on commit()
 */

import type { Address, LockedBalance, PositionId } from "@escrowpoint/types";
import { StagedMap } from "./staged-map.js";

/** Lock of a position that holds nothing. */
export const EMPTY_LOCK: LockedBalance = Object.freeze({
  amount: 0n,
  end: 0,
  isPermanent: false,
  effectiveStart: 0,
});

/**
 * Read access shared by the committed registry and an open writer.
 */
export interface PositionReader {
  /** Next id to be minted */
  readonly nextId: PositionId;
  /** Sum of all locked amounts */
  readonly supply: bigint;
  lockOf(positionId: PositionId): LockedBalance;
  ownerOf(positionId: PositionId): Address | undefined;
  getApproved(positionId: PositionId): Address | undefined;
  isApprovedForAll(owner: Address, operator: Address): boolean;
  isWithdrawn(positionId: PositionId): boolean;
  canSplit(account: Address): boolean;
}

/**
 * Backing state of a PositionRegistry.
 */
export interface PositionRegistryState {
  readonly locks: Map<PositionId, LockedBalance>;
  readonly owners: Map<PositionId, Address>;
  readonly approvals: Map<PositionId, Address>;
  readonly operators: Map<Address, ReadonlySet<Address>>;
  readonly withdrawn: Map<PositionId, true>;
  readonly splitPermissions: Map<Address, boolean>;
  nextId: PositionId;
  supply: bigint;
}

/**
 * True when the position was ever minted (live or withdrawn).
 */
export function positionExists(reader: PositionReader, positionId: PositionId): boolean {
  return Number.isSafeInteger(positionId) && positionId >= 1 && positionId < reader.nextId;
}

/**
 * Owner, single approval, or approved-for-all operator of the owner.
 */
export function isApprovedOrOwner(
  reader: PositionReader,
  spender: Address,
  positionId: PositionId,
): boolean {
  const owner = reader.ownerOf(positionId);
  if (owner === undefined) {
    return false;
  }
  return (
    spender === owner ||
    reader.getApproved(positionId) === spender ||
    reader.isApprovedForAll(owner, spender)
  );
}

/**
 * Committed positions. Writes go through begin().
 */
export class PositionRegistry implements PositionReader {
  private readonly _state: PositionRegistryState;

  constructor(state?: PositionRegistryState) {
    this._state = state ?? {
      locks: new Map(),
      owners: new Map(),
      approvals: new Map(),
      operators: new Map(),
      withdrawn: new Map(),
      splitPermissions: new Map(),
      nextId: 1,
      supply: 0n,
    };
  }

  get nextId(): PositionId {
    return this._state.nextId;
  }

  get supply(): bigint {
    return this._state.supply;
  }

  lockOf(positionId: PositionId): LockedBalance {
    return this._state.locks.get(positionId) ?? EMPTY_LOCK;
  }

  ownerOf(positionId: PositionId): Address | undefined {
    return this._state.owners.get(positionId);
  }

  getApproved(positionId: PositionId): Address | undefined {
    return this._state.approvals.get(positionId);
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this._state.operators.get(owner)?.has(operator) ?? false;
  }

  isWithdrawn(positionId: PositionId): boolean {
    return this._state.withdrawn.has(positionId);
  }

  canSplit(account: Address): boolean {
    return this._state.splitPermissions.get(account) ?? false;
  }

  /**
   * Live positions held by `owner`, in id order.
   */
  positionsOf(owner: Address): readonly PositionId[] {
    const ids: PositionId[] = [];
    for (const [id, holder] of this._state.owners) {
      if (holder === owner) {
        ids.push(id);
      }
    }
    return ids.sort((a, b) => a - b);
  }

  /**
   * Every live position id, in id order.
   */
  livePositions(): readonly PositionId[] {
    return [...this._state.owners.keys()].sort((a, b) => a - b);
  }

  /** Operators approved for all of `owner`'s positions. */
  operatorsOf(owner: Address): readonly Address[] {
    return [...(this._state.operators.get(owner) ?? [])].sort();
  }

  /** Owners with at least one approved-for-all operator. */
  ownersWithOperators(): readonly Address[] {
    return [...this._state.operators.keys()].sort();
  }

  /** Accounts whose split flag is enabled. */
  splitEnabledAccounts(): readonly Address[] {
    return [...this._state.splitPermissions]
      .filter(([, enabled]) => enabled)
      .map(([account]) => account)
      .sort();
  }

  begin(): PositionWriter {
    return new PositionWriter(this._state);
  }
}

/**
 * Staged writes over a PositionRegistry.
 */
export class PositionWriter implements PositionReader {
  private readonly _state: PositionRegistryState;
  private readonly _locks: StagedMap<PositionId, LockedBalance>;
  private readonly _owners: StagedMap<PositionId, Address>;
  private readonly _approvals: StagedMap<PositionId, Address>;
  private readonly _operators: StagedMap<Address, ReadonlySet<Address>>;
  private readonly _withdrawn: StagedMap<PositionId, true>;
  private readonly _splitPermissions: StagedMap<Address, boolean>;
  private _nextId: PositionId;
  private _supply: bigint;

  constructor(state: PositionRegistryState) {
    this._state = state;
    this._locks = new StagedMap(state.locks);
    this._owners = new StagedMap(state.owners);
    this._approvals = new StagedMap(state.approvals);
    this._operators = new StagedMap(state.operators);
    this._withdrawn = new StagedMap(state.withdrawn);
    this._splitPermissions = new StagedMap(state.splitPermissions);
    this._nextId = state.nextId;
    this._supply = state.supply;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get nextId(): PositionId {
    return this._nextId;
  }

  get supply(): bigint {
    return this._supply;
  }

  lockOf(positionId: PositionId): LockedBalance {
    return this._locks.get(positionId) ?? EMPTY_LOCK;
  }

  ownerOf(positionId: PositionId): Address | undefined {
    return this._owners.get(positionId);
  }

  getApproved(positionId: PositionId): Address | undefined {
    return this._approvals.get(positionId);
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this._operators.get(owner)?.has(operator) ?? false;
  }

  isWithdrawn(positionId: PositionId): boolean {
    return this._withdrawn.has(positionId);
  }

  canSplit(account: Address): boolean {
    return this._splitPermissions.get(account) ?? false;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  set supply(value: bigint) {
    this._supply = value;
  }

  /**
   * Mint a new position id to `to` with an empty lock.
   */
  mint(to: Address): PositionId {
    const id = this._nextId;
    this._nextId += 1;
    this._owners.set(id, to);
    return id;
  }

  /**
   * Burn a position: drop owner, approval and lock; the id stays used.
   */
  burn(positionId: PositionId): void {
    this._owners.delete(positionId);
    this._approvals.delete(positionId);
    this._locks.delete(positionId);
    this._withdrawn.set(positionId, true);
  }

  setLock(positionId: PositionId, lock: LockedBalance): void {
    this._locks.set(positionId, lock);
  }

  /**
   * Move a position to a new holder. Clears its single approval.
   */
  transfer(positionId: PositionId, to: Address): void {
    this._approvals.delete(positionId);
    this._owners.set(positionId, to);
  }

  approve(positionId: PositionId, approved: Address | null): void {
    if (approved === null) {
      this._approvals.delete(positionId);
    } else {
      this._approvals.set(positionId, approved);
    }
  }

  setApprovalForAll(owner: Address, operator: Address, approved: boolean): void {
    const next = new Set(this._operators.get(owner) ?? []);
    if (approved) {
      next.add(operator);
    } else {
      next.delete(operator);
    }
    if (next.size === 0) {
      this._operators.delete(owner);
    } else {
      this._operators.set(owner, next);
    }
  }

  setSplitPermission(account: Address, enabled: boolean): void {
    this._splitPermissions.set(account, enabled);
  }

  commit(): void {
    this._locks.commit();
    this._owners.commit();
    this._approvals.commit();
    this._operators.commit();
    this._withdrawn.commit();
    this._splitPermissions.commit();
    this._state.nextId = this._nextId;
    this._state.supply = this._supply;
  }
}
