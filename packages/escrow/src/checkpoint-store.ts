/**
 * @escrowpoint/escrow — Checkpoint store.
 *
 * Holds the per-position point histories, the global point history,
 * the slope-change schedule and the running permanent-lock total.
 *
 * Rules:
 * - Histories are 1-indexed: slot 0 is a zero point, and a history's
 *   epoch is its highest written index (0 when empty)
 * - Histories are strictly increasing by timestamp; a point written in
 *   the same second as the newest point replaces it
 * - All writes go through a CheckpointWriter and land together on
 *   commit(); a writer that is never committed leaves no trace
 */

import type { GlobalPoint, PositionId, UserPoint } from "@escrowpoint/types";
import { StagedMap } from "./staged-map.js";

export const ZERO_USER_POINT: UserPoint = Object.freeze({
  bias: 0n,
  slope: 0n,
  ts: 0,
  blk: 0,
  permanent: 0n,
});

export const ZERO_GLOBAL_POINT: GlobalPoint = Object.freeze({
  bias: 0n,
  slope: 0n,
  ts: 0,
  blk: 0,
  permanentLockBalance: 0n,
});

/**
 * Read access shared by the committed store and an open writer.
 */
export interface CheckpointReader {
  /** Highest written index of the global history */
  readonly epoch: number;
  /** Global point at `index`, or the zero point */
  globalPointAt(index: number): GlobalPoint;
  /** Highest written index of a position's history */
  userPointEpoch(positionId: PositionId): number;
  /** User point at `index`, or the zero point */
  userPointAt(positionId: PositionId, index: number): UserPoint;
  /** Scheduled slope delta at a week boundary (0 when none) */
  slopeChangeAt(timestamp: number): bigint;
  /** Sum of all permanent positions' amounts */
  readonly permanentLockBalance: bigint;
}

/**
 * Backing state of a CheckpointStore.
 */
export interface CheckpointState {
  readonly globalHistory: GlobalPoint[];
  readonly userHistory: Map<PositionId, UserPoint[]>;
  readonly slopeChanges: Map<number, bigint>;
  permanentLockBalance: bigint;
}

/**
 * Committed checkpoint state. Read-only from the outside; writes go
 * through begin().
 */
export class CheckpointStore implements CheckpointReader {
  private readonly _state: CheckpointState;

  constructor(state?: CheckpointState) {
    this._state = state ?? {
      globalHistory: [ZERO_GLOBAL_POINT],
      userHistory: new Map(),
      slopeChanges: new Map(),
      permanentLockBalance: 0n,
    };
  }

  get epoch(): number {
    return this._state.globalHistory.length - 1;
  }

  globalPointAt(index: number): GlobalPoint {
    return this._state.globalHistory[index] ?? ZERO_GLOBAL_POINT;
  }

  userPointEpoch(positionId: PositionId): number {
    const history = this._state.userHistory.get(positionId);
    return history === undefined ? 0 : history.length - 1;
  }

  userPointAt(positionId: PositionId, index: number): UserPoint {
    return this._state.userHistory.get(positionId)?.[index] ?? ZERO_USER_POINT;
  }

  slopeChangeAt(timestamp: number): bigint {
    return this._state.slopeChanges.get(timestamp) ?? 0n;
  }

  get permanentLockBalance(): bigint {
    return this._state.permanentLockBalance;
  }

  /**
   * Full global history including the zero point at index 0.
   */
  globalHistory(): readonly GlobalPoint[] {
    return [...this._state.globalHistory];
  }

  /**
   * Full history of a position including the zero point at index 0.
   */
  userHistory(positionId: PositionId): readonly UserPoint[] {
    return [...(this._state.userHistory.get(positionId) ?? [ZERO_USER_POINT])];
  }

  /**
   * Non-zero schedule entries in ascending timestamp order.
   */
  slopeChanges(): readonly (readonly [number, bigint])[] {
    return [...this._state.slopeChanges.entries()]
      .filter(([, delta]) => delta !== 0n)
      .sort(([a], [b]) => a - b);
  }

  /**
   * Open a writer. Only one writer should be open at a time.
   */
  begin(): CheckpointWriter {
    return new CheckpointWriter(this._state);
  }
}

/**
 * Staged writes over a CheckpointStore.
 */
export class CheckpointWriter implements CheckpointReader {
  private readonly _state: CheckpointState;
  private readonly _globalWrites: Map<number, GlobalPoint> = new Map();
  private readonly _userWrites: Map<PositionId, Map<number, UserPoint>> = new Map();
  private readonly _slopeChanges: StagedMap<number, bigint>;
  private _epoch: number;
  private _permanentLockBalance: bigint;
  private _committed = false;

  constructor(state: CheckpointState) {
    this._state = state;
    this._slopeChanges = new StagedMap(state.slopeChanges);
    this._epoch = state.globalHistory.length - 1;
    this._permanentLockBalance = state.permanentLockBalance;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  get epoch(): number {
    return this._epoch;
  }

  globalPointAt(index: number): GlobalPoint {
    return this._globalWrites.get(index) ?? this._state.globalHistory[index] ?? ZERO_GLOBAL_POINT;
  }

  userPointEpoch(positionId: PositionId): number {
    const staged = this._userWrites.get(positionId);
    const committed = this._state.userHistory.get(positionId);
    const committedEpoch = committed === undefined ? 0 : committed.length - 1;
    if (staged === undefined) {
      return committedEpoch;
    }
    return Math.max(committedEpoch, ...staged.keys());
  }

  userPointAt(positionId: PositionId, index: number): UserPoint {
    return (
      this._userWrites.get(positionId)?.get(index) ??
      this._state.userHistory.get(positionId)?.[index] ??
      ZERO_USER_POINT
    );
  }

  slopeChangeAt(timestamp: number): bigint {
    return this._slopeChanges.get(timestamp) ?? 0n;
  }

  get permanentLockBalance(): bigint {
    return this._permanentLockBalance;
  }

  // ─── Writes ──────────────────────────────────────────────────────────

  set permanentLockBalance(value: bigint) {
    this._permanentLockBalance = value;
  }

  setSlopeChange(timestamp: number, delta: bigint): void {
    this._slopeChanges.set(timestamp, delta);
  }

  /**
   * Append a point to the global history.
   */
  appendGlobalPoint(point: GlobalPoint): number {
    this._epoch += 1;
    this._globalWrites.set(this._epoch, point);
    return this._epoch;
  }

  /**
   * Append a global point, or replace the newest one when it carries
   * the same timestamp.
   */
  recordGlobalPoint(point: GlobalPoint): number {
    if (this._epoch > 0 && this.globalPointAt(this._epoch).ts === point.ts) {
      this._globalWrites.set(this._epoch, point);
      return this._epoch;
    }
    return this.appendGlobalPoint(point);
  }

  /**
   * Append a point to a position's history, or replace the newest one
   * when it carries the same timestamp.
   */
  recordUserPoint(positionId: PositionId, point: UserPoint): number {
    let index = this.userPointEpoch(positionId);
    if (index === 0 || this.userPointAt(positionId, index).ts !== point.ts) {
      index += 1;
    }

    let staged = this._userWrites.get(positionId);
    if (staged === undefined) {
      staged = new Map();
      this._userWrites.set(positionId, staged);
    }
    staged.set(index, point);
    return index;
  }

  /**
   * Apply every staged write to the store.
   */
  commit(): void {
    if (this._committed) {
      throw new Error("CheckpointWriter already committed");
    }
    this._committed = true;

    const global = this._state.globalHistory;
    for (const [index, point] of [...this._globalWrites].sort(([a], [b]) => a - b)) {
      global[index] = point;
    }

    for (const [positionId, writes] of this._userWrites) {
      let history = this._state.userHistory.get(positionId);
      if (history === undefined) {
        history = [ZERO_USER_POINT];
        this._state.userHistory.set(positionId, history);
      }
      for (const [index, point] of [...writes].sort(([a], [b]) => a - b)) {
        history[index] = point;
      }
    }

    this._slopeChanges.commit();
    this._state.permanentLockBalance = this._permanentLockBalance;
  }
}
