/**
 * Tests for the VotingEscrow lock lifecycle.
 *
 * Covers:
 * - Lock creation and validation
 * - Decay, withdrawal and early withdrawal
 * - Top-ups and unlock-time extension
 * - Permanent locks
 * - Merge and split
 * - Ownership, approvals and team administration
 * - Global checkpoints, replay cap and atomicity
 */

import { describe, it, expect } from "vitest";
import type { EscrowEvent } from "@escrowpoint/types";
import { ManualClock } from "../src/clock.js";
import { GLOBAL_SPLIT_ACCOUNT, VotingEscrow } from "../src/escrow.js";
import { toWadSlope, UINT128_MAX, WAD } from "../src/fixed-point.js";
import type { EscrowConfig, EscrowErrorCode } from "../src/types.js";
import { EscrowError, WEEK } from "../src/types.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

const T0 = 2810 * WEEK;
const YEAR = 365 * 86_400;
const TOKEN = WAD;

const TEAM = "0x7ea0000000000000000000000000000000000001";
const TREASURY = "0x7ea5000000000000000000000000000000000002";
const ALICE = "0xa11ce00000000000000000000000000000000001";
const BOB = "0xb0b0000000000000000000000000000000000002";
const CAROL = "0xca70100000000000000000000000000000000003";

function setup(overrides: Partial<EscrowConfig> = {}): {
  clock: ManualClock;
  escrow: VotingEscrow;
  events: EscrowEvent[];
} {
  const clock = new ManualClock(T0);
  const escrow = new VotingEscrow(
    { team: TEAM, earlyWithdrawTreasury: TREASURY, ...overrides },
    clock,
  );
  const events: EscrowEvent[] = [];
  escrow.onEvent((event) => events.push(event));
  return { clock, escrow, events };
}

function expectEscrowError(fn: () => unknown, code: EscrowErrorCode): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(EscrowError);
    if (error instanceof EscrowError) {
      expect(error.code).toBe(code);
    }
    return;
  }
  expect.unreachable(`expected ${code}`);
}

function sumOfBalances(escrow: VotingEscrow, ids: readonly number[], t: number): bigint {
  return ids.reduce((sum, id) => sum + escrow.balanceAt(id, t), 0n);
}

const SLOPE_1000 = toWadSlope(1000n * TOKEN, YEAR);

// ─── Lock creation ───────────────────────────────────────────────────────

describe("createLock", () => {
  it("mints a position with a week-aligned unlock time", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, 1000n * TOKEN, YEAR);

    expect(id).toBe(1);
    expect(escrow.ownerOf(id)).toBe(ALICE);
    expect(escrow.locked(id)).toEqual({
      amount: 1000n * TOKEN,
      end: T0 + 52 * WEEK,
      isPermanent: false,
    });
    expect(escrow.lockDetails(id).effectiveStart).toBe(T0);
    expect(escrow.positionState(id)).toBe("active");
    expect(escrow.supply).toBe(1000n * TOKEN);
  });

  it("starts weight at slope times the remaining time", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, 1000n * TOKEN, YEAR);

    expect(escrow.balanceOf(id)).toBe(997_260_273_972_602_739_726n);
    expect(escrow.totalSupply()).toBe(997_260_273_972_602_739_726n);
  });

  it("writes the position point, the global point and the schedule", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, 1000n * TOKEN, YEAR);

    expect(escrow.userPointEpoch(id)).toBe(1);
    expect(escrow.userPointHistory(id, 1)).toEqual({
      bias: SLOPE_1000 * BigInt(52 * WEEK),
      slope: SLOPE_1000,
      ts: T0,
      blk: 1,
      permanent: 0n,
    });
    expect(escrow.epoch).toBe(1);
    expect(escrow.pointHistory(1).slope).toBe(SLOPE_1000);
    expect(escrow.slopeChanges(T0 + 52 * WEEK)).toBe(-SLOPE_1000);
  });

  it("announces transfer, deposit and supply", () => {
    const { escrow, events } = setup();
    escrow.createLock(ALICE, 5n * TOKEN, 10 * WEEK);

    expect(events.map((e) => e.type)).toEqual([
      "position.transfer",
      "escrow.deposit",
      "escrow.supply",
    ]);
    expect(events[1]).toEqual({
      type: "escrow.deposit",
      metadata: { timestamp: T0, blockNumber: 1, actor: ALICE },
      payload: { positionId: 1, kind: "create_lock", amount: 5n * TOKEN, end: T0 + 10 * WEEK },
    });
  });

  it("mints to a recipient with createLockFor", () => {
    const { escrow } = setup();
    const id = escrow.createLockFor(ALICE, 5n * TOKEN, 10 * WEEK, BOB);
    expect(escrow.ownerOf(id)).toBe(BOB);
    expect(escrow.positionsOf(BOB)).toEqual([id]);
    expect(escrow.balanceOfOwner(ALICE)).toBe(0);
  });

  it("rejects zero and sub-minimum amounts", () => {
    const { escrow } = setup();
    expectEscrowError(() => escrow.createLock(ALICE, 0n, YEAR), "ZERO_AMOUNT");
    expectEscrowError(() => escrow.createLock(ALICE, TOKEN - 1n, YEAR), "AMOUNT_TOO_SMALL");
  });

  it("rejects the zero address as recipient", () => {
    const { escrow } = setup();
    expectEscrowError(
      () => escrow.createLockFor(ALICE, TOKEN, YEAR, GLOBAL_SPLIT_ACCOUNT),
      "ZERO_ADDRESS",
    );
  });

  it("enforces the minimum and maximum lock time", () => {
    const { escrow } = setup();
    expectEscrowError(() => escrow.createLock(ALICE, TOKEN, 3 * WEEK), "LOCK_TOO_SHORT");
    expectEscrowError(() => escrow.createLock(ALICE, TOKEN, 53 * WEEK), "LOCK_TOO_LONG");
    expect(escrow.createLock(ALICE, TOKEN, 4 * WEEK)).toBe(1);
  });

  it("measures the minimum against the rounded unlock time", () => {
    const { escrow, clock } = setup();
    clock.advance(100);
    expectEscrowError(() => escrow.createLock(ALICE, TOKEN, 4 * WEEK), "LOCK_TOO_SHORT");
  });

  it("rejects malformed durations", () => {
    const { escrow } = setup();
    expectEscrowError(() => escrow.createLock(ALICE, TOKEN, -1), "INVALID_DURATION");
    expectEscrowError(() => escrow.createLock(ALICE, TOKEN, 1.5), "INVALID_DURATION");
  });

  it("leaves no trace when rejected", () => {
    const { escrow, events } = setup();
    expectEscrowError(() => escrow.createLock(ALICE, TOKEN, 3 * WEEK), "LOCK_TOO_SHORT");

    expect(escrow.epoch).toBe(0);
    expect(escrow.supply).toBe(0n);
    expect(events).toEqual([]);
    expect(escrow.createLock(ALICE, TOKEN, 4 * WEEK)).toBe(1);
  });
});

describe("atomicity", () => {
  it("rolls back positions, points and schedule when a merge overflows midway", () => {
    const { escrow, events } = setup();
    const half = UINT128_MAX / 2n + 1n;
    const from = escrow.createLock(ALICE, half, 10 * WEEK);
    const to = escrow.createLock(ALICE, half, 20 * WEEK);
    const before = escrow.snapshot(new Date(0)).stateHash;
    const published = events.length;
    const epoch = escrow.epoch;

    expectEscrowError(() => escrow.merge(ALICE, from, to), "SAFE_CAST_OVERFLOW");

    expect(escrow.snapshot(new Date(0)).stateHash).toBe(before);
    expect(escrow.positionState(from)).toBe("active");
    expect(escrow.locked(from).amount).toBe(half);
    expect(escrow.slopeChanges(T0 + 10 * WEEK)).toBe(-toWadSlope(half, YEAR));
    expect(escrow.epoch).toBe(epoch);
    expect(events).toHaveLength(published);
  });
});

// ─── Decay & withdrawal ──────────────────────────────────────────────────

describe("decay and withdrawal", () => {
  it("halves a maximum lock halfway and returns the full amount at expiry", () => {
    const { escrow, clock } = setup();
    const id = escrow.createLock(ALICE, 1000n * TOKEN, YEAR);

    clock.advance(26 * WEEK);
    const half = escrow.balanceOf(id);
    expect(half).toBe(498_630_136_986_301_369_863n);
    expect(half > 498n * TOKEN && half < 500n * TOKEN).toBe(true);
    expectEscrowError(() => escrow.withdraw(ALICE, id), "NOT_EXPIRED");

    clock.advance(26 * WEEK);
    expect(escrow.balanceOf(id)).toBe(0n);
    expect(escrow.withdraw(ALICE, id)).toEqual({ positionId: id, amount: 1000n * TOKEN });
    expect(escrow.positionState(id)).toBe("withdrawn");
    expect(escrow.supply).toBe(0n);
    expect(escrow.totalSupply()).toBe(0n);
  });

  it("keeps historical balances readable after withdrawal", () => {
    const { escrow, clock } = setup();
    const id = escrow.createLock(ALICE, 1000n * TOKEN, YEAR);
    clock.advance(52 * WEEK);
    escrow.withdraw(ALICE, id);

    expect(escrow.balanceAt(id, T0)).toBe(997_260_273_972_602_739_726n);
    expect(escrow.totalSupplyAt(T0 + 26 * WEEK)).toBe(498_630_136_986_301_369_863n);
  });

  it("rejects every operation on a withdrawn position", () => {
    const { escrow, clock } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 4 * WEEK);
    clock.advance(4 * WEEK);
    escrow.withdraw(ALICE, id);

    expectEscrowError(() => escrow.withdraw(ALICE, id), "ALREADY_WITHDRAWN");
    expectEscrowError(() => escrow.depositFor(BOB, id, TOKEN), "ALREADY_WITHDRAWN");
    expectEscrowError(() => escrow.ownerOf(id), "ALREADY_WITHDRAWN");
    expectEscrowError(() => escrow.positionState(99), "NONEXISTENT_POSITION");
  });

  it("only lets the owner or an approved address withdraw", () => {
    const { escrow, clock } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 4 * WEEK);
    clock.advance(4 * WEEK);
    expectEscrowError(() => escrow.withdraw(BOB, id), "NOT_APPROVED_OR_OWNER");
  });

  it("keeps the aggregate equal to the sum of positions", () => {
    const { escrow, clock } = setup();
    const ids = [escrow.createLock(ALICE, 1000n * TOKEN, YEAR)];
    clock.advance(3 * WEEK + 1234);
    ids.push(escrow.createLock(BOB, 250n * TOKEN, 20 * WEEK));
    clock.advance(5 * WEEK);
    ids.push(escrow.createLock(CAROL, 77n * TOKEN, 8 * WEEK));

    for (const offset of [0, 1, WEEK, 10 * WEEK, 30 * WEEK, 60 * WEEK]) {
      const t = clock.now() + offset;
      const sum = sumOfBalances(escrow, ids, t);
      const total = escrow.totalSupplyAt(t);
      expect(total - sum >= 0n && total - sum < 3n).toBe(true);
    }
  });
});

// ─── Early withdrawal ────────────────────────────────────────────────────

describe("earlyWithdraw", () => {
  it("charges half the penalty rate halfway through", () => {
    const { escrow, clock, events } = setup();
    const id = escrow.createLock(ALICE, 1000n * TOKEN, 52 * WEEK);
    clock.advance(26 * WEEK);

    expect(escrow.earlyWithdraw(ALICE, id)).toEqual({
      positionId: id,
      payout: 750n * TOKEN,
      penalty: 250n * TOKEN,
      treasury: TREASURY,
    });
    expect(escrow.positionState(id)).toBe("withdrawn");
    expect(escrow.supply).toBe(0n);
    expect(events.at(-1)?.type).toBe("escrow.early_withdraw");
  });

  it("charges the full rate at the start", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, 1000n * TOKEN, 52 * WEEK);
    expect(escrow.earlyWithdraw(ALICE, id).penalty).toBe(500n * TOKEN);
  });

  it("follows the configured penalty", () => {
    const { escrow, clock } = setup();
    escrow.setEarlyWithdrawPenalty(TEAM, 2_000n);
    const id = escrow.createLock(ALICE, 1000n * TOKEN, 52 * WEEK);
    clock.advance(26 * WEEK);
    expect(escrow.earlyWithdraw(ALICE, id).penalty).toBe(100n * TOKEN);
  });

  it("refuses expired and permanent positions", () => {
    const { escrow, clock } = setup();
    const expiring = escrow.createLock(ALICE, TOKEN, 4 * WEEK);
    const permanent = escrow.createLock(ALICE, TOKEN, 4 * WEEK);
    escrow.lockPermanent(ALICE, permanent);
    clock.advance(4 * WEEK);

    expectEscrowError(() => escrow.earlyWithdraw(ALICE, expiring), "EXPIRED");
    expectEscrowError(() => escrow.earlyWithdraw(ALICE, permanent), "ALREADY_PERMANENT");
  });
});

// ─── Top-ups ─────────────────────────────────────────────────────────────

describe("increaseAmount / depositFor", () => {
  it("adds to the amount and averages the effective start", () => {
    const { escrow, clock } = setup();
    const id = escrow.createLock(ALICE, 100n * TOKEN, 52 * WEEK);
    clock.advance(2 * WEEK);
    escrow.increaseAmount(ALICE, id, 100n * TOKEN);

    expect(escrow.lockDetails(id)).toEqual({
      amount: 200n * TOKEN,
      end: T0 + 52 * WEEK,
      isPermanent: false,
      effectiveStart: T0 + WEEK,
    });
    expect(escrow.supply).toBe(200n * TOKEN);
  });

  it("lets anyone deposit for a position", () => {
    const { escrow, events } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    escrow.depositFor(BOB, id, TOKEN);

    expect(escrow.locked(id).amount).toBe(2n * TOKEN);
    expect(events.filter((e) => e.type === "escrow.deposit").map((e) => e.payload)).toContainEqual({
      positionId: id,
      kind: "deposit_for",
      amount: TOKEN,
      end: T0 + 10 * WEEK,
    });
  });

  it("replaces the point written in the same second", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    escrow.increaseAmount(ALICE, id, TOKEN);

    expect(escrow.userPointEpoch(id)).toBe(1);
    expect(escrow.epoch).toBe(1);
    expect(escrow.userPointHistory(id, 1).slope).toBe(toWadSlope(2n * TOKEN, YEAR));
  });

  it("requires authorization for increaseAmount", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    expectEscrowError(() => escrow.increaseAmount(BOB, id, TOKEN), "NOT_APPROVED_OR_OWNER");
  });

  it("rejects zero amounts", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    expectEscrowError(() => escrow.depositFor(BOB, id, 0n), "ZERO_AMOUNT");
  });

  it("rejects top-ups close to or past expiry", () => {
    const { escrow, clock } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 8 * WEEK);
    clock.advance(5 * WEEK);
    expectEscrowError(() => escrow.depositFor(BOB, id, TOKEN), "DEPOSIT_DURATION_TOO_SHORT");
    clock.advance(3 * WEEK);
    expectEscrowError(() => escrow.depositFor(BOB, id, TOKEN), "EXPIRED");
  });

  it("raises the permanent balance when topping up a permanent position", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 8 * WEEK);
    escrow.lockPermanent(ALICE, id);
    escrow.depositFor(BOB, id, 2n * TOKEN);

    expect(escrow.permanentLockBalance).toBe(3n * TOKEN);
    expect(escrow.balanceOf(id)).toBe(3n * TOKEN);
    expect(escrow.totalSupply()).toBe(3n * TOKEN);
  });
});

// ─── Unlock time ─────────────────────────────────────────────────────────

describe("increaseUnlockTime", () => {
  it("moves the unlock time and the scheduled slope change", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, 100n * TOKEN, 26 * WEEK);
    const slope = toWadSlope(100n * TOKEN, YEAR);
    expect(escrow.slopeChanges(T0 + 26 * WEEK)).toBe(-slope);

    escrow.increaseUnlockTime(ALICE, id, 52 * WEEK);

    expect(escrow.locked(id).end).toBe(T0 + 52 * WEEK);
    expect(escrow.slopeChanges(T0 + 26 * WEEK)).toBe(0n);
    expect(escrow.slopeChanges(T0 + 52 * WEEK)).toBe(-slope);
    expect(escrow.balanceOf(id)).toBe((slope * BigInt(52 * WEEK)) / WAD);
  });

  it("only moves forward and within the maximum", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 26 * WEEK);
    expectEscrowError(() => escrow.increaseUnlockTime(ALICE, id, 26 * WEEK), "LOCK_DURATION_NOT_IN_FUTURE");
    expectEscrowError(() => escrow.increaseUnlockTime(ALICE, id, 10 * WEEK), "LOCK_DURATION_NOT_IN_FUTURE");
    expectEscrowError(() => escrow.increaseUnlockTime(ALICE, id, 53 * WEEK), "LOCK_TOO_LONG");
  });

  it("refuses permanent and expired positions", () => {
    const { escrow, clock } = setup();
    const permanent = escrow.createLock(ALICE, TOKEN, 26 * WEEK);
    const expiring = escrow.createLock(ALICE, TOKEN, 4 * WEEK);
    escrow.lockPermanent(ALICE, permanent);
    expectEscrowError(() => escrow.increaseUnlockTime(ALICE, permanent, 52 * WEEK), "ALREADY_PERMANENT");

    clock.advance(4 * WEEK);
    expectEscrowError(() => escrow.increaseUnlockTime(ALICE, expiring, 52 * WEEK), "EXPIRED");
  });
});

// ─── Permanent locks ─────────────────────────────────────────────────────

describe("permanent locks", () => {
  it("freezes weight at the amount and hides the unlock time", () => {
    const { escrow, clock } = setup();
    const id = escrow.createLock(ALICE, 1000n * TOKEN, YEAR);
    escrow.lockPermanent(ALICE, id);

    expect(escrow.positionState(id)).toBe("permanent");
    expect(escrow.locked(id)).toEqual({ amount: 1000n * TOKEN, end: 0, isPermanent: true });
    expect(escrow.lockDetails(id).end).toBe(T0 + 52 * WEEK);
    expect(escrow.permanentLockBalance).toBe(1000n * TOKEN);
    expect(escrow.slopeChanges(T0 + 52 * WEEK)).toBe(0n);

    clock.advance(80 * WEEK);
    expect(escrow.balanceOf(id)).toBe(1000n * TOKEN);
    expect(escrow.totalSupply()).toBe(1000n * TOKEN);
    expectEscrowError(() => escrow.withdraw(ALICE, id), "ALREADY_PERMANENT");
  });

  it("rejects double conversion either way", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    expectEscrowError(() => escrow.unlockPermanent(ALICE, id), "NOT_PERMANENT");
    escrow.lockPermanent(ALICE, id);
    expectEscrowError(() => escrow.lockPermanent(ALICE, id), "ALREADY_PERMANENT");
  });

  it("rejects converting an expired position", () => {
    const { escrow, clock } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 4 * WEEK);
    clock.advance(4 * WEEK);
    expectEscrowError(() => escrow.lockPermanent(ALICE, id), "EXPIRED");
  });

  it("resumes decay as though the clock never paused", () => {
    const { escrow, clock } = setup();
    const frozen = escrow.createLock(ALICE, 1000n * TOKEN, YEAR);
    const control = escrow.createLock(BOB, 1000n * TOKEN, YEAR);

    clock.advance(WEEK);
    escrow.lockPermanent(ALICE, frozen);
    clock.advance(10 * WEEK);
    escrow.unlockPermanent(ALICE, frozen);

    expect(escrow.balanceOf(frozen)).toBe(escrow.balanceOf(control));
    const t2 = clock.now();
    expect(escrow.userPointHistory(frozen, escrow.userPointEpoch(frozen))).toEqual({
      bias: SLOPE_1000 * BigInt(T0 + 52 * WEEK - t2),
      slope: SLOPE_1000,
      ts: t2,
      blk: 3,
      permanent: 0n,
    });
    expect(escrow.permanentLockBalance).toBe(0n);
    expect(escrow.slopeChanges(T0 + 52 * WEEK)).toBe(-2n * SLOPE_1000);
    expect(escrow.totalSupply()).toBe(2n * escrow.balanceOf(control));
  });

  it("leaves an overdue position withdrawable after unlocking", () => {
    const { escrow, clock } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 8 * WEEK);
    escrow.lockPermanent(ALICE, id);
    clock.advance(10 * WEEK);
    escrow.unlockPermanent(ALICE, id);

    expect(escrow.balanceOf(id)).toBe(0n);
    expect(escrow.totalSupply()).toBe(0n);
    expect(escrow.withdraw(ALICE, id).amount).toBe(TOKEN);
  });
});

// ─── Merge ───────────────────────────────────────────────────────────────

describe("merge", () => {
  it("folds the amount into the target and burns the source", () => {
    const { escrow, clock } = setup();
    const from = escrow.createLock(ALICE, 100n * TOKEN, 52 * WEEK);
    clock.advance(WEEK);
    const to = escrow.createLock(ALICE, 300n * TOKEN, 20 * WEEK);

    escrow.merge(ALICE, from, to);

    expect(escrow.lockDetails(to)).toEqual({
      amount: 400n * TOKEN,
      end: T0 + 52 * WEEK,
      isPermanent: false,
      effectiveStart: T0 + 453_600,
    });
    expect(escrow.positionState(from)).toBe("withdrawn");
    expect(escrow.balanceOf(from)).toBe(0n);
    expect(escrow.supply).toBe(400n * TOKEN);
    expect(escrow.slopeChanges(T0 + 21 * WEEK)).toBe(0n);
    expect(escrow.slopeChanges(T0 + 52 * WEEK)).toBe(-toWadSlope(400n * TOKEN, YEAR));
  });

  it("keeps a permanent target permanent", () => {
    const { escrow } = setup();
    const from = escrow.createLock(ALICE, 100n * TOKEN, 10 * WEEK);
    const to = escrow.createLock(ALICE, 300n * TOKEN, 20 * WEEK);
    escrow.lockPermanent(ALICE, to);

    escrow.merge(ALICE, from, to);

    expect(escrow.locked(to)).toEqual({ amount: 400n * TOKEN, end: 0, isPermanent: true });
    expect(escrow.permanentLockBalance).toBe(400n * TOKEN);
    expect(escrow.balanceOf(to)).toBe(400n * TOKEN);
    expect(escrow.totalSupply()).toBe(400n * TOKEN);
    expect(escrow.slopeChanges(T0 + 10 * WEEK)).toBe(0n);
  });

  it("rejects merging a position into itself or from a permanent one", () => {
    const { escrow } = setup();
    const a = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    const b = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    expectEscrowError(() => escrow.merge(ALICE, a, a), "SAME_POSITION");
    escrow.lockPermanent(ALICE, a);
    expectEscrowError(() => escrow.merge(ALICE, a, b), "ALREADY_PERMANENT");
  });

  it("rejects an expired target", () => {
    const { escrow, clock } = setup();
    const from = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    const to = escrow.createLock(ALICE, TOKEN, 4 * WEEK);
    clock.advance(4 * WEEK);
    expectEscrowError(() => escrow.merge(ALICE, from, to), "EXPIRED");
  });

  it("requires authorization over both positions", () => {
    const { escrow } = setup();
    const mine = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    const theirs = escrow.createLock(BOB, TOKEN, 10 * WEEK);
    expectEscrowError(() => escrow.merge(ALICE, mine, theirs), "NOT_APPROVED_OR_OWNER");
    expect(escrow.positionState(mine)).toBe("active");
  });
});

// ─── Split ───────────────────────────────────────────────────────────────

describe("split", () => {
  it("is refused until the team enables it", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, 10n * TOKEN, 10 * WEEK);
    expectEscrowError(() => escrow.split(ALICE, id, TOKEN), "SPLIT_NOT_ALLOWED");
  });

  it("divides the position into remainder and split-off", () => {
    const { escrow, clock } = setup();
    escrow.toggleSplit(TEAM, ALICE, true);
    const id = escrow.createLock(ALICE, 1000n * TOKEN, YEAR);
    const before = escrow.balanceAt(id, T0 + 10 * WEEK);

    const [first, second] = escrow.split(ALICE, id, 400n * TOKEN);

    expect([first, second]).toEqual([2, 3]);
    expect(escrow.locked(first)).toEqual({ amount: 600n * TOKEN, end: T0 + 52 * WEEK, isPermanent: false });
    expect(escrow.locked(second)).toEqual({ amount: 400n * TOKEN, end: T0 + 52 * WEEK, isPermanent: false });
    expect(escrow.ownerOf(first)).toBe(ALICE);
    expect(escrow.positionState(id)).toBe("withdrawn");
    expect(escrow.supply).toBe(1000n * TOKEN);

    clock.advance(10 * WEEK);
    const after = escrow.balanceOf(first) + escrow.balanceOf(second);
    expect(before - after >= 0n && before - after <= 2n).toBe(true);
  });

  it("honors the global split flag", () => {
    const { escrow } = setup();
    escrow.toggleSplit(TEAM, GLOBAL_SPLIT_ACCOUNT, true);
    const id = escrow.createLock(BOB, 10n * TOKEN, 10 * WEEK);
    expect(escrow.split(BOB, id, TOKEN)).toEqual([2, 3]);
  });

  it("treats any spelling of the zero address as the global flag", () => {
    const { escrow, events } = setup();
    escrow.toggleSplit(TEAM, `0X${"0".repeat(40)}`, true);

    expect(escrow.canSplit(GLOBAL_SPLIT_ACCOUNT)).toBe(true);
    expect(events.at(-1)).toMatchObject({
      type: "admin.split_permission",
      payload: { account: GLOBAL_SPLIT_ACCOUNT, enabled: true },
    });
    const id = escrow.createLock(BOB, 10n * TOKEN, 10 * WEEK);
    expect(escrow.split(BOB, id, TOKEN)).toEqual([2, 3]);
  });

  it("keeps permanence and leaves the permanent balance unchanged", () => {
    const { escrow } = setup();
    escrow.toggleSplit(TEAM, ALICE, true);
    const id = escrow.createLock(ALICE, 10n * TOKEN, 10 * WEEK);
    escrow.lockPermanent(ALICE, id);

    const [first, second] = escrow.split(ALICE, id, 4n * TOKEN);

    expect(escrow.balanceOf(first)).toBe(6n * TOKEN);
    expect(escrow.balanceOf(second)).toBe(4n * TOKEN);
    expect(escrow.lockDetails(second).end).toBe(T0 + 10 * WEEK);
    expect(escrow.permanentLockBalance).toBe(10n * TOKEN);
  });

  it("follows the holder, not the position", () => {
    const { escrow } = setup();
    escrow.toggleSplit(TEAM, ALICE, true);
    const id = escrow.createLock(ALICE, 10n * TOKEN, 10 * WEEK);
    escrow.transferFrom(ALICE, ALICE, BOB, id);
    expectEscrowError(() => escrow.split(BOB, id, TOKEN), "SPLIT_NOT_ALLOWED");
  });

  it("rejects amounts outside (0, amount)", () => {
    const { escrow } = setup();
    escrow.toggleSplit(TEAM, ALICE, true);
    const id = escrow.createLock(ALICE, 10n * TOKEN, 10 * WEEK);
    expectEscrowError(() => escrow.split(ALICE, id, 0n), "ZERO_AMOUNT");
    expectEscrowError(() => escrow.split(ALICE, id, 10n * TOKEN), "AMOUNT_TOO_LARGE");
  });
});

// ─── Ownership ───────────────────────────────────────────────────────────

describe("ownership and approvals", () => {
  it("lets an approved address transfer and clears the approval", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    escrow.approve(ALICE, BOB, id);
    expect(escrow.getApproved(id)).toBe(BOB);

    escrow.transferFrom(BOB, ALICE, CAROL, id);

    expect(escrow.ownerOf(id)).toBe(CAROL);
    expect(escrow.getApproved(id)).toBeNull();
    expect(escrow.isApprovedOrOwner(BOB, id)).toBe(false);
  });

  it("lets operators act for every position of the owner", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    escrow.setApprovalForAll(ALICE, BOB, true);
    expect(escrow.isApprovedForAll(ALICE, BOB)).toBe(true);

    escrow.increaseAmount(BOB, id, TOKEN);
    escrow.approve(BOB, CAROL, id);
    expect(escrow.getApproved(id)).toBe(CAROL);
  });

  it("rejects approvals and transfers from strangers", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    expectEscrowError(() => escrow.approve(BOB, BOB, id), "NOT_APPROVED_OR_OWNER");
    expectEscrowError(() => escrow.transferFrom(BOB, ALICE, BOB, id), "NOT_APPROVED_OR_OWNER");
    expectEscrowError(() => escrow.transferFrom(ALICE, BOB, CAROL, id), "NOT_APPROVED_OR_OWNER");
    expectEscrowError(() => escrow.transferFrom(ALICE, ALICE, GLOBAL_SPLIT_ACCOUNT, id), "ZERO_ADDRESS");
  });

  it("does not touch weight on transfer", () => {
    const { escrow } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    const weight = escrow.balanceOf(id);
    escrow.transferFrom(ALICE, ALICE, BOB, id);
    expect(escrow.balanceOf(id)).toBe(weight);
    expect(escrow.userPointEpoch(id)).toBe(1);
  });
});

// ─── Administration ──────────────────────────────────────────────────────

describe("team administration", () => {
  it("restricts settings to the team", () => {
    const { escrow } = setup();
    expectEscrowError(() => escrow.toggleSplit(ALICE, ALICE, true), "NOT_TEAM");
    expectEscrowError(() => escrow.setEarlyWithdrawPenalty(ALICE, 1n), "NOT_TEAM");
    expectEscrowError(() => escrow.setEarlyWithdrawTreasury(ALICE, ALICE), "NOT_TEAM");
    expectEscrowError(() => escrow.setMinLockAmount(ALICE, 1n), "NOT_TEAM");
    expectEscrowError(() => escrow.setTeam(ALICE, ALICE), "NOT_TEAM");
  });

  it("hands over the team in two steps", () => {
    const { escrow, events } = setup();
    escrow.setTeam(TEAM, BOB);
    expect(escrow.team).toBe(TEAM);
    expect(escrow.pendingTeam).toBe(BOB);
    expectEscrowError(() => escrow.acceptTeam(CAROL), "NOT_PENDING_TEAM");

    escrow.acceptTeam(BOB);

    expect(escrow.team).toBe(BOB);
    expect(escrow.pendingTeam).toBeNull();
    expect(events.map((e) => e.type)).toEqual(["admin.team_proposed", "admin.team_accepted"]);
    expectEscrowError(() => escrow.toggleSplit(TEAM, ALICE, true), "NOT_TEAM");
  });

  it("validates settings", () => {
    const { escrow } = setup();
    expectEscrowError(() => escrow.setEarlyWithdrawPenalty(TEAM, 10_001n), "INVALID_PENALTY");
    expectEscrowError(() => escrow.setEarlyWithdrawTreasury(TEAM, GLOBAL_SPLIT_ACCOUNT), "ZERO_ADDRESS");
    expectEscrowError(() => escrow.setMinLockAmount(TEAM, 0n), "ZERO_AMOUNT");
  });

  it("applies and announces setting changes", () => {
    const { escrow, events } = setup();
    escrow.setMinLockAmount(TEAM, 5n * TOKEN);
    escrow.setEarlyWithdrawTreasury(TEAM, CAROL);

    expect(escrow.minLockAmount).toBe(5n * TOKEN);
    expect(escrow.earlyWithdrawTreasury).toBe(CAROL);
    expect(events.map((e) => e.payload)).toEqual([
      { key: "minLockAmount", value: "5000000000000000000" },
      { key: "earlyWithdrawTreasury", value: CAROL },
    ]);
    expectEscrowError(() => escrow.createLock(ALICE, 4n * TOKEN, YEAR), "AMOUNT_TOO_SMALL");
  });

  it("validates the initial configuration", () => {
    expectEscrowError(() => setup({ team: "" }), "ZERO_ADDRESS");
    expectEscrowError(() => setup({ earlyWithdrawPenaltyBps: 20_000n }), "INVALID_PENALTY");
    expectEscrowError(() => setup({ maxLockTime: 0 }), "INVALID_CONFIG");
    expectEscrowError(() => setup({ minLockTime: 60 * WEEK }), "INVALID_CONFIG");
    expectEscrowError(() => setup({ minLockAmount: 0n }), "INVALID_CONFIG");
  });
});

// ─── Global checkpoints ──────────────────────────────────────────────────

describe("checkpoint", () => {
  it("writes one global point per elapsed week with interpolated blocks", () => {
    const { escrow, clock } = setup();
    escrow.createLock(ALICE, 1000n * TOKEN, YEAR);
    for (let i = 0; i < 99; i++) {
      clock.advance(0);
    }
    clock.advance(3 * WEEK + 100);

    escrow.checkpoint(BOB);

    expect(escrow.epoch).toBe(5);
    expect([2, 3, 4, 5].map((i) => escrow.pointHistory(i).ts)).toEqual([
      T0 + WEEK,
      T0 + 2 * WEEK,
      T0 + 3 * WEEK,
      T0 + 3 * WEEK + 100,
    ]);
    expect([2, 3, 4, 5].map((i) => escrow.pointHistory(i).blk)).toEqual([34, 67, 100, 101]);
    expect(escrow.pointHistory(2).bias).toBe(SLOPE_1000 * BigInt(51 * WEEK));
  });

  it("replaces a global point written in the same second", () => {
    const { escrow } = setup();
    escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    escrow.checkpoint(BOB);
    expect(escrow.epoch).toBe(1);
  });

  it("catches up a gap longer than 255 weeks through repeated global checkpoints", () => {
    const { escrow, clock } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    clock.advance(256 * WEEK);

    expectEscrowError(() => escrow.withdraw(ALICE, id), "LOOKBACK_EXCEEDED");
    expectEscrowError(() => escrow.totalSupply(), "LOOKBACK_EXCEEDED");
    expect(escrow.epoch).toBe(1);

    escrow.checkpoint(BOB);
    expect(escrow.epoch).toBe(256);
    expect(escrow.pointHistory(256).ts).toBe(T0 + 255 * WEEK);

    escrow.checkpoint(BOB);
    expect(escrow.epoch).toBe(257);
    expect(escrow.pointHistory(257).ts).toBe(T0 + 256 * WEEK);
    expect(escrow.totalSupply()).toBe(0n);
    expect(escrow.withdraw(ALICE, id)).toEqual({ positionId: id, amount: TOKEN });
    expect(escrow.positionState(id)).toBe("withdrawn");
  });

  it("bridges long gaps with intermediate checkpoints", () => {
    const { escrow, clock } = setup();
    escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    clock.advance(100 * WEEK);
    escrow.checkpoint(BOB);
    expect(escrow.epoch).toBe(101);

    clock.advance(200 * WEEK);
    escrow.checkpoint(BOB);
    expect(escrow.totalSupply()).toBe(0n);
  });

  it("rejects a clock that moved backwards", () => {
    const { escrow, clock } = setup();
    escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    clock.setTime(T0 - 10);
    expectEscrowError(() => escrow.createLock(ALICE, TOKEN, 10 * WEEK), "CLOCK_WENT_BACKWARDS");
  });
});

// ─── Events ──────────────────────────────────────────────────────────────

describe("event listeners", () => {
  it("stop receiving events after unsubscribing", () => {
    const clock = new ManualClock(T0);
    const escrow = new VotingEscrow({ team: TEAM, earlyWithdrawTreasury: TREASURY }, clock);
    const seen: string[] = [];
    const unsubscribe = escrow.onEvent((event) => seen.push(event.type));

    escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    unsubscribe();
    escrow.createLock(ALICE, TOKEN, 10 * WEEK);

    expect(seen).toEqual(["position.transfer", "escrow.deposit", "escrow.supply"]);
  });

  it("receive nothing for a rejected operation", () => {
    const { escrow, events } = setup();
    const id = escrow.createLock(ALICE, TOKEN, 10 * WEEK);
    events.length = 0;
    expectEscrowError(() => escrow.withdraw(ALICE, id), "NOT_EXPIRED");
    expect(events).toEqual([]);
  });
});
