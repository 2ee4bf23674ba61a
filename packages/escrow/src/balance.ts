/**
 * @escrowpoint/escrow — Decay and replay engine.
 *
 * Reconstructs historical balances from checkpoints. Pure functions
 * over a CheckpointReader; nothing here writes.
 *
 * Rules:
 * - Balances round down, so history is never overstated
 * - Permanent weight is constant and never decays
 * - A replay that cannot reach its target within MAX_REPLAY_WEEKS
 *   throws LOOKBACK_EXCEEDED instead of returning a wrong number
 */

import type { GlobalPoint, PositionId } from "@escrowpoint/types";
import type { CheckpointReader } from "./checkpoint-store.js";
import { decay, fromWad, toInt256 } from "./fixed-point.js";
import { roundDownToWeek } from "./epoch-time.js";
import { indexAtOrBefore } from "./search.js";
import { EscrowError, MAX_REPLAY_WEEKS, WEEK } from "./types.js";

/**
 * Index of the position's newest checkpoint at or before `timestamp`.
 */
export function userPointIndexAt(
  reader: CheckpointReader,
  positionId: PositionId,
  timestamp: number,
): number {
  return indexAtOrBefore(
    (i) => reader.userPointAt(positionId, i),
    reader.userPointEpoch(positionId),
    timestamp,
  );
}

/**
 * Index of the newest global checkpoint at or before `timestamp`.
 */
export function globalPointIndexAt(reader: CheckpointReader, timestamp: number): number {
  return indexAtOrBefore((i) => reader.globalPointAt(i), reader.epoch, timestamp);
}

/**
 * Weight of a position at `timestamp`, in public units.
 */
export function balanceOfPositionAt(
  reader: CheckpointReader,
  positionId: PositionId,
  timestamp: number,
): bigint {
  const index = userPointIndexAt(reader, positionId, timestamp);
  if (index === 0) {
    return 0n;
  }

  const point = reader.userPointAt(positionId, index);
  if (point.permanent !== 0n) {
    return point.permanent;
  }

  return fromWad(decay(point.bias, point.slope, timestamp - point.ts));
}

/**
 * Replay the aggregate from `point` forward to `timestamp`, one week
 * boundary at a time, applying the slope-change schedule.
 */
export function supplyAt(
  reader: CheckpointReader,
  point: GlobalPoint,
  timestamp: number,
): bigint {
  let bias = point.bias;
  let slope = point.slope;
  let lastTs = point.ts;
  let reached = timestamp <= lastTs;

  let tI = roundDownToWeek(lastTs);
  for (let i = 0; i < MAX_REPLAY_WEEKS && !reached; i++) {
    tI += WEEK;
    let dSlope = 0n;
    if (tI > timestamp) {
      tI = timestamp;
    } else {
      dSlope = reader.slopeChangeAt(tI);
    }

    bias = toInt256(bias - slope * BigInt(tI - lastTs));
    if (tI === timestamp) {
      reached = true;
      break;
    }
    slope = toInt256(slope + dSlope);
    lastTs = tI;
  }

  if (!reached) {
    throw new EscrowError(
      "LOOKBACK_EXCEEDED",
      `Cannot replay from ${String(point.ts)} to ${String(timestamp)}: more than ${String(MAX_REPLAY_WEEKS)} weeks without a global checkpoint`,
    );
  }

  return fromWad(bias) + point.permanentLockBalance;
}

/**
 * Total weight of all positions at `timestamp`, in public units.
 */
export function totalSupplyAt(reader: CheckpointReader, timestamp: number): bigint {
  const index = globalPointIndexAt(reader, timestamp);
  if (index === 0) {
    return 0n;
  }
  return supplyAt(reader, reader.globalPointAt(index), timestamp);
}
