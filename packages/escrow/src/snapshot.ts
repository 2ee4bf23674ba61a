/**
 * @escrowpoint/escrow — Snapshots.
 *
 * Serializes the committed escrow state (configuration, positions,
 * histories, schedule, totals) to plain JSON with bigints as decimal
 * strings, and restores it.
 *
 * Integrity: each snapshot carries a SHA-256 over the RFC 8785
 * canonical JSON of its state. Restore verifies the hash before it
 * trusts a single field, then validates every field's shape.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  Address,
  GlobalPoint,
  LockedBalance,
  PositionId,
  SerializedGlobalPoint,
  SerializedLockedBalance,
  SerializedUserPoint,
  UserPoint,
} from "@escrowpoint/types";
import {
  isAddress,
  isDecimalString,
  isPositionId,
  isSerializedGlobalPoint,
  isSerializedLockedBalance,
  isSerializedUserPoint,
  isTimestamp,
  isUnsignedDecimalString,
} from "@escrowpoint/types";
import { CheckpointStore, ZERO_GLOBAL_POINT, ZERO_USER_POINT } from "./checkpoint-store.js";
import type { CheckpointState } from "./checkpoint-store.js";
import { PositionRegistry } from "./positions.js";
import type { PositionRegistryState } from "./positions.js";
import type {
  EscrowConfig,
  EscrowSnapshot,
  EscrowStateSnapshot,
  ResolvedEscrowConfig,
  SerializedPosition,
} from "./types.js";
import { EscrowError } from "./types.js";

/**
 * The committed stores a snapshot is taken from and restored into.
 */
export interface SnapshotSource {
  readonly checkpoints: CheckpointStore;
  readonly positions: PositionRegistry;
  readonly pendingTeam: Address | null;
}

/**
 * Compute a SHA-256 hash of the canonical JSON representation of a state.
 */
export function computeStateHash(state: unknown): string {
  return createHash("sha256").update(canonicalize(state)).digest("hex");
}

/**
 * Verify that a snapshot's stateHash matches its state.
 */
export function verifySnapshotIntegrity(snapshot: EscrowSnapshot): boolean {
  if (snapshot.stateHash === "") {
    return false;
  }
  return snapshot.stateHash === computeStateHash(snapshot.state);
}

// ─── Serialize ─────────────────────────────────────────────────────────────

function serializeLock(lock: LockedBalance): SerializedLockedBalance {
  return {
    amount: lock.amount.toString(),
    end: lock.end,
    isPermanent: lock.isPermanent,
    effectiveStart: lock.effectiveStart,
  };
}

function serializeUserPoint(point: UserPoint): SerializedUserPoint {
  return {
    bias: point.bias.toString(),
    slope: point.slope.toString(),
    ts: point.ts,
    blk: point.blk,
    permanent: point.permanent.toString(),
  };
}

function serializeGlobalPoint(point: GlobalPoint): SerializedGlobalPoint {
  return {
    bias: point.bias.toString(),
    slope: point.slope.toString(),
    ts: point.ts,
    blk: point.blk,
    permanentLockBalance: point.permanentLockBalance.toString(),
  };
}

/**
 * Serialize committed state. Histories are written without their zero
 * slot.
 */
export function serializeEscrowState(
  config: ResolvedEscrowConfig,
  source: SnapshotSource,
): EscrowStateSnapshot {
  const { checkpoints, positions } = source;

  const serializedPositions: SerializedPosition[] = [];
  for (let id = 1; id < positions.nextId; id++) {
    serializedPositions.push({
      id,
      owner: positions.ownerOf(id) ?? null,
      approved: positions.getApproved(id) ?? null,
      locked: serializeLock(positions.lockOf(id)),
      withdrawn: positions.isWithdrawn(id),
      history: checkpoints.userHistory(id).slice(1).map(serializeUserPoint),
    });
  }

  return {
    config: {
      team: config.team,
      pendingTeam: source.pendingTeam,
      earlyWithdrawTreasury: config.earlyWithdrawTreasury,
      maxLockTime: config.maxLockTime,
      minLockTime: config.minLockTime,
      minLockAmount: config.minLockAmount.toString(),
      earlyWithdrawPenaltyBps: config.earlyWithdrawPenaltyBps.toString(),
    },
    nextPositionId: positions.nextId,
    supply: positions.supply.toString(),
    permanentLockBalance: checkpoints.permanentLockBalance.toString(),
    positions: serializedPositions,
    operators: positions
      .ownersWithOperators()
      .map((owner) => [owner, positions.operatorsOf(owner)] as const),
    splitPermissions: positions.splitEnabledAccounts(),
    globalHistory: checkpoints.globalHistory().slice(1).map(serializeGlobalPoint),
    slopeChanges: checkpoints
      .slopeChanges()
      .map(([ts, delta]) => [ts, delta.toString()] as const),
  };
}

/**
 * Serialize committed state and seal it with its hash.
 */
export function createSnapshot(
  config: ResolvedEscrowConfig,
  source: SnapshotSource,
  createdAt: Date = new Date(),
): EscrowSnapshot {
  const state = serializeEscrowState(config, source);
  return {
    version: 1,
    state,
    stateHash: computeStateHash(state),
    createdAt: createdAt.toISOString(),
  };
}

// ─── Restore ───────────────────────────────────────────────────────────────

function invalid(message: string): never {
  throw new EscrowError("INVALID_SNAPSHOT", message);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function requireRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    return invalid(`${path} must be an object`);
  }
  return value;
}

function requireArray(value: unknown, path: string): readonly unknown[] {
  if (!Array.isArray(value)) {
    return invalid(`${path} must be an array`);
  }
  return value;
}

function requireAddress(value: unknown, path: string): Address {
  if (!isAddress(value)) {
    return invalid(`${path} must be an address`);
  }
  return value;
}

function requireNullableAddress(value: unknown, path: string): Address | null {
  return value === null ? null : requireAddress(value, path);
}

function requireUnsigned(value: unknown, path: string): bigint {
  if (!isUnsignedDecimalString(value)) {
    return invalid(`${path} must be an unsigned decimal string`);
  }
  return BigInt(value);
}

function requireTimestamp(value: unknown, path: string): number {
  if (!isTimestamp(value)) {
    return invalid(`${path} must be a non-negative integer`);
  }
  return value;
}

function parseLock(value: unknown, path: string): LockedBalance {
  if (!isSerializedLockedBalance(value)) {
    return invalid(`${path} is not a locked balance`);
  }
  return {
    amount: BigInt(value.amount),
    end: value.end,
    isPermanent: value.isPermanent,
    effectiveStart: value.effectiveStart,
  };
}

function parseUserPoint(value: unknown, path: string): UserPoint {
  if (!isSerializedUserPoint(value)) {
    return invalid(`${path} is not a user point`);
  }
  return {
    bias: BigInt(value.bias),
    slope: BigInt(value.slope),
    ts: value.ts,
    blk: value.blk,
    permanent: BigInt(value.permanent),
  };
}

function parseGlobalPoint(value: unknown, path: string): GlobalPoint {
  if (!isSerializedGlobalPoint(value)) {
    return invalid(`${path} is not a global point`);
  }
  return {
    bias: BigInt(value.bias),
    slope: BigInt(value.slope),
    ts: value.ts,
    blk: value.blk,
    permanentLockBalance: BigInt(value.permanentLockBalance),
  };
}

function requireIncreasing(points: readonly { readonly ts: number }[], path: string): void {
  for (let i = 1; i < points.length; i++) {
    const previous = points[i - 1];
    const current = points[i];
    if (previous !== undefined && current !== undefined && current.ts <= previous.ts) {
      invalid(`${path} is not strictly increasing by timestamp at index ${String(i)}`);
    }
  }
}

/**
 * Result of restoring a snapshot: the configuration and the stores.
 */
export interface RestoredEscrow {
  readonly config: EscrowConfig;
  readonly source: SnapshotSource;
}

/**
 * Validate and restore a snapshot.
 *
 * @throws EscrowError INVALID_SNAPSHOT on a hash mismatch or any
 *   malformed field
 */
export function restoreEscrowState(snapshot: unknown): RestoredEscrow {
  const root = requireRecord(snapshot, "snapshot");
  if (root["version"] !== 1) {
    invalid(`Unsupported snapshot version: ${String(root["version"])}`);
  }
  const stateHash = root["stateHash"];
  if (typeof stateHash !== "string" || stateHash === "") {
    invalid("snapshot.stateHash is missing");
  }
  const state = requireRecord(root["state"], "snapshot.state");
  if (computeStateHash(state) !== stateHash) {
    invalid("snapshot.stateHash does not match the state");
  }

  // Configuration
  const rawConfig = requireRecord(state["config"], "state.config");
  const maxLockTime = requireTimestamp(rawConfig["maxLockTime"], "config.maxLockTime");
  const minLockTime = requireTimestamp(rawConfig["minLockTime"], "config.minLockTime");
  const config: EscrowConfig = {
    team: requireAddress(rawConfig["team"], "config.team"),
    earlyWithdrawTreasury: requireAddress(
      rawConfig["earlyWithdrawTreasury"],
      "config.earlyWithdrawTreasury",
    ),
    maxLockTime,
    minLockTime,
    minLockAmount: requireUnsigned(rawConfig["minLockAmount"], "config.minLockAmount"),
    earlyWithdrawPenaltyBps: requireUnsigned(
      rawConfig["earlyWithdrawPenaltyBps"],
      "config.earlyWithdrawPenaltyBps",
    ),
  };
  const pendingTeam = requireNullableAddress(rawConfig["pendingTeam"], "config.pendingTeam");

  // Positions
  const nextId = state["nextPositionId"];
  if (!isPositionId(nextId)) {
    return invalid("state.nextPositionId must be a positive integer");
  }

  const registry: PositionRegistryState = {
    locks: new Map(),
    owners: new Map(),
    approvals: new Map(),
    operators: new Map(),
    withdrawn: new Map(),
    splitPermissions: new Map(),
    nextId,
    supply: requireUnsigned(state["supply"], "state.supply"),
  };
  const checkpoints: CheckpointState = {
    globalHistory: [ZERO_GLOBAL_POINT],
    userHistory: new Map(),
    slopeChanges: new Map(),
    permanentLockBalance: requireUnsigned(
      state["permanentLockBalance"],
      "state.permanentLockBalance",
    ),
  };

  const rawPositions = requireArray(state["positions"], "state.positions");
  if (rawPositions.length !== nextId - 1) {
    invalid(`state.positions holds ${String(rawPositions.length)} entries, expected ${String(nextId - 1)}`);
  }

  rawPositions.forEach((raw, index) => {
    const path = `positions[${String(index)}]`;
    const entry = requireRecord(raw, path);
    const id: PositionId = index + 1;
    if (entry["id"] !== id) {
      invalid(`${path}.id must be ${String(id)}`);
    }

    const withdrawn = entry["withdrawn"];
    if (typeof withdrawn !== "boolean") {
      invalid(`${path}.withdrawn must be a boolean`);
    }
    const owner = requireNullableAddress(entry["owner"], `${path}.owner`);
    const approved = requireNullableAddress(entry["approved"], `${path}.approved`);
    const lock = parseLock(entry["locked"], `${path}.locked`);

    if (withdrawn) {
      if (owner !== null || approved !== null || lock.amount !== 0n) {
        invalid(`${path} is withdrawn but still has an owner, approval or amount`);
      }
      registry.withdrawn.set(id, true);
    } else {
      if (owner === null) {
        invalid(`${path} is live but has no owner`);
      }
      registry.owners.set(id, owner);
      registry.locks.set(id, lock);
      if (approved !== null) {
        registry.approvals.set(id, approved);
      }
    }

    const history = requireArray(entry["history"], `${path}.history`).map((point, i) =>
      parseUserPoint(point, `${path}.history[${String(i)}]`),
    );
    requireIncreasing(history, `${path}.history`);
    if (history.length > 0) {
      checkpoints.userHistory.set(id, [ZERO_USER_POINT, ...history]);
    }
  });

  for (const [index, raw] of requireArray(state["operators"], "state.operators").entries()) {
    const path = `operators[${String(index)}]`;
    const pair = requireArray(raw, path);
    const owner = requireAddress(pair[0], `${path}[0]`);
    const operators = requireArray(pair[1], `${path}[1]`).map((operator, i) =>
      requireAddress(operator, `${path}[1][${String(i)}]`),
    );
    if (operators.length > 0) {
      registry.operators.set(owner, new Set(operators));
    }
  }

  for (const [index, raw] of requireArray(state["splitPermissions"], "state.splitPermissions").entries()) {
    registry.splitPermissions.set(requireAddress(raw, `splitPermissions[${String(index)}]`), true);
  }

  // Checkpoints
  const globalHistory = requireArray(state["globalHistory"], "state.globalHistory").map(
    (point, i) => parseGlobalPoint(point, `globalHistory[${String(i)}]`),
  );
  requireIncreasing(globalHistory, "state.globalHistory");
  checkpoints.globalHistory.push(...globalHistory);

  for (const [index, raw] of requireArray(state["slopeChanges"], "state.slopeChanges").entries()) {
    const path = `slopeChanges[${String(index)}]`;
    const pair = requireArray(raw, path);
    const ts = requireTimestamp(pair[0], `${path}[0]`);
    const delta = pair[1];
    if (!isDecimalString(delta)) {
      invalid(`${path}[1] must be a decimal string`);
    }
    checkpoints.slopeChanges.set(ts, BigInt(delta));
  }

  return {
    config,
    source: {
      checkpoints: new CheckpointStore(checkpoints),
      positions: new PositionRegistry(registry),
      pendingTeam,
    },
  };
}
