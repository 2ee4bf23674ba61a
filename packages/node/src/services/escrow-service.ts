/**
 * EscrowService — single-writer host for one VotingEscrow.
 *
 * Commands arrive as untrusted JSON, are validated against
 * EscrowCommandSchema, and run strictly one at a time in submission
 * order. Reads bypass the queue and only ever see committed state.
 */

import type { Address, PositionId } from "@escrowpoint/types";
import type {
  EarlyWithdrawResult,
  EscrowSnapshot,
  PublicLock,
  SplitResult,
  VotingEscrow,
  WithdrawResult,
} from "@escrowpoint/escrow";
import type { Logger } from "../logger.js";
import { EscrowCommandSchema } from "../types/commands.js";
import type { EscrowCommand, EscrowCommandKind } from "../types/commands.js";
import { CommandValidationError, toErrorEnvelope } from "../types/error.js";
import { AuditLog } from "./audit-log.js";

// =============================================================================
// Types
// =============================================================================

export interface EscrowServiceOptions {
  readonly escrow: VotingEscrow;
  readonly logger: Logger;
  readonly auditLog?: AuditLog | undefined;
}

/** Engine return value; undefined for operations that return nothing. */
export type CommandResult =
  | PositionId
  | SplitResult
  | WithdrawResult
  | EarlyWithdrawResult
  | undefined;

export interface CommandReceipt {
  readonly kind: EscrowCommandKind;
  readonly result: CommandResult;
  readonly positionIds: readonly PositionId[];
}

interface Execution {
  readonly result: CommandResult;
  readonly positionIds: readonly PositionId[];
}

// =============================================================================
// Service
// =============================================================================

export class EscrowService {
  readonly escrow: VotingEscrow;
  readonly auditLog: AuditLog;

  private readonly _logger: Logger;
  private _tail: Promise<void> = Promise.resolve();

  constructor(options: EscrowServiceOptions) {
    this.escrow = options.escrow;
    this.auditLog = options.auditLog ?? new AuditLog();
    this._logger = options.logger;
  }

  // ─── Commands ────────────────────────────────────────────────────────

  /**
   * Validate and enqueue a command on behalf of `caller`.
   *
   * Resolves once the command has committed; rejects with the engine's
   * EscrowError, or with CommandValidationError before anything is queued.
   */
  submit(caller: Address, raw: unknown): Promise<CommandReceipt> {
    const parsed = EscrowCommandSchema.safeParse(raw);
    if (!parsed.success) {
      const error = new CommandValidationError(parsed.error);
      this._logger.warn(
        { caller, code: error.code, category: error.category },
        "Command rejected",
      );
      return Promise.reject(error);
    }
    const command = parsed.data;
    return this._enqueue(() => this._run(caller, command));
  }

  /**
   * Resolves once every command submitted so far has settled.
   */
  idle(): Promise<void> {
    return this._tail;
  }

  // ─── Reads ───────────────────────────────────────────────────────────

  balanceOf(positionId: PositionId): bigint {
    return this.escrow.balanceOf(positionId);
  }

  balanceAt(positionId: PositionId, timestamp: number): bigint {
    return this.escrow.balanceAt(positionId, timestamp);
  }

  totalSupply(): bigint {
    return this.escrow.totalSupply();
  }

  totalSupplyAt(timestamp: number): bigint {
    return this.escrow.totalSupplyAt(timestamp);
  }

  locked(positionId: PositionId): PublicLock {
    return this.escrow.locked(positionId);
  }

  snapshot(): EscrowSnapshot {
    return this.escrow.snapshot();
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _enqueue<T>(task: () => T): Promise<T> {
    const run = this._tail.then(task);
    this._tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private _run(caller: Address, command: EscrowCommand): CommandReceipt {
    let execution: Execution;
    try {
      execution = this._execute(caller, command);
    } catch (error) {
      const { error: detail } = toErrorEnvelope(error);
      const bindings = { command: command.kind, caller, code: detail.code, category: detail.category };
      if (detail.category === "internal") {
        this._logger.error({ ...bindings, err: error }, "Command failed");
      } else {
        this._logger.warn(bindings, "Command rejected");
      }
      throw error;
    }

    const entry = this.auditLog.append({
      action: command.kind,
      actor: caller,
      positionIds: execution.positionIds,
    });
    this._logger.info(
      {
        command: command.kind,
        caller,
        positionIds: execution.positionIds,
        sequence: entry.sequence,
      },
      "Command committed",
    );

    return { kind: command.kind, ...execution };
  }

  private _execute(caller: Address, command: EscrowCommand): Execution {
    const escrow = this.escrow;
    switch (command.kind) {
      case "create_lock": {
        const id = escrow.createLock(caller, command.value, command.duration);
        return { result: id, positionIds: [id] };
      }
      case "create_lock_for": {
        const id = escrow.createLockFor(caller, command.value, command.duration, command.recipient);
        return { result: id, positionIds: [id] };
      }
      case "increase_amount":
        escrow.increaseAmount(caller, command.positionId, command.value);
        return touched(command.positionId);
      case "deposit_for":
        escrow.depositFor(caller, command.positionId, command.value);
        return touched(command.positionId);
      case "increase_unlock_time":
        escrow.increaseUnlockTime(caller, command.positionId, command.duration);
        return touched(command.positionId);
      case "lock_permanent":
        escrow.lockPermanent(caller, command.positionId);
        return touched(command.positionId);
      case "unlock_permanent":
        escrow.unlockPermanent(caller, command.positionId);
        return touched(command.positionId);
      case "merge":
        escrow.merge(caller, command.from, command.to);
        return touched(command.from, command.to);
      case "split": {
        const children = escrow.split(caller, command.positionId, command.amount);
        return { result: children, positionIds: [command.positionId, ...children] };
      }
      case "withdraw":
        return {
          result: escrow.withdraw(caller, command.positionId),
          positionIds: [command.positionId],
        };
      case "early_withdraw":
        return {
          result: escrow.earlyWithdraw(caller, command.positionId),
          positionIds: [command.positionId],
        };
      case "checkpoint":
        escrow.checkpoint(caller);
        return touched();
      case "transfer_from":
        escrow.transferFrom(caller, command.from, command.to, command.positionId);
        return touched(command.positionId);
      case "approve":
        escrow.approve(caller, command.approved, command.positionId);
        return touched(command.positionId);
      case "set_approval_for_all":
        escrow.setApprovalForAll(caller, command.operator, command.approved);
        return touched();
      case "toggle_split":
        escrow.toggleSplit(caller, command.account, command.enabled);
        return touched();
      case "set_team":
        escrow.setTeam(caller, command.team);
        return touched();
      case "accept_team":
        escrow.acceptTeam(caller);
        return touched();
      case "set_early_withdraw_penalty":
        escrow.setEarlyWithdrawPenalty(caller, command.bps);
        return touched();
      case "set_early_withdraw_treasury":
        escrow.setEarlyWithdrawTreasury(caller, command.treasury);
        return touched();
      case "set_min_lock_amount":
        escrow.setMinLockAmount(caller, command.amount);
        return touched();
    }
  }
}

function touched(...positionIds: PositionId[]): Execution {
  return { result: undefined, positionIds };
}
