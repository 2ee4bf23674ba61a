/**
 * Append-only audit log for recording who-did-what-when.
 *
 * The escrow service appends one entry per committed command.
 * In-memory only — survives as long as the process.
 */

import type { Address, PositionId } from "@escrowpoint/types";
import type { EscrowCommandKind } from "../types/commands.js";

// =============================================================================
// Types
// =============================================================================

export interface AuditLogEntry {
  /** Position in the log, starting at 1 */
  readonly sequence: number;
  readonly timestamp: string;
  readonly action: EscrowCommandKind;
  readonly actor: Address;
  /** Positions the command touched, in the order the engine reported them */
  readonly positionIds: readonly PositionId[];
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly action?: EscrowCommandKind | undefined;
  readonly actor?: Address | undefined;
  readonly positionId?: PositionId | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];

  /**
   * Append an entry to the audit log.
   */
  append(entry: Omit<AuditLogEntry, "timestamp" | "sequence">): AuditLogEntry {
    const recorded: AuditLogEntry = {
      ...entry,
      sequence: this._entries.length + 1,
      timestamp: new Date().toISOString(),
    };
    this._entries.push(recorded);
    return recorded;
  }

  /**
   * Query audit log entries with optional filters.
   *
   * Returns newest-first.
   */
  query(filter?: AuditLogQuery): readonly AuditLogEntry[] {
    let results: AuditLogEntry[] = this._entries;

    if (filter?.action !== undefined) {
      results = results.filter((e) => e.action === filter.action);
    }
    if (filter?.actor !== undefined) {
      results = results.filter((e) => e.actor === filter.actor);
    }
    if (filter?.positionId !== undefined) {
      const id = filter.positionId;
      results = results.filter((e) => e.positionIds.includes(id));
    }

    // Newest first
    results = [...results].reverse();

    if (filter?.limit !== undefined && filter.limit > 0) {
      results = results.slice(0, filter.limit);
    }

    return results;
  }

  /**
   * Total number of entries.
   */
  get size(): number {
    return this._entries.length;
  }
}
