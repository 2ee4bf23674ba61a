/**
 * Zod schemas for escrow commands.
 *
 * A command is the wire form of one engine operation: a plain JSON object
 * discriminated on `kind`. Token amounts travel as decimal strings in base
 * units and are parsed to bigint; durations are seconds.
 */

import { z } from "zod";

// =============================================================================
// Shared Fields
// =============================================================================

const Address = z.string().min(1).max(256);

const PositionIdSchema = z.number().int().positive();

/** Base-unit amount as a decimal string, e.g. "1000000000000000000" */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "must be a non-negative integer string")
  .max(80)
  .transform((v) => BigInt(v));

const Duration = z.number().int().nonnegative();

// =============================================================================
// Commands
// =============================================================================

export const EscrowCommandSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("create_lock"),
    value: AmountSchema,
    duration: Duration,
  }),
  z.object({
    kind: z.literal("create_lock_for"),
    value: AmountSchema,
    duration: Duration,
    recipient: Address,
  }),
  z.object({
    kind: z.literal("increase_amount"),
    positionId: PositionIdSchema,
    value: AmountSchema,
  }),
  z.object({
    kind: z.literal("deposit_for"),
    positionId: PositionIdSchema,
    value: AmountSchema,
  }),
  z.object({
    kind: z.literal("increase_unlock_time"),
    positionId: PositionIdSchema,
    duration: Duration,
  }),
  z.object({ kind: z.literal("lock_permanent"), positionId: PositionIdSchema }),
  z.object({ kind: z.literal("unlock_permanent"), positionId: PositionIdSchema }),
  z.object({
    kind: z.literal("merge"),
    from: PositionIdSchema,
    to: PositionIdSchema,
  }),
  z.object({
    kind: z.literal("split"),
    positionId: PositionIdSchema,
    amount: AmountSchema,
  }),
  z.object({ kind: z.literal("withdraw"), positionId: PositionIdSchema }),
  z.object({ kind: z.literal("early_withdraw"), positionId: PositionIdSchema }),
  z.object({ kind: z.literal("checkpoint") }),
  z.object({
    kind: z.literal("transfer_from"),
    from: Address,
    to: Address,
    positionId: PositionIdSchema,
  }),
  z.object({
    kind: z.literal("approve"),
    approved: Address.nullable(),
    positionId: PositionIdSchema,
  }),
  z.object({
    kind: z.literal("set_approval_for_all"),
    operator: Address,
    approved: z.boolean(),
  }),
  z.object({
    kind: z.literal("toggle_split"),
    account: Address,
    enabled: z.boolean(),
  }),
  z.object({ kind: z.literal("set_team"), team: Address }),
  z.object({ kind: z.literal("accept_team") }),
  z.object({ kind: z.literal("set_early_withdraw_penalty"), bps: AmountSchema }),
  z.object({ kind: z.literal("set_early_withdraw_treasury"), treasury: Address }),
  z.object({ kind: z.literal("set_min_lock_amount"), amount: AmountSchema }),
]);

export type EscrowCommand = z.infer<typeof EscrowCommandSchema>;
export type EscrowCommandKind = EscrowCommand["kind"];
