/**
 * @escrowpoint/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { EscrowConfig } from "@escrowpoint/escrow";

// =============================================================================
// Schema
// =============================================================================

const UnsignedInteger = z.string().trim().regex(/^\d+$/, "must be a non-negative integer");

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Escrow
  ESCROW_TEAM: z.string().trim().min(1),
  ESCROW_TREASURY: z.string().trim().min(1),
  ESCROW_MAX_LOCK_TIME: z.coerce.number().int().positive().optional(),
  ESCROW_MIN_LOCK_TIME: z.coerce.number().int().min(0).optional(),
  /** Base units of the locked token */
  ESCROW_MIN_LOCK_AMOUNT: UnsignedInteger.transform((v) => BigInt(v)).optional(),
  ESCROW_EARLY_WITHDRAW_PENALTY_BPS: UnsignedInteger.transform((v) => BigInt(v)).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when the environment does not describe a valid configuration.
 */
export class ConfigError extends Error {
  /** Environment variables that failed validation */
  readonly keys: readonly string[];

  constructor(issues: readonly z.ZodIssue[]) {
    const keys = [...new Set(issues.map((issue) => issue.path.join(".")))];
    super(
      `Invalid configuration: ${issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
    );
    this.name = "ConfigError";
    this.keys = keys;
  }
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {ConfigError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  return result.data;
}

/**
 * Map the environment configuration onto the escrow engine's.
 * Unset values fall back to the engine defaults.
 */
export function toEscrowConfig(config: AppConfig): EscrowConfig {
  return {
    team: config.ESCROW_TEAM,
    earlyWithdrawTreasury: config.ESCROW_TREASURY,
    maxLockTime: config.ESCROW_MAX_LOCK_TIME,
    minLockTime: config.ESCROW_MIN_LOCK_TIME,
    minLockAmount: config.ESCROW_MIN_LOCK_AMOUNT,
    earlyWithdrawPenaltyBps: config.ESCROW_EARLY_WITHDRAW_PENALTY_BPS,
  };
}
