/**
 * Error envelope types for command rejections.
 *
 * All rejections are described by the shape:
 * { error: { code: string, category: string, message: string, details?: Record<string, unknown> } }
 */

import type { ZodError } from "zod";
import { EscrowError } from "@escrowpoint/escrow";
import type { EscrowErrorCategory, EscrowErrorCode } from "@escrowpoint/escrow";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Host-level codes. Engine rejections keep the engine's code.
 */
export type HostErrorCode = "VALIDATION_ERROR" | "INTERNAL_ERROR";

export type ErrorCategory = EscrowErrorCategory | "internal";

// =============================================================================
// Errors
// =============================================================================

/**
 * Raised when a submitted command does not match the command schema.
 */
export class CommandValidationError extends Error {
  readonly code = "VALIDATION_ERROR";
  readonly category = "validation";
  readonly issues: ZodError["issues"];

  constructor(error: ZodError) {
    super(
      `Invalid command: ${error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("; ")}`,
    );
    this.name = "CommandValidationError";
    this.issues = error.issues;
  }
}

// =============================================================================
// Error Envelope
// =============================================================================

export interface ErrorDetail {
  readonly code: EscrowErrorCode | HostErrorCode;
  readonly category: ErrorCategory;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

/**
 * Describe any thrown value as an envelope.
 */
export function toErrorEnvelope(error: unknown): ErrorEnvelope {
  if (error instanceof EscrowError) {
    return { error: { code: error.code, category: error.category, message: error.message } };
  }
  if (error instanceof CommandValidationError) {
    return {
      error: {
        code: error.code,
        category: error.category,
        message: error.message,
        details: { fields: error.issues.map((i) => i.path.join(".")) },
      },
    };
  }
  return {
    error: {
      code: "INTERNAL_ERROR",
      category: "internal",
      message: error instanceof Error ? error.message : String(error),
    },
  };
}
