export { EscrowCommandSchema, AmountSchema } from "./commands.js";
export type { EscrowCommand, EscrowCommandKind } from "./commands.js";
export { CommandValidationError, toErrorEnvelope } from "./error.js";
export type {
  ErrorCategory,
  ErrorDetail,
  ErrorEnvelope,
  HostErrorCode,
} from "./error.js";
