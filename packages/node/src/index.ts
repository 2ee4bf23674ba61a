/**
 * @escrowpoint/node — Host service for the escrow engine.
 */

export { createNode } from "./node.js";
export type { CreateNodeOptions, EscrowNode } from "./node.js";
export { EscrowService } from "./services/escrow-service.js";
export type {
  EscrowServiceOptions,
  CommandReceipt,
  CommandResult,
} from "./services/escrow-service.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditLogEntry, AuditLogQuery } from "./services/audit-log.js";
export { loadConfig, toEscrowConfig, ConfigSchema, ConfigError } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger, createSilentLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export * from "./types/index.js";
