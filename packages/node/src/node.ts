/**
 * @escrowpoint/node — Composition root.
 *
 * Wires configuration, logging and the escrow engine into one
 * EscrowService.
 */

import { SystemClock, VotingEscrow } from "@escrowpoint/escrow";
import type { Clock } from "@escrowpoint/escrow";
import { loadConfig, toEscrowConfig } from "./config.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { EscrowService } from "./services/escrow-service.js";

export interface CreateNodeOptions {
  readonly env?: Record<string, string | undefined> | undefined;
  readonly clock?: Clock | undefined;
  /** Overrides the logger derived from LOG_LEVEL and NODE_ENV */
  readonly logger?: Logger | undefined;
}

export interface EscrowNode {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly service: EscrowService;
}

/**
 * @throws {ConfigError} if the environment is invalid
 */
export function createNode(options: CreateNodeOptions = {}): EscrowNode {
  const config = loadConfig(options.env);
  const logger = options.logger ?? createLogger(config);
  const escrow = new VotingEscrow(toEscrowConfig(config), options.clock ?? new SystemClock());
  const service = new EscrowService({ escrow, logger });

  logger.info(
    {
      team: escrow.team,
      treasury: escrow.earlyWithdrawTreasury,
      maxLockTime: escrow.maxLockTime,
      minLockTime: escrow.minLockTime,
    },
    "Escrow node ready",
  );

  return { config, logger, service };
}
