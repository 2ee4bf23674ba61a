/**
 * @escrowpoint/node — Entry point.
 *
 * Builds the node from the environment and handles graceful shutdown.
 */

import { createNode } from "./node.js";

async function main(): Promise<void> {
  const { logger, service } = createNode();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    await service.idle();
    logger.info({ stateHash: service.snapshot().stateHash }, "Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
