/**
 * @custody/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { InMemoryAssetTransfer } from "@custody/vault";
import { loadConfig, parseSeedHoldings } from "./config.js";
import { createApp } from "./app.js";
import { createOracle } from "./services/oracle-factory.js";

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const managed = createOracle(config);
  await managed.start();
  logger.info({ oracle: managed.description }, "Oracle ready");

  const transfer = new InMemoryAssetTransfer();
  const seeds = parseSeedHoldings(config.SEED_HOLDINGS);
  for (const seed of seeds) {
    transfer.fund(seed.account, seed.asset, seed.amount);
  }
  if (seeds.length > 0) {
    logger.info({ holdings: seeds.length }, "External holdings seeded");
  }

  const { app } = createApp({
    serviceConfig: {
      maxTotalValue: config.MAX_TOTAL_VALUE,
      maxWithdrawValue: config.MAX_WITHDRAW_VALUE,
      oracle: managed.oracle,
      transfer,
      maxOracleAgeSeconds: config.ORACLE_MAX_AGE_SECONDS,
      logger: logger.child({ component: "vault" }),
    },
    requestLogger: logger.child({ component: "http" }),
    onInternalError: (err, c) => {
      logger.error({ err, requestId: c.get("requestId") }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      maxTotalValue: config.MAX_TOTAL_VALUE.toString(),
      maxWithdrawValue: config.MAX_WITHDRAW_VALUE.toString(),
    },
    "Custody node started",
  );

  // Graceful shutdown
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await managed.stop();
    logger.info("Shutdown complete");
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
