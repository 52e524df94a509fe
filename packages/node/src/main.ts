/**
 * @tallybook/node — Entry point.
 *
 * Loads config, starts the HTTP server and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, loadReconcilerConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const reconciler = loadReconcilerConfig(config.RECONCILIATION_CONFIG_PATH, {
    autoAccept: config.RECONCILIATION_AUTO_ACCEPT_THRESHOLD,
    review: config.RECONCILIATION_REVIEW_THRESHOLD,
  });
  logger.info(
    {
      configPath: config.RECONCILIATION_CONFIG_PATH ?? null,
      thresholds: reconciler.thresholds,
      severityGate: reconciler.severityGate,
    },
    "Reconciliation configured",
  );

  const { app, tenantRegistry } = createApp({
    defaultCurrency: config.DEFAULT_CURRENCY,
    defaultDecimals: config.DEFAULT_DECIMALS,
    reconciler,
    logger,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Tallybook node started");

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await tenantRegistry.stopAll();
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
