/**
 * @fracta/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { ManualClock, SystemClock } from "@fracta/types";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const parsedKeys = parseApiKeys(config.API_KEYS);
  const apiKeys = new Map(parsedKeys.map((k) => [k.key, k.address]));
  if (apiKeys.size > 0) {
    logger.info({ apiKeyCount: apiKeys.size }, "API key auth configured");
  } else {
    logger.warn("No API keys configured; callers are taken from X-Caller-Address");
  }
  if (config.SANDBOX_ENABLED) {
    logger.warn({ clock: config.CLOCK }, "Sandbox routes enabled");
  }

  const { app, service } = createApp({
    serviceConfig: {
      ownerAddress: config.OWNER_ADDRESS,
      fractionsPerAsset: config.FRACTIONS_PER_ASSET,
      auction: {
        duration: config.AUCTION_DURATION_SECONDS,
        royaltyPercentage: config.ROYALTY_PERCENTAGE,
        antiSnipeWindow: config.ANTI_SNIPE_WINDOW_SECONDS,
        antiSnipeExtension: config.ANTI_SNIPE_EXTENSION_SECONDS,
        maxExtensions: config.AUCTION_MAX_EXTENSIONS,
      },
      governance: {
        proposalThresholdPercentage: config.PROPOSAL_THRESHOLD_PERCENTAGE,
        quorumPercentage: config.QUORUM_PERCENTAGE,
        votingPeriod: config.VOTING_PERIOD_SECONDS,
      },
      timelockDelay: config.TIMELOCK_DELAY_SECONDS,
      bindTimelockAuthority: config.BIND_TIMELOCK_AUTHORITY,
      clock: config.CLOCK === "manual" ? new ManualClock(Math.floor(Date.now() / 1000)) : new SystemClock(),
      logger: logger.child({ component: "service" }),
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onInternalError: (err, requestId) => {
      logger.error({ err, requestId }, "Unhandled error");
    },
    apiKeys,
    sandbox: config.SANDBOX_ENABLED,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST },
    "Fracta node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      service.stop();
      if (err !== undefined) {
        logger.error({ err }, "Server close failed");
        process.exit(1);
      }
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
