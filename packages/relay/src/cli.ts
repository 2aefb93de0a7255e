#!/usr/bin/env node
/**
 * realtime-relay entry point.
 *
 * Loads `.env`, validates configuration from the environment, starts the
 * relay and shuts it down gracefully on SIGINT/SIGTERM. Exits 1 when the
 * configuration is invalid.
 */

import { getErrorMessage, RelayConfigurationError } from "@realtime-relay/errors";
import { config as loadDotenv } from "dotenv";
import { loadRelayConfigFromEnv, type RelayConfig } from "./config.js";
import { createConsoleLogger } from "./logger.js";
import { RelayServer } from "./server.js";
import { buildUpstreamUrl, redactUrl } from "./upstream/upstream-connector.js";
import { RELAY_VERSION } from "./version.js";

function loadConfig(): RelayConfig | undefined {
  try {
    return loadRelayConfigFromEnv();
  } catch (error) {
    if (error instanceof RelayConfigurationError) {
      console.error("[RealtimeRelay] Invalid configuration:");
      for (const issue of error.issues) {
        console.error(`  - ${issue}`);
      }
      return undefined;
    }
    throw error;
  }
}

async function main(): Promise<void> {
  loadDotenv();
  const config = loadConfig();
  if (!config) {
    process.exitCode = 1;
    return;
  }

  const logger = createConsoleLogger(config.logLevel);
  const server = new RelayServer({ config, logger });

  logger.info(`realtime-relay ${RELAY_VERSION}`);
  logger.info(`Upstream: ${redactUrl(buildUpstreamUrl(config.upstream))}`);
  logger.info(
    `Limits: ${config.maxConcurrentPerIdentity} concurrent, ` +
      `${config.maxRequestsPerWindow} per ${config.windowMs}ms`,
  );

  await server.start();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error(`Shutdown failed: ${getErrorMessage(error)}`);
        process.exit(1);
      },
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error(`[RealtimeRelay] Fatal: ${getErrorMessage(error)}`);
  process.exit(1);
});
