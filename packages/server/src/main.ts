/**
 * @acct-emulator/server — Entry point.
 *
 * Loads config, opens the store, starts the HTTP server and handles
 * graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, loginCredentials } from "./config.js";
import { createApp } from "./app.js";
import { pinoRequestLog } from "./middleware/logger.js";
import { EmulatorService } from "./services/emulator-service.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const emulator = EmulatorService.open({
    dbPath: config.DB_PATH,
    uploadDir: config.UPLOAD_DIR,
    referenceDataPath: config.REFERENCE_DATA_PATH,
    logger,
    accessTokenTtlSeconds: config.ACCESS_TOKEN_TTL_SECONDS,
    refreshTokenTtlSeconds: config.REFRESH_TOKEN_TTL_SECONDS,
    sessionTtlSeconds: config.AUTH_SESSION_TTL_SECONDS,
    credentials: loginCredentials(config),
    companyId: config.DEFAULT_COMPANY_ID,
    settleWithoutPayments: config.SETTLE_WITHOUT_PAYMENTS,
  });
  emulator.purgeExpired();

  const { app } = createApp({
    emulator,
    logger,
    logFn: pinoRequestLog(logger),
    maxUploadBytes: config.MAX_UPLOAD_BYTES,
    requestTimeoutMs: config.REQUEST_TIMEOUT_MS,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, dbPath: config.DB_PATH },
    "Accounting emulator started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      emulator.close();
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
