/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. main.ts serves it;
 * tests call `app.request()` directly.
 */

import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { timeout } from "hono/timeout";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import type { EmulatorService } from "./services/emulator-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { bearerAuthMiddleware } from "./middleware/bearer-auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createOAuthRoutes } from "./routes/oauth.js";
import { createAuthorizeRoutes } from "./routes/authorize.js";
import { createReferenceRoutes } from "./routes/reference.js";
import { createWalletTxnRoutes } from "./routes/wallet-txns.js";
import { createDealRoutes } from "./routes/deals.js";
import { createJournalRoutes } from "./routes/journals.js";
import { createReceiptRoutes } from "./routes/receipts.js";

// =============================================================================
// App Config
// =============================================================================

export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

export interface CreateAppOptions {
  readonly emulator: EmulatorService;
  /** Used for unexpected failures */
  readonly logger: Logger;
  /** Per-request log sink; omitted → no request log */
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  readonly maxUploadBytes?: number | undefined;
  readonly requestTimeoutMs?: number | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly emulator: EmulatorService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { emulator } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", timeout(options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS));

  app.use("*", async (c, next) => {
    c.set("emulator", emulator);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));
  app.notFound((c) => c.json(createErrorEnvelope("not_found", "Not found"), 404));

  // ─── API Guards ─────────────────────────────────────────────────
  app.use("/api/1/*", bearerAuthMiddleware());
  app.use(
    "/api/1/receipts",
    bodyLimit({
      maxSize: options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES,
      onError: (c) => c.json(createErrorEnvelope("invalid_request", "Request body too large"), 413),
    }),
  );

  // ─── Unauthenticated Routes ─────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/oauth", createOAuthRoutes());
  app.route("/oauth/authorize", createAuthorizeRoutes());

  // ─── API Routes ─────────────────────────────────────────────────
  app.route("/api/1", createReferenceRoutes());
  app.route("/api/1/wallet_txns", createWalletTxnRoutes());
  app.route("/api/1/deals", createDealRoutes());
  app.route("/api/1/journals", createJournalRoutes());
  app.route("/api/1/receipts", createReceiptRoutes());

  return { app, emulator };
}
