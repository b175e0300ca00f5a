/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 */

import type { EmulatorService } from "../services/emulator-service.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Composition root shared by every route */
    emulator: EmulatorService;

    /** Bearer token of the current request (set by bearer-auth middleware) */
    token: string;
  };
}
