/**
 * Bearer token authentication.
 *
 * `Authorization: Bearer <token>` is checked against the token manager.
 * Missing, malformed or unknown/expired tokens get 401.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

const BEARER_PREFIX = "Bearer ";

export function bearerAuthMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const header = c.req.header("Authorization");
    if (header === undefined || header.length === 0) {
      return c.json(createErrorEnvelope("unauthorized", "Missing Authorization header"), 401);
    }

    if (!header.startsWith(BEARER_PREFIX) || header.length === BEARER_PREFIX.length) {
      return c.json(
        createErrorEnvelope("unauthorized", "Invalid Authorization header format"),
        401,
      );
    }

    const token = header.slice(BEARER_PREFIX.length);
    if (!c.get("emulator").tokens.validate(token)) {
      return c.json(createErrorEnvelope("unauthorized", "Invalid or expired token"), 401);
    }

    c.set("token", token);
    return next();
  };
}
