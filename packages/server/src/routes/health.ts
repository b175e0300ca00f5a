/**
 * Health check route.
 *
 * GET /health — Liveness probe (200 while the store is open)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    if (c.get("emulator").store.closed) {
      return c.json({ status: "down", timestamp: new Date().toISOString() }, 503);
    }
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  return routes;
}
