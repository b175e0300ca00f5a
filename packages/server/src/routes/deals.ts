/**
 * Deal routes.
 *
 * GET    /api/1/deals       — List (company_id)
 * POST   /api/1/deals       — Create; payment lines settle wallet transactions
 * GET    /api/1/deals/:id   — Get one
 * PUT    /api/1/deals/:id   — Partial update
 * DELETE /api/1/deals/:id   — Delete (settlements stay)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CompanyQuerySchema, CreateDealSchema, UpdateDealSchema } from "../types/dto.js";
import { parseIdParam, parseJsonBody, parseWith } from "../middleware/validate.js";

const LABEL = "deal";

export function createDealRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = parseWith(CompanyQuerySchema, c.req.query());
    return c.json({ deals: c.get("emulator").deals.list(query) });
  });

  routes.post("/", async (c) => {
    const body = await parseJsonBody(c, CreateDealSchema);
    const { deal } = c.get("emulator").deals.create(body);
    return c.json({ deal }, 201);
  });

  routes.get("/:id", (c) => {
    const id = parseIdParam(c, LABEL);
    return c.json({ deal: c.get("emulator").deals.get(id) });
  });

  routes.put("/:id", async (c) => {
    const id = parseIdParam(c, LABEL);
    const body = await parseJsonBody(c, UpdateDealSchema);
    return c.json({ deal: c.get("emulator").deals.update(id, body) });
  });

  routes.delete("/:id", (c) => {
    const id = parseIdParam(c, LABEL);
    c.get("emulator").deals.delete(id);
    return c.body(null, 204);
  });

  return routes;
}
